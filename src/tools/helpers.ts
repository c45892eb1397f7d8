import type { z } from "zod";
import type { ToolContext } from "./context.js";
import type { ErrorCategory, ErrorResponse, SuccessResponse, ToolResponse } from "../types/response.js";
import type { ToolMetadata } from "../types/tool.js";
import type { ExecutionResult } from "../types/result.js";
import { BmcErrorCode } from "../shared/errors.js";

// ── Response Builders ──────────────────────────────────────────────

export function success(
  tool: string,
  targetHost: string,
  durationMs: number,
  data: Record<string, unknown>,
  extra?: Partial<SuccessResponse>,
): SuccessResponse {
  return { status: "success", tool, target_host: targetHost, duration_ms: durationMs, data, ...extra };
}

export function error(
  tool: string,
  targetHost: string,
  durationMs: number,
  opts: { code: string; category: ErrorCategory; message: string; transient?: boolean; remediation?: string[] },
): ErrorResponse {
  return {
    status: "error", tool, target_host: targetHost, duration_ms: durationMs,
    error_code: opts.code, error_category: opts.category, message: opts.message,
    transient: opts.transient ?? false,
    remediation: opts.remediation ?? [],
  };
}

// ── Error Classification ───────────────────────────────────────────

interface ErrorClass {
  category: ErrorCategory;
  transient: boolean;
  remediation: string[];
}

const ERROR_CLASSES: Record<BmcErrorCode, ErrorClass> = {
  [BmcErrorCode.NOT_FOUND]: { category: "not_found", transient: false,
    remediation: ["Check the hostname spelling", "Confirm the device exists in inventory"] },
  [BmcErrorCode.AMBIGUOUS]: { category: "not_found", transient: false,
    remediation: ["Qualify the hostname, e.g. with its region suffix"] },
  [BmcErrorCode.MISSING_ATTRIBUTE]: { category: "not_found", transient: false,
    remediation: ["Fill in the device's out-of-band IP and manufacturer in inventory"] },
  [BmcErrorCode.INVALID_ADDRESS]: { category: "not_found", transient: false,
    remediation: ["Fix the device's out-of-band IP in inventory"] },
  [BmcErrorCode.UNREACHABLE]: { category: "network", transient: true,
    remediation: ["Check that the BMC is powered and cabled", "Verify routing to the management network"] },
  [BmcErrorCode.TIMED_OUT]: { category: "timeout", transient: true,
    remediation: ["Retry; BMCs stall under load", "Reset the BMC if it keeps timing out"] },
  [BmcErrorCode.AUTHENTICATION_FAILED]: { category: "authentication", transient: false,
    remediation: ["Check IPMI_PASSWORD", "Check that the BMC account is not locked out"] },
  [BmcErrorCode.PROTOCOL_ERROR]: { category: "protocol", transient: false,
    remediation: ["Review the vendor message above", "Check the BMC firmware version"] },
  [BmcErrorCode.INVALID_ARGUMENT]: { category: "validation", transient: false,
    remediation: ["Review the tool's input schema"] },
  [BmcErrorCode.UNSUPPORTED_MANUFACTURER]: { category: "validation", transient: false,
    remediation: ["This operation is only available for the vendors named in the message"] },
  [BmcErrorCode.BAD_CONFIRMATION]: { category: "confirmation", transient: false,
    remediation: ["Call bmc_magic for the host and pass its token as magic"] },
  [BmcErrorCode.MISSING_REASON]: { category: "confirmation", transient: false,
    remediation: ["Pass a non-empty reason"] },
  [BmcErrorCode.MISSING_CONFIGURATION]: { category: "configuration", transient: false,
    remediation: ["Set the environment variable or config key named in the message"] },
};

export function classify(code: BmcErrorCode): ErrorClass {
  return ERROR_CLASSES[code];
}

/** Convert a router result into the MCP response envelope. */
export function toToolResponse(tool: string, result: ExecutionResult, durationMs: number): ToolResponse {
  if (!result.success) {
    const code = result.errorKind ?? BmcErrorCode.PROTOCOL_ERROR;
    const cls = classify(code);
    return error(tool, result.hostname, durationMs, {
      code, category: cls.category, message: result.message, transient: cls.transient, remediation: cls.remediation,
    });
  }

  const data: Record<string, unknown> = { lines: result.lines };
  const fields = result.structuredFields;
  if (fields) data.disks = fields.disks;
  return success(tool, result.hostname, durationMs, data, {
    summary: result.message,
    ...(fields ? { total: fields.disks.length } : {}),
    ...(fields?.warning !== undefined ? { warning: fields.warning } : {}),
  });
}

// ── Tool Registration Helper ───────────────────────────────────────

/**
 * Register a tool whose handler receives validated input. Input that fails the schema
 * is answered with a validation error and never reaches the handler.
 */
export function registerTool<S extends z.ZodRawShape>(
  ctx: ToolContext,
  metadata: Omit<ToolMetadata, "inputSchema"> & { inputSchema: z.ZodObject<S> },
  handler: (args: z.infer<z.ZodObject<S>>) => Promise<ToolResponse>,
): void {
  ctx.registry.register({
    metadata,
    execute: async (raw) => {
      const parsed = metadata.inputSchema.safeParse(raw);
      if (!parsed.success) {
        const host = typeof raw.host === "string" ? raw.host : "";
        return error(metadata.name, host, 0, {
          code: BmcErrorCode.INVALID_ARGUMENT,
          category: "validation",
          message: parsed.error.issues.map((i) => `${i.path.join(".") || "input"}: ${i.message}`).join("; "),
          remediation: classify(BmcErrorCode.INVALID_ARGUMENT).remediation,
        });
      }
      return handler(parsed.data);
    },
  });
}
