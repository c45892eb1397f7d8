import { z } from "zod";
import type { ToolContext } from "../context.js";
import type { Operation, OperationName, RunOptions } from "../../types/operation.js";
import type { ToolResponse } from "../../types/response.js";
import { OPERATION_RISK } from "../../types/risk.js";
import { confirmationToken } from "../../safety/gate.js";
import { registerTool, success, toToolResponse } from "../helpers.js";

const host = z.string().min(1).describe("Hostname as recorded in inventory");
const magic = z.string().optional().describe("Confirmation token from bmc_magic");
const reason = z.string().optional().describe("Why the host is being taken down; sent to the fleet service");
const ledState = z.enum(["on", "off"]).describe("'on' starts the locate LED blinking, 'off' stops it");
const slot = z.union([z.string(), z.number()]).transform((v) => String(v)).describe("Drive bay number, e.g. 3");

const READ_ONLY: { op: "power" | "health" | "sel" | "drive_status" | "nvme_status"; description: string }[] = [
  { op: "power", description: "Chassis power state via IPMI." },
  { op: "health", description: "Sensor readings via IPMI." },
  { op: "sel", description: "System event log via IPMI." },
  { op: "drive_status", description: "Physical disk listing via RACADM over SSH. Dell only. Warns on an odd drive count." },
  { op: "nvme_status", description: "NVMe drive listing via Redfish. Dell and Supermicro." },
];

async function timed(tool: string, ctx: ToolContext, hostname: string, operation: Operation, options?: RunOptions): Promise<ToolResponse> {
  const start = performance.now();
  const result = await ctx.router.run(hostname, operation, options);
  return toToolResponse(tool, result, Math.round(performance.now() - start));
}

function toolName(op: OperationName): string {
  return `bmc_${op}`;
}

export function registerBmcTools(ctx: ToolContext): void {
  // ── read-only queries ───────────────────────────────────────────
  for (const { op, description } of READ_ONLY) {
    registerTool(ctx, {
      name: toolName(op), description,
      module: "bmc", riskLevel: OPERATION_RISK[op],
      inputSchema: z.object({ host }),
      annotations: { readOnlyHint: true, openWorldHint: true },
    }, async (args) => timed(toolName(op), ctx, args.host, { kind: op }));
  }

  // ── bmc_poweron ─────────────────────────────────────────────────
  registerTool(ctx, {
    name: "bmc_poweron", description: "Power the chassis on via IPMI.",
    module: "bmc", riskLevel: OPERATION_RISK.poweron,
    inputSchema: z.object({ host, magic }),
    annotations: { idempotentHint: true, openWorldHint: true },
  }, async (args) => timed("bmc_poweron", ctx, args.host, { kind: "poweron" }, { magic: args.magic }));

  // ── bmc_boot ────────────────────────────────────────────────────
  registerTool(ctx, {
    name: "bmc_boot", description: "Set the next boot device (pxe or bios). Sets boot device, then boot flag.",
    module: "bmc", riskLevel: OPERATION_RISK.boot,
    inputSchema: z.object({ host, mode: z.string().optional().describe("'pxe' or 'bios'"), magic }),
    annotations: { idempotentHint: true, openWorldHint: true },
  }, async (args) => timed("bmc_boot", ctx, args.host, { kind: "boot", mode: args.mode }, { magic: args.magic }));

  // ── bmc_reboot / bmc_kdump ──────────────────────────────────────
  for (const op of ["reboot", "kdump"] as const) {
    registerTool(ctx, {
      name: toolName(op),
      description: op === "reboot"
        ? "Power-cycle the host. Critical: requires the host's confirmation token and a reason."
        : "Send a diagnostic interrupt (NMI) to trigger a crash dump. Critical: requires the host's confirmation token and a reason.",
      module: "bmc", riskLevel: OPERATION_RISK[op],
      inputSchema: z.object({ host, magic, reason }),
      annotations: { destructiveHint: true, openWorldHint: true },
    }, async (args) => timed(toolName(op), ctx, args.host, { kind: op, reason: args.reason }, { magic: args.magic }));
  }

  // ── bmc_drive_locate / bmc_nvme_locate ──────────────────────────
  for (const op of ["drive_locate", "nvme_locate"] as const) {
    registerTool(ctx, {
      name: toolName(op),
      description: op === "drive_locate"
        ? "Blink or unblink a drive bay LED via RACADM over SSH. Dell only."
        : "Blink or unblink an NVMe bay LED via Redfish. Dell only.",
      module: "bmc", riskLevel: OPERATION_RISK[op],
      inputSchema: z.object({ host, state: ledState, slot, magic }),
      annotations: { idempotentHint: true, openWorldHint: true },
    }, async (args) =>
      timed(toolName(op), ctx, args.host, { kind: op, state: args.state, slot: args.slot }, { magic: args.magic }));
  }

  // ── bmc_magic ───────────────────────────────────────────────────
  registerTool(ctx, {
    name: "bmc_magic", description: "Confirmation token required by bmc_reboot and bmc_kdump for this host.",
    module: "bmc", riskLevel: "read-only",
    inputSchema: z.object({ host }),
    annotations: { readOnlyHint: true },
  }, async (args) => success("bmc_magic", args.host, 0, { token: confirmationToken(args.host) }));
}
