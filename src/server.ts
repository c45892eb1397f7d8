#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";

import { logger } from "./logger.js";
import { createRuntime } from "./runtime.js";
import { ToolRegistry } from "./tools/registry.js";
import type { ToolContext } from "./tools/context.js";
import { registerBmcTools } from "./tools/bmc/index.js";
import type { ToolResponse } from "./types/response.js";
import { describeError } from "./shared/errors.js";
import { VERSION } from "./version.js";

/** Build an MCP server exposing every registered tool. */
export function createServer(registry: ToolRegistry): McpServer {
  const server = new McpServer({ name: "bmctl", version: VERSION });

  for (const tool of registry.list()) {
    const meta = tool.metadata;
    const name = meta.name;

    const inputShape: Record<string, z.ZodTypeAny> = {};
    if (meta.inputSchema instanceof z.ZodObject) {
      for (const [key, value] of Object.entries(meta.inputSchema.shape)) {
        if (value instanceof z.ZodType) inputShape[key] = value;
      }
    }

    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: inputShape,
        annotations: {
          readOnlyHint: meta.annotations?.readOnlyHint ?? meta.riskLevel === "read-only",
          destructiveHint: meta.annotations?.destructiveHint ?? false,
          idempotentHint: meta.annotations?.idempotentHint ?? false,
          openWorldHint: meta.annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>) => {
        try {
          const response: ToolResponse = await tool.execute(args);
          return {
            content: [{ type: "text" as const, text: JSON.stringify(response, null, 2) }],
          };
        } catch (err) {
          const message = describeError(err);
          logger.error({ tool: name, error: message }, "Tool execution error");
          return {
            content: [{
              type: "text" as const,
              text: JSON.stringify({
                status: "error",
                tool: name,
                target_host: typeof args.host === "string" ? args.host : "",
                duration_ms: 0,
                error_code: "INTERNAL_ERROR",
                error_category: "protocol",
                message,
                transient: false,
                remediation: ["Check server logs for details"],
              }),
            }],
            isError: true,
          };
        }
      },
    );
  }
  return server;
}

async function main(): Promise<void> {
  logger.info("Starting bmctl MCP server");

  const { router, configPath } = createRuntime();
  const registry = new ToolRegistry();
  const ctx: ToolContext = { router, registry };
  registerBmcTools(ctx);
  logger.info({ toolCount: registry.size, configPath }, "Tools registered");

  const server = createServer(registry);
  await server.connect(new StdioServerTransport());
  logger.info("bmctl MCP server running on stdio");
}

if (require.main === module) {
  main().catch((err) => {
    logger.fatal({ error: err }, "Fatal startup error");
    process.exit(1);
  });
}
