import type { ExecutionResult, Operation, RunOptions } from "../types/index.js";
import type { ToolRegistry } from "./registry.js";

/** The part of the command router the tool layer depends on. */
export interface OperationRunner {
  run(hostname: string, operation: Operation, options?: RunOptions): Promise<ExecutionResult>;
}

/**
 * Shared tool context. Created once at startup, passed to all tool modules.
 */
export interface ToolContext {
  readonly router: OperationRunner;
  readonly registry: ToolRegistry;
}
