// Presentation adapter for the terminal. The core never formats; this is the only place
// an ExecutionResult becomes text.
import type { ExecutionResult } from "../types/result.js";

export const CLI_PREFIX = "bmctl: ";

export interface RenderedResult {
  readonly stdout: readonly string[];
  readonly stderr: readonly string[];
  readonly exitCode: 0 | 1;
}

/** Success: summary then body on stdout. Failure: one prefixed line on stderr. */
export function renderResult(result: ExecutionResult, json = false): RenderedResult {
  const exitCode = result.success ? 0 : 1;
  if (json) {
    return { stdout: [JSON.stringify(result, null, 2)], stderr: [], exitCode };
  }
  if (!result.success) {
    return { stdout: [], stderr: [`${CLI_PREFIX}${result.message}`], exitCode };
  }
  return { stdout: [result.message, ...result.lines], stderr: [], exitCode };
}

/** Commander prints "error: ..." with a trailing newline. */
export function formatUsageError(text: string): string {
  const line = text.split("\n").map((l) => l.trim()).find((l) => l !== "") ?? "invalid usage";
  return `${CLI_PREFIX}${line.replace(/^error:\s*/, "")}`;
}
