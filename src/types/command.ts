/**
 * A structured command ready for local execution.
 * Transports never hand the executor a shell string; they produce Command objects.
 */
export interface Command {
  readonly argv: readonly string[];
  readonly env?: Record<string, string>;
}
