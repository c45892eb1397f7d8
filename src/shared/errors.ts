export enum BmcErrorCode {
  // Inventory resolution
  NOT_FOUND = "NOT_FOUND",
  AMBIGUOUS = "AMBIGUOUS",
  MISSING_ATTRIBUTE = "MISSING_ATTRIBUTE",
  INVALID_ADDRESS = "INVALID_ADDRESS",
  // Transport
  UNREACHABLE = "UNREACHABLE",
  TIMED_OUT = "TIMED_OUT",
  AUTHENTICATION_FAILED = "AUTHENTICATION_FAILED",
  PROTOCOL_ERROR = "PROTOCOL_ERROR",
  // Routing and validation
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
  UNSUPPORTED_MANUFACTURER = "UNSUPPORTED_MANUFACTURER",
  BAD_CONFIRMATION = "BAD_CONFIRMATION",
  MISSING_REASON = "MISSING_REASON",
  MISSING_CONFIGURATION = "MISSING_CONFIGURATION",
}

export class BmcError extends Error {
  readonly code: BmcErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: BmcErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "BmcError";
    this.code = code;
    this.context = context;
  }
}

/** Render an unknown thrown value as a single line. */
export function describeError(err: unknown): string {
  const message = err instanceof Error ? err.message : String(err);
  return message.split("\n")[0]?.trim() ?? "";
}
