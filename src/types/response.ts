/** Error categories reported to MCP clients. */
export type ErrorCategory =
  | "not_found"
  | "validation"
  | "network"
  | "timeout"
  | "authentication"
  | "protocol"
  | "confirmation"
  | "configuration";

/** Base fields present in every response. */
export interface ResponseBase {
  status: "success" | "error";
  tool: string;
  target_host: string;
  duration_ms: number;
}

/** Successful response with tool-specific data. */
export interface SuccessResponse extends ResponseBase {
  status: "success";
  data: Record<string, unknown>;
  summary?: string;
  // Drive listings
  total?: number;
  warning?: string;
}

export interface ErrorResponse extends ResponseBase {
  status: "error";
  error_code: string;
  error_category: ErrorCategory;
  message: string;
  transient: boolean;
  remediation: string[];
}

export type ToolResponse = SuccessResponse | ErrorResponse;
