import type { Target } from "../types/target.js";

export type TransportName = "ipmi" | "shell" | "redfish";

/**
 * One way of reaching a BMC. Every implementation runs exactly one logical call per
 * execute() and opens a fresh, freshly authenticated session for it.
 */
export interface Transport<P, R> {
  readonly name: TransportName;
  execute(target: Target, payload: P): Promise<R>;
}

/** Raw ipmitool outcome, stdout and stderr combined in that order. */
export interface IpmiOutput {
  readonly command: string;
  readonly output: string;
  readonly exitCode: number;
  readonly timedOut: boolean;
  /** Present only when the session could not be established and a diagnostic run was made. */
  readonly sessionDiagnosis?: "authentication" | "unknown";
}

export interface ShellOutput {
  readonly command: string;
  readonly output: string;
  readonly exitCode: number | null;
}

export type HttpMethod = "GET" | "POST";

export interface RedfishRequest {
  readonly method: HttpMethod;
  readonly path: string;
  readonly body?: Record<string, unknown>;
}

export interface RedfishResponse {
  readonly status: number;
  readonly path: string;
  /** Parsed JSON body; the raw text when the body is not JSON; null when empty. */
  readonly body: unknown;
  readonly text: string;
}

/** The three transports the router selects from. */
export interface Transports {
  readonly ipmi: Transport<string, IpmiOutput>;
  readonly shell: Transport<string, ShellOutput>;
  readonly redfish: Transport<RedfishRequest, RedfishResponse>;
}
