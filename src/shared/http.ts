// Minimal JSON-over-HTTP(S) client shared by the Redfish transport, the inventory
// resolver and the fleet notifier. One connection per request (no keep-alive pool),
// a per-request TLS verification switch, and every failure mapped to a BmcError.
import { request as httpRequest } from "node:http";
import { request as httpsRequest } from "node:https";
import { BmcError, BmcErrorCode, describeError } from "./errors.js";

const CONNECT_FAILURE_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "ETIMEDOUT",
]);

export interface HttpRequest {
  readonly method: "GET" | "POST";
  readonly url: string;
  readonly headers?: Record<string, string>;
  /** Serialized as JSON when present. */
  readonly body?: unknown;
  /** Wall-clock limit for the whole exchange. */
  readonly timeoutMs: number;
  /** Socket inactivity limit; bounds a stalled connect. */
  readonly connectTimeoutMs?: number;
  /** Only consulted for https URLs. Defaults to true. */
  readonly tlsVerify?: boolean;
}

export interface HttpResult {
  readonly status: number;
  /** Parsed JSON, the raw text when it is not JSON, or null when empty. */
  readonly body: unknown;
  readonly text: string;
}

export function decodeBody(text: string): { body: unknown; text: string } {
  if (text.trim() === "") return { body: null, text };
  try {
    const body: unknown = JSON.parse(text);
    return { body, text };
  } catch {
    return { body: text, text };
  }
}

export function basicAuth(username: string, password: string): string {
  return `Basic ${Buffer.from(`${username}:${password}`, "utf-8").toString("base64")}`;
}

/** Maps a socket or request failure to the transport error taxonomy. */
export function classifyRequestError(err: unknown, endpoint: string): BmcError {
  if (err instanceof BmcError) return err;
  const code = errorCode(err);
  if (code !== undefined && CONNECT_FAILURE_CODES.has(code)) {
    return new BmcError(BmcErrorCode.UNREACHABLE, `Cannot connect to ${endpoint} (${code})`, { code });
  }
  return new BmcError(BmcErrorCode.PROTOCOL_ERROR, `Request to ${endpoint} failed: ${describeError(err)}`, {
    code,
  });
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function sendRequest(req: HttpRequest): Promise<HttpResult> {
  const url = new URL(req.url);
  const endpoint = `${url.origin}${url.pathname}`;
  const isHttps = url.protocol === "https:";
  const requestFn = isHttps ? httpsRequest : httpRequest;
  const payload = req.body !== undefined ? Buffer.from(JSON.stringify(req.body), "utf-8") : undefined;

  return new Promise((resolve, reject) => {
    const request = requestFn(
      {
        protocol: url.protocol,
        hostname: url.hostname,
        port: url.port ? Number(url.port) : undefined,
        path: `${url.pathname}${url.search}`,
        method: req.method,
        agent: false,
        headers: {
          ...req.headers,
          ...(payload ? { "content-type": "application/json", "content-length": String(payload.length) } : {}),
        },
        ...(isHttps ? { rejectUnauthorized: req.tlsVerify ?? true } : {}),
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("error", (err) => {
          clearTimeout(timer);
          reject(classifyRequestError(err, endpoint));
        });
        res.on("end", () => {
          clearTimeout(timer);
          resolve({ status: res.statusCode ?? 0, ...decodeBody(Buffer.concat(chunks).toString("utf-8")) });
        });
      },
    );

    const timer = setTimeout(() => {
      request.destroy(new BmcError(BmcErrorCode.TIMED_OUT, `Request to ${endpoint} timed out`));
    }, req.timeoutMs);

    if (req.connectTimeoutMs !== undefined) {
      request.setTimeout(req.connectTimeoutMs, () => {
        request.destroy(new BmcError(BmcErrorCode.TIMED_OUT, `Request to ${endpoint} stalled`));
      });
    }
    request.on("error", (err) => {
      clearTimeout(timer);
      reject(classifyRequestError(err, endpoint));
    });
    if (payload) request.write(payload);
    request.end();
  });
}
