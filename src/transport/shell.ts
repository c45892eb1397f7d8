// Remote shell transport: one SSH session per call, one command per session.
// The session is closed on every path once connect() has returned.
import { Client, type ClientChannel } from "ssh2";
import type { BmctlConfig, Credentials } from "../types/config.js";
import type { Target } from "../types/target.js";
import type { ShellOutput, Transport } from "./types.js";
import { requireBmcPassword } from "./credentials.js";
import { BmcError, BmcErrorCode, describeError } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface ShellConnectOptions {
  readonly host: string;
  readonly port: number;
  readonly username: string;
  readonly password: string;
  readonly readyTimeoutMs: number;
}

export interface ShellExecResult {
  readonly output: string;
  readonly exitCode: number | null;
}

/** An established, authenticated session. */
export interface ShellSession {
  exec(command: string, timeoutMs: number): Promise<ShellExecResult>;
  close(): void;
}

/**
 * Opens a session or throws a BmcError. Implementations release everything they
 * opened before rejecting.
 */
export type ShellConnector = (options: ShellConnectOptions) => Promise<ShellSession>;

export class ShellTransport implements Transport<string, ShellOutput> {
  readonly name = "shell" as const;

  constructor(
    private readonly config: Pick<BmctlConfig, "shell">,
    private readonly credentials: Credentials,
    private readonly connect: ShellConnector = sshConnect,
  ) {}

  async execute(target: Target, command: string): Promise<ShellOutput> {
    const { shell } = this.config;
    const session = await this.connect({
      host: target.managementAddress,
      port: shell.port,
      username: shell.username,
      password: requireBmcPassword(this.credentials),
      readyTimeoutMs: shell.connect_timeout_seconds * 1000,
    });

    try {
      logger.debug({ host: target.hostname, command }, "Running remote shell command");
      const { output, exitCode } = await session.exec(command, shell.command_timeout_seconds * 1000);
      return { command, output, exitCode };
    } finally {
      session.close();
    }
  }
}

/** ssh2-backed connector. Password and keyboard-interactive auth both answer with the BMC password. */
export const sshConnect: ShellConnector = (options) =>
  new Promise<ShellSession>((resolve, reject) => {
    const client = new Client();
    let ready = false;

    client.on("ready", () => {
      ready = true;
      resolve(new Ssh2Session(client));
    });
    client.on("keyboard-interactive", (_name, _instructions, _lang, prompts, finish) => {
      finish(prompts.map(() => options.password));
    });
    client.on("error", (err) => {
      if (ready) {
        logger.warn({ host: options.host, error: err.message }, "SSH session error");
        return;
      }
      client.end();
      if (err.level === "client-authentication") {
        reject(new BmcError(BmcErrorCode.AUTHENTICATION_FAILED, `SSH authentication to ${options.host} failed`));
        return;
      }
      reject(
        new BmcError(BmcErrorCode.PROTOCOL_ERROR, `SSH session to ${options.host} failed: ${describeError(err)}`),
      );
    });

    client.connect({
      host: options.host,
      port: options.port,
      username: options.username,
      password: options.password,
      tryKeyboard: true,
      readyTimeout: options.readyTimeoutMs,
    });
  });

class Ssh2Session implements ShellSession {
  constructor(private readonly client: Client) {}

  exec(command: string, timeoutMs: number): Promise<ShellExecResult> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new BmcError(BmcErrorCode.TIMED_OUT, `Remote command '${command}' timed out`));
      }, timeoutMs);

      this.client.exec(command, (err: Error | undefined, stream: ClientChannel) => {
        if (err) {
          clearTimeout(timer);
          reject(new BmcError(BmcErrorCode.PROTOCOL_ERROR, `Remote command failed: ${describeError(err)}`));
          return;
        }
        const chunks: Buffer[] = [];
        let exitCode: number | null = null;
        stream.on("data", (chunk: Buffer) => chunks.push(chunk));
        stream.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));
        stream.on("exit", (code: number | null) => {
          exitCode = code;
        });
        stream.on("close", () => {
          clearTimeout(timer);
          resolve({ output: Buffer.concat(chunks).toString("utf-8"), exitCode });
        });
      });
    });
  }

  close(): void {
    this.client.end();
  }
}
