// Command execution layer. Every local process the tool starts passes through this module.
// LocalExecutor.execute() is the hard boundary between transports and the OS: argv only,
// no shell, and every call is bounded by a soft timeout followed by a hard kill.
import execa from "execa";
import type { Command } from "../types/command.js";
import { BmcError, BmcErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly timedOut: boolean;
  readonly durationMs: number;
}

export interface ExecLimits {
  /** SIGTERM is sent once this elapses. */
  readonly timeoutMs: number;
  /** Grace period after SIGTERM before SIGKILL. */
  readonly killAfterMs: number;
}

/** Executor interface: the only way transports start local processes. */
export interface Executor {
  execute(command: Command, limits: ExecLimits): Promise<ExecResult>;
}

export class LocalExecutor implements Executor {
  async execute(command: Command, limits: ExecLimits): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (!cmd) {
      throw new BmcError(BmcErrorCode.INVALID_ARGUMENT, "Empty command");
    }

    const result = await execa(cmd, args, {
      env: command.env,
      extendEnv: true,
      timeout: limits.timeoutMs,
      killSignal: "SIGTERM",
      forceKillAfterTimeout: limits.killAfterMs,
      reject: false,
      stdin: "ignore",
    });
    const durationMs = Math.round(performance.now() - start);

    // Spawn failures (missing binary, EACCES) come back without an exit code.
    if (result.failed && !result.timedOut && typeof result.exitCode !== "number") {
      throw new BmcError(BmcErrorCode.PROTOCOL_ERROR, `Command failed to spawn: ${cmd}`, {
        command: result.command,
      });
    }

    logger.debug({ cmd, exitCode: result.exitCode, timedOut: result.timedOut, durationMs }, "Command finished");
    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      exitCode: typeof result.exitCode === "number" ? result.exitCode : 1,
      timedOut: result.timedOut,
      durationMs,
    };
  }
}
