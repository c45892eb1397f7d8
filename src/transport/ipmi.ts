// Local CLI transport: drives ipmitool against the management address.
// Every call is preceded by an ICMP liveness probe; a fully lost probe short-circuits
// before ipmitool is started. The password reaches ipmitool through its -E environment
// lookup, never through argv.
import type { Executor, ExecResult } from "../execution/executor.js";
import type { BmctlConfig, Credentials } from "../types/config.js";
import type { Target } from "../types/target.js";
import type { IpmiOutput, Transport } from "./types.js";
import { requireBmcPassword } from "./credentials.js";
import { hasAuthenticationSignature, isSessionFailure } from "../normalizer/ipmi.js";
import { BmcError, BmcErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

const PACKET_LOSS = /(\d+(?:\.\d+)?)% packet loss/;

/** Read-only command for the verbose re-run. The operator's payload is never sent twice. */
export const DIAGNOSTIC_COMMAND = "chassis power status";

export class IpmiTransport implements Transport<string, IpmiOutput> {
  readonly name = "ipmi" as const;

  constructor(
    private readonly executor: Executor,
    private readonly config: Pick<BmctlConfig, "ipmi" | "probe">,
    private readonly credentials: Credentials,
  ) {}

  async execute(target: Target, command: string): Promise<IpmiOutput> {
    const password = requireBmcPassword(this.credentials);
    await this.probe(target);

    const first = await this.invoke(target, command, password, false);
    const output = combine(first);
    const base = { command, output, exitCode: first.exitCode, timedOut: first.timedOut };
    if (!isSessionFailure(output)) return base;

    // One verbose re-run, only to tell bad credentials apart from other session failures.
    // Its result is never returned as the operation's output.
    logger.info({ host: target.hostname, command }, "IPMI session failed, running diagnostic");
    const diagnostic = await this.invoke(target, DIAGNOSTIC_COMMAND, password, true);
    return {
      ...base,
      sessionDiagnosis: hasAuthenticationSignature(combine(diagnostic)) ? "authentication" : "unknown",
    };
  }

  /** Two echo requests; 100% loss means the BMC is not worth talking to. */
  private async probe(target: Target): Promise<void> {
    const { binary, count, timeout_seconds } = this.config.probe;
    const result = await this.executor.execute(
      { argv: [binary, "-c", String(count), "-W", String(timeout_seconds), target.managementAddress] },
      { timeoutMs: (count * timeout_seconds + 2) * 1000, killAfterMs: 1000 },
    );
    const output = combine(result);
    const loss = PACKET_LOSS.exec(output);
    const unreachable = loss ? Number(loss[1]) >= 100 : result.exitCode !== 0;
    if (unreachable) {
      throw new BmcError(
        BmcErrorCode.UNREACHABLE,
        `${target.managementAddress} does not answer ping (100% packet loss)`,
        { output },
      );
    }
  }

  private invoke(target: Target, command: string, password: string, verbose: boolean): Promise<ExecResult> {
    const { ipmi } = this.config;
    const argv = [
      ipmi.binary,
      "-I", ipmi.interface,
      "-H", target.managementAddress,
      "-U", ipmi.username,
      "-L", ipmi.privilege,
      "-E",
      ...(verbose ? ["-vvv"] : []),
      ...command.split(/\s+/).filter(Boolean),
    ];
    return this.executor.execute(
      { argv, env: { IPMI_PASSWORD: password } },
      { timeoutMs: ipmi.timeout_seconds * 1000, killAfterMs: ipmi.kill_after_seconds * 1000 },
    );
  }
}

function combine(result: ExecResult): string {
  return [result.stdout, result.stderr].filter((s) => s !== "").join("\n");
}
