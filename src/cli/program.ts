import { Command, CommanderError } from "commander";
import type { Operation, RunOptions } from "../types/operation.js";
import type { OperationRunner } from "../tools/context.js";
import { confirmationToken } from "../safety/gate.js";
import { describeError } from "../shared/errors.js";
import { CLI_PREFIX, formatUsageError, renderResult } from "./format.js";
import { logger } from "../logger.js";
import { VERSION } from "../version.js";

export interface CliDeps {
  /** Built lazily so that `magic`, --help and usage errors need no config or network. */
  createRouter(configPath?: string): OperationRunner;
  out(line: string): void;
  err(line: string): void;
}

interface GlobalOptions {
  config?: string;
  json?: boolean;
}

const QUERIES = [
  { name: "power", description: "chassis power state" },
  { name: "health", description: "sensor readings" },
  { name: "sel", description: "system event log" },
  { name: "drive_status", description: "physical disk listing (Dell, RACADM over SSH)" },
  { name: "nvme_status", description: "NVMe drive listing (Dell, Supermicro; Redfish)" },
] as const;

/**
 * Parses argv, runs at most one operation and returns the process exit code.
 * Never throws for operator errors; every failure is one prefixed line on stderr.
 */
export async function runCli(argv: readonly string[], deps: CliDeps): Promise<number> {
  let exitCode = 0;
  const program = new Command();

  const run = async (hostname: string, operation: Operation, options: RunOptions = {}): Promise<void> => {
    const globals = program.opts<GlobalOptions>();
    const router = deps.createRouter(globals.config);
    const rendered = renderResult(await router.run(hostname, operation, options), globals.json ?? false);
    rendered.stdout.forEach((line) => deps.out(line));
    rendered.stderr.forEach((line) => deps.err(line));
    exitCode = rendered.exitCode;
  };

  program
    .name("bmctl")
    .description("Out-of-band server management through the host's BMC")
    .version(VERSION)
    .option("-c, --config <path>", "config file (default: $BMCTL_CONFIG or ~/.config/bmctl/config.yaml)")
    .option("--json", "print the full result as JSON")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.out(text.trimEnd()),
      writeErr: (text) => deps.err(text.trimEnd()),
      outputError: (text, write) => write(formatUsageError(text)),
    });

  for (const { name, description } of QUERIES) {
    program
      .command(name)
      .description(description)
      .argument("<host>")
      .action((host: string) => run(host, { kind: name }));
  }

  program
    .command("poweron")
    .description("power the chassis on")
    .argument("<host>")
    .option("--magic <token>", "confirmation token, when the configured threshold asks for one")
    .action((host: string, opts: { magic?: string }) => run(host, { kind: "poweron" }, { magic: opts.magic }));

  program
    .command("boot")
    .description("set the next boot device")
    .argument("<host>")
    .argument("[mode]", "pxe or bios")
    .option("--magic <token>", "confirmation token, when the configured threshold asks for one")
    .action((host: string, mode: string | undefined, opts: { magic?: string }) =>
      run(host, { kind: "boot", mode }, { magic: opts.magic }),
    );

  for (const kind of ["reboot", "kdump"] as const) {
    program
      .command(kind)
      .description(kind === "reboot" ? "power-cycle the host" : "diagnostic interrupt (crash dump)")
      .argument("<host>")
      .option("--magic <token>", "confirmation token (see `bmctl magic <host>`)")
      .option("--reason <text>", "why the host is going down")
      .action((host: string, opts: { magic?: string; reason?: string }) =>
        run(host, { kind, reason: opts.reason }, { magic: opts.magic }),
      );
  }

  for (const kind of ["drive_locate", "nvme_locate"] as const) {
    program
      .command(kind)
      .description(kind === "drive_locate" ? "blink a drive bay (Dell, RACADM)" : "blink an NVMe bay (Dell, Redfish)")
      .argument("<host>")
      .argument("<state>", "on or off")
      .argument("<slot>", "bay number")
      .option("--magic <token>", "confirmation token, when the configured threshold asks for one")
      .action((host: string, state: string, slot: string, opts: { magic?: string }) =>
        run(host, { kind, state, slot }, { magic: opts.magic }),
      );
  }

  program
    .command("magic")
    .description("print the confirmation token for a host")
    .argument("<host>")
    .action((host: string) => {
      deps.out(confirmationToken(host));
    });

  try {
    await program.parseAsync([...argv]);
    return exitCode;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode === 0 ? 0 : 1;
    }
    logger.error({ error: err }, "Unexpected failure");
    deps.err(`${CLI_PREFIX}${describeError(err)}`);
    return 1;
  }
}
