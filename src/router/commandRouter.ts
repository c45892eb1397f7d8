// Command router: the single place where an Operation becomes transport calls.
//
// Ordering is fixed for every operation:
//   1. argument validation (slot, LED state)
//   2. safety gate (confirmation token, reason)
//   3. inventory resolution
//   4. argument validation that needs the target (boot mode)
//   5. manufacturer gating
//   6. transport call(s), then normalization
// Anything that fails in steps 1-5 has not touched a BMC.
import type { InventoryResolver } from "../inventory/resolver.js";
import type { SafetyGate } from "../safety/gate.js";
import type { FleetNotifier } from "../safety/fleet.js";
import { notifyOffline } from "../safety/fleet.js";
import type { Transports } from "../transport/types.js";
import type { BmctlConfig } from "../types/config.js";
import type { BootMode, LedState, Operation, OperationName, RunOptions } from "../types/operation.js";
import type { ExecutionResult, StructuredFields } from "../types/result.js";
import type { Target } from "../types/target.js";
import { firstLine, normalizeIpmi } from "../normalizer/ipmi.js";
import { parseRacadmDisks } from "../normalizer/racadm.js";
import { extendedErrorMessage, projectNvmeDrives } from "../normalizer/redfish.js";
import { nvmeProfile, racadmProfile } from "../vendors/catalog.js";
import { BmcError, BmcErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface RouterDeps {
  readonly resolver: InventoryResolver;
  readonly transports: Transports;
  readonly gate: SafetyGate;
  readonly notifier: FleetNotifier;
  readonly config: Pick<BmctlConfig, "racadm" | "nvme">;
}

/** Fixed IPMI command strings for single-call operations. */
const IPMI_COMMANDS = {
  power: "chassis power status",
  health: "sensor",
  sel: "sel elist",
  poweron: "chassis power on",
  reboot: "chassis power cycle",
  kdump: "chassis power diag",
} as const;

const SLOT_PATTERN = /^\d+$/;

export class CommandRouter {
  constructor(private readonly deps: RouterDeps) {}

  /**
   * Runs one operation against one host. Every BmcError becomes a failed result;
   * anything else is a bug and propagates.
   */
  async run(hostname: string, operation: Operation, options: RunOptions = {}): Promise<ExecutionResult> {
    logger.debug({ hostname, operation: operation.kind }, "Routing operation");
    try {
      return await this.dispatch(hostname, operation, options);
    } catch (err) {
      if (err instanceof BmcError) {
        logger.info({ hostname, operation: operation.kind, code: err.code }, "Operation failed");
        return failure(operation.kind, hostname, err);
      }
      throw err;
    }
  }

  private async dispatch(hostname: string, op: Operation, options: RunOptions): Promise<ExecutionResult> {
    switch (op.kind) {
      case "power":
      case "health":
      case "sel":
      case "poweron": {
        const target = await this.prepare(hostname, op.kind, options);
        const output = await this.ipmi(target, IPMI_COMMANDS[op.kind]);
        return ipmiResult(op.kind, hostname, output);
      }
      case "boot": {
        const target = await this.prepare(hostname, op.kind, options);
        return this.setBootMode(target, parseBootMode(op.mode));
      }
      case "reboot":
      case "kdump": {
        const target = await this.prepare(hostname, op.kind, options, op.reason);
        const output = await this.ipmi(target, IPMI_COMMANDS[op.kind]);
        await notifyOffline(this.deps.notifier, hostname, op.reason ?? "");
        return ipmiResult(op.kind, hostname, output);
      }
      case "drive_status":
        return this.driveStatus(await this.prepare(hostname, op.kind, options));
      case "drive_locate": {
        const state = parseLedState(op.kind, op.state);
        const slot = parseSlot(op.slot);
        return this.driveLocate(await this.prepare(hostname, op.kind, options), state, slot);
      }
      case "nvme_status":
        return this.nvmeStatus(await this.prepare(hostname, op.kind, options));
      case "nvme_locate": {
        const state = parseLedState(op.kind, op.state);
        const slot = parseSlot(op.slot);
        return this.nvmeLocate(await this.prepare(hostname, op.kind, options), state, slot);
      }
      default: {
        const unhandled: never = op;
        throw new Error(`Unhandled operation: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  /** Safety gate, then inventory. Nothing past this point runs on a refused operation. */
  private async prepare(
    hostname: string,
    operation: OperationName,
    options: RunOptions,
    reason?: string,
  ): Promise<Target> {
    this.deps.gate.check({ operation, hostname, magic: options.magic, reason });
    return this.deps.resolver.resolve(hostname);
  }

  private async ipmi(target: Target, command: string): Promise<string> {
    return normalizeIpmi(await this.deps.transports.ipmi.execute(target, command));
  }

  /**
   * Boot device, then boot flag. Both steps always run; a failure in one does not
   * undo the other.
   */
  private async setBootMode(target: Target, mode: BootMode): Promise<ExecutionResult> {
    const steps = [`chassis bootdev ${mode}`, `chassis bootparam set bootflag force_${mode}`];
    const outputs: string[] = [];
    const failures: { step: string; error: BmcError }[] = [];

    for (const step of steps) {
      try {
        outputs.push(await this.ipmi(target, step));
      } catch (err) {
        if (!(err instanceof BmcError)) throw err;
        failures.push({ step, error: err });
        const output = err.context?.output;
        outputs.push(typeof output === "string" ? output : err.message);
      }
    }

    const rawOutput = outputs.join("\n");
    const [first] = failures;
    if (first !== undefined) {
      return {
        success: false,
        operation: "boot",
        hostname: target.hostname,
        message: `${target.hostname}: '${first.step}' failed: ${first.error.message}`,
        lines: failures.map((f) => `${f.step}: ${f.error.message}`),
        rawOutput,
        errorKind: first.error.code,
      };
    }
    return {
      success: true,
      operation: "boot",
      hostname: target.hostname,
      message: `${target.hostname}: next boot set to ${mode}`,
      lines: splitLines(rawOutput),
      rawOutput,
      errorKind: null,
    };
  }

  private async driveStatus(target: Target): Promise<ExecutionResult> {
    const profile = this.requireRacadm(target, "drive_status");
    const output = await this.shell(target, profile.statusCommand);
    const fields = parseRacadmDisks(output, profile.bayMarker);
    return diskResult("drive_status", target.hostname, `${fields.disks.length} drives`, output, fields);
  }

  private async driveLocate(target: Target, state: LedState, slot: number): Promise<ExecutionResult> {
    const profile = this.requireRacadm(target, "drive_locate");
    const output = await this.shell(target, profile.locateCommand(state, slot));
    if (!output.includes(profile.successMarker)) {
      throw new BmcError(BmcErrorCode.PROTOCOL_ERROR, firstLine(output) || "RACADM did not confirm the request", {
        output,
      });
    }
    return {
      success: true,
      operation: "drive_locate",
      hostname: target.hostname,
      message: `${target.hostname}: Drive in Slot ${slot} sucessfully set to ${blinkWord(state)}.`,
      lines: splitLines(output),
      rawOutput: output,
      errorKind: null,
    };
  }

  private async nvmeStatus(target: Target): Promise<ExecutionResult> {
    const profile = nvmeProfile(target.manufacturer, this.deps.config);
    if (profile === null) throw unsupported("nvme_status", target, "a Dell or Supermicro");

    const response = await this.deps.transports.redfish.execute(target, { method: "GET", path: profile.statusPath });
    if (response.status !== 200) {
      throw redfishError(response.status, response.body, response.text);
    }
    const fields = projectNvmeDrives(response.body, profile.bayMarker);
    const summary = fields.disks.length === 0 ? "no compatible drives found" : `${fields.disks.length} NVMe drives`;
    return diskResult("nvme_status", target.hostname, summary, response.text, fields);
  }

  private async nvmeLocate(target: Target, state: LedState, slot: number): Promise<ExecutionResult> {
    const locate = nvmeProfile(target.manufacturer, this.deps.config)?.locateRequest ?? null;
    if (locate === null) throw unsupported("nvme_locate", target, "a Dell");

    const response = await this.deps.transports.redfish.execute(target, locate(state, slot));
    if (response.status !== 200) {
      throw redfishError(response.status, response.body, response.text);
    }
    return {
      success: true,
      operation: "nvme_locate",
      hostname: target.hostname,
      message: `${target.hostname}: NVMe drive in Slot ${slot} sucessfully set to ${blinkWord(state)}.`,
      lines: [],
      rawOutput: response.text,
      errorKind: null,
    };
  }

  private requireRacadm(target: Target, operation: OperationName) {
    const profile = racadmProfile(target.manufacturer, this.deps.config);
    if (profile === null) throw unsupported(operation, target, "a Dell");
    return profile;
  }

  private async shell(target: Target, command: string): Promise<string> {
    const result = await this.deps.transports.shell.execute(target, command);
    // No exit status: killed by a signal or the channel closed early. The output may be cut short.
    if (result.exitCode === null) {
      throw new BmcError(BmcErrorCode.PROTOCOL_ERROR, "remote command ended without an exit status", {
        output: result.output,
      });
    }
    if (result.exitCode !== 0) {
      const message = firstLine(result.output) || `'${command}' exited ${result.exitCode}`;
      throw new BmcError(BmcErrorCode.PROTOCOL_ERROR, message, { output: result.output, exitCode: result.exitCode });
    }
    return result.output;
  }
}

function parseBootMode(mode: string | undefined): BootMode {
  if (mode === "pxe" || mode === "bios") return mode;
  throw new BmcError(BmcErrorCode.INVALID_ARGUMENT, "usage: boot <host> <pxe|bios>", { mode });
}

function parseLedState(operation: OperationName, state: string): LedState {
  if (state === "on" || state === "off") return state;
  throw new BmcError(BmcErrorCode.INVALID_ARGUMENT, `usage: ${operation} <host> <on|off> <slot>`, { state });
}

function parseSlot(slot: string): number {
  if (!SLOT_PATTERN.test(slot)) {
    throw new BmcError(BmcErrorCode.INVALID_ARGUMENT, `slot must be a non-negative integer, got '${slot}'`);
  }
  return Number(slot);
}

/** Non-200 Redfish answers surface the vendor's extended message, or the bare status. */
function redfishError(status: number, body: unknown, text: string): BmcError {
  return new BmcError(BmcErrorCode.PROTOCOL_ERROR, extendedErrorMessage(body) ?? `HTTP ${status}`, {
    output: text,
    status,
  });
}

function blinkWord(state: LedState): string {
  return state === "on" ? "blink" : "unblink";
}

function unsupported(operation: OperationName, target: Target, required: string): BmcError {
  return new BmcError(
    BmcErrorCode.UNSUPPORTED_MANUFACTURER,
    `${operation} requires ${required} BMC (inventory says ${target.manufacturer})`,
    { manufacturer: target.manufacturer },
  );
}

function splitLines(output: string): string[] {
  return output.split("\n").map((l) => l.trimEnd()).filter((l) => l.trim() !== "");
}

function ipmiResult(operation: OperationName, hostname: string, output: string): ExecutionResult {
  const lines = splitLines(output);
  const message =
    operation === "health" || operation === "sel"
      ? `${hostname}: ${lines.length} ${operation === "health" ? "sensor readings" : "event log lines"}`
      : `${hostname}: ${firstLine(output)}`;
  return { success: true, operation, hostname, message, lines, rawOutput: output, errorKind: null };
}

function diskResult(
  operation: OperationName,
  hostname: string,
  summary: string,
  rawOutput: string,
  fields: StructuredFields,
): ExecutionResult {
  const lines = fields.disks.map((d) =>
    [d.bay, d.model, d.status, d.sizeOrCapacity, d.serialOrHealth].filter((v) => v !== undefined).join("  "),
  );
  if (fields.warning !== undefined) lines.push(fields.warning);
  return {
    success: true,
    operation,
    hostname,
    message: `${hostname}: ${summary}`,
    lines,
    rawOutput,
    errorKind: null,
    structuredFields: fields,
  };
}

function failure(operation: OperationName, hostname: string, err: BmcError): ExecutionResult {
  const output = err.context?.output;
  return {
    success: false,
    operation,
    hostname,
    message: `${hostname}: ${err.message}`,
    lines: [],
    rawOutput: typeof output === "string" ? output : "",
    errorKind: err.code,
  };
}
