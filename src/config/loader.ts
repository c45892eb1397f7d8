// Config loader: reads ~/.config/bmctl/config.yaml (or $BMCTL_CONFIG) and deep-merges it
// over defaults. Unset keys inherit defaults; the merged result is validated before use.
// Secrets are never read from the file: loadCredentials() takes them from the environment.
import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { BmctlConfig, Credentials } from "../types/config.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "bmctl", "config.yaml");

export const DEFAULT_CONFIG: BmctlConfig = {
  ipmi: {
    binary: "ipmitool",
    interface: "lanplus",
    username: "root",
    privilege: "ADMINISTRATOR",
    timeout_seconds: 30,
    kill_after_seconds: 5,
  },
  probe: { binary: "ping", count: 2, timeout_seconds: 2 },
  shell: { username: "root", port: 22, connect_timeout_seconds: 10, command_timeout_seconds: 60 },
  redfish: { username: "root", verify_tls: false, connect_timeout_seconds: 10, request_timeout_seconds: 60 },
  racadm: {
    enclosure: "Enclosure.Internal.0-1",
    controller: "RAID.Integrated.1-1",
    success_marker: "STOR095",
  },
  nvme: { enclosure: "Enclosure.Internal.0-1" },
  inventory: { url: null, timeout_seconds: 15 },
  fleet: { url: null, timeout_seconds: 10 },
  safety: { confirmation_threshold: "critical" },
};

const positive = z.number().positive();

const ConfigSchema: z.ZodType<BmctlConfig> = z.object({
  ipmi: z.object({
    binary: z.string().min(1),
    interface: z.enum(["lanplus", "lan"]),
    username: z.string().min(1),
    privilege: z.enum(["ADMINISTRATOR", "OPERATOR", "USER"]),
    timeout_seconds: positive,
    kill_after_seconds: positive,
  }),
  probe: z.object({ binary: z.string().min(1), count: z.number().int().min(1), timeout_seconds: positive }),
  shell: z.object({
    username: z.string().min(1),
    port: z.number().int().min(1).max(65535),
    connect_timeout_seconds: positive,
    command_timeout_seconds: positive,
  }),
  redfish: z.object({
    username: z.string().min(1),
    verify_tls: z.boolean(),
    connect_timeout_seconds: positive,
    request_timeout_seconds: positive,
  }),
  racadm: z.object({ enclosure: z.string().min(1), controller: z.string().min(1), success_marker: z.string().min(1) }),
  nvme: z.object({ enclosure: z.string().min(1) }),
  inventory: z.object({ url: z.string().url().nullable(), timeout_seconds: positive }),
  fleet: z.object({ url: z.string().url().nullable(), timeout_seconds: positive }),
  safety: z.object({ confirmation_threshold: z.enum(["read-only", "low", "moderate", "high", "critical"]) }),
});

export interface ConfigResult {
  config: BmctlConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): ConfigResult {
  const configPath = explicitPath ?? env.BMCTL_CONFIG ?? DEFAULT_CONFIG_PATH;

  let fileConfig: Record<string, unknown> = {};
  let fromFile = false;
  if (existsSync(configPath)) {
    try {
      const parsed: unknown = parseYaml(readFileSync(configPath, "utf-8"));
      if (isRecord(parsed)) {
        fileConfig = parsed;
        fromFile = true;
      }
    } catch (err) {
      logger.error({ configPath, error: err }, "Failed to parse config, using defaults");
    }
  }

  const merged = deepMerge(deepMerge(toRecord(DEFAULT_CONFIG), fileConfig), envOverrides(env));
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    logger.error({ configPath, issues: result.error.issues }, "Invalid config, using defaults");
    return { config: structuredClone(DEFAULT_CONFIG), configPath, fromFile: false };
  }
  return { config: result.data, configPath, fromFile };
}

/** Secrets and their environment variable names. */
export function loadCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  return {
    ipmiPassword: nonEmpty(env.IPMI_PASSWORD),
    inventoryToken: nonEmpty(env.BMCTL_INVENTORY_TOKEN),
    fleetToken: nonEmpty(env.BMCTL_FLEET_TOKEN),
  };
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  const inventoryUrl = nonEmpty(env.BMCTL_INVENTORY_URL);
  if (inventoryUrl) overrides.inventory = { url: inventoryUrl };
  const fleetUrl = nonEmpty(env.BMCTL_FLEET_URL);
  if (fleetUrl) overrides.fleet = { url: fleetUrl };
  return overrides;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== "" ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function toRecord(config: BmctlConfig): Record<string, unknown> {
  return { ...config };
}

/** Deep merge b into a (a provides defaults, b overrides). */
function deepMerge(a: Record<string, unknown>, b: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isRecord(aVal) && isRecord(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
