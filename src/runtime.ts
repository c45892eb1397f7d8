// Composition root shared by the CLI and the MCP server: config and credentials in,
// a ready CommandRouter out. Nothing below this module reads process.env.
import { loadConfig, loadCredentials } from "./config/loader.js";
import { LocalExecutor } from "./execution/executor.js";
import { NetboxInventory } from "./inventory/netbox.js";
import { CommandRouter } from "./router/commandRouter.js";
import { HttpFleetNotifier, NoopFleetNotifier, type FleetNotifier } from "./safety/fleet.js";
import { SafetyGate } from "./safety/gate.js";
import { IpmiTransport } from "./transport/ipmi.js";
import { RedfishTransport } from "./transport/redfish.js";
import { ShellTransport } from "./transport/shell.js";
import type { Transports } from "./transport/types.js";
import type { BmctlConfig } from "./types/config.js";
import { logger } from "./logger.js";

export interface Runtime {
  readonly config: BmctlConfig;
  readonly configPath: string;
  readonly router: CommandRouter;
}

export function createRuntime(options: { configPath?: string; env?: NodeJS.ProcessEnv } = {}): Runtime {
  const env = options.env ?? process.env;
  const { config, configPath, fromFile } = loadConfig(options.configPath, env);
  logger.debug({ configPath, fromFile }, "Configuration loaded");
  const credentials = loadCredentials(env);

  const executor = new LocalExecutor();
  const transports: Transports = {
    ipmi: new IpmiTransport(executor, config, credentials),
    shell: new ShellTransport(config, credentials),
    redfish: new RedfishTransport(config, credentials),
  };
  const notifier: FleetNotifier =
    config.fleet.url === null ? new NoopFleetNotifier() : new HttpFleetNotifier(config, credentials);

  const router = new CommandRouter({
    resolver: new NetboxInventory(config, credentials),
    transports,
    gate: new SafetyGate(config.safety),
    notifier,
    config,
  });
  return { config, configPath, router };
}
