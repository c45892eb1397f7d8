export * from "./types/index.js";
export { BmcError, BmcErrorCode, describeError } from "./shared/errors.js";
export { loadConfig, loadCredentials, DEFAULT_CONFIG } from "./config/loader.js";
export { LocalExecutor } from "./execution/executor.js";
export type { Executor, ExecResult, ExecLimits } from "./execution/executor.js";
export type { InventoryResolver } from "./inventory/resolver.js";
export { NetboxInventory } from "./inventory/netbox.js";
export type { Transport, Transports, IpmiOutput, ShellOutput, RedfishRequest, RedfishResponse } from "./transport/types.js";
export { IpmiTransport } from "./transport/ipmi.js";
export { ShellTransport, sshConnect } from "./transport/shell.js";
export type { ShellConnector, ShellSession } from "./transport/shell.js";
export { RedfishTransport } from "./transport/redfish.js";
export { SafetyGate, confirmationToken } from "./safety/gate.js";
export { HttpFleetNotifier, NoopFleetNotifier, notifyOffline } from "./safety/fleet.js";
export type { FleetNotifier } from "./safety/fleet.js";
export { CommandRouter } from "./router/commandRouter.js";
export type { RouterDeps } from "./router/commandRouter.js";
export { createRuntime } from "./runtime.js";
export { runCli } from "./cli/program.js";
