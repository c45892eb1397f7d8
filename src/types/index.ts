export type { Manufacturer, Target } from "./target.js";
export type { Operation, OperationName, BootMode, LedState, RunOptions } from "./operation.js";
export type { DiskEntry, StructuredFields, ExecutionResult } from "./result.js";
export type { RiskLevel } from "./risk.js";
export { RISK_ORDER, OPERATION_RISK } from "./risk.js";
export type { Command } from "./command.js";
export type { BmctlConfig, Credentials } from "./config.js";
export type { ToolResponse, SuccessResponse, ErrorResponse } from "./response.js";
export type { ToolMetadata, RegisteredTool } from "./tool.js";
