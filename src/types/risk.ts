import type { OperationName } from "./operation.js";

/** Risk levels ordered from lowest to highest. */
export type RiskLevel = "read-only" | "low" | "moderate" | "high" | "critical";

/** Numeric ordering for risk comparison. */
export const RISK_ORDER: Record<RiskLevel, number> = {
  "read-only": 0,
  "low": 1,
  "moderate": 2,
  "high": 3,
  "critical": 4,
};

/** Default risk per operation. Critical operations always require a confirmation token. */
export const OPERATION_RISK: Record<OperationName, RiskLevel> = {
  power: "read-only",
  health: "read-only",
  sel: "read-only",
  drive_status: "read-only",
  nvme_status: "read-only",
  poweron: "moderate",
  boot: "moderate",
  drive_locate: "moderate",
  nvme_locate: "moderate",
  reboot: "critical",
  kdump: "critical",
};
