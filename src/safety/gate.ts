// Safety gate: runs before the inventory lookup for every operation, so a refused
// operation never touches the network. Critical operations (power cycle, diagnostic
// interrupt) always need the confirmation token and a reason, whatever the threshold says.
import { createHash } from "node:crypto";
import type { OperationName } from "../types/operation.js";
import type { RiskLevel } from "../types/risk.js";
import { OPERATION_RISK, RISK_ORDER } from "../types/risk.js";
import { BmcError, BmcErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export const TOKEN_LENGTH = 10;

/** First 10 hex characters of SHA-256(hostname). Deterministic; never persisted. */
export function confirmationToken(hostname: string): string {
  return createHash("sha256").update(hostname, "utf-8").digest("hex").slice(0, TOKEN_LENGTH);
}

export interface SafetyCheck {
  readonly operation: OperationName;
  readonly hostname: string;
  readonly magic?: string;
  readonly reason?: string;
}

export class SafetyGate {
  private readonly threshold: RiskLevel;

  constructor(config: { confirmation_threshold: RiskLevel }) {
    this.threshold = config.confirmation_threshold;
  }

  requiresConfirmation(operation: OperationName): boolean {
    const risk = OPERATION_RISK[operation];
    if (risk === "critical") return true;
    // Read-only and low risk never need confirmation
    if (RISK_ORDER[risk] < RISK_ORDER["moderate"]) return false;
    return RISK_ORDER[risk] >= RISK_ORDER[this.threshold];
  }

  /** Throws BAD_CONFIRMATION or MISSING_REASON; returns when the operation may proceed. */
  check(params: SafetyCheck): void {
    const risk = OPERATION_RISK[params.operation];
    if (!this.requiresConfirmation(params.operation)) return;

    const expected = confirmationToken(params.hostname);
    if (params.magic === undefined || params.magic === "") {
      logger.info({ operation: params.operation, host: params.hostname, risk }, "Confirmation required");
      throw new BmcError(
        BmcErrorCode.BAD_CONFIRMATION,
        `${params.operation} requires confirmation: rerun with magic ${expected}`,
      );
    }
    if (params.magic !== expected) {
      throw new BmcError(BmcErrorCode.BAD_CONFIRMATION, "confirmation token does not match");
    }

    if (risk === "critical" && (params.reason === undefined || params.reason.trim() === "")) {
      throw new BmcError(BmcErrorCode.MISSING_REASON, `${params.operation} requires a reason`);
    }
  }
}
