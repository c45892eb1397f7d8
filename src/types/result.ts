import type { BmcErrorCode } from "../shared/errors.js";
import type { OperationName } from "./operation.js";

/** One physical drive slot as reported by RACADM or Redfish, in the vendor's order. */
export interface DiskEntry {
  readonly bay: string;
  readonly status: string;
  readonly sizeOrCapacity: string;
  readonly serialOrHealth: string;
  readonly model?: string;
}

export interface StructuredFields {
  readonly disks: readonly DiskEntry[];
  /** Set when the drive count looks wrong, e.g. an odd count in a paired enclosure. */
  readonly warning?: string;
}

/**
 * Normalized outcome of one operation. structuredFields is only ever set on success.
 */
export interface ExecutionResult {
  readonly success: boolean;
  readonly operation: OperationName;
  readonly hostname: string;
  /** One-line summary; on failure this is the explanatory line shown to the operator. */
  readonly message: string;
  /** Human-readable body lines. */
  readonly lines: readonly string[];
  readonly rawOutput: string;
  readonly errorKind: BmcErrorCode | null;
  readonly structuredFields?: StructuredFields;
}
