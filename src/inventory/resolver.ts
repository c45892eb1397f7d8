import type { Target } from "../types/target.js";

/**
 * Maps a hostname to its management address and vendor. Implementations throw
 * BmcError NOT_FOUND, AMBIGUOUS, MISSING_ATTRIBUTE or INVALID_ADDRESS.
 */
export interface InventoryResolver {
  resolve(hostname: string): Promise<Target>;
}
