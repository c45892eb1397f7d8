import type { Credentials } from "../types/config.js";
import { BmcError, BmcErrorCode } from "../shared/errors.js";

/** The BMC password every transport authenticates with. */
export function requireBmcPassword(credentials: Credentials): string {
  if (!credentials.ipmiPassword) {
    throw new BmcError(BmcErrorCode.MISSING_CONFIGURATION, "IPMI_PASSWORD is not set");
  }
  return credentials.ipmiPassword;
}
