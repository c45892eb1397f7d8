// ipmitool output normalization. ipmitool reports almost everything as free text, so the
// checks here are substring matches on the messages it is known to print.
import type { IpmiOutput } from "../transport/types.js";
import { BmcError, BmcErrorCode } from "../shared/errors.js";

const SESSION_FAILURE_MARKER = "Unable to establish";

/** Lines printed under -vvv when the BMC rejected the user name or password. */
const AUTHENTICATION_SIGNATURES = [
  "RAKP 2 HMAC is invalid",
  "RAKP 2 message indicates an error",
  "unauthorized name",
  "Invalid user name",
];

export function isSessionFailure(output: string): boolean {
  return output.includes(SESSION_FAILURE_MARKER);
}

export function hasAuthenticationSignature(verboseOutput: string): boolean {
  return AUTHENTICATION_SIGNATURES.some((signature) => verboseOutput.includes(signature));
}

/** First non-blank line, used wherever a single explanatory line is needed. */
export function firstLine(text: string): string {
  return text.split("\n").map((l) => l.trim()).find((l) => l !== "") ?? "";
}

/**
 * Returns the success payload, or throws the BmcError the output maps to.
 */
export function normalizeIpmi(result: IpmiOutput): string {
  if (result.timedOut || result.output.trim() === "") {
    throw new BmcError(BmcErrorCode.TIMED_OUT, `IPMI command '${result.command}' timed out`);
  }

  if (isSessionFailure(result.output)) {
    if (result.sessionDiagnosis === "authentication") {
      throw new BmcError(
        BmcErrorCode.AUTHENTICATION_FAILED,
        "BMC rejected the IPMI credentials (check IPMI_PASSWORD)",
        { output: result.output },
      );
    }
    throw new BmcError(BmcErrorCode.PROTOCOL_ERROR, firstLine(result.output), { output: result.output });
  }

  if (result.exitCode !== 0) {
    throw new BmcError(BmcErrorCode.PROTOCOL_ERROR, firstLine(result.output), {
      output: result.output,
      exitCode: result.exitCode,
    });
  }

  return result.output;
}
