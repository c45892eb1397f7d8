// Best-effort "host is offline" notification sent after a power cycle or diagnostic
// interrupt. Nothing here may fail the operation that triggered it.
import type { BmctlConfig, Credentials } from "../types/config.js";
import { BmcError, BmcErrorCode, describeError } from "../shared/errors.js";
import { sendRequest } from "../shared/http.js";
import { logger } from "../logger.js";

export interface FleetNotifier {
  setOffline(hostId: string, reason: string): Promise<void>;
}

export class HttpFleetNotifier implements FleetNotifier {
  constructor(
    private readonly config: Pick<BmctlConfig, "fleet">,
    private readonly credentials: Credentials,
  ) {}

  async setOffline(hostId: string, reason: string): Promise<void> {
    const { url, timeout_seconds } = this.config.fleet;
    if (url === null) {
      throw new BmcError(BmcErrorCode.MISSING_CONFIGURATION, "fleet.url is not configured (BMCTL_FLEET_URL)");
    }
    const headers: Record<string, string> = { accept: "application/json" };
    if (this.credentials.fleetToken) {
      headers.authorization = `Bearer ${this.credentials.fleetToken}`;
    }

    const response = await sendRequest({
      method: "POST",
      url: `${url.replace(/\/+$/, "")}/hosts/${encodeURIComponent(hostId)}/offline`,
      headers,
      body: { reason },
      timeoutMs: timeout_seconds * 1000,
    });
    if (response.status < 200 || response.status >= 300) {
      throw new BmcError(BmcErrorCode.PROTOCOL_ERROR, `fleet service answered HTTP ${response.status}`);
    }
  }
}

/** Used when no fleet service is configured. */
export class NoopFleetNotifier implements FleetNotifier {
  async setOffline(hostId: string): Promise<void> {
    logger.debug({ hostId }, "No fleet service configured, skipping offline notification");
  }
}

/** Calls the notifier and logs any failure at warn. Never rejects. */
export async function notifyOffline(notifier: FleetNotifier, hostId: string, reason: string): Promise<void> {
  try {
    await notifier.setOffline(hostId, reason);
    logger.info({ hostId }, "Fleet service notified: host offline");
  } catch (err) {
    logger.warn({ hostId, error: describeError(err) }, "Fleet offline notification failed");
  }
}
