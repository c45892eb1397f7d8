// REST transport for Redfish. Stateless basic auth: no session is created, so there is
// nothing to log out of. Each execute() checks the credentials against the Systems
// collection, which requires authentication, then sends exactly one GET or POST.
// Every request uses its own connection.
//
// Certificate verification is off unless redfish.verify_tls is set: BMCs ship
// self-signed certificates and the management network is the trust boundary.
import type { BmctlConfig, Credentials } from "../types/config.js";
import type { Target } from "../types/target.js";
import type { RedfishRequest, RedfishResponse, Transport } from "./types.js";
import { requireBmcPassword } from "./credentials.js";
import { BmcError, BmcErrorCode } from "../shared/errors.js";
import { basicAuth, sendRequest } from "../shared/http.js";
import { logger } from "../logger.js";

/** Requires authentication on every conforming service, unlike the service root. */
const CREDENTIAL_CHECK = "/redfish/v1/Systems";

export interface RedfishTransportOptions {
  /** Base URL for a management address. Defaults to https://<address>. */
  readonly baseUrl?: (address: string) => string;
}

export class RedfishTransport implements Transport<RedfishRequest, RedfishResponse> {
  readonly name = "redfish" as const;
  private readonly baseUrl: (address: string) => string;

  constructor(
    private readonly config: Pick<BmctlConfig, "redfish">,
    private readonly credentials: Credentials,
    options: RedfishTransportOptions = {},
  ) {
    this.baseUrl = options.baseUrl ?? ((address) => `https://${address}`);
  }

  async execute(target: Target, request: RedfishRequest): Promise<RedfishResponse> {
    const authorization = basicAuth(this.config.redfish.username, requireBmcPassword(this.credentials));

    const check = await this.send(target, authorization, { method: "GET", path: CREDENTIAL_CHECK });
    if (check.status !== 200) {
      throw new BmcError(BmcErrorCode.PROTOCOL_ERROR, `Redfish systems collection returned HTTP ${check.status}`);
    }

    logger.debug({ host: target.hostname, method: request.method, path: request.path }, "Redfish request");
    return this.send(target, authorization, request);
  }

  private async send(target: Target, authorization: string, request: RedfishRequest): Promise<RedfishResponse> {
    const { redfish } = this.config;
    const result = await sendRequest({
      method: request.method,
      url: `${this.baseUrl(target.managementAddress)}${request.path}`,
      headers: { authorization, accept: "application/json" },
      body: request.body,
      timeoutMs: redfish.request_timeout_seconds * 1000,
      connectTimeoutMs: redfish.connect_timeout_seconds * 1000,
      tlsVerify: redfish.verify_tls,
    });
    if (result.status === 401 || result.status === 403) {
      throw new BmcError(
        BmcErrorCode.AUTHENTICATION_FAILED,
        `Redfish service at ${target.managementAddress} rejected the credentials (HTTP ${result.status})`,
      );
    }
    return { status: result.status, path: request.path, body: result.body, text: result.text };
  }
}
