import type { RiskLevel } from "./risk.js";

/** Full tool configuration. Secrets never live here; see Credentials. */
export interface BmctlConfig {
  ipmi: {
    binary: string;
    interface: "lanplus" | "lan";
    username: string;
    privilege: "ADMINISTRATOR" | "OPERATOR" | "USER";
    timeout_seconds: number;
    kill_after_seconds: number;
  };
  probe: {
    binary: string;
    count: number;
    timeout_seconds: number;
  };
  shell: {
    username: string;
    port: number;
    connect_timeout_seconds: number;
    command_timeout_seconds: number;
  };
  redfish: {
    username: string;
    verify_tls: boolean;
    connect_timeout_seconds: number;
    request_timeout_seconds: number;
  };
  racadm: {
    enclosure: string;
    controller: string;
    success_marker: string;
  };
  nvme: {
    enclosure: string;
  };
  inventory: {
    url: string | null;
    timeout_seconds: number;
  };
  fleet: {
    url: string | null;
    timeout_seconds: number;
  };
  safety: {
    confirmation_threshold: RiskLevel;
  };
}

/** Secrets sourced from the process environment at the process boundary. */
export interface Credentials {
  readonly ipmiPassword?: string;
  readonly inventoryToken?: string;
  readonly fleetToken?: string;
}
