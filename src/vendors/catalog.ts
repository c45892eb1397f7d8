// Per-vendor payloads. Every function switches exhaustively over Manufacturer so that
// adding a vendor fails to compile until each operation has decided how to handle it.
import type { BmctlConfig } from "../types/config.js";
import type { LedState } from "../types/operation.js";
import type { Manufacturer } from "../types/target.js";
import type { RedfishRequest } from "../transport/types.js";

const BAY_MARKER = "Disk.Bay";

export interface RacadmProfile {
  readonly statusCommand: string;
  locateCommand(state: LedState, slot: number): string;
  /** Substring RACADM prints when a storage job was accepted. */
  readonly successMarker: string;
  readonly bayMarker: string;
}

export interface NvmeProfile {
  readonly statusPath: string;
  readonly bayMarker: string;
  /** null when the vendor exposes no locate action. */
  locateRequest: ((state: LedState, slot: number) => RedfishRequest) | null;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled manufacturer: ${String(value)}`);
}

/** RACADM over SSH. Dell only. */
export function racadmProfile(manufacturer: Manufacturer, config: Pick<BmctlConfig, "racadm">): RacadmProfile | null {
  switch (manufacturer) {
    case "Dell": {
      const { enclosure, controller, success_marker } = config.racadm;
      return {
        statusCommand: "racadm storage get pdisks -o -p State,Size,SerialNumber",
        locateCommand: (state, slot) =>
          `racadm storage ${state === "on" ? "blink" : "unblink"}:${BAY_MARKER}.${slot}:${enclosure}:${controller}`,
        successMarker: success_marker,
        bayMarker: BAY_MARKER,
      };
    }
    case "Supermicro":
    case "Unknown":
      return null;
    default:
      return assertNever(manufacturer);
  }
}

const EXPAND = "?$expand=*($levels=1)";

/** Redfish NVMe drive listing and locate. Locate is Dell only. */
export function nvmeProfile(manufacturer: Manufacturer, config: Pick<BmctlConfig, "nvme">): NvmeProfile | null {
  switch (manufacturer) {
    case "Dell":
      return {
        statusPath: `/redfish/v1/Systems/System.Embedded.1/Storage/CPU.1/Drives${EXPAND}`,
        bayMarker: BAY_MARKER,
        locateRequest: (state, slot) => ({
          method: "POST",
          path:
            "/redfish/v1/Dell/Systems/System.Embedded.1/DellRaidService/Actions/" +
            (state === "on" ? "DellRaidService.BlinkTarget" : "DellRaidService.UnBlinkTarget"),
          body: { TargetFQDD: `${BAY_MARKER}.${slot}:${config.nvme.enclosure}` },
        }),
      };
    case "Supermicro":
      return {
        statusPath: `/redfish/v1/Chassis/NVMeSSD.0.StorageBackplane/Drives${EXPAND}`,
        bayMarker: BAY_MARKER,
        locateRequest: null,
      };
    case "Unknown":
      return null;
    default:
      return assertNever(manufacturer);
  }
}
