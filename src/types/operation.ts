export type OperationName =
  | "power"
  | "health"
  | "sel"
  | "poweron"
  | "boot"
  | "reboot"
  | "kdump"
  | "drive_status"
  | "drive_locate"
  | "nvme_status"
  | "nvme_locate";

export type BootMode = "pxe" | "bios";
export type LedState = "on" | "off";

/**
 * A logical operation as the operator asked for it. Sub-arguments stay raw strings
 * here; the router validates them before any transport is touched.
 */
export type Operation =
  | { readonly kind: "power" }
  | { readonly kind: "health" }
  | { readonly kind: "sel" }
  | { readonly kind: "poweron" }
  | { readonly kind: "boot"; readonly mode?: string }
  | { readonly kind: "reboot"; readonly reason?: string }
  | { readonly kind: "kdump"; readonly reason?: string }
  | { readonly kind: "drive_status" }
  | { readonly kind: "drive_locate"; readonly state: string; readonly slot: string }
  | { readonly kind: "nvme_status" }
  | { readonly kind: "nvme_locate"; readonly state: string; readonly slot: string };

/** Per-invocation options that are not part of the operation itself. */
export interface RunOptions {
  /** Confirmation token echoed back by the operator. */
  readonly magic?: string;
}
