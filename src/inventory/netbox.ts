// Inventory lookup against a NetBox-style DCIM API. The out-of-band address comes from
// the device's oob_ip, the vendor from device_type.manufacturer.
import { z } from "zod";
import type { InventoryResolver } from "./resolver.js";
import type { BmctlConfig, Credentials } from "../types/config.js";
import type { Manufacturer, Target } from "../types/target.js";
import { BmcError, BmcErrorCode } from "../shared/errors.js";
import { sendRequest } from "../shared/http.js";
import { logger } from "../logger.js";

/** Values inventories use to mean "no address" without leaving the field empty. */
const PLACEHOLDER_ADDRESSES = new Set(["", '""', "''", "0.0.0.0"]);

const DeviceSchema = z
  .object({
    name: z.string().nullable().optional(),
    oob_ip: z.object({ address: z.string() }).passthrough().nullable().optional(),
    device_type: z
      .object({
        manufacturer: z.object({ name: z.string() }).passthrough().nullable().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

const DeviceListSchema = z.object({ results: z.array(DeviceSchema) }).passthrough();

type Device = z.infer<typeof DeviceSchema>;

/** Case and punctuation are ignored: "Super Micro Computer, Inc." is Supermicro. */
export function toManufacturer(name: string): Manufacturer {
  const lower = name.toLowerCase().replace(/[^a-z]/g, "");
  if (lower.includes("dell")) return "Dell";
  if (lower.includes("supermicro")) return "Supermicro";
  return "Unknown";
}

/** Strips the prefix length NetBox stores with every address. */
export function stripPrefixLength(address: string): string {
  return address.trim().split("/")[0] ?? "";
}

export class NetboxInventory implements InventoryResolver {
  constructor(
    private readonly config: Pick<BmctlConfig, "inventory">,
    private readonly credentials: Credentials,
  ) {}

  async resolve(hostname: string): Promise<Target> {
    const devices = await this.lookup(hostname);

    if (devices.length === 0) {
      throw new BmcError(BmcErrorCode.NOT_FOUND, `no inventory record matches '${hostname}'`);
    }
    const [device, ...rest] = devices;
    if (device === undefined || rest.length > 0) {
      const names = devices.map((d) => d.name ?? "?").join(", ");
      throw new BmcError(
        BmcErrorCode.AMBIGUOUS,
        `'${hostname}' matches ${devices.length} inventory records (${names}); ` +
          "qualify the hostname, e.g. with its region suffix",
      );
    }

    return toTarget(hostname, device);
  }

  private async lookup(hostname: string): Promise<Device[]> {
    const { url, timeout_seconds } = this.config.inventory;
    if (url === null) {
      throw new BmcError(BmcErrorCode.MISSING_CONFIGURATION, "inventory.url is not configured (BMCTL_INVENTORY_URL)");
    }

    const headers: Record<string, string> = { accept: "application/json" };
    if (this.credentials.inventoryToken) {
      headers.authorization = `Token ${this.credentials.inventoryToken}`;
    }

    const endpoint = `${url.replace(/\/+$/, "")}/api/dcim/devices/?name__ic=${encodeURIComponent(hostname)}`;
    const response = await sendRequest({
      method: "GET",
      url: endpoint,
      headers,
      timeoutMs: timeout_seconds * 1000,
    });
    if (response.status < 200 || response.status >= 300) {
      throw new BmcError(BmcErrorCode.PROTOCOL_ERROR, `inventory lookup failed with HTTP ${response.status}`);
    }

    const parsed = DeviceListSchema.safeParse(response.body);
    if (!parsed.success) {
      throw new BmcError(BmcErrorCode.PROTOCOL_ERROR, "inventory returned an unexpected device list");
    }
    logger.debug({ hostname, matches: parsed.data.results.length }, "Inventory lookup");
    return parsed.data.results;
  }
}

function toTarget(hostname: string, device: Device): Target {
  const manufacturerName = device.device_type?.manufacturer?.name;
  if (!device.oob_ip || manufacturerName === undefined) {
    const missing = !device.oob_ip ? "management address" : "manufacturer";
    throw new BmcError(BmcErrorCode.MISSING_ATTRIBUTE, `inventory record for '${hostname}' has no ${missing}`);
  }

  const managementAddress = stripPrefixLength(device.oob_ip.address);
  if (PLACEHOLDER_ADDRESSES.has(managementAddress)) {
    throw new BmcError(
      BmcErrorCode.INVALID_ADDRESS,
      `inventory record for '${hostname}' has an invalid management address '${managementAddress}'`,
    );
  }

  return { hostname, managementAddress, manufacturer: toManufacturer(manufacturerName) };
}
