// Redfish response projection. Only the handful of Drive properties the operator sees are
// validated; everything else in the payload passes through untouched.
import { z } from "zod";
import type { DiskEntry, StructuredFields } from "../types/result.js";
import { BmcError, BmcErrorCode } from "../shared/errors.js";

const UNKNOWN = "Unknown";

const DriveSchema = z
  .object({
    Id: z.string().optional(),
    Name: z.string().optional(),
    Model: z.string().nullable().optional(),
    CapacityBytes: z.number().nullable().optional(),
    Status: z
      .object({
        State: z.string().nullable().optional(),
        Health: z.string().nullable().optional(),
      })
      .passthrough()
      .optional(),
    PhysicalLocation: z
      .object({
        PartLocation: z.object({ ServiceLabel: z.string().nullable().optional() }).passthrough().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const CollectionSchema = z.object({ Members: z.array(z.unknown()) }).passthrough();

const ExtendedErrorSchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      "@Message.ExtendedInfo": z.array(z.object({ Message: z.string().optional() }).passthrough()).optional(),
    })
    .passthrough(),
});

type Drive = z.infer<typeof DriveSchema>;

/** Decimal units, two decimals: 1920383410176 → "1.92 TB". */
export function formatCapacity(bytes: number | null | undefined): string {
  if (bytes === null || bytes === undefined || bytes < 0) return UNKNOWN;
  const units = ["B", "KB", "MB", "GB", "TB", "PB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1000 && unit < units.length - 1) {
    value /= 1000;
    unit++;
  }
  return `${value.toFixed(2)} ${units[unit]}`;
}

/** First identifying property that carries the bay marker. */
function bayOf(drive: Drive, bayMarker: string): string | undefined {
  const candidates = [drive.Id, drive.PhysicalLocation?.PartLocation?.ServiceLabel, drive.Name];
  return candidates.find((c): c is string => typeof c === "string" && c.includes(bayMarker));
}

/**
 * Projects an expanded Drives collection into DiskEntry values. Members whose location
 * does not carry the bay marker (virtual disks, enclosure entries) are skipped.
 * An empty projection is a valid result.
 */
export function projectNvmeDrives(body: unknown, bayMarker: string): StructuredFields {
  const collection = CollectionSchema.safeParse(body);
  if (!collection.success) {
    throw new BmcError(BmcErrorCode.PROTOCOL_ERROR, "Redfish response is not a drive collection");
  }

  const disks: DiskEntry[] = [];
  for (const member of collection.data.Members) {
    const parsed = DriveSchema.safeParse(member);
    if (!parsed.success) continue;
    const drive = parsed.data;
    const bay = bayOf(drive, bayMarker);
    if (bay === undefined) continue;
    disks.push({
      bay,
      model: drive.Model ?? UNKNOWN,
      status: drive.Status?.State ?? UNKNOWN,
      sizeOrCapacity: formatCapacity(drive.CapacityBytes),
      serialOrHealth: drive.Status?.Health ?? UNKNOWN,
    });
  }
  return { disks };
}

/** The first vendor-supplied explanation in a Redfish error body, if there is one. */
export function extendedErrorMessage(body: unknown): string | null {
  const parsed = ExtendedErrorSchema.safeParse(body);
  if (!parsed.success) return null;
  const { error } = parsed.data;
  return error["@Message.ExtendedInfo"]?.[0]?.Message ?? error.message ?? null;
}
