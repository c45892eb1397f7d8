// RACADM pdisk listing. Each drive starts with its FQDD on its own line
// (Disk.Bay.N:Enclosure...:RAID...) followed by indented "Key = Value" property lines.
import type { DiskEntry, StructuredFields } from "../types/result.js";

const PROPERTY = /^\s*([A-Za-z][\w.]*)\s*=\s*(.*)$/;
const UNKNOWN = "Unknown";

interface Draft {
  bay: string;
  props: Map<string, string>;
}

/**
 * Builds one DiskEntry per line that begins with the bay marker, in reporting order.
 * An odd drive count is annotated, not treated as a failure.
 */
export function parseRacadmDisks(output: string, bayMarker: string): StructuredFields {
  const drafts: Draft[] = [];
  let current: Draft | undefined;

  for (const raw of output.split("\n")) {
    const line = raw.trim();
    if (line.startsWith(bayMarker)) {
      current = { bay: line.split(":")[0] ?? line, props: new Map() };
      drafts.push(current);
      continue;
    }
    const match = PROPERTY.exec(raw);
    if (current && match?.[1] !== undefined) {
      current.props.set(match[1], (match[2] ?? "").trim());
    }
  }

  const disks: DiskEntry[] = drafts.map(({ bay, props }) => ({
    bay,
    status: props.get("State") || UNKNOWN,
    sizeOrCapacity: props.get("Size") || UNKNOWN,
    serialOrHealth: props.get("SerialNumber") || UNKNOWN,
  }));

  return disks.length % 2 === 1
    ? { disks, warning: `WARNING: odd number of drives detected (${disks.length})` }
    : { disks };
}
