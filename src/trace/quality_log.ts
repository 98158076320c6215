import { contentHash } from "../shared/hash.js";
import type { EventSource } from "../shared/types.js";

export type QualityIssueKind =
  | "UNPARSEABLE_TIMESTAMP"
  | "WINDOW_FILTER_SKIPPED"
  | "UNKNOWN_EVENT_TYPE"
  | "DRIVER_NAME_PARSED"
  | "DRIVER_UNRESOLVED"
  | "PLACEMENT_UNRESOLVED"
  | "MISSING_SPEED"
  | "HEADER_ROW_SKIPPED"
  | "UNPARSEABLE_ROW_DATE"
  | "INCIDENT_DRIVER_MISSING";

export type QualitySource = EventSource | "assessment" | "incident" | "vehicle";

export interface QualityEntry {
  position: number;
  kind: QualityIssueKind;
  source: QualitySource;
  /** Event id, report number or vehicle number the entry is about */
  ref: string;
  message: string;
}

/**
 * Quality Log: the diagnostic stream of a run. Classification never
 * throws on bad input; it degrades to a sentinel and records why here.
 */
export class QualityLog {
  private entries: QualityEntry[] = [];

  record(kind: QualityIssueKind, source: QualitySource, ref: string, message: string): QualityEntry {
    const entry: QualityEntry = {
      position: this.entries.length,
      kind,
      source,
      ref,
      message,
    };
    this.entries.push(entry);
    return entry;
  }

  getEntries(): QualityEntry[] {
    return [...this.entries];
  }

  count(kind?: QualityIssueKind): number {
    if (!kind) return this.entries.length;
    return this.entries.filter((e) => e.kind === kind).length;
  }

  /** Counts per kind, keys in first-seen order. */
  summary(): Partial<Record<QualityIssueKind, number>> {
    const counts: Partial<Record<QualityIssueKind, number>> = {};
    for (const entry of this.entries) {
      counts[entry.kind] = (counts[entry.kind] ?? 0) + 1;
    }
    return counts;
  }

  /** Digest of the whole stream, for comparing two runs. */
  digest(): string {
    return contentHash(this.entries);
  }
}
