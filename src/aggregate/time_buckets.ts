import type { RedFlagRules } from "../config/schemas.js";
import type { NormalizedEvent, TimeBucket } from "../shared/types.js";
import { TIME_BUCKETS } from "../shared/types.js";
import { bucketTimeOfDay } from "../time/windows.js";

export interface BucketCount {
  bucket: TimeBucket;
  count: number;
}

export interface TypeBucketCounts {
  type: string;
  total: number;
  counts: Record<TimeBucket, number>;
}

export interface TimeBucketAnalysis {
  buckets: BucketCount[];
  byType: TypeBucketCounts[];
  /** Events with no local timestamp */
  unbucketed: number;
  drowsinessNote: string | null;
}

export const DROWSINESS_NOTE =
  "Drowsiness events concentrated in afternoon/evening. Consider scheduling adjustments";

const LATE_BUCKETS: ReadonlySet<TimeBucket> = new Set<TimeBucket>(["12PM-6PM", "6PM-12AM"]);

function emptyCounts(): Record<TimeBucket, number> {
  return { "6AM-12PM": 0, "12PM-6PM": 0, "6PM-12AM": 0, "12AM-6AM": 0 };
}

/** Local time-of-day distribution, overall and per event type. */
export function analyzeTimeBuckets(events: readonly NormalizedEvent[], rules: RedFlagRules): TimeBucketAnalysis {
  const totals = emptyCounts();
  const perType = new Map<string, TypeBucketCounts>();
  let unbucketed = 0;
  let drowsyLate = 0;
  let drowsyEarly = 0;

  for (const e of events) {
    if (!e.timestampLocal) {
      unbucketed++;
      continue;
    }
    const b = bucketTimeOfDay(e.timestampLocal);
    totals[b]++;

    const row = perType.get(e.displayName) ?? { type: e.displayName, total: 0, counts: emptyCounts() };
    row.counts[b]++;
    row.total++;
    perType.set(e.displayName, row);

    if (e.eventType === "drowsiness") {
      if (LATE_BUCKETS.has(b)) drowsyLate++;
      else drowsyEarly++;
    }
  }

  return {
    buckets: TIME_BUCKETS.map((bucket) => ({ bucket, count: totals[bucket] })),
    byType: [...perType.values()].sort((a, b) => b.total - a.total),
    unbucketed,
    drowsinessNote: drowsyLate > drowsyEarly && drowsyLate >= rules.drowsinessNoteMin ? DROWSINESS_NOTE : null,
  };
}
