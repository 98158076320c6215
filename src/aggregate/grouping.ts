/**
 * Ordered groupings and counts over normalized events. Every list that
 * leaves here has an explicit order; nothing depends on map iteration
 * beyond insertion order.
 */
import type { NormalizedEvent, TierCounts } from "../shared/types.js";

export interface TypeCount {
  type: string;
  count: number;
}

export interface YardGroup<T extends NormalizedEvent> {
  yard: string;
  events: T[];
}

export interface DivisionGroup<T extends NormalizedEvent> {
  division: string;
  events: T[];
  yards: YardGroup<T>[];
}

export function countByTier(events: readonly NormalizedEvent[]): TierCounts {
  const counts: TierCounts = { RED: 0, ORANGE: 0, YELLOW: 0 };
  for (const e of events) counts[e.tier]++;
  return counts;
}

/** Counts per display name, most common first; ties keep first-seen order. */
export function summarizeEventTypes(events: readonly NormalizedEvent[]): TypeCount[] {
  const counts = new Map<string, number>();
  for (const e of events) counts.set(e.displayName, (counts.get(e.displayName) ?? 0) + 1);
  return [...counts.entries()]
    .map(([type, count]) => ({ type, count }))
    .sort((a, b) => b.count - a.count);
}

/** "Distraction x2, Hard Brake x1" */
export function formatTypeSummary(events: readonly NormalizedEvent[]): string {
  return summarizeEventTypes(events)
    .map((t) => `${t.type} x${t.count}`)
    .join(", ");
}

/**
 * Keys in a configured order: listed keys first, then unlisted keys
 * alphabetically, then the `last` key (if any).
 */
function orderedKeys(keys: Iterable<string>, order: readonly string[], last?: string): string[] {
  const rank = (k: string) => {
    if (k === last) return order.length + 1;
    const i = order.indexOf(k);
    return i >= 0 ? i : order.length;
  };
  return [...keys].sort((a, b) => rank(a) - rank(b) || a.localeCompare(b));
}

function bucket<T extends NormalizedEvent>(events: readonly T[], key: (e: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const e of events) {
    const k = key(e);
    const list = groups.get(k) ?? [];
    list.push(e);
    groups.set(k, list);
  }
  return groups;
}

/** Events per yard in configured yard order; events without a yard come last. */
export function groupByYard<T extends NormalizedEvent>(events: readonly T[], yardOrder: readonly string[]): YardGroup<T>[] {
  const groups = bucket(events, (e) => e.yard);
  return orderedKeys(groups.keys(), yardOrder, "").map((yard) => ({
    yard,
    events: groups.get(yard) ?? [],
  }));
}

/**
 * Events per division in configured order (unassigned last), each split
 * by yard for divisions that have a yard order.
 */
export function groupByDivision<T extends NormalizedEvent>(
  events: readonly T[],
  divisionOrder: readonly string[],
  yardOrderByDivision: Readonly<Record<string, readonly string[]>>,
  unassignedDivision: string = "Unassigned"
): DivisionGroup<T>[] {
  const groups = bucket(events, (e) => e.division);
  return orderedKeys(groups.keys(), divisionOrder, unassignedDivision).map((division) => {
    const divisionEvents = groups.get(division) ?? [];
    const yardOrder = yardOrderByDivision[division];
    return {
      division,
      events: divisionEvents,
      yards: yardOrder ? groupByYard(divisionEvents, yardOrder) : [],
    };
  });
}
