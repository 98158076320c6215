import type { SpeedTierTable } from "../config/schemas.js";
import type { NormalizedEvent, SpeedingEvent, Tier } from "../shared/types.js";
import { TIER_ORDER } from "../shared/types.js";
import type { EventTypeRules } from "./event_types.js";

/**
 * Tier for a canonical camera-event type. Anything outside the RED and
 * YELLOW sets is ORANGE: unknown types land in coaching, never dropped
 * and never escalated.
 */
export function classifyTier(canonicalType: string, rules: EventTypeRules): Tier {
  return rules.tiers.get(canonicalType) ?? "ORANGE";
}

/**
 * Tier for an over-the-limit event. The worse of the relative and the
 * absolute condition wins, so a small overage at highway speed is RED.
 */
export function classifySpeedTier(
  overLimitMph: number,
  absoluteSpeedMph: number,
  thresholds: SpeedTierTable
): Tier {
  if (
    overLimitMph >= thresholds.redOverLimitMph ||
    absoluteSpeedMph >= thresholds.redAbsoluteMph
  ) {
    return "RED";
  }
  if (overLimitMph >= thresholds.orangeOverLimitMph) return "ORANGE";
  return "YELLOW";
}

/** Within-tier rank (lower = more severe); unranked types sort last. */
export function severityRank(canonicalType: string, rules: EventTypeRules): number {
  return rules.ranks.get(canonicalType) ?? rules.defaultRank;
}

/** Comparator: tier order, then severity rank. */
export function compareByTierAndRank(
  a: Pick<NormalizedEvent, "tier" | "severityRank">,
  b: Pick<NormalizedEvent, "tier" | "severityRank">
): number {
  return TIER_ORDER[a.tier] - TIER_ORDER[b.tier] || a.severityRank - b.severityRank;
}

/** Stable sort by (tier, rank); returns a new array. */
export function sortByTierAndRank<T extends Pick<NormalizedEvent, "tier" | "severityRank">>(
  events: readonly T[]
): T[] {
  return [...events].sort(compareByTierAndRank);
}

/** Stable sort by overspeed, largest first; returns a new array. */
export function sortByOverspeed(events: readonly SpeedingEvent[]): SpeedingEvent[] {
  return [...events].sort((a, b) => b.overspeedMph - a.overspeedMph);
}

/**
 * Single-event severity comparator across families: tier first, then
 * overspeed (speeding) or rank (camera).
 */
export function compareEventSeverity(a: NormalizedEvent, b: NormalizedEvent): number {
  const byTier = TIER_ORDER[a.tier] - TIER_ORDER[b.tier];
  if (byTier !== 0) return byTier;
  if (a.source === "speeding" && b.source === "speeding") {
    return b.overspeedMph - a.overspeedMph;
  }
  return a.severityRank - b.severityRank;
}
