import { compareEventSeverity } from "../classify/tier.js";
import type { NormalizedEvent, RepeatOffender } from "../shared/types.js";
import { UNKNOWN_DRIVER } from "../shared/types.js";
import { formatTypeSummary } from "./grouping.js";

export interface RepeatOffenderOptions {
  /** Minimum events in the window to be listed */
  minEvents: number;
  /** Cap on list length; when set, the list is ordered by worst event before truncation */
  limit?: number;
}

/**
 * Named drivers with at least `minEvents` events from a single source.
 *
 * Uncapped lists are ordered by count, then worst event. Capped lists
 * are ordered by worst single event first (a driver with one RED
 * collision outranks one with five YELLOW events), then count.
 */
export function findRepeatOffenders(
  events: readonly NormalizedEvent[],
  options: RepeatOffenderOptions
): RepeatOffender[] {
  const byDriver = new Map<string, NormalizedEvent[]>();
  for (const e of events) {
    if (e.driver === UNKNOWN_DRIVER) continue;
    const list = byDriver.get(e.driver) ?? [];
    list.push(e);
    byDriver.set(e.driver, list);
  }

  const offenders: RepeatOffender[] = [];
  for (const [name, driverEvents] of byDriver) {
    if (driverEvents.length < options.minEvents) continue;
    const worstEvent = driverEvents.reduce((worst, e) => (compareEventSeverity(e, worst) < 0 ? e : worst));
    offenders.push({
      name,
      count: driverEvents.length,
      typeSummary: formatTypeSummary(driverEvents),
      worstTier: worstEvent.tier,
      worstEvent,
      events: driverEvents,
    });
  }

  if (options.limit === undefined) {
    return offenders.sort((a, b) => b.count - a.count || compareEventSeverity(a.worstEvent, b.worstEvent));
  }
  return offenders
    .sort((a, b) => compareEventSeverity(a.worstEvent, b.worstEvent) || b.count - a.count)
    .slice(0, options.limit);
}
