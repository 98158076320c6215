import type { SafetyRep } from "../config/schemas.js";
import type { NormalizedEvent, Placement } from "../shared/types.js";

export interface RepSection<T extends NormalizedEvent> {
  rep: string;
  emails: string[];
  events: T[];
}

export interface RepRouting<T extends NormalizedEvent> {
  sections: RepSection<T>[];
  /** Events no rep covers */
  unrouted: T[];
}

/** A placement with yard "" covers the whole division. */
export function coversPlacement(rep: SafetyRep, placement: Placement): boolean {
  return rep.placements.some(
    (p) => p.division === placement.division && (p.yard === "" || p.yard === placement.yard)
  );
}

/**
 * Per-rep event sections for distribution, in configured rep order.
 * An event covered by two reps appears in both sections.
 */
export function routeToSafetyReps<T extends NormalizedEvent>(
  events: readonly T[],
  reps: readonly SafetyRep[]
): RepRouting<T> {
  const sections = reps.map((rep) => ({
    rep: rep.name,
    emails: [...rep.emails],
    events: events.filter((e) => coversPlacement(rep, e)),
  }));
  const unrouted = events.filter((e) => !reps.some((rep) => coversPlacement(rep, e)));
  return { sections, unrouted };
}
