/**
 * Cross-source red flags: drivers whose camera, speeding and incident
 * records together cross the configured thresholds.
 */
import type { RedFlagRules } from "../config/schemas.js";
import type { CameraEvent, KpaIncident, RedFlagDriver, SpeedingEvent } from "../shared/types.js";
import { UNKNOWN_DRIVER } from "../shared/types.js";
import { formatTypeSummary } from "./grouping.js";

interface DriverTally {
  name: string;
  vehicle: string;
  yard: string;
  camera: CameraEvent[];
  speeding: SpeedingEvent[];
  kpaCount: number;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

function speedingSummary(events: readonly SpeedingEvent[]): string {
  if (events.length === 0) return "";
  const worst = Math.max(...events.map((e) => e.overspeedMph));
  return `${plural(events.length, "event")}, worst +${worst} mph over`;
}

/** Recommended action by fixed priority; only the first matching rule applies. */
export function recommendAction(tally: Pick<DriverTally, "camera" | "speeding">, rules: RedFlagRules): string {
  const types = new Set(tally.camera.map((e) => e.eventType));
  if (rules.fatigueTypes.some((t) => types.has(t))) return rules.actions.fatigue;
  if (rules.distractionTypes.some((t) => types.has(t))) return rules.actions.distraction;
  if (tally.speeding.length >= rules.speedingMin) return rules.actions.speed;
  if (tally.camera.length >= rules.cameraMin && tally.speeding.length > 0) {
    return rules.actions.multipleCategories;
  }
  return rules.actions.review;
}

function flagReasons(t: DriverTally, rules: RedFlagRules): string[] {
  const reasons: string[] = [];
  const cam = t.camera.length;
  const spd = t.speeding.length;
  if (cam > 0 && spd > 0) reasons.push("Camera and speeding events");
  if (cam >= rules.cameraMin) reasons.push(plural(cam, "camera event"));
  if (spd >= rules.speedingMin) reasons.push(plural(spd, "speeding event"));
  if (cam > 0 && t.kpaCount >= rules.kpaMin) reasons.push(`Camera events with ${plural(t.kpaCount, "KPA incident")}`);
  return reasons;
}

export function detectRedFlags(
  camera: readonly CameraEvent[],
  speeding: readonly SpeedingEvent[],
  kpaIncidents: readonly KpaIncident[],
  rules: RedFlagRules
): RedFlagDriver[] {
  const tallies = new Map<string, DriverTally>();
  const tallyFor = (name: string) => {
    const existing = tallies.get(name);
    if (existing) return existing;
    const created: DriverTally = { name, vehicle: "", yard: "", camera: [], speeding: [], kpaCount: 0 };
    tallies.set(name, created);
    return created;
  };

  for (const e of camera) {
    if (e.driver === UNKNOWN_DRIVER) continue;
    const t = tallyFor(e.driver);
    t.camera.push(e);
    if (e.vehicle) t.vehicle = e.vehicle;
    if (e.yard) t.yard = e.yard;
  }
  for (const e of speeding) {
    if (e.driver === UNKNOWN_DRIVER) continue;
    const t = tallyFor(e.driver);
    t.speeding.push(e);
    if (e.vehicle) t.vehicle = e.vehicle;
    if (e.yard) t.yard = e.yard;
  }

  // incidents only count toward drivers already seen in telematics
  const byLowerName = new Map([...tallies.values()].map((t) => [t.name.trim().toLowerCase(), t]));
  for (const incident of kpaIncidents) {
    const t = byLowerName.get(incident.driver.trim().toLowerCase());
    if (t) t.kpaCount++;
  }

  const flagged: RedFlagDriver[] = [];
  for (const t of tallies.values()) {
    const reasons = flagReasons(t, rules);
    if (reasons.length === 0) continue;
    flagged.push({
      name: t.name,
      vehicle: t.vehicle,
      yard: t.yard,
      cameraCount: t.camera.length,
      speedingCount: t.speeding.length,
      kpaCount: t.kpaCount,
      total: t.camera.length + t.speeding.length + t.kpaCount,
      reasons,
      cameraSummary: formatTypeSummary(t.camera),
      speedingSummary: speedingSummary(t.speeding),
      recommendedAction: recommendAction(t, rules),
    });
  }

  return flagged.sort((a, b) => b.total - a.total);
}
