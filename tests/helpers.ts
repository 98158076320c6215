/**
 * Shared fixtures: the repo's rule tables and fleet config, a report
 * context, and builders for already-normalized events.
 */
import { eventDisplayName } from "../src/classify/canonicalize.js";
import { classifyTier, severityRank } from "../src/classify/tier.js";
import { loadFleetConfig, loadRuleSet } from "../src/config/loader.js";
import { EMPTY_FLEET_LOOKUP } from "../src/enrich/fleet_lookup.js";
import type { ReportContext } from "../src/report/common.js";
import type { CameraEvent, LocalTimestamp, SpeedingEvent } from "../src/shared/types.js";
import { QualityLog } from "../src/trace/quality_log.js";

export const TZ = "America/Chicago";
export const rules = loadRuleSet();
export const fleet = loadFleetConfig();
export const CASING_YARDS = fleet.yardOrder["Casing"];

export function makeCtx(overrides: Partial<ReportContext> = {}): ReportContext {
  return {
    rules,
    fleet,
    lookup: EMPTY_FLEET_LOOKUP,
    timeZone: TZ,
    now: new Date("2025-02-17T12:00:00Z"),
    log: new QualityLog(),
    ...overrides,
  };
}

export function localAt(hour: number, isoWeekday: number = 3): LocalTimestamp {
  return { iso: "", date: "", isoWeekday, hour };
}

export function cameraEvent(overrides: Partial<CameraEvent> = {}): CameraEvent {
  return {
    id: "cam-x",
    source: "camera",
    driver: "Ana Ruiz",
    driverNameSource: "lookup",
    vehicle: "5010C",
    division: "Casing",
    yard: "Midland",
    eventType: "hard_brake",
    rawType: "hard_brake",
    displayName: "Hard Brake",
    tier: "ORANGE",
    severityRank: 10,
    speedMph: 0,
    durationSeconds: 0,
    durationLabel: "N/A",
    timestampUtc: null,
    timestampLocal: null,
    formattedTime: "N/A",
    isWeekend: false,
    location: null,
    videoUrl: "",
    isObstruction: false,
    ...overrides,
  };
}

/** A camera event whose label, tier and rank come from the rule tables. */
export function cameraOfType(eventType: string, overrides: Partial<CameraEvent> = {}): CameraEvent {
  const types = rules.eventTypes;
  return cameraEvent({
    eventType,
    rawType: eventType,
    displayName: eventDisplayName(eventType, eventType, types),
    tier: classifyTier(eventType, types),
    severityRank: severityRank(eventType, types),
    ...overrides,
  });
}

export function speedingEvent(overrides: Partial<SpeedingEvent> = {}): SpeedingEvent {
  return {
    id: "spd-x",
    source: "speeding",
    driver: "Ana Ruiz",
    driverNameSource: "lookup",
    vehicle: "5010C",
    division: "Casing",
    yard: "Midland",
    eventType: "speed_violation",
    rawType: "speeding",
    displayName: "Speed Violation",
    tier: "YELLOW",
    severityRank: 17,
    speedMph: 75,
    durationSeconds: 0,
    durationLabel: "N/A",
    timestampUtc: null,
    timestampLocal: null,
    formattedTime: "N/A",
    isWeekend: false,
    location: null,
    postedSpeedMph: 65,
    overspeedMph: 10,
    vendorSeverity: "",
    mapsLink: "",
    ...overrides,
  };
}
