/**
 * Telematics over-the-limit (speeding) event enrichment. Vendor speeds
 * are km/h; every derived number is converted once here.
 */
import { classifySpeedTier, severityRank } from "../classify/tier.js";
import type { SpeedingEvent } from "../shared/types.js";
import { parseVendorTimestamp } from "../time/windows.js";
import type { EnrichContext } from "./context.js";
import { readLocation, resolveEventTime, resolveIdentity } from "./common.js";
import { SPEEDING_ENVELOPE_KEY, unwrapEnvelope } from "./envelope.js";
import { asText, firstNumber, firstText, getRecord } from "./fields.js";
import { formatDuration, kmhToMph } from "./units.js";

export const SPEEDING_EVENT_TYPE = "speed_violation";

/**
 * Overspeed in km/h: the vendor's max (or average) overspeed, else
 * vehicle speed minus posted limit when both are known, floored at 0.
 */
export function overspeedKmh(raw: Record<string, unknown>): number {
  const reported = firstNumber(raw, ["max_over_speed_in_kph", "avg_over_speed_in_kph"]);
  if (reported !== null) return Math.max(0, reported);
  const vehicle = firstNumber(raw, ["max_vehicle_speed", "avg_vehicle_speed"]);
  const posted = firstNumber(raw, ["min_posted_speed_limit_in_kph"]);
  if (vehicle === null || posted === null) return 0;
  return Math.max(0, vehicle - posted);
}

function durationBetween(start: string, end: string): number {
  const a = parseVendorTimestamp(start);
  const b = parseVendorTimestamp(end);
  if (!a || !b) return 0;
  return Math.max(0, Math.round((b.getTime() - a.getTime()) / 1000));
}

/** Normalize one raw speeding event. Never throws. */
export function enrichSpeedingEvent(rawEvent: unknown, ctx: EnrichContext): SpeedingEvent {
  const raw = unwrapEnvelope(rawEvent, SPEEDING_ENVELOPE_KEY);
  const types = ctx.rules.eventTypes;
  const id = firstText(raw, ["id", "event_id"]);

  const vehicleKmh = firstNumber(raw, ["max_vehicle_speed", "avg_vehicle_speed"]);
  if (vehicleKmh === null) {
    ctx.log.record("MISSING_SPEED", "speeding", id, "No vehicle speed; recorded as 0");
  }
  const speedMph = kmhToMph(vehicleKmh ?? 0);
  const postedSpeedMph = kmhToMph(firstNumber(raw, ["min_posted_speed_limit_in_kph"]) ?? 0);
  const overspeedMph = kmhToMph(overspeedKmh(raw));

  const { vehicle, driver, placement } = resolveIdentity(raw, "speeding", id, ctx);
  const time = resolveEventTime(raw, ["start_time", "end_time"], "speeding", id, ctx);
  const durationSeconds =
    firstNumber(raw, ["duration", "duration_seconds"]) ??
    durationBetween(asText(raw.start_time), asText(raw.end_time));
  const location = readLocation(raw, ["start_lat", "lat", "latitude"], ["start_lon", "lon", "longitude"]);
  const metadata = getRecord(raw, "metadata");

  return {
    id,
    source: "speeding",
    driver: driver.name,
    driverNameSource: driver.source,
    vehicle,
    division: placement.division,
    yard: placement.yard,
    eventType: SPEEDING_EVENT_TYPE,
    rawType: "speeding",
    displayName: types.displayNames.get(SPEEDING_EVENT_TYPE) ?? "Speeding",
    tier: classifySpeedTier(overspeedMph, speedMph, ctx.rules.speedTiers),
    severityRank: severityRank(SPEEDING_EVENT_TYPE, types),
    speedMph,
    durationSeconds,
    durationLabel: formatDuration(durationSeconds),
    ...time,
    location,
    postedSpeedMph,
    overspeedMph,
    vendorSeverity: metadata ? asText(metadata.severity) : "",
    mapsLink: location ? `https://www.google.com/maps?q=${location.lat},${location.lon}` : "",
  };
}

export function enrichSpeedingEvents(rawEvents: readonly unknown[], ctx: EnrichContext): SpeedingEvent[] {
  return rawEvents.map((raw) => enrichSpeedingEvent(raw, ctx));
}
