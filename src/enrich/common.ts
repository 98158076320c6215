/**
 * Fields shared by both event families: who, where and when.
 */
import type { EventSource, GeoPoint, LocalTimestamp, Placement, RawRecord } from "../shared/types.js";
import { formatLocalTime, isWeekend, parseVendorTimestamp, toLocalTimestamp } from "../time/windows.js";
import type { EnrichContext } from "./context.js";
import { firstNumber, firstText } from "./fields.js";
import type { ResolvedDriver } from "./vehicle.js";
import { resolveDriver, resolvePlacement, resolveVehicleNumber } from "./vehicle.js";

export interface Identity {
  vehicle: string;
  driver: ResolvedDriver;
  placement: Placement;
}

export interface EventTime {
  timestampUtc: string | null;
  timestampLocal: LocalTimestamp | null;
  formattedTime: string;
  isWeekend: boolean;
}

export function resolveIdentity(raw: RawRecord, source: EventSource, ref: string, ctx: EnrichContext): Identity {
  const vehicle = resolveVehicleNumber(raw);
  const driver = resolveDriver(vehicle, raw, ctx.lookup);
  if (driver.source === "parsed") {
    ctx.log.record("DRIVER_NAME_PARSED", source, ref, `Driver "${driver.name}" parsed from vehicle "${vehicle}"`);
  } else if (driver.source === "unknown") {
    ctx.log.record("DRIVER_UNRESOLVED", source, ref, `No driver for vehicle "${vehicle}"`);
  }

  const placement = resolvePlacement(vehicle, raw, ctx.lookup, ctx.fleet);
  if (placement.division === ctx.fleet.unassignedDivision) {
    ctx.log.record("PLACEMENT_UNRESOLVED", source, ref, `No division for vehicle "${vehicle}"`);
  }

  return { vehicle, driver, placement };
}

export function resolveEventTime(
  raw: RawRecord,
  keys: readonly string[],
  source: EventSource,
  ref: string,
  ctx: EnrichContext
): EventTime {
  const text = firstText(raw, keys);
  const instant = parseVendorTimestamp(text);
  if (!instant) {
    ctx.log.record(
      "UNPARSEABLE_TIMESTAMP",
      source,
      ref,
      text ? `Unparseable timestamp "${text}"` : `Missing timestamp (${keys.join(", ")})`
    );
    return { timestampUtc: null, timestampLocal: null, formattedTime: text || "N/A", isWeekend: false };
  }

  const local = toLocalTimestamp(instant, ctx.timeZone);
  return {
    timestampUtc: instant.toISOString(),
    timestampLocal: local,
    formattedTime: formatLocalTime(instant, ctx.timeZone),
    isWeekend: isWeekend(local),
  };
}

export function readLocation(
  raw: RawRecord,
  latKeys: readonly string[],
  lonKeys: readonly string[]
): GeoPoint | null {
  const lat = firstNumber(raw, latKeys);
  const lon = firstNumber(raw, lonKeys);
  return lat !== null && lon !== null ? { lat, lon } : null;
}
