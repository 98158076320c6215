/**
 * Local-time reporting windows.
 *
 * Vendor timestamps are UTC; report periods are local calendar days and
 * weeks. Boundaries are computed as local wall-clock strings, converted
 * once to UTC instants, and membership is tested against those instants.
 */
import { addDays, format, isValid, parseISO, subDays } from "date-fns";
import { formatInTimeZone, fromZonedTime } from "date-fns-tz";
import type { QualityLog } from "../trace/quality_log.js";
import type { LocalTimestamp, LocalWindow, NormalizedEvent, TimeBucket } from "../shared/types.js";

const DATE_FORMAT = "yyyy-MM-dd";
const LOCAL_ISO_FORMAT = "yyyy-MM-dd'T'HH:mm:ssXXX";
const DISPLAY_FORMAT = "MM/dd/yyyy hh:mm a zzz";

function shiftDate(date: string, days: number): string {
  const base = parseISO(date);
  return format(days < 0 ? subDays(base, -days) : addDays(base, days), DATE_FORMAT);
}

function buildWindow(startDate: string, endDate: string, timeZone: string): LocalWindow {
  const startLocal = `${startDate}T00:00:00`;
  const endLocal = `${endDate}T23:59:59`;
  return {
    timeZone,
    startDate,
    endDate,
    startLocal,
    endLocal,
    startUtc: fromZonedTime(startLocal, timeZone),
    endUtc: fromZonedTime(endLocal, timeZone),
  };
}

/** Closed interval [00:00:00, 23:59:59] local time for a yyyy-MM-dd date. */
export function localDayWindow(date: string, timeZone: string): LocalWindow {
  return buildWindow(date, date, timeZone);
}

/** The local calendar day before `now`. */
export function previousLocalDay(now: Date, timeZone: string): LocalWindow {
  const today = formatInTimeZone(now, timeZone, DATE_FORMAT);
  return localDayWindow(shiftDate(today, -1), timeZone);
}

/**
 * The previous ISO week, Monday 00:00:00 through Sunday 23:59:59 local.
 * On a Monday this is still the week before, never the current week.
 */
export function localWeekWindow(now: Date, timeZone: string): LocalWindow {
  const today = formatInTimeZone(now, timeZone, DATE_FORMAT);
  const isoWeekday = Number(formatInTimeZone(now, timeZone, "i"));
  const monday = shiftDate(today, -(isoWeekday - 1 + 7));
  return buildWindow(monday, shiftDate(monday, 6), timeZone);
}

export function toLocalTimestamp(instant: Date, timeZone: string): LocalTimestamp {
  return {
    iso: formatInTimeZone(instant, timeZone, LOCAL_ISO_FORMAT),
    date: formatInTimeZone(instant, timeZone, DATE_FORMAT),
    isoWeekday: Number(formatInTimeZone(instant, timeZone, "i")),
    hour: Number(formatInTimeZone(instant, timeZone, "H")),
  };
}

/** Display form used in report rows, e.g. "02/11/2025 02:30 PM CST". */
export function formatLocalTime(instant: Date, timeZone: string): string {
  return formatInTimeZone(instant, timeZone, DISPLAY_FORMAT);
}

export function bucketTimeOfDay(local: LocalTimestamp): TimeBucket {
  if (local.hour >= 6 && local.hour < 12) return "6AM-12PM";
  if (local.hour >= 12 && local.hour < 18) return "12PM-6PM";
  if (local.hour >= 18) return "6PM-12AM";
  return "12AM-6AM";
}

export function isWeekend(local: LocalTimestamp): boolean {
  return local.isoWeekday >= 6;
}

// Offset-less vendor timestamps are UTC, whatever the host zone.
const NAIVE_ISO = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?$/;

function asUtcIso(text: string): string {
  const naive = NAIVE_ISO.exec(text);
  if (!naive) return text;
  return `${naive[1]}T${naive[2] ?? "00:00"}Z`;
}

/** Parse a vendor timestamp; null when absent or unparseable. */
export function parseVendorTimestamp(value: unknown): Date | null {
  if (value instanceof Date) return isValid(value) ? value : null;
  if (typeof value !== "string") return null;
  const text = value.trim();
  if (text === "") return null;
  const parsed = parseISO(asUtcIso(text));
  return isValid(parsed) ? parsed : null;
}

export function isWithinWindow(instant: Date, window: LocalWindow): boolean {
  const t = instant.getTime();
  return t >= window.startUtc.getTime() && t <= window.endUtc.getTime();
}

export interface WindowFilterResult<T> {
  events: T[];
  outsideWindow: number;
  unparseable: number;
}

/**
 * Keep events inside the window. Events without a usable timestamp are
 * kept too (and logged): the time filter is skipped, the event is not.
 */
export function filterToWindow<T extends NormalizedEvent>(
  events: readonly T[],
  window: LocalWindow,
  log: QualityLog
): WindowFilterResult<T> {
  const kept: T[] = [];
  let outsideWindow = 0;
  let unparseable = 0;

  for (const event of events) {
    const instant = event.timestampUtc ? parseVendorTimestamp(event.timestampUtc) : null;
    if (!instant) {
      unparseable++;
      log.record(
        "WINDOW_FILTER_SKIPPED",
        event.source,
        event.id,
        "No usable timestamp; kept without window check"
      );
      kept.push(event);
      continue;
    }
    if (isWithinWindow(instant, window)) {
      kept.push(event);
    } else {
      outsideWindow++;
    }
  }

  return { events: kept, outsideWindow, unparseable };
}
