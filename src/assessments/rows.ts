/**
 * EHS form-response rows: CSV parsing, header-echo removal, window
 * filtering and incident attribution.
 */
import { parse } from "csv-parse/sync";
import { format, isValid, parse as parseDate } from "date-fns";
import { fromZonedTime } from "date-fns-tz";
import { z } from "zod";

import type { FindingRules } from "../config/schemas.js";
import type { FormRow, KpaIncident, LocalWindow } from "../shared/types.js";
import { isWithinWindow } from "../time/windows.js";
import type { QualityLog } from "../trace/quality_log.js";

const FormRowsSchema = z.array(z.record(z.string(), z.string()));

/** Parse an exported form-response CSV into header-keyed rows. */
export function parseFormResponsesCsv(text: string): FormRow[] {
  const records: unknown = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    bom: true,
  });
  return FormRowsSchema.parse(records);
}

/** Case-insensitive field read; "" when absent. */
export function getField(row: FormRow, name: string): string {
  const wanted = name.trim().toLowerCase();
  for (const [key, value] of Object.entries(row)) {
    if (key.trim().toLowerCase() === wanted) return value.trim();
  }
  return "";
}

/** First non-empty value among `names`. */
export function firstField(row: FormRow, names: readonly string[]): string {
  for (const name of names) {
    const value = getField(row, name);
    if (value) return value;
  }
  return "";
}

export function reportNumber(row: FormRow, rules: FindingRules): string {
  return getField(row, rules.headerSentinel.column);
}

/**
 * Drop rows that repeat the header ("Report Number" under the
 * "Report Number" column); exports include one per page.
 */
export function dropHeaderEchoRows(rows: readonly FormRow[], rules: FindingRules, log: QualityLog): FormRow[] {
  const { value } = rules.headerSentinel;
  return rows.filter((row, index) => {
    if (reportNumber(row, rules) !== value) return true;
    log.record("HEADER_ROW_SKIPPED", "assessment", `row ${index + 1}`, "Duplicate header row removed");
    return false;
  });
}

const FALLBACK_DATE_FORMATS = ["yyyy-MM-dd", "MM/dd/yyyy HH:mm:ss", "MM/dd/yyyy"];
const LOCAL_WALL_CLOCK = "yyyy-MM-dd'T'HH:mm:ss";

/**
 * A row date is local wall-clock time in `timeZone`; returns the UTC
 * instant, or null when no known format matches.
 */
export function parseRowDate(value: string, rules: FindingRules, timeZone: string): Date | null {
  const text = value.trim();
  if (!text) return null;
  for (const pattern of [rules.dateFormat, ...FALLBACK_DATE_FORMATS]) {
    const wall = parseDate(text, pattern, new Date(0));
    if (isValid(wall)) return fromZonedTime(format(wall, LOCAL_WALL_CLOCK), timeZone);
  }
  return null;
}

/**
 * Rows whose date falls in the window. Undated rows are kept and
 * logged, the same policy as events without a timestamp.
 */
export function filterRowsToWindow(
  rows: readonly FormRow[],
  window: LocalWindow,
  rules: FindingRules,
  log: QualityLog
): FormRow[] {
  return rows.filter((row) => {
    const raw = getField(row, "date");
    const instant = parseRowDate(raw, rules, window.timeZone);
    if (!instant) {
      log.record(
        "UNPARSEABLE_ROW_DATE",
        "assessment",
        reportNumber(row, rules),
        raw ? `Unparseable date "${raw}"; kept without window check` : "Missing date; kept without window check"
      );
      return true;
    }
    return isWithinWindow(instant, window);
  });
}

/** Incident rows attributed to a named driver. Unattributed rows are logged and skipped. */
export function toKpaIncidents(rows: readonly FormRow[], rules: FindingRules, log: QualityLog): KpaIncident[] {
  const incidents: KpaIncident[] = [];
  for (const row of rows) {
    const reportId = reportNumber(row, rules);
    const driver = firstField(row, rules.incidentDriverFields);
    if (!driver) {
      log.record("INCIDENT_DRIVER_MISSING", "incident", reportId, "Incident has no driver or employee field");
      continue;
    }
    incidents.push({ reportId, date: getField(row, "date"), driver });
  }
  return incidents;
}
