/**
 * Run Configuration Module
 *
 * Selects which report a run builds and the zone its windows are cut in:
 * - daily_camera:      yesterday's camera / driver-performance events
 * - daily_speeding:    yesterday's over-the-limit events
 * - daily_assessments: yesterday's field assessments
 * - weekly:            the previous Monday–Sunday briefing
 */

export type ReportKind = "daily_camera" | "daily_speeding" | "daily_assessments" | "weekly";

export const REPORT_KINDS: ReportKind[] = [
  "daily_camera",
  "daily_speeding",
  "daily_assessments",
  "weekly",
];

export const DEFAULT_TIME_ZONE = "America/Chicago";

export interface RunConfig {
  report: ReportKind;
  timeZone: string;
}

function isReportKind(value: string): value is ReportKind {
  return REPORT_KINDS.some((kind) => kind === value);
}

/**
 * Parse the report kind from CLI argument and/or environment variable.
 * CLI argument takes priority over environment variable.
 * Defaults to "weekly" when neither is provided; unknown values throw.
 */
export function parseReportKind(cliArg?: string, envVar?: string): ReportKind {
  const raw = (cliArg ?? envVar ?? "weekly").trim().toLowerCase().replace(/-/g, "_");
  if (isReportKind(raw)) return raw;
  throw new Error(`Unknown report kind "${raw}" (expected one of: ${REPORT_KINDS.join(", ")})`);
}

/** Whether the runtime recognizes an IANA zone name. */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Parse the IANA time zone from CLI argument and/or environment variable.
 * CLI argument takes priority; defaults to America/Chicago.
 */
export function parseTimeZone(cliArg?: string, envVar?: string): string {
  const tz = (cliArg ?? envVar ?? DEFAULT_TIME_ZONE).trim();
  if (!isValidTimeZone(tz)) {
    throw new Error(`Unknown time zone "${tz}"`);
  }
  return tz;
}
