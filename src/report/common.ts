/**
 * Shared report plumbing: run context, window summary, quality summary
 * and the content digest every report carries.
 */
import type { EnrichContext } from "../enrich/context.js";
import type { ReportKind } from "../shared/run_config.js";
import { contentHash } from "../shared/hash.js";
import type { LocalWindow, NormalizedEvent, Tier } from "../shared/types.js";
import type { QualityIssueKind } from "../trace/quality_log.js";

export interface ReportContext extends EnrichContext {
  /** Reference instant for window calculation; the only clock a report reads */
  now: Date;
}

export interface WindowSummary {
  timeZone: string;
  startDate: string;
  endDate: string;
  startLocal: string;
  endLocal: string;
}

export interface QualitySummary {
  entries: number;
  byKind: Partial<Record<QualityIssueKind, number>>;
}

export interface ReportHeader {
  kind: ReportKind;
  title: string;
  window: WindowSummary;
  ruleVersions: Record<string, string>;
  quality: QualitySummary;
}

export type WithDigest<T> = T & { digest: string };

/** One row per event in a rendered table. */
export interface EventRow {
  id: string;
  driver: string;
  driverNameSource: NormalizedEvent["driverNameSource"];
  vehicle: string;
  division: string;
  yard: string;
  event: string;
  tier: Tier;
  time: string;
  speedMph: number;
  detail: string;
  link: string;
}

export function summarizeWindow(window: LocalWindow): WindowSummary {
  return {
    timeZone: window.timeZone,
    startDate: window.startDate,
    endDate: window.endDate,
    startLocal: window.startLocal,
    endLocal: window.endLocal,
  };
}

export function ruleVersions(ctx: ReportContext): Record<string, string> {
  return {
    eventTypes: ctx.rules.eventTypes.version,
    speedTiers: ctx.rules.speedTiers.version,
    findings: ctx.rules.findings.version,
    redFlags: ctx.rules.redFlags.version,
    fleet: ctx.fleet.version,
  };
}

export function summarizeQuality(ctx: ReportContext): QualitySummary {
  return { entries: ctx.log.count(), byKind: ctx.log.summary() };
}

export function reportHeader(kind: ReportKind, title: string, window: LocalWindow, ctx: ReportContext): ReportHeader {
  return {
    kind,
    title,
    window: summarizeWindow(window),
    ruleVersions: ruleVersions(ctx),
    quality: summarizeQuality(ctx),
  };
}

/** Attach the SHA-256 of the canonical JSON body. */
export function withDigest<T extends object>(body: T): WithDigest<T> {
  return { ...body, digest: contentHash(body) };
}

export function toEventRow(e: NormalizedEvent): EventRow {
  const detail =
    e.source === "speeding"
      ? `${e.speedMph} mph in ${e.postedSpeedMph} mph zone (+${e.overspeedMph})`
      : e.durationLabel;
  return {
    id: e.id,
    driver: e.driver,
    driverNameSource: e.driverNameSource,
    vehicle: e.vehicle,
    division: e.division,
    yard: e.yard,
    event: e.displayName,
    tier: e.tier,
    time: e.formattedTime,
    speedMph: e.speedMph,
    detail,
    link: e.source === "speeding" ? e.mapsLink : e.videoUrl,
  };
}
