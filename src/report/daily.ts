/**
 * Daily reports: yesterday's camera events, speeding events and field
 * assessments, each as renderer-agnostic data.
 */
import { analyzeAssessments } from "../assessments/analyze.js";
import type { AssessmentAnalysis } from "../assessments/analyze.js";
import { dropHeaderEchoRows, filterRowsToWindow } from "../assessments/rows.js";
import { countByTier, groupByDivision, summarizeEventTypes } from "../aggregate/grouping.js";
import type { TypeCount } from "../aggregate/grouping.js";
import { findRepeatOffenders } from "../aggregate/repeat_offenders.js";
import { routeToSafetyReps } from "../aggregate/rep_routing.js";
import { sortByOverspeed, sortByTierAndRank } from "../classify/tier.js";
import { enrichCameraEvents } from "../enrich/camera.js";
import { enrichSpeedingEvents } from "../enrich/speeding.js";
import { round } from "../shared/stats.js";
import type {
  AssessmentStatus,
  FormRow,
  LocalWindow,
  NormalizedEvent,
  RepeatOffender,
  TierCounts,
} from "../shared/types.js";
import { filterToWindow, previousLocalDay } from "../time/windows.js";
import type { WindowFilterResult } from "../time/windows.js";
import { reportHeader, toEventRow, withDigest } from "./common.js";
import type { EventRow, ReportContext, ReportHeader, WithDigest } from "./common.js";

export interface EventTotals {
  events: number;
  outsideWindow: number;
  unparseableTimestamps: number;
}

export interface DivisionSection {
  division: string;
  tiers: TierCounts;
  rows: EventRow[];
  yards: { yard: string; count: number }[];
}

export interface RepSummary {
  rep: string;
  emails: string[];
  events: number;
  tiers: TierCounts;
}

export interface DailyEventReport extends ReportHeader {
  totals: EventTotals;
  tiers: TierCounts;
  types: TypeCount[];
  divisions: DivisionSection[];
  repeatOffenders: RepeatOffender[];
  reps: RepSummary[];
  unroutedEvents: number;
}

export interface DailySpeedingReport extends DailyEventReport {
  maxOverspeedMph: number;
  averageOverspeedMph: number;
}

export interface DailyAssessmentReport extends ReportHeader {
  totals: { assessments: number; withFindings: number; clean: number; findings: number };
  statuses: Record<AssessmentStatus, number>;
  analysis: AssessmentAnalysis;
}

function totalsOf<T>(filtered: WindowFilterResult<T>): EventTotals {
  return {
    events: filtered.events.length,
    outsideWindow: filtered.outsideWindow,
    unparseableTimestamps: filtered.unparseable,
  };
}

function divisionSections(events: readonly NormalizedEvent[], ctx: ReportContext): DivisionSection[] {
  const { fleet } = ctx;
  return groupByDivision(events, fleet.divisionOrder, fleet.yardOrder, fleet.unassignedDivision).map((g) => ({
    division: g.division,
    tiers: countByTier(g.events),
    rows: g.events.map(toEventRow),
    yards: g.yards.map((y) => ({ yard: y.yard, count: y.events.length })),
  }));
}

function repSummaries(events: readonly NormalizedEvent[], ctx: ReportContext) {
  const routing = routeToSafetyReps(events, ctx.fleet.safetyReps);
  const reps: RepSummary[] = routing.sections.map((s) => ({
    rep: s.rep,
    emails: s.emails,
    events: s.events.length,
    tiers: countByTier(s.events),
  }));
  return { reps, unroutedEvents: routing.unrouted.length };
}

function buildEventReport(
  kind: "daily_camera" | "daily_speeding",
  title: string,
  filtered: WindowFilterResult<NormalizedEvent>,
  sorted: NormalizedEvent[],
  minRepeat: number,
  ctx: ReportContext,
  window: LocalWindow
): DailyEventReport {
  const { reps, unroutedEvents } = repSummaries(sorted, ctx);
  const body = {
    totals: totalsOf(filtered),
    tiers: countByTier(sorted),
    types: summarizeEventTypes(sorted),
    divisions: divisionSections(sorted, ctx),
    repeatOffenders: findRepeatOffenders(sorted, { minEvents: minRepeat }),
    reps,
    unroutedEvents,
  };
  return { ...reportHeader(kind, title, window, ctx), ...body };
}

/** Yesterday's camera events by division, (tier, rank) ordered. */
export function buildDailyCameraReport(rawEvents: readonly unknown[], ctx: ReportContext): WithDigest<DailyEventReport> {
  const window = previousLocalDay(ctx.now, ctx.timeZone);
  const filtered = filterToWindow(enrichCameraEvents(rawEvents, ctx), window, ctx.log);
  const sorted = sortByTierAndRank(filtered.events);
  return withDigest(
    buildEventReport(
      "daily_camera",
      `Daily Camera Events: ${window.startDate}`,
      filtered,
      sorted,
      ctx.rules.redFlags.repeatOffenders.camera,
      ctx,
      window
    )
  );
}

/** Yesterday's speeding events by division, worst overspeed first. */
export function buildDailySpeedingReport(rawEvents: readonly unknown[], ctx: ReportContext): WithDigest<DailySpeedingReport> {
  const window = previousLocalDay(ctx.now, ctx.timeZone);
  const filtered = filterToWindow(enrichSpeedingEvents(rawEvents, ctx), window, ctx.log);
  const sorted = sortByOverspeed(filtered.events);
  const overspeeds = sorted.map((e) => e.overspeedMph);
  const report = buildEventReport(
    "daily_speeding",
    `Daily Speeding Events: ${window.startDate}`,
    filtered,
    sorted,
    ctx.rules.redFlags.repeatOffenders.dailySpeeding,
    ctx,
    window
  );
  return withDigest({
    ...report,
    maxOverspeedMph: overspeeds.length > 0 ? Math.max(...overspeeds) : 0,
    averageOverspeedMph:
      overspeeds.length > 0 ? round(overspeeds.reduce((a, b) => a + b, 0) / overspeeds.length, 1) : 0,
  });
}

export function countStatuses(analysis: AssessmentAnalysis): Record<AssessmentStatus, number> {
  const statuses: Record<AssessmentStatus, number> = { Open: 0, CorrectedOnSite: 0, RequiresFollowUp: 0 };
  for (const a of analysis.withFindings) statuses[a.status]++;
  return statuses;
}

/** Yesterday's field assessments: findings by category, yard and rep. */
export function buildDailyAssessmentReport(rows: readonly FormRow[], ctx: ReportContext): WithDigest<DailyAssessmentReport> {
  const window = previousLocalDay(ctx.now, ctx.timeZone);
  const { findings } = ctx.rules;
  const inWindow = filterRowsToWindow(dropHeaderEchoRows(rows, findings, ctx.log), window, findings, ctx.log);
  const analysis = analyzeAssessments(inWindow, findings, ctx.fleet);
  const body = {
    totals: {
      assessments: inWindow.length,
      withFindings: analysis.withFindings.length,
      clean: analysis.clean.length,
      findings: analysis.totalFindings,
    },
    statuses: countStatuses(analysis),
    analysis,
  };
  return withDigest({
    ...reportHeader("daily_assessments", `Daily Field Assessments: ${window.startDate}`, window, ctx),
    ...body,
  });
}
