/**
 * Weekly safety briefing for the briefing division: the previous
 * Monday–Sunday across camera, speeding and EHS sources.
 */
import { analyzeAssessments } from "../assessments/analyze.js";
import type { AssessmentAnalysis } from "../assessments/analyze.js";
import { dropHeaderEchoRows, filterRowsToWindow, toKpaIncidents } from "../assessments/rows.js";
import { countByTier, groupByYard, summarizeEventTypes } from "../aggregate/grouping.js";
import type { TypeCount } from "../aggregate/grouping.js";
import { detectRedFlags } from "../aggregate/red_flags.js";
import { findRepeatOffenders } from "../aggregate/repeat_offenders.js";
import { buildYardScorecard } from "../aggregate/scorecard.js";
import { analyzeTimeBuckets } from "../aggregate/time_buckets.js";
import type { TimeBucketAnalysis } from "../aggregate/time_buckets.js";
import { sortByOverspeed, sortByTierAndRank } from "../classify/tier.js";
import { enrichCameraEvents } from "../enrich/camera.js";
import { enrichSpeedingEvents } from "../enrich/speeding.js";
import type { ReportInputs } from "../inputs/loader.js";
import { percentage } from "../shared/stats.js";
import type {
  CameraEvent,
  RedFlagDriver,
  RepeatOffender,
  TierCounts,
  YardScore,
} from "../shared/types.js";
import { filterToWindow, localWeekWindow } from "../time/windows.js";
import { countStatuses } from "./daily.js";
import { reportHeader, toEventRow, withDigest } from "./common.js";
import type { EventRow, ReportContext, ReportHeader, WithDigest } from "./common.js";

export const TOP_SPEEDING_ROWS = 10;

export interface ObstructionRow {
  vehicle: string;
  driver: string;
  yard: string;
  count: number;
}

export interface WeeklyBriefing extends ReportHeader {
  division: string;
  camera: {
    total: number;
    tiers: TierCounts;
    types: TypeCount[];
    byYard: { yard: string; count: number }[];
  };
  speeding: {
    total: number;
    tiers: TierCounts;
    maxOverspeedMph: number;
    top: EventRow[];
  };
  unparseableTimestamps: number;
  redFlags: RedFlagDriver[];
  timeOfDay: TimeBucketAnalysis;
  obstructions: ObstructionRow[];
  repeatOffenders: { camera: RepeatOffender[]; speeding: RepeatOffender[] };
  assessments: {
    total: number;
    statuses: ReturnType<typeof countStatuses>;
    analysis: AssessmentAnalysis;
    incidents: number;
  };
  weekend: { camera: number; speeding: number; total: number; percent: number };
  scorecard: YardScore[];
}

/** Obstruction events per vehicle, most first; ties keep first-seen order. */
export function summarizeObstructions(events: readonly CameraEvent[]): ObstructionRow[] {
  const rows = new Map<string, ObstructionRow>();
  for (const e of events) {
    if (!e.isObstruction) continue;
    const row = rows.get(e.vehicle) ?? { vehicle: e.vehicle, driver: e.driver, yard: e.yard, count: 0 };
    row.count++;
    rows.set(e.vehicle, row);
  }
  return [...rows.values()].sort((a, b) => b.count - a.count);
}

export type WeeklyInputs = Pick<ReportInputs, "cameraEvents" | "speedingEvents" | "assessments" | "incidents">;

export function buildWeeklyBriefing(inputs: WeeklyInputs, ctx: ReportContext): WithDigest<WeeklyBriefing> {
  const { fleet, rules, log } = ctx;
  const division = fleet.briefingDivision;
  const yardOrder = fleet.yardOrder[division] ?? [];
  const window = localWeekWindow(ctx.now, ctx.timeZone);

  const cameraWindow = filterToWindow(enrichCameraEvents(inputs.cameraEvents, ctx), window, log);
  const speedingWindow = filterToWindow(enrichSpeedingEvents(inputs.speedingEvents, ctx), window, log);
  const camera = sortByTierAndRank(cameraWindow.events.filter((e) => e.division === division));
  const speeding = sortByOverspeed(speedingWindow.events.filter((e) => e.division === division));

  const assessmentRows = filterRowsToWindow(
    dropHeaderEchoRows(inputs.assessments, rules.findings, log),
    window,
    rules.findings,
    log
  );
  const incidentRows = filterRowsToWindow(
    dropHeaderEchoRows(inputs.incidents, rules.findings, log),
    window,
    rules.findings,
    log
  );
  const incidents = toKpaIncidents(incidentRows, rules.findings, log);
  const analysis = analyzeAssessments(assessmentRows, rules.findings, fleet);

  const repeat = rules.redFlags.repeatOffenders;
  const weekendCamera = camera.filter((e) => e.isWeekend).length;
  const weekendSpeeding = speeding.filter((e) => e.isWeekend).length;
  const weekendTotal = weekendCamera + weekendSpeeding;

  const body = {
    division,
    camera: {
      total: camera.length,
      tiers: countByTier(camera),
      types: summarizeEventTypes(camera),
      byYard: groupByYard(camera, yardOrder).map((g) => ({ yard: g.yard, count: g.events.length })),
    },
    speeding: {
      total: speeding.length,
      tiers: countByTier(speeding),
      maxOverspeedMph: speeding.length > 0 ? speeding[0].overspeedMph : 0,
      top: speeding.slice(0, TOP_SPEEDING_ROWS).map(toEventRow),
    },
    unparseableTimestamps: cameraWindow.unparseable + speedingWindow.unparseable,
    redFlags: detectRedFlags(camera, speeding, incidents, rules.redFlags),
    timeOfDay: analyzeTimeBuckets(camera, rules.redFlags),
    obstructions: summarizeObstructions(camera),
    repeatOffenders: {
      camera: findRepeatOffenders(camera, { minEvents: repeat.camera, limit: repeat.limit }),
      speeding: findRepeatOffenders(speeding, { minEvents: repeat.weeklySpeeding, limit: repeat.limit }),
    },
    assessments: {
      total: assessmentRows.length,
      statuses: countStatuses(analysis),
      analysis,
      incidents: incidents.length,
    },
    weekend: {
      camera: weekendCamera,
      speeding: weekendSpeeding,
      total: weekendTotal,
      percent: percentage(weekendTotal, camera.length + speeding.length),
    },
    scorecard: buildYardScorecard(
      camera,
      speeding,
      ctx.lookup.vehicleCountsByYard.get(division) ?? new Map<string, number>(),
      yardOrder
    ),
  };

  return withDigest({
    ...reportHeader("weekly", `Weekly Safety Briefing: ${division}, ${window.startDate} to ${window.endDate}`, window, ctx),
    ...body,
  });
}
