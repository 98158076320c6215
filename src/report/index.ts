import type { ReportInputs } from "../inputs/loader.js";
import type { ReportKind } from "../shared/run_config.js";
import type { ReportContext, WithDigest } from "./common.js";
import { buildDailyAssessmentReport, buildDailyCameraReport, buildDailySpeedingReport } from "./daily.js";
import type { DailyAssessmentReport, DailyEventReport, DailySpeedingReport } from "./daily.js";
import { buildWeeklyBriefing } from "./weekly.js";
import type { WeeklyBriefing } from "./weekly.js";

export type AnyReport =
  | WithDigest<DailyEventReport>
  | WithDigest<DailySpeedingReport>
  | WithDigest<DailyAssessmentReport>
  | WithDigest<WeeklyBriefing>;

/** Build the report a run asked for from its loaded inputs. */
export function buildReport(kind: ReportKind, inputs: ReportInputs, ctx: ReportContext): AnyReport {
  switch (kind) {
    case "daily_camera":
      return buildDailyCameraReport(inputs.cameraEvents, ctx);
    case "daily_speeding":
      return buildDailySpeedingReport(inputs.speedingEvents, ctx);
    case "daily_assessments":
      return buildDailyAssessmentReport(inputs.assessments, ctx);
    case "weekly":
      return buildWeeklyBriefing(inputs, ctx);
  }
}
