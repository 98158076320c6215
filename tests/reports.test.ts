/**
 * Report builders over the demo input pack (samples/demo), run as of
 * Monday 2025-02-17 06:00 America/Chicago.
 */

import { describe, it, expect } from "vitest";
import path from "path";
import { fileURLToPath } from "url";
import { buildFleetLookup } from "../src/enrich/fleet_lookup.js";
import { loadReportInputs } from "../src/inputs/loader.js";
import { buildDailyAssessmentReport, buildDailyCameraReport, buildDailySpeedingReport } from "../src/report/daily.js";
import { buildReport } from "../src/report/index.js";
import { buildWeeklyBriefing } from "../src/report/weekly.js";
import { contentHash } from "../src/shared/hash.js";
import { fleet, makeCtx } from "./helpers.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const inputs = loadReportInputs(path.resolve(__dirname, "..", "samples", "demo"));
const lookup = buildFleetLookup(inputs.vehicles, fleet);

const demoCtx = () => makeCtx({ lookup });

describe("buildWeeklyBriefing", () => {
  const report = buildWeeklyBriefing(inputs, demoCtx());

  it("covers the previous Monday to Sunday for the briefing division", () => {
    expect(report.kind).toBe("weekly");
    expect(report.title).toBe("Weekly Safety Briefing: Casing, 2025-02-10 to 2025-02-16");
    expect(report.division).toBe("Casing");
    expect(report.window).toEqual({
      timeZone: "America/Chicago",
      startDate: "2025-02-10",
      endDate: "2025-02-16",
      startLocal: "2025-02-10T00:00:00",
      endLocal: "2025-02-16T23:59:59",
    });
    expect(report.ruleVersions).toEqual({
      eventTypes: "event-types/2025-02",
      speedTiers: "speed-tiers/2025-02",
      findings: "findings/2025-02",
      redFlags: "red-flags/2025-02",
      fleet: "fleet/2025-02",
    });
  });

  it("summarizes camera events", () => {
    expect(report.camera.total).toBe(10);
    expect(report.camera.tiers).toEqual({ RED: 5, ORANGE: 5, YELLOW: 0 });
    expect(report.camera.types).toEqual([
      { type: "Drowsiness", count: 2 },
      { type: "Camera Obstruction", count: 2 },
      { type: "Forward Collision Warning", count: 1 },
      { type: "Distraction", count: 1 },
      { type: "Cell Phone", count: 1 },
      { type: "Hard Brake", count: 1 },
      { type: "Smoking", count: 1 },
      { type: "Rolling Stop", count: 1 },
    ]);
    expect(report.camera.byYard).toEqual([
      { yard: "Midland", count: 3 },
      { yard: "Bryan", count: 2 },
      { yard: "Kilgore", count: 2 },
      { yard: "Jourdanton", count: 1 },
      { yard: "Laredo", count: 1 },
      { yard: "San Angelo", count: 1 },
    ]);
    expect(report.unparseableTimestamps).toBe(1);
  });

  it("lists speeding events worst overspeed first", () => {
    expect(report.speeding.total).toBe(5);
    expect(report.speeding.tiers).toEqual({ RED: 3, ORANGE: 1, YELLOW: 1 });
    expect(report.speeding.maxOverspeedMph).toBe(29.8);
    expect(report.speeding.top.map((r) => r.id)).toEqual(["spd-001", "spd-004", "spd-006", "spd-003", "spd-002"]);
    expect(report.speeding.top[0]).toMatchObject({
      driver: "Ana Ruiz",
      vehicle: "5010C",
      yard: "Midland",
      event: "Speed Violation",
      tier: "RED",
      speedMph: 99.4,
      detail: "99.4 mph in 69.6 mph zone (+29.8)",
      link: "https://www.google.com/maps?q=31.99,-102.08",
    });
  });

  it("flags drivers across sources", () => {
    expect(report.redFlags).toEqual([
      {
        name: "Ana Ruiz",
        vehicle: "5010C",
        yard: "Midland",
        cameraCount: 3,
        speedingCount: 1,
        kpaCount: 1,
        total: 5,
        reasons: ["Camera and speeding events", "3 camera events", "Camera events with 1 KPA incident"],
        cameraSummary: "Distraction x1, Cell Phone x1, Hard Brake x1",
        speedingSummary: "1 event, worst +29.8 mph over",
        recommendedAction: "Pattern: distraction. Formal coaching required",
      },
      {
        name: "Finn Moss",
        vehicle: "5077C",
        yard: "San Angelo",
        cameraCount: 1,
        speedingCount: 1,
        kpaCount: 0,
        total: 2,
        reasons: ["Camera and speeding events"],
        cameraSummary: "Rolling Stop x1",
        speedingSummary: "1 event, worst +22.4 mph over",
        recommendedAction: "Cross-source flags. Safety rep to review and coach",
      },
    ]);
  });

  it("buckets camera events by local time of day", () => {
    expect(report.timeOfDay.buckets.map((b) => b.count)).toEqual([3, 5, 1, 0]);
    expect(report.timeOfDay.unbucketed).toBe(1);
    expect(report.timeOfDay.drowsinessNote).toBe(
      "Drowsiness events concentrated in afternoon/evening. Consider scheduling adjustments"
    );
  });

  it("counts obstructions per vehicle", () => {
    expect(report.obstructions).toEqual([{ vehicle: "5031C", driver: "Cole Hart", yard: "Kilgore", count: 2 }]);
  });

  it("lists repeat offenders per source", () => {
    expect(report.repeatOffenders.camera.map((o) => [o.name, o.count, o.worstTier])).toEqual([
      ["Ana Ruiz", 3, "RED"],
      ["Ben Okoro", 2, "RED"],
      ["Cole Hart", 2, "ORANGE"],
    ]);
    expect(report.repeatOffenders.speeding.map((o) => [o.name, o.count, o.worstEvent.id])).toEqual([
      ["Gus Tran", 3, "spd-004"],
    ]);
  });

  it("summarizes the week's assessments and incidents", () => {
    expect(report.assessments.total).toBe(3);
    expect(report.assessments.statuses).toEqual({ Open: 0, CorrectedOnSite: 1, RequiresFollowUp: 1 });
    expect(report.assessments.incidents).toBe(1);
    expect(report.assessments.analysis.totalFindings).toBe(3);
    expect(report.assessments.analysis.clean.map((c) => [c.reportId, c.yard])).toEqual([["A-100", "Midland"]]);
    expect(report.assessments.analysis.withFindings.map((a) => [a.reportId, a.yard, a.rep, a.status])).toEqual([
      ["A-101", "Bryan", "Rep Three", "CorrectedOnSite"],
      ["A-102", "Jourdanton", "Rep Four", "RequiresFollowUp"],
    ]);
    expect(report.assessments.analysis.withFindings[1].categories).toEqual({
      DOCUMENTATION: ["Fire extinguisher inspection tag expired"],
    });
  });

  it("reports the weekend share", () => {
    expect(report.weekend).toEqual({ camera: 4, speeding: 2, total: 6, percent: 40 });
  });

  it("ranks yards by events per vehicle", () => {
    expect(report.scorecard.map((s) => [s.rank, s.yard, s.vehicles, s.total, s.rate])).toEqual([
      [1, "Midland", 2, 7, 3.5],
      [2, "Bryan", 1, 2, 2],
      [3, "Kilgore", 1, 2, 2],
      [4, "San Angelo", 1, 2, 2],
      [5, "Jourdanton", 1, 1, 1],
      [6, "Laredo", 1, 1, 1],
      [7, "Hobbs", 1, 0, 0],
    ]);
  });

  it("carries the run's data-quality counts", () => {
    expect(report.quality.byKind).toEqual({
      DRIVER_NAME_PARSED: 2,
      UNKNOWN_EVENT_TYPE: 1,
      UNPARSEABLE_TIMESTAMP: 1,
      WINDOW_FILTER_SKIPPED: 1,
      HEADER_ROW_SKIPPED: 1,
      INCIDENT_DRIVER_MISSING: 1,
    });
    expect(report.quality.entries).toBe(7);
  });

  it("is deterministic and digests its own body", () => {
    const again = buildWeeklyBriefing(inputs, demoCtx());
    expect(again.digest).toBe(report.digest);
    const { digest, ...body } = report;
    expect(contentHash(body)).toBe(digest);
  });
});

describe("buildDailyCameraReport", () => {
  const report = buildDailyCameraReport(inputs.cameraEvents, demoCtx());

  it("keeps yesterday's events in tier and rank order", () => {
    expect(report.title).toBe("Daily Camera Events: 2025-02-16");
    expect(report.totals).toEqual({ events: 5, outsideWindow: 7, unparseableTimestamps: 1 });
    expect(report.tiers).toEqual({ RED: 1, ORANGE: 3, YELLOW: 1 });
    const ids = report.divisions.flatMap((d) => d.rows.map((r) => r.id));
    expect(ids).toEqual(["cam-007", "cam-012", "cam-010", "cam-009", "cam-008"]);
  });

  it("groups by division and yard", () => {
    expect(report.divisions.map((d) => d.division)).toEqual(["Casing", "Trucking"]);
    expect(report.divisions[0].yards).toEqual([
      { yard: "Kilgore", count: 1 },
      { yard: "Jourdanton", count: 1 },
      { yard: "Laredo", count: 1 },
      { yard: "San Angelo", count: 1 },
    ]);
    expect(report.divisions[1].yards).toEqual([]);
  });

  it("renders rows with the resolved driver", () => {
    const row = report.divisions[0].rows[0];
    expect(row).toMatchObject({
      id: "cam-007",
      driver: "Dan Pike",
      driverNameSource: "parsed",
      yard: "Jourdanton",
      event: "Forward Collision Warning",
      tier: "RED",
      speedMph: 49.7,
      detail: "N/A",
      link: "",
    });
    expect(row.time).toMatch(/^02\/16\/2025 08:00 AM /);
  });

  it("routes events to safety reps", () => {
    expect(report.reps.map((r) => [r.rep, r.events])).toEqual([
      ["Rep One", 0],
      ["Rep Two", 1],
      ["Rep Three", 1],
      ["Rep Four", 3],
    ]);
    expect(report.unroutedEvents).toBe(0);
    expect(report.repeatOffenders).toEqual([]);
  });
});

describe("buildDailySpeedingReport", () => {
  const report = buildDailySpeedingReport(inputs.speedingEvents, demoCtx());

  it("keeps yesterday's events worst overspeed first", () => {
    expect(report.title).toBe("Daily Speeding Events: 2025-02-16");
    expect(report.totals).toEqual({ events: 2, outsideWindow: 4, unparseableTimestamps: 0 });
    expect(report.divisions.map((d) => [d.division, d.rows.map((r) => r.id)])).toEqual([
      ["Casing", ["spd-006"]],
      ["Poly Pipe", ["spd-005"]],
    ]);
    expect(report.maxOverspeedMph).toBe(22.4);
    expect(report.tiers).toEqual({ RED: 1, ORANGE: 0, YELLOW: 1 });
  });

  it("describes each event against its posted limit", () => {
    expect(report.divisions[0].rows[0].detail).toBe("92 mph in 69.6 mph zone (+22.4)");
    expect(report.divisions[1].rows[0]).toMatchObject({ driver: "Yem Bobey", driverNameSource: "parsed", detail: "62.1 mph in 54.7 mph zone (+7.5)" });
  });
});

describe("buildDailyAssessmentReport", () => {
  it("analyzes yesterday's assessments", () => {
    const report = buildDailyAssessmentReport(inputs.assessments, demoCtx());
    expect(report.title).toBe("Daily Field Assessments: 2025-02-16");
    expect(report.totals).toEqual({ assessments: 1, withFindings: 1, clean: 0, findings: 1 });
    expect(report.statuses).toEqual({ Open: 0, CorrectedOnSite: 0, RequiresFollowUp: 1 });
    expect(report.analysis.withFindings[0]).toMatchObject({
      reportId: "A-102",
      assessor: "R. Lindqvist",
      link: "https://ehs.example.com/forms/responses/view/A-102",
    });
    expect(report.quality.byKind).toEqual({ HEADER_ROW_SKIPPED: 1 });
  });
});

describe("buildReport", () => {
  it("dispatches on the report kind", () => {
    expect(buildReport("daily_camera", inputs, demoCtx()).kind).toBe("daily_camera");
    expect(buildReport("daily_speeding", inputs, demoCtx()).kind).toBe("daily_speeding");
    expect(buildReport("daily_assessments", inputs, demoCtx()).kind).toBe("daily_assessments");
    expect(buildReport("weekly", inputs, demoCtx()).digest).toBe(buildWeeklyBriefing(inputs, demoCtx()).digest);
  });

  it("builds from empty inputs", () => {
    const empty = { vehicles: [], cameraEvents: [], speedingEvents: [], assessments: [], incidents: [], missing: [] };
    const report = buildWeeklyBriefing(empty, makeCtx());
    expect(report.camera.total).toBe(0);
    expect(report.weekend.percent).toBe(0);
    expect(report.scorecard.every((s) => s.rate === 0)).toBe(true);
    expect(report.quality.entries).toBe(0);
  });
});
