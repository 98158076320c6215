/**
 * Assessment analysis: per-row findings and status, then ordered
 * breakdowns by yard, safety rep and category.
 */
import type { FindingRules, FleetConfig } from "../config/schemas.js";
import type {
  AssessmentFinding,
  CleanAssessment,
  FindingCategory,
  FormRow,
} from "../shared/types.js";
import { categorizeFinding, categoryLabel, deriveAssessmentStatus, extractFindings } from "./findings.js";
import { firstField, getField, reportNumber } from "./rows.js";

export const UNASSIGNED_REP = "Unassigned";

export interface YardAssessmentSummary {
  yard: string;
  withFindings: number;
  clean: number;
  findings: number;
}

export interface RepAssessments {
  rep: string;
  withFindings: AssessmentFinding[];
  clean: CleanAssessment[];
}

export interface CategoryFindings {
  category: FindingCategory;
  label: string;
  findings: { reportId: string; yard: string; text: string }[];
}

export interface AssessmentAnalysis {
  withFindings: AssessmentFinding[];
  clean: CleanAssessment[];
  totalFindings: number;
  byYard: YardAssessmentSummary[];
  byRep: RepAssessments[];
  byCategory: CategoryFindings[];
}

const IGNORED_ASSESSORS = new Set(["none", "unknown"]);

export function resolveAssessor(row: FormRow, rules: FindingRules): string {
  for (const field of rules.assessorFields) {
    const value = getField(row, field);
    if (value && !IGNORED_ASSESSORS.has(value.toLowerCase())) return value;
  }
  return "Unknown";
}

function findObserver(assessor: string, fleet: FleetConfig) {
  const lower = assessor.toLowerCase();
  return fleet.observers.find((o) => lower.includes(o.match.toLowerCase()));
}

/** All configured yard names, briefing division first. */
function knownYards(fleet: FleetConfig): string[] {
  const ordered = [
    ...(fleet.yardOrder[fleet.briefingDivision] ?? []),
    ...Object.values(fleet.yardOrder).flat(),
  ];
  return [...new Set(ordered)];
}

/** Yard named in a yard/location column, else the observer's home yard, else "". */
export function resolveAssessmentYard(row: FormRow, assessor: string, rules: FindingRules, fleet: FleetConfig): string {
  const yards = knownYards(fleet);
  for (const field of rules.yardFields) {
    const value = getField(row, field).toLowerCase();
    if (!value) continue;
    const match = yards.find((yard) => value.includes(yard.toLowerCase()));
    if (match) return match;
  }
  return findObserver(assessor, fleet)?.yard ?? "";
}

/** Observer's rep, else the rep covering the yard in the briefing division. */
export function resolveAssessmentRep(assessor: string, yard: string, fleet: FleetConfig): string {
  const observer = findObserver(assessor, fleet);
  if (observer) return observer.rep;
  if (!yard) return UNASSIGNED_REP;
  const rep = fleet.safetyReps.find((r) =>
    r.placements.some((p) => p.division === fleet.briefingDivision && p.yard === yard)
  );
  return rep?.name ?? UNASSIGNED_REP;
}

export function assessmentLink(row: FormRow, reportId: string, rules: FindingRules): string {
  const explicit = firstField(row, ["link", "kpa_link"]);
  if (explicit) return explicit;
  return reportId ? `${rules.linkBaseUrl}/${encodeURIComponent(reportId)}` : "";
}

function yardSortKey(yard: string, order: readonly string[]): [number, string] {
  const index = order.indexOf(yard);
  if (index >= 0) return [index, yard];
  return [yard ? order.length : order.length + 1, yard];
}

export function analyzeAssessments(rows: readonly FormRow[], rules: FindingRules, fleet: FleetConfig): AssessmentAnalysis {
  const withFindings: AssessmentFinding[] = [];
  const clean: CleanAssessment[] = [];
  const cleanReps: string[] = [];

  for (const row of rows) {
    const reportId = reportNumber(row, rules);
    const date = getField(row, "date");
    const assessor = resolveAssessor(row, rules);
    const yard = resolveAssessmentYard(row, assessor, rules, fleet);
    const rep = resolveAssessmentRep(assessor, yard, fleet);
    const findings = extractFindings(row, rules);

    if (findings.length === 0) {
      const record: CleanAssessment = { reportId, date, yard, assessor };
      clean.push(record);
      cleanReps.push(rep);
      continue;
    }

    const categories: Partial<Record<FindingCategory, string[]>> = {};
    for (const text of findings) {
      const category = categorizeFinding(text, rules);
      const list = categories[category] ?? [];
      list.push(text);
      categories[category] = list;
    }

    withFindings.push({
      reportId,
      date,
      yard,
      assessor,
      rep,
      link: assessmentLink(row, reportId, rules),
      status: deriveAssessmentStatus(row, rules),
      findings,
      categories,
    });
  }

  // by yard, in configured order; unknown yards by name; no yard last
  const yardOrder = fleet.yardOrder[fleet.briefingDivision] ?? [];
  const yardStats = new Map<string, YardAssessmentSummary>();
  const statsFor = (yard: string) => {
    const existing = yardStats.get(yard);
    if (existing) return existing;
    const created: YardAssessmentSummary = { yard, withFindings: 0, clean: 0, findings: 0 };
    yardStats.set(yard, created);
    return created;
  };
  for (const a of withFindings) {
    const s = statsFor(a.yard);
    s.withFindings++;
    s.findings += a.findings.length;
  }
  for (const c of clean) statsFor(c.yard).clean++;
  const byYard = [...yardStats.values()].sort((a, b) => {
    const [ai, an] = yardSortKey(a.yard, yardOrder);
    const [bi, bn] = yardSortKey(b.yard, yardOrder);
    return ai - bi || an.localeCompare(bn);
  });

  // by rep, in configured rep order, then other observer reps, unassigned last
  const seenReps = [...withFindings.map((a) => a.rep), ...cleanReps];
  const repNames = [
    ...new Set([
      ...fleet.safetyReps.map((r) => r.name),
      ...seenReps.filter((r) => r !== UNASSIGNED_REP),
      UNASSIGNED_REP,
    ]),
  ];
  const byRep: RepAssessments[] = repNames
    .map((rep) => ({
      rep,
      withFindings: withFindings.filter((a) => a.rep === rep),
      clean: clean.filter((_, i) => cleanReps[i] === rep),
    }))
    .filter((r) => r.withFindings.length > 0 || r.clean.length > 0);

  const byCategory: CategoryFindings[] = rules.categories.map((c) => ({
    category: c.name,
    label: categoryLabel(c.name, rules),
    findings: withFindings.flatMap((a) =>
      (a.categories[c.name] ?? []).map((text) => ({ reportId: a.reportId, yard: a.yard, text }))
    ),
  }));

  return {
    withFindings,
    clean,
    totalFindings: withFindings.reduce((sum, a) => sum + a.findings.length, 0),
    byYard,
    byRep,
    byCategory,
  };
}
