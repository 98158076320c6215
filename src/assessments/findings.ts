/**
 * Finding extraction for field assessments.
 *
 * A form row is a bag of question → answer strings. Most answers are
 * affirmations ("Yes", "Proper PPE was worn"); a finding is an answer
 * that says something was wrong or had to be fixed.
 */
import type { FindingRules } from "../config/schemas.js";
import type { AssessmentStatus, FindingCategory, FormRow } from "../shared/types.js";
import { getField } from "./rows.js";

const URL_PATTERN = /^https?:\/\//i;
const NUMERIC_LIKE = /^\d+$/;
const OPAQUE_CODE = /^[a-z0-9]+$/i;

function containsAny(lower: string, needles: readonly string[]): boolean {
  return needles.some((needle) => lower.includes(needle));
}

/** Why a value was not kept as a finding; null when it was. */
export type SkipReason =
  | "short"
  | "url"
  | "numeric"
  | "opaque_code"
  | "boilerplate"
  | "positive"
  | "no_corrective_keyword";

export function classifyAnswer(value: string, rules: FindingRules): SkipReason | null {
  const text = value.trim();
  if (text.length < 5) return "short";
  const lower = text.toLowerCase();
  if (URL_PATTERN.test(lower)) return "url";
  if (NUMERIC_LIKE.test(text.replace(/[.\-/: ]/g, ""))) return "numeric";

  const hasFindingKeyword = containsAny(lower, rules.findingKeywords);
  if (
    text.length < 30 &&
    !text.includes(" ") &&
    OPAQUE_CODE.test(text.replace(/[_-]/g, "")) &&
    !hasFindingKeyword
  ) {
    return "opaque_code";
  }
  if (rules.boilerplateValues.includes(lower)) return "boilerplate";

  // Corrective keywords inside the positive wording itself ("no unsafe
  // practices") do not count against it.
  let residual = lower;
  for (const phrase of rules.positivePhrases) {
    residual = residual.split(phrase).join(" ");
  }
  const prefix = rules.positivePrefixes.find((p) => lower.startsWith(p));
  if (prefix && residual.startsWith(prefix)) residual = residual.slice(prefix.length);
  const positive = prefix !== undefined || residual !== lower;
  if (positive && !containsAny(residual, rules.correctiveKeywords)) return "positive";

  if (rules.requireCorrectiveKeyword && !containsAny(lower, rules.correctiveKeywords)) {
    return "no_corrective_keyword";
  }
  return null;
}

/** Findings in field order, trimmed. Metadata and location columns are never read. */
export function extractFindings(row: FormRow, rules: FindingRules): string[] {
  const skipKeys = new Set([...rules.metaFields, ...rules.locationFields].map((k) => k.toLowerCase()));
  const findings: string[] = [];
  for (const [key, value] of Object.entries(row)) {
    if (skipKeys.has(key.trim().toLowerCase())) continue;
    if (classifyAnswer(value, rules) === null) findings.push(value.trim());
  }
  return findings;
}

/**
 * Category with the most keyword hits. Ties go to the category listed
 * first; no hits at all goes to the default category.
 */
export function categorizeFinding(text: string, rules: FindingRules): FindingCategory {
  const lower = text.toLowerCase();
  let best: FindingCategory = rules.defaultCategory;
  let bestScore = 0;
  for (const category of rules.categories) {
    const score = category.keywords.filter((kw) => lower.includes(kw)).length;
    if (score > bestScore) {
      best = category.name;
      bestScore = score;
    }
  }
  return best;
}

export function categoryLabel(category: FindingCategory, rules: FindingRules): string {
  return rules.categories.find((c) => c.name === category)?.label ?? category;
}

function statusFromExplicit(value: string): AssessmentStatus {
  const lower = value.toLowerCase();
  if (lower.includes("corrected")) return "CorrectedOnSite";
  if (lower.includes("follow")) return "RequiresFollowUp";
  return "Open";
}

/**
 * Status from the text of the whole row: corrected-on-site phrases,
 * then follow-up phrases, then an explicit status column, else Open.
 */
export function deriveAssessmentStatus(row: FormRow, rules: FindingRules): AssessmentStatus {
  const allText = Object.values(row).join(" ").toLowerCase();
  if (containsAny(allText, rules.statusPhrases.correctedOnSite)) return "CorrectedOnSite";
  if (containsAny(allText, rules.statusPhrases.requiresFollowUp)) return "RequiresFollowUp";
  const explicit = getField(row, "status");
  return explicit ? statusFromExplicit(explicit) : "Open";
}
