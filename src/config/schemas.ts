/**
 * Rule-table and fleet configuration schemas.
 *
 * Every classification axis is a versioned JSON table under rules/;
 * fleet master data lives in config/fleet.json.
 */
import { z } from "zod";

const nonEmpty = z.string().min(1);
const stringList = z.array(z.string());

// ── Event types ──────────────────────────────────────────────────────

export const EventTypeTableSchema = z.object({
  version: nonEmpty,
  synonyms: z.record(z.string(), stringList),
  tiers: z.object({
    RED: stringList,
    ORANGE: stringList,
    YELLOW: stringList,
  }),
  severityRank: z.record(z.string(), z.number().int().positive()),
  defaultRank: z.number().int().positive(),
  displayNames: z.record(z.string(), nonEmpty),
  obstructionRawTypes: stringList,
});

export type EventTypeTable = z.infer<typeof EventTypeTableSchema>;

// ── Speed tiers ──────────────────────────────────────────────────────

export const SpeedTierTableSchema = z
  .object({
    version: nonEmpty,
    redOverLimitMph: z.number().positive(),
    redAbsoluteMph: z.number().positive(),
    orangeOverLimitMph: z.number().positive(),
  })
  .refine((t) => t.orangeOverLimitMph <= t.redOverLimitMph, {
    message: "orangeOverLimitMph must not exceed redOverLimitMph",
  });

export type SpeedTierTable = z.infer<typeof SpeedTierTableSchema>;

// ── Findings ─────────────────────────────────────────────────────────

export const FindingCategorySchema = z.enum([
  "EQUIPMENT_VEHICLE",
  "BEHAVIORAL_COMPLIANCE",
  "HOUSEKEEPING_SITE",
  "DOCUMENTATION",
]);

export const FindingRulesSchema = z.object({
  version: nonEmpty,
  headerSentinel: z.object({ column: nonEmpty, value: nonEmpty }),
  metaFields: stringList,
  locationFields: stringList,
  boilerplateValues: stringList,
  positivePhrases: stringList,
  positivePrefixes: stringList,
  correctiveKeywords: stringList,
  requireCorrectiveKeyword: z.boolean(),
  findingKeywords: stringList,
  categories: z
    .array(
      z.object({
        name: FindingCategorySchema,
        label: nonEmpty,
        keywords: stringList,
      })
    )
    .length(4),
  defaultCategory: FindingCategorySchema,
  statusPhrases: z.object({
    correctedOnSite: stringList,
    requiresFollowUp: stringList,
  }),
  assessorFields: stringList,
  yardFields: stringList,
  incidentDriverFields: stringList,
  dateFormat: nonEmpty,
  linkBaseUrl: z.string().url(),
});

export type FindingRules = z.infer<typeof FindingRulesSchema>;

// ── Red flags / reducers ─────────────────────────────────────────────

export const RedFlagRulesSchema = z.object({
  version: nonEmpty,
  cameraMin: z.number().int().positive(),
  speedingMin: z.number().int().positive(),
  kpaMin: z.number().int().positive(),
  fatigueTypes: stringList,
  distractionTypes: stringList,
  actions: z.object({
    fatigue: nonEmpty,
    distraction: nonEmpty,
    speed: nonEmpty,
    multipleCategories: nonEmpty,
    review: nonEmpty,
  }),
  repeatOffenders: z.object({
    camera: z.number().int().positive(),
    dailySpeeding: z.number().int().positive(),
    weeklySpeeding: z.number().int().positive(),
    limit: z.number().int().positive(),
  }),
  drowsinessNoteMin: z.number().int().positive(),
});

export type RedFlagRules = z.infer<typeof RedFlagRulesSchema>;

// ── Fleet master data ────────────────────────────────────────────────

export const PlacementSchema = z.object({
  division: nonEmpty,
  yard: z.string(),
});

export const FleetConfigSchema = z.object({
  version: nonEmpty,
  unassignedDivision: nonEmpty,
  groups: z.array(PlacementSchema.extend({ groupId: z.number().int() })),
  vehiclePrefixes: z.array(PlacementSchema.extend({ prefix: nonEmpty })),
  numericPrefixRule: PlacementSchema.extend({ pattern: nonEmpty }).optional(),
  divisionOrder: stringList,
  yardOrder: z.record(z.string(), stringList),
  briefingDivision: nonEmpty,
  safetyReps: z.array(
    z.object({
      name: nonEmpty,
      emails: z.array(z.string().email()),
      placements: z.array(PlacementSchema),
    })
  ),
  observers: z.array(
    z.object({
      match: nonEmpty,
      yard: z.string(),
      rep: nonEmpty,
    })
  ),
});

export type FleetConfig = z.infer<typeof FleetConfigSchema>;
export type SafetyRep = FleetConfig["safetyReps"][number];
