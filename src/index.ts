// Configuration
export * from "./config/schemas.js";
export * from "./config/loader.js";
export * from "./shared/run_config.js";

// Shared types and helpers
export * from "./shared/types.js";
export { contentHash, canonicalJsonStringify } from "./shared/hash.js";
export * from "./trace/quality_log.js";

// Classification
export * from "./classify/event_types.js";
export * from "./classify/canonicalize.js";
export * from "./classify/tier.js";

// Time windows
export * from "./time/windows.js";

// Enrichment
export * from "./enrich/context.js";
export * from "./enrich/envelope.js";
export * from "./enrich/units.js";
export * from "./enrich/vehicle.js";
export * from "./enrich/fleet_lookup.js";
export * from "./enrich/camera.js";
export * from "./enrich/speeding.js";

// Assessments
export * from "./assessments/rows.js";
export * from "./assessments/findings.js";
export * from "./assessments/analyze.js";

// Aggregation
export * from "./aggregate/grouping.js";
export * from "./aggregate/red_flags.js";
export * from "./aggregate/repeat_offenders.js";
export * from "./aggregate/scorecard.js";
export * from "./aggregate/time_buckets.js";
export * from "./aggregate/rep_routing.js";

// Reports
export * from "./inputs/loader.js";
export * from "./report/common.js";
export * from "./report/daily.js";
export * from "./report/weekly.js";
export * from "./report/index.js";
