import type { RuleSet } from "../config/loader.js";
import type { FleetConfig } from "../config/schemas.js";
import type { QualityLog } from "../trace/quality_log.js";
import type { FleetLookup } from "./fleet_lookup.js";

/** Everything per-event enrichment reads; built once per run. */
export interface EnrichContext {
  rules: RuleSet;
  fleet: FleetConfig;
  lookup: FleetLookup;
  timeZone: string;
  log: QualityLog;
}
