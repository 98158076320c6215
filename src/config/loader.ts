/**
 * Config Loader: reads the versioned rule tables and fleet master data.
 *
 * Tables are validated with their zod schemas, compiled where lookups
 * need it, and frozen. Nothing reads them from module state afterwards:
 * the loaded set is passed into every classification function.
 */

import { readFileSync, existsSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

import {
  EventTypeTableSchema,
  FindingRulesSchema,
  FleetConfigSchema,
  RedFlagRulesSchema,
  SpeedTierTableSchema,
} from "./schemas.js";
import type { FindingRules, FleetConfig, RedFlagRules, SpeedTierTable } from "./schemas.js";
import { compileEventTypes } from "../classify/event_types.js";
import type { EventTypeRules } from "../classify/event_types.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const ROOT = path.resolve(__dirname, "..", "..");

export const DEFAULT_RULES_DIR = path.join(ROOT, "rules");
export const DEFAULT_FLEET_PATH = path.join(ROOT, "config", "fleet.json");

export const RULE_FILES = {
  eventTypes: "event_types.v1.json",
  speedTiers: "speed_tiers.v1.json",
  findings: "findings.v1.json",
  redFlags: "red_flags.v1.json",
} as const;

export interface RuleSet {
  eventTypes: EventTypeRules;
  speedTiers: SpeedTierTable;
  findings: FindingRules;
  redFlags: RedFlagRules;
}

/** Freeze an object graph in place. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function readJson(filePath: string, what: string): unknown {
  if (!existsSync(filePath)) {
    throw new Error(`${what} not found: ${filePath}`);
  }
  try {
    return JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${what} is not valid JSON (${filePath}): ${msg}`);
  }
}

/**
 * Load every rule table from a directory (default: rules/ at the repo root).
 */
export function loadRuleSet(dir: string = DEFAULT_RULES_DIR): RuleSet {
  const table = (file: string) => readJson(path.join(dir, file), "Rule table");

  const eventTypeTable = deepFreeze(EventTypeTableSchema.parse(table(RULE_FILES.eventTypes)));
  return deepFreeze({
    eventTypes: compileEventTypes(eventTypeTable),
    speedTiers: SpeedTierTableSchema.parse(table(RULE_FILES.speedTiers)),
    findings: FindingRulesSchema.parse(table(RULE_FILES.findings)),
    redFlags: RedFlagRulesSchema.parse(table(RULE_FILES.redFlags)),
  });
}

/**
 * Load fleet master data (default: config/fleet.json at the repo root).
 */
export function loadFleetConfig(filePath: string = DEFAULT_FLEET_PATH): FleetConfig {
  const fleet = FleetConfigSchema.parse(readJson(filePath, "Fleet config"));
  if (fleet.numericPrefixRule) {
    try {
      new RegExp(fleet.numericPrefixRule.pattern);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`Fleet config numericPrefixRule.pattern is not a valid regex: ${msg}`);
    }
  }
  return deepFreeze(fleet);
}
