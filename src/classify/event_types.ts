/**
 * Compiled event-type vocabulary.
 *
 * The JSON table groups synonyms under their canonical name (the same
 * shape as a column-synonym dictionary); compiling builds the reverse
 * lookups once so classification stays a set of map reads.
 */
import type { EventTypeTable } from "../config/schemas.js";
import type { Tier } from "../shared/types.js";
import { TIERS } from "../shared/types.js";

export interface EventTypeRules {
  version: string;
  /** normalized alias (or canonical name) → canonical name */
  synonyms: ReadonlyMap<string, string>;
  tiers: ReadonlyMap<string, Tier>;
  ranks: ReadonlyMap<string, number>;
  defaultRank: number;
  displayNames: ReadonlyMap<string, string>;
  obstructionRawTypes: ReadonlySet<string>;
}

/** Lower-case, trim, and replace spaces and hyphens with underscores. */
export function normalizeTypeKey(raw: string): string {
  return raw.toLowerCase().trim().replace(/[ -]/g, "_");
}

export function compileEventTypes(table: EventTypeTable): EventTypeRules {
  const synonyms = new Map<string, string>();
  for (const [canonical, aliases] of Object.entries(table.synonyms)) {
    synonyms.set(normalizeTypeKey(canonical), canonical);
    for (const alias of aliases) {
      synonyms.set(normalizeTypeKey(alias), canonical);
    }
  }

  const tiers = new Map<string, Tier>();
  for (const tier of TIERS) {
    for (const type of table.tiers[tier]) {
      if (tiers.has(type)) {
        throw new Error(`Event type "${type}" is listed in more than one tier`);
      }
      tiers.set(type, tier);
    }
  }

  return {
    version: table.version,
    synonyms,
    tiers,
    ranks: new Map(Object.entries(table.severityRank)),
    defaultRank: table.defaultRank,
    displayNames: new Map(Object.entries(table.displayNames)),
    obstructionRawTypes: new Set(table.obstructionRawTypes.map(normalizeTypeKey)),
  };
}
