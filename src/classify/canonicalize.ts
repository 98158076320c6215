import { UNKNOWN_EVENT_TYPE } from "../shared/types.js";
import type { EventTypeRules } from "./event_types.js";
import { normalizeTypeKey } from "./event_types.js";

/**
 * Map a vendor event-type string to the canonical vocabulary.
 *
 * Unmapped input comes back normalized and acts as its own canonical
 * type, so tiering can still default it. Missing input is "unknown".
 */
export function canonicalize(
  rawType: string | null | undefined,
  rules: EventTypeRules
): string {
  if (!rawType || rawType.trim() === "") return UNKNOWN_EVENT_TYPE;
  const key = normalizeTypeKey(rawType);
  return rules.synonyms.get(key) ?? key;
}

/** Title-case an underscore identifier: "unsafe_reverse" → "Unsafe Reverse". */
function titleCase(value: string): string {
  return value
    .replace(/_/g, " ")
    .toLowerCase()
    .replace(/\b[a-z]/g, (c) => c.toUpperCase());
}

/**
 * Human-readable label for an event type. Types without a configured
 * name are title-cased from the raw vendor string.
 */
export function eventDisplayName(
  canonicalType: string,
  rawType: string,
  rules: EventTypeRules
): string {
  const name = rules.displayNames.get(canonicalType);
  if (name) return name;
  const label = titleCase((rawType || canonicalType).trim());
  return label || "Unknown";
}

/** Whether a camera event reports a blocked or covered camera. */
export function isObstructionType(
  rawType: string,
  canonicalType: string,
  rules: EventTypeRules
): boolean {
  return (
    canonicalType === "camera_obstruction" ||
    rules.obstructionRawTypes.has(normalizeTypeKey(rawType))
  );
}
