/**
 * Typed reads over vendor records whose shape is not guaranteed.
 * Every accessor degrades to null / "" instead of throwing.
 */
import type { RawRecord } from "../shared/types.js";

export function isRecord(value: unknown): value is RawRecord {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function getRecord(raw: RawRecord, key: string): RawRecord | null {
  const value = raw[key];
  return isRecord(value) ? value : null;
}

/** A string or a finite number as text; "" for anything else. */
export function asText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return "";
}

/** A finite number, or a string holding one; null otherwise. */
export function asNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** First non-empty text value among `keys`. */
export function firstText(raw: RawRecord, keys: readonly string[]): string {
  for (const key of keys) {
    const text = asText(raw[key]);
    if (text !== "") return text;
  }
  return "";
}

/**
 * First non-zero numeric value among `keys`. Vendors send 0 for fields
 * they did not measure, so 0 falls through to the next key.
 */
export function firstNumber(raw: RawRecord, keys: readonly string[]): number | null {
  for (const key of keys) {
    const n = asNumber(raw[key]);
    if (n !== null && n !== 0) return n;
  }
  return null;
}
