import type { RawRecord } from "../shared/types.js";
import { isRecord } from "./fields.js";

export const CAMERA_ENVELOPE_KEY = "driver_performance_event";
export const SPEEDING_ENVELOPE_KEY = "speeding_event";

/**
 * Strip a single-key vendor envelope ({ speeding_event: {...} }).
 * Unwrapped records pass through; non-objects become {}.
 */
export function unwrapEnvelope(record: unknown, key: string): RawRecord {
  if (!isRecord(record)) return {};
  const inner = record[key];
  return isRecord(inner) ? inner : record;
}
