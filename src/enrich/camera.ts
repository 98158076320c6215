/**
 * Camera / driver-performance event enrichment.
 */
import { canonicalize, eventDisplayName, isObstructionType } from "../classify/canonicalize.js";
import { classifyTier, severityRank } from "../classify/tier.js";
import type { CameraEvent } from "../shared/types.js";
import type { EnrichContext } from "./context.js";
import { readLocation, resolveEventTime, resolveIdentity } from "./common.js";
import { CAMERA_ENVELOPE_KEY, unwrapEnvelope } from "./envelope.js";
import { asText, firstNumber, firstText, isRecord } from "./fields.js";
import { formatDuration, kmhToMph } from "./units.js";

const TYPE_KEYS = ["type", "event_type", "behavior_type"];
const TIME_KEYS = ["start_time", "event_time", "created_at"];
const SPEED_KEYS = ["start_speed", "max_speed", "end_speed"];
const DURATION_KEYS = ["duration", "duration_seconds"];
const MEDIA_URL_KEYS = ["url", "video_url", "s3_url", "media_url", "recording_url"];
const MEDIA_NESTED_KEYS = ["video", "media", "recording"];

/**
 * Video link from `camera_media`, which vendors send as a bare URL, an
 * object with one of several URL keys (possibly nested), or a list.
 */
export function extractVideoUrl(media: unknown): string {
  if (typeof media === "string") return media.trim();
  if (Array.isArray(media)) {
    for (const item of media) {
      const url = extractVideoUrl(item);
      if (url) return url;
    }
    return "";
  }
  if (!isRecord(media)) return "";
  for (const key of MEDIA_URL_KEYS) {
    const url = asText(media[key]);
    if (url) return url;
  }
  for (const key of MEDIA_NESTED_KEYS) {
    const url = isRecord(media[key]) ? extractVideoUrl(media[key]) : "";
    if (url) return url;
  }
  return "";
}

/** Normalize one raw camera event. Never throws. */
export function enrichCameraEvent(rawEvent: unknown, ctx: EnrichContext): CameraEvent {
  const raw = unwrapEnvelope(rawEvent, CAMERA_ENVELOPE_KEY);
  const types = ctx.rules.eventTypes;
  const id = firstText(raw, ["id", "event_id"]);

  const rawType = firstText(raw, TYPE_KEYS);
  const eventType = canonicalize(rawType, types);
  if (!types.tiers.has(eventType)) {
    ctx.log.record("UNKNOWN_EVENT_TYPE", "camera", id, `Unrecognized event type "${rawType || eventType}" defaults to ORANGE`);
  }

  const { vehicle, driver, placement } = resolveIdentity(raw, "camera", id, ctx);
  const time = resolveEventTime(raw, TIME_KEYS, "camera", id, ctx);
  const durationSeconds = firstNumber(raw, DURATION_KEYS) ?? 0;

  return {
    id,
    source: "camera",
    driver: driver.name,
    driverNameSource: driver.source,
    vehicle,
    division: placement.division,
    yard: placement.yard,
    eventType,
    rawType,
    displayName: eventDisplayName(eventType, rawType, types),
    tier: classifyTier(eventType, types),
    severityRank: severityRank(eventType, types),
    speedMph: kmhToMph(firstNumber(raw, SPEED_KEYS) ?? 0),
    durationSeconds,
    durationLabel: formatDuration(durationSeconds),
    ...time,
    location: readLocation(raw, ["lat", "start_lat", "latitude"], ["lon", "start_lon", "longitude"]),
    videoUrl: extractVideoUrl(raw.camera_media),
    isObstruction: isObstructionType(rawType, eventType, types),
  };
}

export function enrichCameraEvents(rawEvents: readonly unknown[], ctx: EnrichContext): CameraEvent[] {
  return rawEvents.map((raw) => enrichCameraEvent(raw, ctx));
}
