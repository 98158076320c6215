/** Severity tiers: RED = immediate action, ORANGE = coaching, YELLOW = monitoring */
export type Tier = "RED" | "ORANGE" | "YELLOW";

export const TIERS: Tier[] = ["RED", "ORANGE", "YELLOW"];

/** Sort order of tiers (lower = more severe) */
export const TIER_ORDER: Record<Tier, number> = { RED: 0, ORANGE: 1, YELLOW: 2 };

/** Event families */
export type EventSource = "camera" | "speeding";

/** How a driver display name was resolved */
export type DriverNameSource = "lookup" | "embedded" | "parsed" | "unknown";

/** Local hour-of-day buckets */
export type TimeBucket = "6AM-12PM" | "12PM-6PM" | "6PM-12AM" | "12AM-6AM";

export const TIME_BUCKETS: TimeBucket[] = ["6AM-12PM", "12PM-6PM", "6PM-12AM", "12AM-6AM"];

/** A vendor record as fetched, shape unknown */
export type RawRecord = Record<string, unknown>;

/** A flattened EHS form response row */
export type FormRow = Record<string, string>;

export const UNKNOWN_DRIVER = "Unknown";
export const UNKNOWN_VEHICLE = "Unknown";
export const UNKNOWN_EVENT_TYPE = "unknown";

/** Division / yard pair; yard "" = no yard breakdown */
export interface Placement {
  division: string;
  yard: string;
}

export interface GeoPoint {
  lat: number;
  lon: number;
}

/** A vendor timestamp resolved into the configured local zone */
export interface LocalTimestamp {
  iso: string; // yyyy-MM-ddTHH:mm:ss±hh:mm
  date: string; // yyyy-MM-dd
  isoWeekday: number; // 1 = Monday … 7 = Sunday
  hour: number; // 0–23
}

/** Closed local-time interval, carried with its UTC instants */
export interface LocalWindow {
  timeZone: string;
  startDate: string;
  endDate: string;
  startLocal: string;
  endLocal: string;
  startUtc: Date;
  endUtc: Date;
}

interface NormalizedEventBase {
  id: string;
  source: EventSource;
  driver: string;
  driverNameSource: DriverNameSource;
  vehicle: string;
  division: string;
  yard: string;
  eventType: string;
  rawType: string;
  displayName: string;
  tier: Tier;
  severityRank: number;
  speedMph: number;
  durationSeconds: number;
  durationLabel: string;
  timestampUtc: string | null;
  timestampLocal: LocalTimestamp | null;
  formattedTime: string;
  isWeekend: boolean;
  location: GeoPoint | null;
}

/** Camera / driver-performance event */
export interface CameraEvent extends NormalizedEventBase {
  source: "camera";
  videoUrl: string;
  isObstruction: boolean;
}

/** Telematics over-the-limit event */
export interface SpeedingEvent extends NormalizedEventBase {
  source: "speeding";
  postedSpeedMph: number;
  overspeedMph: number;
  vendorSeverity: string;
  mapsLink: string;
}

export type NormalizedEvent = CameraEvent | SpeedingEvent;

// ── Assessments ──────────────────────────────────────────────────────

export type AssessmentStatus = "Open" | "CorrectedOnSite" | "RequiresFollowUp";

export type FindingCategory =
  | "EQUIPMENT_VEHICLE"
  | "BEHAVIORAL_COMPLIANCE"
  | "HOUSEKEEPING_SITE"
  | "DOCUMENTATION";

export interface AssessmentFinding {
  reportId: string;
  date: string;
  yard: string;
  assessor: string;
  rep: string;
  link: string;
  status: AssessmentStatus;
  findings: string[];
  categories: Partial<Record<FindingCategory, string[]>>;
}

export interface CleanAssessment {
  reportId: string;
  date: string;
  yard: string;
  assessor: string;
}

/** An EHS incident report attributed to a driver */
export interface KpaIncident {
  reportId: string;
  date: string;
  driver: string;
}

// ── Aggregates ───────────────────────────────────────────────────────

export interface RedFlagDriver {
  name: string;
  vehicle: string;
  yard: string;
  cameraCount: number;
  speedingCount: number;
  kpaCount: number;
  total: number;
  reasons: string[];
  cameraSummary: string;
  speedingSummary: string;
  recommendedAction: string;
}

export interface RepeatOffender {
  name: string;
  count: number;
  typeSummary: string;
  worstTier: Tier;
  worstEvent: NormalizedEvent;
  events: NormalizedEvent[];
}

export interface YardScore {
  rank: number;
  yard: string;
  vehicles: number;
  camera: number;
  speeding: number;
  total: number;
  rate: number;
}

export interface TierCounts {
  RED: number;
  ORANGE: number;
  YELLOW: number;
}
