/**
 * Vehicle, driver and placement resolution for a single vendor record.
 */
import type { FleetConfig } from "../config/schemas.js";
import type { DriverNameSource, Placement, RawRecord } from "../shared/types.js";
import { UNKNOWN_DRIVER, UNKNOWN_VEHICLE } from "../shared/types.js";
import { asText, getRecord } from "./fields.js";
import type { FleetLookup } from "./fleet_lookup.js";
import { driverDisplayName, placementFromGroups, readGroupIds } from "./fleet_lookup.js";

export interface ResolvedDriver {
  name: string;
  source: DriverNameSource;
}

/**
 * Vehicle number: the vehicle object's `number`, else whatever plain
 * vehicle reference the record carries, else "Unknown".
 */
export function resolveVehicleNumber(raw: RawRecord): string {
  const vehicle = getRecord(raw, "vehicle");
  if (vehicle) return asText(vehicle.number) || UNKNOWN_VEHICLE;
  return asText(raw.vehicle) || UNKNOWN_VEHICLE;
}

const LEADING_SEPARATORS = /^[- ]+/;
const NUMERIC_TOKEN = /^\d+$/;

/**
 * Best-effort driver name embedded in a free-text vehicle number.
 *
 *   "POL-2324PP - Yem Bobey"   → "Yem Bobey"
 *   "5010C John Smith"         → "John Smith"
 *   "Sales 2560 Drew Kendrick" → "Drew Kendrick"
 *   "TRK-101"                  → null
 *
 * The first token is the vehicle code. After it, separators are
 * stripped and purely numeric tokens ("2560", "12-4") are dropped until
 * a non-numeric token leads. The remainder must be at least three
 * characters and contain a letter.
 */
export function parseDriverFromVehicleNumber(vehicleNumber: string): string | null {
  const text = vehicleNumber.trim();
  const space = text.indexOf(" ");
  if (space < 0) return null;

  let candidate = text.slice(space + 1).trim().replace(LEADING_SEPARATORS, "");
  while (candidate) {
    const first = candidate.split(" ")[0];
    if (!NUMERIC_TOKEN.test(first.replace(/-/g, ""))) break;
    candidate = candidate.slice(first.length).replace(LEADING_SEPARATORS, "");
  }

  candidate = candidate.trim();
  if (candidate.length > 2 && /[a-zA-Z]/.test(candidate)) return candidate;
  return null;
}

/**
 * Driver name by priority: fleet lookup, embedded driver object, parsed
 * from the vehicle number, "Unknown".
 */
export function resolveDriver(vehicleNumber: string, raw: RawRecord, lookup: FleetLookup): ResolvedDriver {
  const fromLookup = lookup.driversByVehicle.get(vehicleNumber);
  if (fromLookup) return { name: fromLookup, source: "lookup" };

  const embedded = driverDisplayName(getRecord(raw, "driver"));
  if (embedded) return { name: embedded, source: "embedded" };

  if (vehicleNumber !== UNKNOWN_VEHICLE) {
    const parsed = parseDriverFromVehicleNumber(vehicleNumber);
    if (parsed) return { name: parsed, source: "parsed" };
  }

  return { name: UNKNOWN_DRIVER, source: "unknown" };
}

/**
 * Division / yard by priority: fleet lookup, the record's group ids,
 * the ordered vehicle-prefix table, the numeric-prefix pattern,
 * then the unassigned division with no yard.
 */
export function resolvePlacement(
  vehicleNumber: string,
  raw: RawRecord,
  lookup: FleetLookup,
  fleet: FleetConfig
): Placement {
  const known = lookup.placementByVehicle.get(vehicleNumber);
  if (known) return known;

  const vehicle = getRecord(raw, "vehicle");
  const groupIds = [...readGroupIds(raw), ...(vehicle ? readGroupIds(vehicle) : [])];
  const fromGroups = placementFromGroups(groupIds, fleet);
  if (fromGroups) return fromGroups;

  const upper = vehicleNumber.toUpperCase();
  const prefixRule = fleet.vehiclePrefixes.find((p) => upper.startsWith(p.prefix.toUpperCase()));
  if (prefixRule) return { division: prefixRule.division, yard: prefixRule.yard };

  const numeric = fleet.numericPrefixRule;
  if (numeric && new RegExp(numeric.pattern).test(vehicleNumber)) {
    return { division: numeric.division, yard: numeric.yard };
  }

  return { division: fleet.unassignedDivision, yard: "" };
}
