/**
 * Fleet lookup maps built from fetched vehicle master records.
 */
import type { FleetConfig } from "../config/schemas.js";
import type { Placement, RawRecord } from "../shared/types.js";
import { asNumber, asText, getRecord, isRecord } from "./fields.js";
import { unwrapEnvelope } from "./envelope.js";

export interface FleetLookup {
  /** vehicle number → driver display name */
  driversByVehicle: ReadonlyMap<string, string>;
  /** vehicle number → division / yard */
  placementByVehicle: ReadonlyMap<string, Placement>;
  /** division → yard → vehicle count */
  vehicleCountsByYard: ReadonlyMap<string, ReadonlyMap<string, number>>;
}

export const EMPTY_FLEET_LOOKUP: FleetLookup = {
  driversByVehicle: new Map(),
  placementByVehicle: new Map(),
  vehicleCountsByYard: new Map(),
};

/** "first last" from a vendor driver object; "" when neither is set. */
export function driverDisplayName(driver: RawRecord | null): string {
  if (!driver) return "";
  const first = asText(driver.first_name);
  const last = asText(driver.last_name);
  return `${first} ${last}`.trim();
}

/** Numeric group ids from a `group_ids` array of ids or { id } objects. */
export function readGroupIds(raw: RawRecord): number[] {
  const value = raw.group_ids;
  if (!Array.isArray(value)) return [];
  const ids: number[] = [];
  for (const item of value) {
    const id = asNumber(isRecord(item) ? item.id : item);
    if (id !== null) ids.push(id);
  }
  return ids;
}

/** Placement of the first group id present in the fleet group table. */
export function placementFromGroups(groupIds: readonly number[], fleet: FleetConfig): Placement | null {
  for (const id of groupIds) {
    const group = fleet.groups.find((g) => g.groupId === id);
    if (group) return { division: group.division, yard: group.yard };
  }
  return null;
}

export function buildFleetLookup(rawVehicles: readonly unknown[], fleet: FleetConfig): FleetLookup {
  const driversByVehicle = new Map<string, string>();
  const placementByVehicle = new Map<string, Placement>();
  const vehicleCountsByYard = new Map<string, Map<string, number>>();

  for (const item of rawVehicles) {
    const vehicle = unwrapEnvelope(item, "vehicle");
    const number = asText(vehicle.number);
    if (!number) continue;

    const driver =
      driverDisplayName(getRecord(vehicle, "current_driver")) ||
      driverDisplayName(getRecord(vehicle, "permanent_driver"));
    if (driver) driversByVehicle.set(number, driver);

    const placement = placementFromGroups(readGroupIds(vehicle), fleet);
    if (!placement) continue;
    placementByVehicle.set(number, placement);

    if (placement.yard) {
      const yards = vehicleCountsByYard.get(placement.division) ?? new Map<string, number>();
      yards.set(placement.yard, (yards.get(placement.yard) ?? 0) + 1);
      vehicleCountsByYard.set(placement.division, yards);
    }
  }

  return { driversByVehicle, placementByVehicle, vehicleCountsByYard };
}
