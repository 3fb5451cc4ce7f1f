import { InputError } from "../errors";
import type { Location } from "../types";
import { haversineKm } from "../utils/geo";
import { roundTo } from "../utils/units";
import type { DirectionsProvider } from "./directions";

export type RouteLegInfo = {
  distance_km: number;
  drive_hours_estimate: number;
  max_drive_hours: number | null;
  within_drive_limit: boolean | null;
  estimate_source: "directions" | "heuristic";
};

export type DriveLegOptions = {
  maxDriveHours?: number | null;
  /** Allow the straight-line estimate when the directions call fails. */
  allowFallback: boolean;
};

/** Towing rigs rarely average faster than this, whatever the router says. */
const MAX_TOWING_AVG_KMH = 90;
const FALLBACK_ROAD_FACTOR = 1.25;
const FALLBACK_AVG_KMH = 80;

function requireCoordinates(location: Location, label: string): { latitude: number; longitude: number } {
  if (location.latitude == null || location.longitude == null) {
    throw new InputError(`${label} location '${location.name}' has no coordinates`);
  }
  return { latitude: location.latitude, longitude: location.longitude };
}

export function withinBudget(driveHours: number, maxDriveHours: number | null | undefined): boolean | null {
  if (maxDriveHours == null) return null;
  return driveHours <= maxDriveHours;
}

export function heuristicLeg(
  from: { latitude: number; longitude: number },
  to: { latitude: number; longitude: number }
): { distanceKm: number; durationHours: number } {
  const roadKm = haversineKm(from.latitude, from.longitude, to.latitude, to.longitude) * FALLBACK_ROAD_FACTOR;
  return { distanceKm: roadKm, durationHours: roadKm > 0 ? roadKm / FALLBACK_AVG_KMH : 0 };
}

/**
 * Road distance and drive time between two points. Falls back to a
 * straight-line estimate only when the directions call itself fails;
 * a location without coordinates is rejected outright.
 */
export async function estimateDriveLeg(
  directions: DirectionsProvider,
  fromLoc: Location,
  toLoc: Location,
  { maxDriveHours = null, allowFallback }: DriveLegOptions
): Promise<RouteLegInfo> {
  const from = requireCoordinates(fromLoc, "Start");
  const to = requireCoordinates(toLoc, "Destination");

  let distanceKm: number;
  let durationHours: number;
  let source: RouteLegInfo["estimate_source"];

  try {
    const route = await directions.getRoute(from, to);
    distanceKm = route.distanceKm;
    durationHours = Math.max(route.durationHours, route.distanceKm / MAX_TOWING_AVG_KMH);
    source = "directions";
  } catch (error) {
    if (!allowFallback) throw error;
    console.warn(
      `[drive-leg] Directions failed for ${fromLoc.name} → ${toLoc.name}; using heuristic estimate:`,
      error instanceof Error ? error.message : error
    );
    ({ distanceKm, durationHours } = heuristicLeg(from, to));
    source = "heuristic";
  }

  return {
    distance_km: roundTo(distanceKm, 1),
    drive_hours_estimate: roundTo(durationHours, 2),
    max_drive_hours: maxDriveHours,
    within_drive_limit: withinBudget(durationHours, maxDriveHours),
    estimate_source: source,
  };
}
