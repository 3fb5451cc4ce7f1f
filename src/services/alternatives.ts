import type { ResolvedLocation } from "../types";
import { bearingDifferenceDeg, initialBearingDeg } from "../utils/geo";
import type { DirectionsProvider } from "./directions";
import { estimateDriveLeg } from "./drive-leg";
import { buildTravelDaySummary } from "./forecast";
import type { WeatherProvider } from "./weather-client";

export type StopCandidate = {
  name: string;
  latitude: number;
  longitude: number;
};

export type Alignment = "along_route" | "small_detour" | "side_trip";

export type AlternativeStop = {
  name: string;
  latitude: number;
  longitude: number;
  drive_hours_estimate: number;
  towing_stress: number;
  alignment: Alignment;
  note: string;
};

export type RankAlternativesParams = {
  weather: WeatherProvider;
  directions: DirectionsProvider;
  start: ResolvedLocation;
  destination: ResolvedLocation;
  travelDate: string;
  maxDriveHours: number | null;
  allowFallback: boolean;
  candidates: readonly StopCandidate[];
};

/** Roughly 11 m: a candidate this close to the start is the start. */
const SAME_PLACE_DEG = 1e-4;

const ALIGNMENT_PHRASES: Record<Alignment, string> = {
  along_route: "Along your route",
  small_detour: "Small detour off your route",
  side_trip: "Side-trip away from your route",
};

export function classifyAlignment(angleDeg: number): Alignment {
  if (angleDeg <= 45) return "along_route";
  if (angleDeg <= 90) return "small_detour";
  return "side_trip";
}

export function isSamePlace(a: StopCandidate | ResolvedLocation, b: StopCandidate | ResolvedLocation): boolean {
  return Math.abs(a.latitude - b.latitude) < SAME_PLACE_DEG && Math.abs(a.longitude - b.longitude) < SAME_PLACE_DEG;
}

export function alignmentNote(alignment: Alignment, towingStress: number): string {
  return `${ALIGNMENT_PHRASES[alignment]}, towing stress around ${towingStress}/100.`;
}

/**
 * Evaluate every candidate stop reachable from the start on the travel day and
 * order them calmest first. Ties keep the candidate list order.
 */
export async function rankAlternativeStops({
  weather,
  directions,
  start,
  destination,
  travelDate,
  maxDriveHours,
  allowFallback,
  candidates,
}: RankAlternativesParams): Promise<AlternativeStop[]> {
  const routeBearing = initialBearingDeg(start.latitude, start.longitude, destination.latitude, destination.longitude);

  const evaluated = await Promise.all(
    candidates.map(async (candidate): Promise<AlternativeStop | null> => {
      if (isSamePlace(candidate, start)) return null;

      const leg = await estimateDriveLeg(directions, start, candidate, { maxDriveHours, allowFallback });
      if (leg.within_drive_limit === false) return null;

      const day = await buildTravelDaySummary(weather, candidate, travelDate);

      const candidateBearing = initialBearingDeg(
        start.latitude,
        start.longitude,
        candidate.latitude,
        candidate.longitude
      );
      const alignment = classifyAlignment(bearingDifferenceDeg(routeBearing, candidateBearing));

      return {
        name: candidate.name,
        latitude: candidate.latitude,
        longitude: candidate.longitude,
        drive_hours_estimate: leg.drive_hours_estimate,
        towing_stress: day.towing_stress,
        alignment,
        note: alignmentNote(alignment, day.towing_stress),
      };
    })
  );

  return evaluated
    .filter((stop): stop is AlternativeStop => stop !== null)
    .sort((a, b) => a.towing_stress - b.towing_stress);
}
