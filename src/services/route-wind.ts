import type { ResolvedLocation } from "../types";
import { lerp } from "../utils/geo";
import { clamp, roundTo } from "../utils/units";
import { buildTravelDaySummary, type DaySummary } from "./forecast";
import type { WeatherProvider } from "./weather-client";

export type RouteWindProfile = {
  samples: number;
  worst_at_km_from_start: number;
  worst_wind_avg_kmh: number;
  worst_wind_gust_kmh: number;
  worst_towing_stress: number;
  note: string;
};

export const DEFAULT_ROUTE_SAMPLES = 9;
const MIN_SAMPLES = 3;
const MAX_SAMPLES = 21;

/**
 * Evenly spaced points on the straight line between the endpoints, both ends
 * included. This is not the road path.
 */
export function makeRouteSamples(from: ResolvedLocation, to: ResolvedLocation, samples: number): ResolvedLocation[] {
  const count = clamp(Math.round(samples), MIN_SAMPLES, MAX_SAMPLES);
  const points: ResolvedLocation[] = [];

  for (let i = 0; i < count; i++) {
    const t = i / (count - 1);
    points.push({
      name: `Route sample ${i + 1}`,
      latitude: lerp(from.latitude, to.latitude, t),
      longitude: lerp(from.longitude, to.longitude, t),
    });
  }
  return points;
}

/** Index of the highest stress; the earliest sample wins a tie. */
export function worstSampleIndex(days: DaySummary[]): number {
  let worst = 0;
  for (let i = 1; i < days.length; i++) {
    if (days[i].towing_stress > days[worst].towing_stress) worst = i;
  }
  return worst;
}

export async function buildRouteWindProfile(
  weather: WeatherProvider,
  from: ResolvedLocation,
  to: ResolvedLocation,
  travelDate: string,
  legDistanceKm: number,
  samples = DEFAULT_ROUTE_SAMPLES
): Promise<RouteWindProfile> {
  const points = makeRouteSamples(from, to, samples);
  const days = await Promise.all(points.map((point) => buildTravelDaySummary(weather, point, travelDate)));

  const worstIdx = worstSampleIndex(days);
  const worst = days[worstIdx];

  return {
    samples: points.length,
    worst_at_km_from_start: roundTo(legDistanceKm * (worstIdx / (points.length - 1)), 1),
    worst_wind_avg_kmh: worst.wind_avg_kmh,
    worst_wind_gust_kmh: worst.wind_gust_kmh,
    worst_towing_stress: worst.towing_stress,
    note: "Wind exposure sampled along the A→B line (not road routing).",
  };
}
