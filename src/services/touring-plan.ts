import type { Location, ResolvedLocation } from "../types";
import { rankAlternativeStops, type AlternativeStop, type StopCandidate } from "./alternatives";
import type { DirectionsProvider } from "./directions";
import { estimateDriveLeg, type RouteLegInfo } from "./drive-leg";
import { buildTravelDaySummary, type DaySummary } from "./forecast";
import { resolveLocation, type Geocoder } from "./geocoder";
import { buildRouteWindProfile, DEFAULT_ROUTE_SAMPLES, type RouteWindProfile } from "./route-wind";
import { routeComfortLabel, type RouteComfortLabel } from "./scoring";
import { buildConditionsSummary } from "./summary";
import type { WeatherProvider } from "./weather-client";

export type TouringPlanRequest = {
  from_location: Location;
  to_location: Location;
  travel_day_iso: string;
  max_drive_hours?: number | null;
  route_samples?: number | null;
};

export type LocationSummary = {
  location: ResolvedLocation;
  day: DaySummary;
};

export type Comparison = {
  better_for_towing: "from" | "to" | "same";
  reason: string;
};

export type TouringPlanResponse = {
  travel_day_iso: string;
  travel_day_human: string;
  main_leg: RouteLegInfo;
  from_summary: LocationSummary;
  to_summary: LocationSummary;
  route_towing_stress: number;
  comfort_label: RouteComfortLabel;
  comparison: Comparison;
  recommendation: string;
  route_wind_profile: RouteWindProfile;
  alternatives: AlternativeStop[];
};

export type TouringPlanDeps = {
  weather: WeatherProvider;
  geocoder: Geocoder;
  directions: DirectionsProvider;
  stops: readonly StopCandidate[];
  allowRoutingFallback: boolean;
};

/** Stress points one end must be below the other to count as calmer. */
const COMPARISON_MARGIN = 5;

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];
const MONTHS = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
];

/** "2026-03-07" → "Saturday 07 March 2026". Expects a valid calendar date. */
export function formatTravelDay(isoDate: string): string {
  const [year, month, day] = isoDate.split("-").map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return `${WEEKDAYS[date.getUTCDay()]} ${String(day).padStart(2, "0")} ${MONTHS[month - 1]} ${year}`;
}

export function compareEnds(fromStress: number, toStress: number): Comparison {
  if (fromStress < toStress - COMPARISON_MARGIN) {
    return { better_for_towing: "from", reason: "Start is calmer." };
  }
  if (toStress < fromStress - COMPARISON_MARGIN) {
    return { better_for_towing: "to", reason: "Destination is calmer." };
  }
  return { better_for_towing: "same", reason: "Conditions are similar." };
}

/** Worst-of-both-ends narrative for the whole trip. */
export function buildRouteRecommendation(from: DaySummary, to: DaySummary): string {
  return buildConditionsSummary(
    {
      rainMm: Math.max(from.rain_mm, to.rain_mm),
      windAvgKmh: Math.max(from.wind_avg_kmh, to.wind_avg_kmh),
      windGustKmh: Math.max(from.wind_gust_kmh, to.wind_gust_kmh),
      overnightTempC: Math.min(from.overnight_temp_c, to.overnight_temp_c),
    },
    "touring"
  );
}

export async function planTouringDay(
  { weather, geocoder, directions, stops, allowRoutingFallback }: TouringPlanDeps,
  request: TouringPlanRequest
): Promise<TouringPlanResponse> {
  const travelDate = request.travel_day_iso;
  const maxDriveHours = request.max_drive_hours ?? null;

  const [from, to] = await Promise.all([
    resolveLocation(geocoder, request.from_location),
    resolveLocation(geocoder, request.to_location),
  ]);
  console.log(
    `[touring] ${from.name} (${from.latitude}, ${from.longitude}) → ` +
      `${to.name} (${to.latitude}, ${to.longitude}) on ${travelDate}`
  );

  const [fromDay, toDay] = await Promise.all([
    buildTravelDaySummary(weather, from, travelDate),
    buildTravelDaySummary(weather, to, travelDate),
  ]);

  const mainLeg = await estimateDriveLeg(directions, from, to, {
    maxDriveHours,
    allowFallback: allowRoutingFallback,
  });

  const [windProfile, alternatives] = await Promise.all([
    buildRouteWindProfile(
      weather,
      from,
      to,
      travelDate,
      mainLeg.distance_km,
      request.route_samples ?? DEFAULT_ROUTE_SAMPLES
    ),
    rankAlternativeStops({
      weather,
      directions,
      start: from,
      destination: to,
      travelDate,
      maxDriveHours,
      allowFallback: allowRoutingFallback,
      candidates: stops,
    }),
  ]);

  const routeStress = Math.max(fromDay.towing_stress, toDay.towing_stress);

  return {
    travel_day_iso: travelDate,
    travel_day_human: formatTravelDay(travelDate),
    main_leg: mainLeg,
    from_summary: { location: from, day: fromDay },
    to_summary: { location: to, day: toDay },
    route_towing_stress: routeStress,
    comfort_label: routeComfortLabel(routeStress),
    comparison: compareEnds(fromDay.towing_stress, toDay.towing_stress),
    recommendation: buildRouteRecommendation(fromDay, toDay),
    route_wind_profile: windProfile,
    alternatives,
  };
}
