import { clamp, roundTo } from "../utils/units";

export type BriefingComfortLabel =
  | "Comfortable"
  | "OK with care"
  | "Stressy / exposed"
  | "Rough – park up if you can";

export type RouteComfortLabel = "good" | "fair" | "caution" | "park_up";

/* ── Thresholds ── */

const AVG_WIND_FLOOR_KMH = 10;
const AVG_WIND_CAP = 50;
const GUST_FLOOR_KMH = 30;
const GUST_CAP = 30;
const RAIN_CAP = 20;

/** Peak wind → "average" wind. A fixed ratio, not a measured mean. */
const AVG_WIND_RATIO = 0.7;

const PARK_UP_AVG_WIND_KMH = 30;
const PARK_UP_GUST_KMH = 40;

export function averageWindFromMax(windMaxKmh: number): number {
  return roundTo(windMaxKmh * AVG_WIND_RATIO, 1);
}

/**
 * Towing stress on a 0–100 scale. Average wind counts above 10 km/h, gusts
 * above 30 km/h, rain from the first millimetre; each part saturates at its
 * own cap before the total is clamped.
 */
export function computeTowingStress(windAvgKmh: number, windGustKmh: number, rainMm: number): number {
  let score = 0;

  if (windAvgKmh > AVG_WIND_FLOOR_KMH) {
    score += Math.min(AVG_WIND_CAP, (windAvgKmh - AVG_WIND_FLOOR_KMH) * 2);
  }
  if (windGustKmh > GUST_FLOOR_KMH) {
    score += Math.min(GUST_CAP, (windGustKmh - GUST_FLOOR_KMH) * 2);
  }
  score += Math.min(RAIN_CAP, Math.max(0, rainMm) * 2);

  return clamp(Math.round(clamp(score, 0, 100)), 0, 100);
}

/** Independent of the stress caps: wind alone decides whether to stay put. */
export function isParkUpDay(windAvgKmh: number, windGustKmh: number): boolean {
  return windAvgKmh >= PARK_UP_AVG_WIND_KMH || windGustKmh >= PARK_UP_GUST_KMH;
}

/** Label for the daily briefing: how the day feels for towing and camping. */
export function briefingComfortLabel(
  towingStress: number,
  rainMm: number,
  overnightTempC: number
): BriefingComfortLabel {
  if (towingStress <= 25 && rainMm < 2 && overnightTempC >= 5) return "Comfortable";
  if (towingStress <= 50) return "OK with care";
  if (towingStress <= 75) return "Stressy / exposed";
  return "Rough – park up if you can";
}

/** Label for touring plans, where only the drive matters. */
export function routeComfortLabel(towingStress: number): RouteComfortLabel {
  if (towingStress <= 40) return "good";
  if (towingStress <= 60) return "fair";
  if (towingStress <= 80) return "caution";
  return "park_up";
}
