import type { WeatherDay } from "../types";
import { kmhToKnots } from "../utils/units";
import { assessDay } from "./forecast";
import { briefingComfortLabel, type BriefingComfortLabel } from "./scoring";
import { buildConditionsSummary } from "./summary";

export type BriefingDay = {
  date: string;
  rain_mm: number;
  wind_avg_kmh: number;
  wind_avg_knots: number;
  wind_gust_kmh: number;
  wind_gust_knots: number;
  overnight_temp_c: number;
  towing_stress: number;
  comfort_label: BriefingComfortLabel;
  ai_summary: string;
};

export type DailyBriefing = {
  days: BriefingDay[];
  headline: string;
  recommendation: string;
};

export type CaravanDay = {
  date: string;
  rain_mm: number;
  wind_avg_kmh: number;
  wind_avg_knots: number;
  wind_gust_kmh: number;
  wind_gust_knots: number;
  towing_stress: number;
  overnight_temp_c: number;
  ai_summary: string;
  park_up_flag: boolean;
};

export type CaravanOutlook = {
  days: CaravanDay[];
  recommendation: string;
};

export const BRIEFING_MIN_DAYS = 1;
export const BRIEFING_MAX_DAYS = 7;
export const CARAVAN_SCORE_DAYS = 3;

/* ── Daily briefing ── */

export function briefingHeadline(maxStress: number): string {
  if (maxStress <= 30) return "Nice run of days for touring and camping.";
  if (maxStress <= 60) return "Mixed few days – some good windows, some rougher patches.";
  return "Windy or wet spell coming – pick your window carefully.";
}

export function buildDailyBriefing(weatherDays: WeatherDay[]): DailyBriefing {
  const days = weatherDays.map((day): BriefingDay => {
    const c = assessDay(day);
    return {
      date: c.date,
      rain_mm: c.rainMm,
      wind_avg_kmh: c.windAvgKmh,
      wind_avg_knots: kmhToKnots(c.windAvgKmh),
      wind_gust_kmh: c.windGustKmh,
      wind_gust_knots: kmhToKnots(c.windGustKmh),
      overnight_temp_c: c.overnightTempC,
      towing_stress: c.towingStress,
      comfort_label: briefingComfortLabel(c.towingStress, c.rainMm, c.overnightTempC),
      ai_summary: buildConditionsSummary(
        { rainMm: c.rainMm, windAvgKmh: c.windAvgKmh, windGustKmh: c.windGustKmh },
        "briefing"
      ),
    };
  });

  // First day wins a tie for the easiest moving day
  const best = days.reduce((a, b) => (b.towing_stress < a.towing_stress ? b : a));
  const maxStress = Math.max(...days.map((d) => d.towing_stress));

  return {
    days,
    headline: briefingHeadline(maxStress),
    recommendation:
      `The easiest day to move on, from a towing perspective, looks like ${best.date} ` +
      `(${best.comfort_label.toLowerCase()}, stress ~${best.towing_stress}/100).`,
  };
}

/* ── Caravan score ── */

export function parkUpRecommendation(flags: boolean[]): string {
  const [today = false, day2 = false, day3 = false] = flags;

  if (today && !(day2 || day3)) {
    return "Park up today – winds hit our 30 km/h threshold. Tomorrow or Day 3 look better.";
  }
  if (day2 && !today) {
    return "Today is a better towing day than tomorrow. If you can, move today and park up tomorrow.";
  }
  if (today && day2 && !day3) {
    return "Next two days look windy. Best towing window is on Day 3 if you can wait.";
  }
  return "No obvious 'park up' days from wind alone – choose the day that suits your plans.";
}

const joinDates = (dates: string[]) => dates.join(" and ");

/**
 * Used when the forecast came back short, so positions no longer line up
 * with today, tomorrow and day 3: name the dates instead.
 */
export function datedParkUpRecommendation(days: Array<{ date: string; park_up_flag: boolean }>): string {
  const windy = days.filter((d) => d.park_up_flag).map((d) => d.date);
  const calm = days.filter((d) => !d.park_up_flag).map((d) => d.date);

  if (windy.length === 0) {
    return "No obvious 'park up' days from wind alone – choose the day that suits your plans.";
  }
  if (calm.length === 0) {
    return `Winds hit our 30 km/h threshold on ${joinDates(windy)}. Park up if you can.`;
  }
  return (
    `Winds hit our 30 km/h threshold on ${joinDates(windy)}. ` +
    `${joinDates(calm)} ${calm.length === 1 ? "looks" : "look"} better for towing.`
  );
}

export function buildCaravanOutlook(weatherDays: WeatherDay[]): CaravanOutlook {
  const days = weatherDays.map((day): CaravanDay => {
    const c = assessDay(day);
    return {
      date: c.date,
      rain_mm: c.rainMm,
      wind_avg_kmh: c.windAvgKmh,
      wind_avg_knots: kmhToKnots(c.windAvgKmh),
      wind_gust_kmh: c.windGustKmh,
      wind_gust_knots: kmhToKnots(c.windGustKmh),
      towing_stress: c.towingStress,
      overnight_temp_c: c.overnightTempC,
      ai_summary: buildConditionsSummary(
        {
          rainMm: c.rainMm,
          windAvgKmh: c.windAvgKmh,
          windGustKmh: c.windGustKmh,
          overnightTempC: c.overnightTempC,
        },
        "caravan"
      ),
      park_up_flag: c.parkUp,
    };
  });

  return {
    days,
    recommendation:
      days.length >= CARAVAN_SCORE_DAYS
        ? parkUpRecommendation(days.map((d) => d.park_up_flag))
        : datedParkUpRecommendation(days),
  };
}
