import { UpstreamError } from "../errors";
import type { DailyWeatherSeries, ResolvedLocation, WeatherDay } from "../types";
import { averageWindFromMax, computeTowingStress, isParkUpDay } from "./scoring";
import { buildConditionsSummary } from "./summary";
import type { WeatherProvider } from "./weather-client";

export type DayConditions = {
  date: string;
  rainMm: number;
  windMaxKmh: number;
  windAvgKmh: number;
  windGustKmh: number;
  overnightTempC: number;
  towingStress: number;
  parkUp: boolean;
};

/** Touring-plan view of one location on the travel day. */
export type DaySummary = {
  date: string;
  rain_mm: number;
  wind_avg_kmh: number;
  wind_gust_kmh: number;
  towing_stress: number;
  overnight_temp_c: number;
  ai_summary: string;
  park_up_flag: boolean;
};

const TOURING_FORECAST_DAYS = 5;

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function isIsoCalendarDate(value: string): boolean {
  const match = ISO_DATE_RE.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const parsed = new Date(Date.UTC(year, month - 1, day));
  return (
    parsed.getUTCFullYear() === year &&
    parsed.getUTCMonth() === month - 1 &&
    parsed.getUTCDate() === day
  );
}

function finite(value: number | null | undefined): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * Zip the parallel daily arrays into day records. Entries with an unparsable
 * date or a missing value are skipped; the arrays are cut to the shortest one.
 */
export function toWeatherDays(series: DailyWeatherSeries): WeatherDay[] {
  const n = Math.min(
    series.time.length,
    series.precipitation_sum.length,
    series.wind_speed_10m_max.length,
    series.wind_gusts_10m_max.length,
    series.temperature_2m_min.length
  );

  const days: WeatherDay[] = [];
  for (let i = 0; i < n; i++) {
    const date = series.time[i];
    const rain = series.precipitation_sum[i];
    const windMax = series.wind_speed_10m_max[i];
    const gust = series.wind_gusts_10m_max[i];
    const tempMin = series.temperature_2m_min[i];

    if (!isIsoCalendarDate(date) || !finite(rain) || !finite(windMax) || !finite(gust) || !finite(tempMin)) {
      console.warn(`[forecast] Skipping unusable weather entry ${i} (${date})`);
      continue;
    }

    days.push({ date, rainMm: rain, windMaxKmh: windMax, windGustKmh: gust, tempMinC: tempMin });
  }

  return days;
}

export function assessDay(day: WeatherDay): DayConditions {
  const windAvgKmh = averageWindFromMax(day.windMaxKmh);
  return {
    date: day.date,
    rainMm: day.rainMm,
    windMaxKmh: day.windMaxKmh,
    windAvgKmh,
    windGustKmh: day.windGustKmh,
    overnightTempC: day.tempMinC,
    towingStress: computeTowingStress(windAvgKmh, day.windGustKmh, day.rainMm),
    parkUp: isParkUpDay(windAvgKmh, day.windGustKmh),
  };
}

/** Exact date match, otherwise the first usable entry. */
export function selectTravelDay(days: WeatherDay[], travelDate: string): { day: WeatherDay; matched: boolean } {
  const exact = days.find((d) => d.date === travelDate);
  if (exact) return { day: exact, matched: true };
  return { day: days[0], matched: false };
}

export async function fetchWeatherDays(
  weather: WeatherProvider,
  latitude: number,
  longitude: number,
  dayCount: number
): Promise<WeatherDay[]> {
  const series = await weather.getDailyWeather(latitude, longitude, dayCount);
  const days = toWeatherDays(series);
  if (days.length === 0) {
    throw new UpstreamError("weather", "Weather service returned no usable daily data");
  }
  return days;
}

export async function buildTravelDaySummary(
  weather: WeatherProvider,
  location: ResolvedLocation,
  travelDate: string
): Promise<DaySummary> {
  const days = await fetchWeatherDays(weather, location.latitude, location.longitude, TOURING_FORECAST_DAYS);
  const { day, matched } = selectTravelDay(days, travelDate);
  if (!matched) {
    console.warn(`[forecast] No forecast for ${travelDate} at ${location.name}; using ${day.date}`);
  }

  const c = assessDay(day);
  return {
    date: travelDate,
    rain_mm: c.rainMm,
    wind_avg_kmh: c.windAvgKmh,
    wind_gust_kmh: c.windGustKmh,
    towing_stress: c.towingStress,
    overnight_temp_c: c.overnightTempC,
    ai_summary: buildConditionsSummary(
      {
        rainMm: c.rainMm,
        windAvgKmh: c.windAvgKmh,
        windGustKmh: c.windGustKmh,
        overnightTempC: c.overnightTempC,
      },
      "touring"
    ),
    park_up_flag: c.parkUp,
  };
}
