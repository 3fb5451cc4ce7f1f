import { z } from "zod";
import { UpstreamError } from "../errors";
import type { DailyWeatherSeries } from "../types";
import { DEFAULT_FETCH_HEADERS, type FetchWithTimeout } from "../utils/http-client";

export interface WeatherProvider {
  getDailyWeather(latitude: number, longitude: number, days: number): Promise<DailyWeatherSeries>;
}

const OPEN_METEO_FORECAST_URL = "https://api.open-meteo.com/v1/forecast";

const DAILY_FIELDS = [
  "precipitation_sum",
  "wind_speed_10m_max",
  "wind_gusts_10m_max",
  "temperature_2m_min",
] as const;

const nullableSeries = z.array(z.number().nullable());

const forecastPayloadSchema = z.object({
  daily: z.object({
    time: z.array(z.string()),
    precipitation_sum: nullableSeries,
    wind_speed_10m_max: nullableSeries,
    wind_gusts_10m_max: nullableSeries,
    temperature_2m_min: nullableSeries,
  }),
});

/** Daily precipitation, max wind, max gust and min temperature from Open-Meteo. */
export function createOpenMeteoWeather(fetchWithTimeout: FetchWithTimeout): WeatherProvider {
  return {
    async getDailyWeather(latitude, longitude, days) {
      const url =
        `${OPEN_METEO_FORECAST_URL}?` +
        new URLSearchParams({
          latitude: String(latitude),
          longitude: String(longitude),
          daily: DAILY_FIELDS.join(","),
          forecast_days: String(days),
          timezone: "auto",
        });

      let payload: unknown;
      try {
        const response = await fetchWithTimeout(url, { headers: DEFAULT_FETCH_HEADERS });
        if (!response.ok) {
          throw new Error(`Open-Meteo forecast failed with status ${response.status}`);
        }
        payload = await response.json();
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new UpstreamError("weather", `Weather service error: ${reason}`, { cause: error });
      }

      const parsed = forecastPayloadSchema.safeParse(payload);
      if (!parsed.success) {
        throw new UpstreamError("weather", "Unexpected response from Open-Meteo: 'daily' block missing or malformed");
      }
      if (parsed.data.daily.time.length === 0) {
        throw new UpstreamError("weather", "Weather service returned no daily data");
      }

      return parsed.data.daily;
    },
  };
}
