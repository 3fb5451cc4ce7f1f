import { Router } from "express";
import { z } from "zod";
import { fetchWeatherDays } from "../services/forecast";
import { BRIEFING_MAX_DAYS, BRIEFING_MIN_DAYS, buildDailyBriefing } from "../services/outlook";
import type { WeatherProvider } from "../services/weather-client";
import { sendRouteError } from "../utils/http-errors";
import { clamp } from "../utils/units";

export const pinnedLocationSchema = z.object({
  name: z.string(),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

const dailyBriefingSchema = z.object({
  location: pinnedLocationSchema,
  days: z.number().int().default(3),
});

export type BriefingRouterDeps = {
  weather: WeatherProvider;
};

export function createBriefingRouter({ weather }: BriefingRouterDeps) {
  const router = Router();

  /** 1–7 day touring and camping outlook for one place. Out-of-range day counts are clamped. */
  router.post("/daily", async (req, res) => {
    try {
      const { location, days } = dailyBriefingSchema.parse(req.body);
      const dayCount = clamp(days, BRIEFING_MIN_DAYS, BRIEFING_MAX_DAYS);

      const weatherDays = await fetchWeatherDays(weather, location.latitude, location.longitude, dayCount);
      const briefing = buildDailyBriefing(weatherDays);

      return res.json({ location, ...briefing });
    } catch (error) {
      return sendRouteError(res, error, "briefing", "Daily briefing failed");
    }
  });

  return router;
}
