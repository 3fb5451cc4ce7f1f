import { Router } from "express";
import { z } from "zod";
import { fetchWeatherDays } from "../services/forecast";
import { CARAVAN_SCORE_DAYS, buildCaravanOutlook } from "../services/outlook";
import { lookupCaravan, type ReferenceCatalog } from "../services/reference-catalog";
import type { WeatherProvider } from "../services/weather-client";
import { sendRouteError } from "../utils/http-errors";
import { pinnedLocationSchema } from "./briefing";

const caravanScoreSchema = z.object({
  location: pinnedLocationSchema,
  home_location: pinnedLocationSchema.nullish(),
});

const caravanLookupQuerySchema = z.object({
  brand: z.string().trim().min(1),
  model: z.string().trim().min(1),
  length_category: z.string().optional(),
});

export type CaravanRouterDeps = {
  weather: WeatherProvider;
  catalog: ReferenceCatalog;
};

function caravanLookupMessage(matchCount: number): string {
  if (matchCount === 0) {
    return (
      "No caravan match found in the reference guide. " +
      "Use your compliance plate and weighbridge figures to enter ATM and ball weight manually."
    );
  }
  if (matchCount === 1) {
    return "Found one likely match. Treat these numbers as a starting point only.";
  }
  return (
    "Found several possible matches. Pick the closest one to your van and " +
    "always confirm against the plate and weighbridge."
  );
}

export function createCaravanRouter({ weather, catalog }: CaravanRouterDeps) {
  const router = Router();

  router.post("/score", async (req, res) => {
    try {
      const { location } = caravanScoreSchema.parse(req.body);

      const weatherDays = await fetchWeatherDays(weather, location.latitude, location.longitude, CARAVAN_SCORE_DAYS);
      const outlook = buildCaravanOutlook(weatherDays);

      return res.json({ location, ...outlook });
    } catch (error) {
      return sendRouteError(res, error, "caravan", "Caravan score failed");
    }
  });

  router.get("/lookup", (req, res) => {
    try {
      const query = caravanLookupQuerySchema.parse(req.query);
      const matches = lookupCaravan(catalog, query.brand, query.model, query.length_category);

      return res.json({ matches, message: caravanLookupMessage(matches.length) });
    } catch (error) {
      return sendRouteError(res, error, "caravan", "Caravan lookup failed");
    }
  });

  return router;
}
