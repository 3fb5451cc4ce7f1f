import { Router } from "express";
import { z } from "zod";
import type { StopCandidate } from "../services/alternatives";
import type { DirectionsProvider } from "../services/directions";
import { isIsoCalendarDate } from "../services/forecast";
import type { Geocoder } from "../services/geocoder";
import { planTouringDay } from "../services/touring-plan";
import type { WeatherProvider } from "../services/weather-client";
import { sendRouteError } from "../utils/http-errors";

const locationSchema = z.object({
  name: z.string(),
  latitude: z.number().min(-90).max(90).nullish(),
  longitude: z.number().min(-180).max(180).nullish(),
});

const touringPlanSchema = z.object({
  from_location: locationSchema,
  to_location: locationSchema,
  travel_day_iso: z.string().refine(isIsoCalendarDate, { message: "Expected a YYYY-MM-DD calendar date" }),
  max_drive_hours: z.number().positive().nullish(),
  route_samples: z.number().int().positive().nullish(),
});

export type TouringRouterDeps = {
  weather: WeatherProvider;
  geocoder: Geocoder;
  directions: DirectionsProvider;
  stops: readonly StopCandidate[];
  allowRoutingFallback: boolean;
};

export function createTouringRouter(deps: TouringRouterDeps) {
  const router = Router();

  router.post("/plan", async (req, res) => {
    try {
      const body = touringPlanSchema.parse(req.body);
      const plan = await planTouringDay(deps, body);
      return res.json(plan);
    } catch (error) {
      return sendRouteError(res, error, "touring", "Touring plan failed");
    }
  });

  return router;
}
