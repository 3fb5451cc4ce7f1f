import { z } from "zod";
import { UpstreamError } from "../errors";
import { DEFAULT_FETCH_HEADERS, type FetchWithTimeout } from "../utils/http-client";

export type RouteDistance = {
  distanceKm: number;
  durationHours: number;
};

export type Coordinates = { latitude: number; longitude: number };

export interface DirectionsProvider {
  getRoute(from: Coordinates, to: Coordinates): Promise<RouteDistance>;
}

const MAPBOX_DIRECTIONS_URL = "https://api.mapbox.com/directions/v5/mapbox/driving";

const directionsPayloadSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional(),
  routes: z
    .array(
      z.object({
        distance: z.number().nullish(),
        duration: z.number().nullish(),
      })
    )
    .optional(),
});

type MapboxDirectionsOptions = {
  token: string | undefined;
  /** Multiplier on the provider's duration, e.g. 1.10 = +10% for towing. */
  towingTimeFactor: number;
};

export function createMapboxDirections(
  fetchWithTimeout: FetchWithTimeout,
  { token, towingTimeFactor }: MapboxDirectionsOptions
): DirectionsProvider {
  return {
    async getRoute(from, to) {
      const accessToken = (token ?? "").trim();
      if (!accessToken) {
        throw new UpstreamError("directions", "MAPBOX_TOKEN is not set in environment");
      }

      // Mapbox expects lon,lat order
      const coords = `${from.longitude},${from.latitude};${to.longitude},${to.latitude}`;
      const url =
        `${MAPBOX_DIRECTIONS_URL}/${coords}?` +
        new URLSearchParams({
          access_token: accessToken,
          alternatives: "false",
          overview: "false",
          steps: "false",
        });

      let payload: unknown;
      try {
        const response = await fetchWithTimeout(url, { headers: DEFAULT_FETCH_HEADERS });
        if (response.status === 401) {
          throw new Error("Mapbox token rejected (401). Check MAPBOX_TOKEN.");
        }
        if (!response.ok) {
          throw new Error(`Mapbox directions failed with status ${response.status}`);
        }
        payload = await response.json();
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new UpstreamError("directions", reason, { cause: error });
      }

      const parsed = directionsPayloadSchema.safeParse(payload);
      if (!parsed.success) {
        throw new UpstreamError("directions", "Unexpected response from Mapbox directions");
      }

      const { routes, code, message } = parsed.data;
      const route = routes?.[0];
      if (!route) {
        throw new UpstreamError(
          "directions",
          `No routes returned by Mapbox for this A→B (code=${code ?? "none"}, message=${message ?? "none"})`
        );
      }
      if (route.distance == null || route.duration == null) {
        throw new UpstreamError("directions", "Mapbox route missing distance/duration fields");
      }

      return {
        distanceKm: route.distance / 1000,
        durationHours: (route.duration / 3600) * towingTimeFactor,
      };
    },
  };
}
