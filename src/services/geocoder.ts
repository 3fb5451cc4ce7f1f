import { z } from "zod";
import { InputError, LocationNotFoundError, UpstreamError } from "../errors";
import type { Location, ResolvedLocation } from "../types";
import { DEFAULT_FETCH_HEADERS, type FetchWithTimeout } from "../utils/http-client";

export type GeocodeMatch = ResolvedLocation & {
  admin1: string | null;
  admin2: string | null;
  country: string | null;
  country_code: string | null;
  timezone: string | null;
  population: number | null;
};

export interface Geocoder {
  geocodeOne(place: string): Promise<GeocodeMatch>;
}

const OPEN_METEO_GEOCODE_URL = "https://geocoding-api.open-meteo.com/v1/search";

// Rough box around the North, South and Stewart islands
const NZ_BOUNDS = { minLat: -47.5, maxLat: -33.5, minLon: 165.0, maxLon: 179.5 };

const PLACE_ALIASES: Record<string, string> = {
  "mt cook": "Mount Cook Village",
  "mount cook": "Mount Cook Village",
  aoraki: "Mount Cook Village",
  "aoraki mt cook": "Mount Cook Village",
  "aoraki mount cook": "Mount Cook Village",
  "mt cook village": "Mount Cook Village",
  "mount cook village": "Mount Cook Village",
};

const optionalText = z.string().nullish();

const geocodeResultSchema = z.object({
  name: optionalText,
  latitude: z.number().nullish(),
  longitude: z.number().nullish(),
  admin1: optionalText,
  admin2: optionalText,
  country: optionalText,
  country_code: optionalText,
  timezone: optionalText,
  population: z.number().nullish(),
});

const geocodePayloadSchema = z.object({
  results: z.array(geocodeResultSchema).optional(),
});

type GeocodeResult = z.infer<typeof geocodeResultSchema>;

export function normalisePlaceQuery(place: string): string {
  const query = place.trim();
  const key = query.toLowerCase().replace(/\./g, "").replace(/’/g, "'");
  return PLACE_ALIASES[key] ?? query;
}

function isInNz(result: GeocodeResult, latitude: number, longitude: number): boolean {
  const countryCode = (result.country_code ?? "").trim().toUpperCase();
  const country = (result.country ?? "").trim();
  if (countryCode === "NZ" || country === "New Zealand") return true;
  return (
    latitude >= NZ_BOUNDS.minLat &&
    latitude <= NZ_BOUNDS.maxLat &&
    longitude >= NZ_BOUNDS.minLon &&
    longitude <= NZ_BOUNDS.maxLon
  );
}

/** Highest population wins; unknown population counts as zero, first result on ties. */
export function pickBestMatch(matches: GeocodeMatch[]): GeocodeMatch | null {
  let best: GeocodeMatch | null = null;
  for (const match of matches) {
    if (!best || (match.population ?? 0) > (best.population ?? 0)) {
      best = match;
    }
  }
  return best;
}

export function createOpenMeteoGeocoder(fetchWithTimeout: FetchWithTimeout, countryCode = "NZ"): Geocoder {
  async function search(query: string, count: number): Promise<GeocodeMatch[]> {
    const url =
      `${OPEN_METEO_GEOCODE_URL}?` +
      new URLSearchParams({
        name: query,
        count: String(count),
        language: "en",
        format: "json",
        country_code: countryCode,
      });

    let payload: unknown;
    try {
      const response = await fetchWithTimeout(url, { headers: DEFAULT_FETCH_HEADERS });
      if (!response.ok) {
        throw new Error(`Open-Meteo geocoding failed with status ${response.status}`);
      }
      payload = await response.json();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new UpstreamError("geocoding", `Geocoding service error: ${reason}`, { cause: error });
    }

    const parsed = geocodePayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UpstreamError("geocoding", "Unexpected response from the geocoding service");
    }

    const out: GeocodeMatch[] = [];
    for (const result of parsed.data.results ?? []) {
      const { name, latitude, longitude } = result;
      if (latitude == null || longitude == null || !name) continue;
      if (!isInNz(result, latitude, longitude)) continue;

      out.push({
        name,
        latitude,
        longitude,
        admin1: result.admin1 ?? null,
        admin2: result.admin2 ?? null,
        country: result.country ?? null,
        country_code: result.country_code ?? null,
        timezone: result.timezone ?? null,
        population: result.population ?? null,
      });
    }
    return out;
  }

  return {
    async geocodeOne(place) {
      const raw = place.trim();
      if (!raw) throw new InputError("Place name is empty");

      const query = normalisePlaceQuery(raw);
      let matches = await search(query, 10);

      if (matches.length === 0 && !query.includes(",")) {
        matches = await search(`${query}, ${countryCode}`, 10);
      }

      const best = pickBestMatch(matches);
      if (!best) {
        throw new LocationNotFoundError(`No ${countryCode} match found for '${place}'`);
      }
      return best;
    },
  };
}

/** Use the given coordinates when both are present, otherwise geocode the name. */
export async function resolveLocation(geocoder: Geocoder, location: Location): Promise<ResolvedLocation> {
  if (location.latitude != null && location.longitude != null) {
    return { name: location.name, latitude: location.latitude, longitude: location.longitude };
  }

  const name = location.name.trim();
  if (!name) throw new InputError("Location name is required.");

  const hit = await geocoder.geocodeOne(name);
  return { name: hit.name || name, latitude: hit.latitude, longitude: hit.longitude };
}
