import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { UpstreamError } from "../errors";
import type { CaravanInfo, VehicleInfo } from "../types";
import type { StopCandidate } from "./alternatives";

/* ── File schemas ── */

const num = z.number().nullish();
const text = z.string().nullish();

const vehicleRecordSchema = z.object({
  id: z.string(),
  make: z.string(),
  model: z.string(),
  year_range: text,
  variant: text,
  country_region: text,
  braked_tow_capacity_kg: num,
  unbraked_tow_capacity_kg: num,
  max_ball_weight_kg: num,
  gvm_kg: num,
  gcm_kg: num,
  confidence: text,
  notes: text,
});

const caravanRecordSchema = z.object({
  id: z.string(),
  brand: z.string(),
  model: z.string(),
  variant: text,
  length_category: text,
  country_region: text,
  atm_kg: num,
  tare_kg: num,
  axle_rating_kg: num,
  ball_weight_empty_kg: num,
  typical_ball_loaded_pct_min: num,
  typical_ball_loaded_pct_max: num,
  confidence: text,
  notes: text,
});

const stopSchema = z.object({
  name: z.string().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

const vehiclesFileSchema = z.object({ vehicles: z.array(vehicleRecordSchema) });
const caravansFileSchema = z.object({ caravans: z.array(caravanRecordSchema) });
const stopsFileSchema = z.object({ stops: z.array(stopSchema) });

/* ── Catalog ── */

export type ReferenceCatalog = {
  readonly vehicles: readonly VehicleInfo[];
  readonly caravans: readonly CaravanInfo[];
  readonly stops: readonly StopCandidate[];
};

const DEFAULT_VEHICLE_NOTES = "Use as a rough guide only. Always check your vehicle plates and handbook.";

function toVehicleInfo(rec: z.infer<typeof vehicleRecordSchema>): VehicleInfo {
  return {
    vehicle_id: rec.id,
    make: rec.make,
    model: rec.model,
    year_range: rec.year_range ?? "",
    variant: rec.variant ?? "",
    country_region: rec.country_region ?? null,
    braked_tow_capacity_kg: rec.braked_tow_capacity_kg ?? null,
    unbraked_tow_capacity_kg: rec.unbraked_tow_capacity_kg ?? null,
    max_ball_weight_kg: rec.max_ball_weight_kg ?? null,
    gvm_kg: rec.gvm_kg ?? null,
    gcm_kg: rec.gcm_kg ?? null,
    confidence: rec.confidence ?? "low",
    notes: rec.notes ?? DEFAULT_VEHICLE_NOTES,
  };
}

function toCaravanInfo(rec: z.infer<typeof caravanRecordSchema>): CaravanInfo {
  return {
    caravan_id: rec.id,
    brand: rec.brand,
    model: rec.model,
    variant: rec.variant ?? null,
    length_category: rec.length_category ?? null,
    country_region: rec.country_region ?? null,
    atm_kg: rec.atm_kg ?? null,
    tare_kg: rec.tare_kg ?? null,
    axle_rating_kg: rec.axle_rating_kg ?? null,
    ball_weight_empty_kg: rec.ball_weight_empty_kg ?? null,
    typical_ball_loaded_pct_min: rec.typical_ball_loaded_pct_min ?? null,
    typical_ball_loaded_pct_max: rec.typical_ball_loaded_pct_max ?? null,
    confidence: rec.confidence ?? "low",
    notes: rec.notes ?? null,
  };
}

/** Freeze the records and the arrays holding them. */
export function createReferenceCatalog(input: {
  vehicles: VehicleInfo[];
  caravans: CaravanInfo[];
  stops: StopCandidate[];
}): ReferenceCatalog {
  return Object.freeze({
    vehicles: Object.freeze(input.vehicles.map((v) => Object.freeze({ ...v }))),
    caravans: Object.freeze(input.caravans.map((c) => Object.freeze({ ...c }))),
    stops: Object.freeze(input.stops.map((s) => Object.freeze({ ...s }))),
  });
}

function readJsonFile<T>(filePath: string, schema: z.ZodType<T>): T {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new UpstreamError("reference-data", `Could not read ${path.basename(filePath)}`, { cause: error });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new UpstreamError("reference-data", `Invalid ${path.basename(filePath)} format: ${parsed.error.message}`);
  }
  return parsed.data;
}

/** Read the JSON tables once; the result is shared read-only for the process lifetime. */
export function loadReferenceCatalog(dataDir: string): ReferenceCatalog {
  const { vehicles } = readJsonFile(path.join(dataDir, "vehicles.json"), vehiclesFileSchema);
  const { caravans } = readJsonFile(path.join(dataDir, "caravans.json"), caravansFileSchema);
  const { stops } = readJsonFile(path.join(dataDir, "alternative-stops.json"), stopsFileSchema);

  console.log(
    `[catalog] Loaded ${vehicles.length} vehicles, ${caravans.length} caravans, ${stops.length} alternative stops`
  );

  return createReferenceCatalog({
    vehicles: vehicles.map(toVehicleInfo),
    caravans: caravans.map(toCaravanInfo),
    stops,
  });
}

/* ── Lookups ── */

const normalise = (value: string | null | undefined) => (value ?? "").trim().toLowerCase();

function yearInRange(year: number, yearRange: string): boolean {
  const match = /^\s*(\d{4})\s*-\s*(\d{4})\s*$/.exec(yearRange);
  if (!match) return true; // unparsable range: ignore the year
  return Number(match[1]) <= year && year <= Number(match[2]);
}

/**
 * Make and model match case-insensitively as substrings. A year must fall
 * inside the record's range when that range parses. Variant never filters;
 * records whose variant contains it are listed first.
 */
export function lookupVehicle(
  catalog: ReferenceCatalog,
  make: string,
  model: string,
  year?: number | null,
  variant?: string | null
): VehicleInfo[] {
  const makeQ = normalise(make);
  const modelQ = normalise(model);
  if (!makeQ || !modelQ) return [];

  const matches = catalog.vehicles.filter((v) => {
    if (!normalise(v.make).includes(makeQ)) return false;
    if (!normalise(v.model).includes(modelQ)) return false;
    if (year != null && !yearInRange(year, v.year_range)) return false;
    return true;
  });

  const variantQ = normalise(variant);
  if (!variantQ) return matches;
  const rank = (v: VehicleInfo) => (normalise(v.variant).includes(variantQ) ? 0 : 1);
  return matches.sort((a, b) => rank(a) - rank(b));
}

const digitsOf = (value: string) => value.replace(/\D/g, "");

/**
 * Brand and model match case-insensitively as substrings. Length is fuzzy:
 * "19ft", "19" and "19-20ft" all match "19-20 ft".
 */
export function lookupCaravan(
  catalog: ReferenceCatalog,
  brand: string,
  model: string,
  lengthCategory?: string | null
): CaravanInfo[] {
  const brandQ = normalise(brand);
  const modelQ = normalise(model);
  if (!brandQ || !modelQ) return [];

  const wantedDigits = digitsOf(normalise(lengthCategory));

  return catalog.caravans.filter((c) => {
    if (!normalise(c.brand).includes(brandQ)) return false;
    if (!normalise(c.model).includes(modelQ)) return false;
    if (wantedDigits && !digitsOf(normalise(c.length_category)).includes(wantedDigits)) return false;
    return true;
  });
}
