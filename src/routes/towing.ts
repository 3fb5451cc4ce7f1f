import { Router } from "express";
import { z } from "zod";
import type { ReferenceCatalog } from "../services/reference-catalog";
import { evaluateTowing } from "../services/towing-advisor";
import { sendRouteError } from "../utils/http-errors";

const kg = z.number().min(0).nullish();

const vehicleSchema = z.object({
  label: z.string(),
  tow_rating_braked_kg: kg,
  max_ball_weight_kg: kg,
  notes: z.string().nullish(),
});

const caravanSchema = z.object({
  label: z.string(),
  atm_kg: kg,
  loaded_estimate_kg: kg,
  ball_weight_kg: kg,
  axle_rating_kg: kg,
});

const motorhomeSchema = z.object({
  label: z.string(),
  gvm_kg: kg,
  current_weight_kg: kg,
  front_axle_rating_kg: kg,
  rear_axle_rating_kg: kg,
  front_axle_actual_kg: kg,
  rear_axle_actual_kg: kg,
  rear_overhang_m: z.number().min(0).nullish(),
});

const extrasSchema = z.object({
  rear_load_kg: kg,
  num_ebikes: z.number().int().min(0).nullish(),
  front_storage_heavy: z.boolean().nullish(),
  front_extra_kg: kg,
  water_front_tank_litres: z.number().min(0).nullish(),
  water_rear_tank_litres: z.number().min(0).nullish(),
  notes: z.string().nullish(),
});

const towingRequestSchema = z.object({
  rig_type: z.enum(["towed_caravan", "motorhome", "campervan"]),
  vehicle: vehicleSchema.nullish(),
  caravan: caravanSchema.nullish(),
  motorhome: motorhomeSchema.nullish(),
  extras: extrasSchema.nullish(),

  use_vehicle_lookup: z.boolean().nullish(),
  vehicle_make: z.string().nullish(),
  vehicle_model: z.string().nullish(),
  vehicle_year: z.number().int().nullish(),
  vehicle_variant: z.string().nullish(),

  use_caravan_lookup: z.boolean().nullish(),
  caravan_brand: z.string().nullish(),
  caravan_model: z.string().nullish(),
  caravan_length_category: z.string().nullish(),
});

export type TowingRouterDeps = {
  catalog: ReferenceCatalog;
};

export function createTowingRouter({ catalog }: TowingRouterDeps) {
  const router = Router();

  router.post("/evaluate", (req, res) => {
    try {
      const body = towingRequestSchema.parse(req.body);
      const result = evaluateTowing(body, catalog);
      console.log(`[towing] ${body.rig_type} evaluated: ${result.status}`);
      return res.json(result);
    } catch (error) {
      return sendRouteError(res, error, "towing", "Towing evaluation failed");
    }
  });

  return router;
}
