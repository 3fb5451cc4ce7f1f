import { Router } from "express";
import { z } from "zod";
import { lookupVehicle, type ReferenceCatalog } from "../services/reference-catalog";
import { sendRouteError } from "../utils/http-errors";

const vehicleLookupQuerySchema = z.object({
  make: z.string().trim().min(1),
  model: z.string().trim().min(1),
  year: z.coerce.number().int().min(1950).max(2100).optional(),
  variant: z.string().optional(),
});

export type VehicleRouterDeps = {
  catalog: ReferenceCatalog;
};

function vehicleLookupMessage(matchCount: number): string {
  if (matchCount === 0) {
    return (
      "No exact match found in the vehicle guide. " +
      "Use your compliance plate and handbook to enter tow limits and ball weight manually."
    );
  }
  if (matchCount === 1) {
    return "Found one likely match. Treat these numbers as a starting point only.";
  }
  return (
    "Found a few possible matches. Pick the closest one to your rig, " +
    "and always double-check against the plates and handbook."
  );
}

export function createVehicleRouter({ catalog }: VehicleRouterDeps) {
  const router = Router();

  router.get("/lookup", (req, res) => {
    try {
      const query = vehicleLookupQuerySchema.parse(req.query);
      const matches = lookupVehicle(catalog, query.make, query.model, query.year, query.variant);

      return res.json({ matches, message: vehicleLookupMessage(matches.length) });
    } catch (error) {
      return sendRouteError(res, error, "vehicle", "Vehicle lookup failed");
    }
  });

  return router;
}
