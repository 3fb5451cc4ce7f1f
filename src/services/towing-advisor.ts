import { InputError } from "../errors";
import type {
  CaravanSpec,
  ExtrasSpec,
  MotorhomeSpec,
  OverallStatus,
  RigType,
  RiskColour,
  TowingCheck,
  VehicleSpec,
} from "../types";
import { roundTo } from "../utils/units";
import { lookupCaravan, lookupVehicle, type ReferenceCatalog } from "./reference-catalog";
import {
  buildAdvice,
  evaluateCaravanChecks,
  evaluateMotorhomeChecks,
  overallStatus,
  type AdviceBlock,
} from "./towing-checks";

export type TowingAdvisorRequest = {
  rig_type: RigType;
  vehicle?: VehicleSpec | null;
  caravan?: CaravanSpec | null;
  motorhome?: MotorhomeSpec | null;
  extras?: ExtrasSpec | null;

  use_vehicle_lookup?: boolean | null;
  vehicle_make?: string | null;
  vehicle_model?: string | null;
  vehicle_year?: number | null;
  vehicle_variant?: string | null;

  use_caravan_lookup?: boolean | null;
  caravan_brand?: string | null;
  caravan_model?: string | null;
  caravan_length_category?: string | null;
};

export type LookupEcho = {
  used: true;
  match_id: string | null;
  match_confidence: string;
} & Record<string, string | number | boolean | null>;

export type TowingAdvisorResponse = {
  status: OverallStatus;
  risk_colour: RiskColour;
  ball_weight_percent_of_atm: number | null;
  ball_weight_percent_of_loaded: number | null;
  checks: TowingCheck[];
  advice: AdviceBlock;
  inputs_echo: Record<string, unknown>;
  disclaimer: string;
};

const CARAVAN_DISCLAIMER =
  "This is general guidance only based on the numbers you entered and typical towing advice. " +
  "It may not reflect the exact limits of your specific vehicle, caravan, year or model. Always " +
  "check your owner’s manuals, compliance plates and local regulations, and use a certified " +
  "weighbridge if in doubt.";

const MOTORHOME_DISCLAIMER =
  "This is general guidance only based on the numbers you entered and typical motorhome loading " +
  "advice. It may not reflect the exact limits of your specific chassis, conversion or model. " +
  "Always check compliance plates, manuals and local regulations, and use a certified " +
  "weighbridge if in doubt.";

const pct = (value: number | null) => (value == null ? null : roundTo(value, 2));

/* ── Lookup merge ── */

/** Copy lookup figures into the fields the user left empty; user figures always win. */
function fillVehicle(vehicle: VehicleSpec | null | undefined, hit: VehicleSpec): VehicleSpec {
  if (!vehicle) return hit;
  return {
    ...vehicle,
    tow_rating_braked_kg: vehicle.tow_rating_braked_kg ?? hit.tow_rating_braked_kg,
    max_ball_weight_kg: vehicle.max_ball_weight_kg ?? hit.max_ball_weight_kg,
    notes: vehicle.notes ?? hit.notes,
  };
}

function fillCaravan(caravan: CaravanSpec | null | undefined, hit: CaravanSpec): CaravanSpec {
  if (!caravan) return hit;
  return {
    ...caravan,
    atm_kg: caravan.atm_kg ?? hit.atm_kg,
    axle_rating_kg: caravan.axle_rating_kg ?? hit.axle_rating_kg,
  };
}

export function applyVehicleLookup(
  request: TowingAdvisorRequest,
  catalog: ReferenceCatalog
): { vehicle: VehicleSpec | null; echo: LookupEcho | null } {
  const vehicle = request.vehicle ?? null;
  const { vehicle_make: make, vehicle_model: model } = request;
  if (!request.use_vehicle_lookup || !make || !model) return { vehicle, echo: null };

  const [match] = lookupVehicle(catalog, make, model, request.vehicle_year, request.vehicle_variant);
  const base = {
    used: true as const,
    make,
    model,
    year: request.vehicle_year ?? null,
    variant: request.vehicle_variant ?? null,
  };

  if (!match) {
    return { vehicle, echo: { ...base, match_id: null, match_confidence: "none" } };
  }

  return {
    vehicle: fillVehicle(vehicle, {
      label: `${match.year_range} ${match.make} ${match.model}`.trim(),
      tow_rating_braked_kg: match.braked_tow_capacity_kg,
      max_ball_weight_kg: match.max_ball_weight_kg,
      notes: match.notes,
    }),
    echo: { ...base, match_id: match.vehicle_id, match_confidence: match.confidence },
  };
}

export function applyCaravanLookup(
  request: TowingAdvisorRequest,
  catalog: ReferenceCatalog
): { caravan: CaravanSpec | null; echo: LookupEcho | null } {
  const caravan = request.caravan ?? null;
  const { caravan_brand: brand, caravan_model: model } = request;
  if (!request.use_caravan_lookup || !brand || !model) return { caravan, echo: null };

  const [match] = lookupCaravan(catalog, brand, model, request.caravan_length_category);
  const base = {
    used: true as const,
    brand,
    model,
    length_category: request.caravan_length_category ?? null,
  };

  if (!match) {
    return { caravan, echo: { ...base, match_id: null, match_confidence: "none" } };
  }

  return {
    caravan: fillCaravan(caravan, {
      label: `${match.brand} ${match.model}`.trim(),
      atm_kg: match.atm_kg,
      loaded_estimate_kg: null,
      ball_weight_kg: null,
      axle_rating_kg: match.axle_rating_kg,
    }),
    echo: { ...base, match_id: match.caravan_id, match_confidence: match.confidence },
  };
}

/* ── Entry point ── */

/**
 * Towing and loading advice for a rig. A towed caravan needs both a vehicle
 * and a caravan (directly or via lookups); motorhomes and campervans need a
 * motorhome block. Missing figures degrade individual checks to `unknown`.
 */
export function evaluateTowing(request: TowingAdvisorRequest, catalog: ReferenceCatalog): TowingAdvisorResponse {
  const extras: ExtrasSpec = request.extras ?? {};

  if (request.rig_type === "towed_caravan") {
    const vehicleLookup = applyVehicleLookup(request, catalog);
    const caravanLookup = applyCaravanLookup(request, catalog);
    const { vehicle } = vehicleLookup;
    const { caravan } = caravanLookup;

    if (!vehicle || !caravan) {
      throw new InputError(
        "For 'towed_caravan' you must provide both 'vehicle' and 'caravan' blocks, " +
          "or use the lookup hints so they can be filled in."
      );
    }

    const { checks, ballAtmPct, ballLoadedPct } = evaluateCaravanChecks(vehicle, caravan, extras);
    const { status, colour } = overallStatus(checks);

    return {
      status,
      risk_colour: colour,
      ball_weight_percent_of_atm: pct(ballAtmPct),
      ball_weight_percent_of_loaded: pct(ballLoadedPct),
      checks,
      advice: buildAdvice(status, checks),
      inputs_echo: {
        rig_type: request.rig_type,
        vehicle,
        caravan,
        motorhome: request.motorhome ?? null,
        extras,
        vehicle_lookup: vehicleLookup.echo,
        caravan_lookup: caravanLookup.echo,
      },
      disclaimer: CARAVAN_DISCLAIMER,
    };
  }

  const { motorhome } = request;
  if (!motorhome) {
    throw new InputError(`For '${request.rig_type}' you must provide a 'motorhome' block.`);
  }

  const checks = evaluateMotorhomeChecks(motorhome, extras);
  const { status, colour } = overallStatus(checks);

  return {
    status,
    risk_colour: colour,
    ball_weight_percent_of_atm: null,
    ball_weight_percent_of_loaded: null,
    checks,
    advice: buildAdvice(status, checks),
    inputs_echo: {
      rig_type: request.rig_type,
      vehicle: request.vehicle ?? null,
      caravan: request.caravan ?? null,
      motorhome,
      extras,
    },
    disclaimer: MOTORHOME_DISCLAIMER,
  };
}
