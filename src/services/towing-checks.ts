import type {
  CaravanSpec,
  CheckStatus,
  ExtrasSpec,
  MotorhomeSpec,
  OverallStatus,
  RiskColour,
  TowingCheck,
  VehicleSpec,
} from "../types";

export type AdviceBlock = {
  summary: string;
  detailed: string[];
};

export type BallWeightResult = {
  check: TowingCheck;
  ballAtmPct: number | null;
  ballLoadedPct: number | null;
};

export const EBIKE_KG = 27;

const NEAR_LIMIT_RATIO = 0.9;

const kg = (value: number) => `${value.toFixed(0)} kg`;

/* ── Shared ── */

/** Declared rear load plus e-bikes; missing figures count as nothing on the rack. */
export function totalRearLoadKg(extras: ExtrasSpec): number {
  let rearLoad = extras.rear_load_kg ?? 0;
  if (extras.num_ebikes) {
    rearLoad += extras.num_ebikes * EBIKE_KG;
  }
  return rearLoad;
}

function bandAgainstLimit(actual: number, limit: number): Exclude<CheckStatus, "unknown"> {
  if (actual > limit) return "over_limit";
  if (actual >= NEAR_LIMIT_RATIO * limit) return "near_limit";
  return "ok";
}

/* ── Towed caravan ── */

export function checkTowRating(vehicle: VehicleSpec, caravan: CaravanSpec): TowingCheck {
  const rating = vehicle.tow_rating_braked_kg;
  if (rating == null) {
    return {
      item: "tow_rating",
      status: "unknown",
      detail:
        "No braked tow rating provided for the vehicle. Check your handbook or " +
        "compliance plate and update these numbers.",
    };
  }

  const vanWeight = caravan.loaded_estimate_kg ?? caravan.atm_kg;
  if (vanWeight == null) {
    return {
      item: "tow_rating",
      status: "unknown",
      detail:
        "No caravan loaded weight or ATM provided, so it's not possible to " +
        "compare against your vehicle's tow rating.",
    };
  }

  const status = bandAgainstLimit(vanWeight, rating);
  const details: Record<typeof status, string> = {
    over_limit:
      `Your estimated caravan weight (${kg(vanWeight)}) appears to be over your vehicle's ` +
      `braked tow rating (${kg(rating)}). Treat this as a red flag and get proper weights ` +
      "and advice before towing.",
    near_limit:
      `Your estimated caravan weight (${kg(vanWeight)}) is close to your vehicle's braked ` +
      `tow rating (${kg(rating)}). Allow very little margin for extra gear and aim to get weighed.`,
    ok:
      `On the numbers provided, your caravan weight (${kg(vanWeight)}) is under your vehicle's ` +
      `braked tow rating (${kg(rating)}). Still worth confirming with a weighbridge when you can.`,
  };
  return { item: "tow_rating", status, detail: details[status] };
}

/** Percentage of `base`, or null when either figure is missing or the base is not positive. */
function percentOf(part: number | null | undefined, base: number | null | undefined): number | null {
  if (part == null || base == null || base <= 0) return null;
  return (part / base) * 100;
}

export function checkBallWeight(caravan: CaravanSpec, vehicle: VehicleSpec): BallWeightResult {
  const ball = caravan.ball_weight_kg;
  const loaded = caravan.loaded_estimate_kg ?? caravan.atm_kg;

  const ballAtmPct = percentOf(ball, caravan.atm_kg);
  const ballLoadedPct = percentOf(ball, loaded);
  const effectivePct = ballLoadedPct ?? ballAtmPct;

  if (ball == null || effectivePct == null) {
    return {
      check: {
        item: "ball_weight",
        status: "unknown",
        detail:
          "No usable ball weight or caravan weight provided, so it's not possible to comment " +
          "on ball weight percentage. A common rule of thumb is around 8–12% of loaded caravan " +
          "weight on the ball.",
      },
      ballAtmPct,
      ballLoadedPct,
    };
  }

  const ballLimit = vehicle.max_ball_weight_kg;
  if (ballLimit != null && ball > ballLimit) {
    return {
      check: {
        item: "ball_weight",
        status: "over_limit",
        detail:
          `Measured ball weight (${kg(ball)}) appears to be over your towbar/vehicle ball limit ` +
          `(${kg(ballLimit)}). This is outside safe and legal guidance — re-check loading and ` +
          "weights before towing.",
      },
      ballAtmPct,
      ballLoadedPct,
    };
  }

  const pct = effectivePct.toFixed(1);
  let check: TowingCheck;
  if (effectivePct >= 8 && effectivePct <= 12) {
    check = {
      item: "ball_weight",
      status: "ok",
      detail:
        `Ball weight is about ${pct}% of caravan weight, which is within the common guidance ` +
        "band of around 8–12% for many rigs.",
    };
  } else if ((effectivePct >= 6 && effectivePct < 8) || (effectivePct > 12 && effectivePct <= 14)) {
    check = {
      item: "ball_weight",
      status: "near_limit",
      detail:
        `Ball weight is about ${pct}% of caravan weight, which is on the edge of common guidance. ` +
        "Too low can encourage sway; too high can overload the towbar and rear axle.",
    };
  } else {
    check = {
      item: "ball_weight",
      status: "over_limit",
      detail:
        `Ball weight is about ${pct}% of caravan weight, which is well outside the common 8–12% ` +
        "guidance band. Very low ball weight often leads to sway, while very high ball weight " +
        "can overload the towbar and rear axle.",
    };
  }

  return { check, ballAtmPct, ballLoadedPct };
}

/** Omitted entirely when nothing is carried at the rear. */
export function checkCaravanRearLoad(extras: ExtrasSpec): TowingCheck | null {
  const rearLoad = totalRearLoadKg(extras);
  if (rearLoad <= 0) return null;

  if (rearLoad >= 100) {
    return {
      item: "rear_load",
      status: "over_limit",
      detail:
        `There's a lot of weight hanging off the rear of the caravan (roughly ${kg(rearLoad)} ` +
        "including bikes and racks). Heavy rear loads reduce effective ball weight and can make " +
        "sway much more likely, especially in crosswinds or emergency manoeuvres.",
    };
  }
  if (rearLoad >= 50) {
    return {
      item: "rear_load",
      status: "near_limit",
      detail:
        `There's a significant amount of weight on the rear of the caravan (around ${kg(rearLoad)}). ` +
        "Rear-mounted bikes and boxes tend to reduce effective ball weight and increase sway risk.",
    };
  }
  return {
    item: "rear_load",
    status: "ok",
    detail:
      `There's some weight on the rear of the caravan (about ${kg(rearLoad)}). Even modest rear ` +
      "loads can affect stability, so it's still worth checking ball weight and how the rig " +
      "feels on the road.",
  };
}

/** Front extra mass in kg; a front water tank counts litre for kilogram. */
export function frontExtraKg(extras: ExtrasSpec): number {
  return extras.front_extra_kg ?? extras.water_front_tank_litres ?? 0;
}

/**
 * Only produced when heavy front storage is flagged or extra front mass is
 * declared. Never `ok`: weight ahead of the axle is always a caution.
 */
export function checkFrontLoad(
  caravan: CaravanSpec,
  vehicle: VehicleSpec,
  extras: ExtrasSpec,
  ballAtmPct: number | null
): TowingCheck | null {
  const frontExtra = frontExtraKg(extras);
  if (!extras.front_storage_heavy && frontExtra <= 0) return null;

  const ball = caravan.ball_weight_kg;
  const ballLimit = vehicle.max_ball_weight_kg;
  const reasons: string[] = [];
  let status: CheckStatus;

  if (ball != null && ballLimit != null && ball > ballLimit) {
    status = "over_limit";
    reasons.push(
      `Measured ball weight (${kg(ball)}) already appears to exceed your towbar/vehicle ball limit (${kg(ballLimit)}).`
    );
  } else if (ballAtmPct != null && ballAtmPct > 12) {
    status = "near_limit";
    reasons.push(
      `Ball weight is already on the high side at about ${ballAtmPct.toFixed(1)}% of ATM. ` +
        "Extra weight at the front tends to push this even higher."
    );
  } else {
    status = "near_limit";
    reasons.push(
      "Extra load mounted towards the front of the van tends to increase ball weight and put " +
        "more load into the towbar and rear axle."
    );
  }

  if (frontExtra > 0) {
    reasons.push(`There's roughly ${kg(frontExtra)} of additional gear mounted towards the front.`);
  }

  return {
    item: "front_load",
    status,
    detail:
      reasons.join(" ") +
      " Extra mass at the front (toolboxes, gas bottles, generators, bikes on the drawbar) " +
      "increases ball weight and loads up the towbar and rear axle. If the ball weight is already " +
      "on the high side, adding more at the front can push the setup outside safe limits. Always " +
      "re-check ball weight after adding or moving front-mounted gear.",
  };
}

/* ── Motorhome / campervan ── */

export function checkCombinedMass(motorhome: MotorhomeSpec): TowingCheck {
  const gvm = motorhome.gvm_kg;
  const actual = motorhome.current_weight_kg;

  if (gvm == null || actual == null) {
    return {
      item: "combined_mass",
      status: "unknown",
      detail:
        "No usable GVM and current weight provided, so it's not possible to comment on how " +
        "heavily loaded the motorhome is. A certified weighbridge is the best way to confirm " +
        "you're within limits.",
    };
  }

  const status = bandAgainstLimit(actual, gvm);
  const details: Record<typeof status, string> = {
    over_limit:
      `Your measured motorhome weight (${kg(actual)}) appears to be over its GVM (${kg(gvm)}). ` +
      "Treat this as a red flag and get proper weights and advice before travelling.",
    near_limit:
      `Your measured motorhome weight (${kg(actual)}) is close to its GVM (${kg(gvm)}). ` +
      "You have very little margin for extra gear, water or passengers.",
    ok:
      `On the numbers provided, your motorhome weight (${kg(actual)}) is under its GVM ` +
      `(${kg(gvm)}). Still worth confirming on a weighbridge from time to time.`,
  };
  return { item: "combined_mass", status, detail: details[status] };
}

/** Omitted when either the rating or the measured load is missing. */
export function checkAxle(
  axle: "front" | "rear",
  rating: number | null | undefined,
  actual: number | null | undefined
): TowingCheck | null {
  if (rating == null || actual == null) return null;

  const status = bandAgainstLimit(actual, rating);
  const details: Record<typeof status, string> = {
    over_limit:
      `The ${axle} axle appears to be over its rated load (${kg(actual)} vs ${kg(rating)}). ` +
      "This is a red flag for handling, tyre life and legal compliance.",
    near_limit:
      `The ${axle} axle is close to its rated load (${kg(actual)} vs ${kg(rating)}). ` +
      "You have very little margin for extra gear at that end of the vehicle.",
    ok: `The ${axle} axle load (${kg(actual)}) is under its rated limit (${kg(rating)}) on the numbers provided.`,
  };
  return { item: "axle_rating", status, detail: details[status] };
}

/** Needs both an overhang figure and some rear load; otherwise no check at all. */
export function checkMotorhomeRearLoad(motorhome: MotorhomeSpec, extras: ExtrasSpec): TowingCheck | null {
  const overhang = motorhome.rear_overhang_m;
  const rearLoad = totalRearLoadKg(extras);
  if (overhang == null || rearLoad <= 0) return null;

  if (overhang >= 2.0 && rearLoad >= 60) {
    return {
      item: "rear_load",
      status: "near_limit",
      detail:
        `There's a fair amount of weight (around ${kg(rearLoad)}) hanging off the rear with an ` +
        `overhang of about ${overhang.toFixed(1)} m. This adds a lot of leverage to the rear axle ` +
        "and can affect handling in crosswinds or on rough roads.",
    };
  }
  return {
    item: "rear_load",
    status: "ok",
    detail:
      `There's some weight (around ${kg(rearLoad)}) mounted at the rear. Even modest rear loads on ` +
      "a motorhome can change how it feels on the road, so pay attention to how it drives and " +
      "adjust if it feels light in the front.",
  };
}

/* ── Verdict ── */

export function overallStatus(checks: TowingCheck[]): { status: OverallStatus; colour: RiskColour } {
  if (checks.some((c) => c.status === "over_limit")) return { status: "over_limits", colour: "red" };
  if (checks.some((c) => c.status === "near_limit")) return { status: "near_limits", colour: "amber" };
  if (checks.some((c) => c.status === "ok")) return { status: "ok", colour: "green" };
  return { status: "unknown", colour: "grey" };
}

const ADVICE_SUMMARIES: Record<OverallStatus, string> = {
  over_limits:
    "On the numbers you've given, this setup should be treated as a red flag until you've " +
    "confirmed actual weights and limits.",
  near_limits:
    "You're close to common limits in a few areas. Treat this as a caution and double-check " +
    "weights before long trips or challenging routes.",
  ok:
    "On the numbers you've given, your setup looks broadly within common guidance, but it's " +
    "still worth confirming with a weighbridge.",
  unknown:
    "There wasn't enough information to give a firm view. Providing tow ratings, ball weight " +
    "and caravan weight will improve this advice.",
};

export const WEIGHBRIDGE_ADMONITION =
  "Before travelling long distances, get weights measured on a certified weighbridge and review " +
  "your manufacturer's limits. Consider shifting heavy items forward or redistributing load " +
  "where appropriate.";

export function buildAdvice(status: OverallStatus, checks: TowingCheck[]): AdviceBlock {
  const detailed = checks.map((c) => c.detail);
  if (status === "over_limits" || status === "near_limits") {
    detailed.push(WEIGHBRIDGE_ADMONITION);
  }
  return { summary: ADVICE_SUMMARIES[status], detailed };
}

/* ── Rule sets ── */

export function evaluateCaravanChecks(
  vehicle: VehicleSpec,
  caravan: CaravanSpec,
  extras: ExtrasSpec
): { checks: TowingCheck[]; ballAtmPct: number | null; ballLoadedPct: number | null } {
  const checks: TowingCheck[] = [checkTowRating(vehicle, caravan)];

  const ball = checkBallWeight(caravan, vehicle);
  checks.push(ball.check);

  const rear = checkCaravanRearLoad(extras);
  if (rear) checks.push(rear);

  const front = checkFrontLoad(caravan, vehicle, extras, ball.ballAtmPct);
  if (front) checks.push(front);

  return { checks, ballAtmPct: ball.ballAtmPct, ballLoadedPct: ball.ballLoadedPct };
}

export function evaluateMotorhomeChecks(motorhome: MotorhomeSpec, extras: ExtrasSpec): TowingCheck[] {
  const checks: TowingCheck[] = [checkCombinedMass(motorhome)];

  for (const axle of [
    checkAxle("front", motorhome.front_axle_rating_kg, motorhome.front_axle_actual_kg),
    checkAxle("rear", motorhome.rear_axle_rating_kg, motorhome.rear_axle_actual_kg),
  ]) {
    if (axle) checks.push(axle);
  }

  const rear = checkMotorhomeRearLoad(motorhome, extras);
  if (rear) checks.push(rear);

  return checks;
}
