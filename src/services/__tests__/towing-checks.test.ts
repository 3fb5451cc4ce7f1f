import { describe, it, expect } from "vitest";
import type { TowingCheck } from "../../types";
import {
  WEIGHBRIDGE_ADMONITION,
  buildAdvice,
  checkAxle,
  checkBallWeight,
  checkCaravanRearLoad,
  checkCombinedMass,
  checkFrontLoad,
  checkMotorhomeRearLoad,
  checkTowRating,
  evaluateCaravanChecks,
  evaluateMotorhomeChecks,
  frontExtraKg,
  overallStatus,
  totalRearLoadKg,
} from "../towing-checks";

const check = (status: TowingCheck["status"]): TowingCheck => ({ item: "tow_rating", status, detail: "" });

describe("checkTowRating", () => {
  const vehicle = { label: "Ute", tow_rating_braked_kg: 3000 };

  it("is unknown without a tow rating", () => {
    expect(checkTowRating({ label: "Car" }, { label: "Van", atm_kg: 1500 }).status).toBe("unknown");
  });

  it("is unknown without any caravan weight", () => {
    const result = checkTowRating(vehicle, { label: "Van" });
    expect(result.status).toBe("unknown");
    expect(result.detail).toBe(
      "No caravan loaded weight or ATM provided, so it's not possible to compare against your vehicle's tow rating."
    );
  });

  it("prefers the loaded estimate over ATM", () => {
    expect(checkTowRating(vehicle, { label: "Van", atm_kg: 3200, loaded_estimate_kg: 2500 }).status).toBe("ok");
  });

  it("bands against 90% of the rating", () => {
    expect(checkTowRating(vehicle, { label: "Van", atm_kg: 2699 }).status).toBe("ok");
    expect(checkTowRating(vehicle, { label: "Van", atm_kg: 2700 }).status).toBe("near_limit");
    expect(checkTowRating(vehicle, { label: "Van", atm_kg: 3000 }).status).toBe("near_limit");
    const over = checkTowRating(vehicle, { label: "Van", atm_kg: 3001 });
    expect(over.status).toBe("over_limit");
    expect(over.detail).toBe(
      "Your estimated caravan weight (3001 kg) appears to be over your vehicle's braked tow rating (3000 kg). " +
        "Treat this as a red flag and get proper weights and advice before towing."
    );
  });
});

describe("checkBallWeight", () => {
  it("is ok at 10% of loaded weight", () => {
    const result = checkBallWeight({ label: "Van", loaded_estimate_kg: 10000, ball_weight_kg: 1000 }, { label: "Ute" });
    expect(result.check.status).toBe("ok");
    expect(result.ballLoadedPct).toBe(10);
    expect(result.ballAtmPct).toBeNull();
  });

  it("is over the limit at 15% of loaded weight", () => {
    const result = checkBallWeight({ label: "Van", loaded_estimate_kg: 10000, ball_weight_kg: 1500 }, { label: "Ute" });
    expect(result.check.status).toBe("over_limit");
    expect(result.check.detail).toBe(
      "Ball weight is about 15.0% of caravan weight, which is well outside the common 8–12% guidance band. " +
        "Very low ball weight often leads to sway, while very high ball weight can overload the towbar and rear axle."
    );
  });

  it("is near the limit just outside the 8–12% band", () => {
    const van = (ball: number) => ({ label: "Van", atm_kg: 2000, ball_weight_kg: ball });
    expect(checkBallWeight(van(130), { label: "Ute" }).check.status).toBe("near_limit"); // 6.5%
    expect(checkBallWeight(van(159), { label: "Ute" }).check.status).toBe("near_limit"); // 7.95%
    expect(checkBallWeight(van(160), { label: "Ute" }).check.status).toBe("ok"); // 8%
    expect(checkBallWeight(van(240), { label: "Ute" }).check.status).toBe("ok"); // 12%
    expect(checkBallWeight(van(270), { label: "Ute" }).check.status).toBe("near_limit"); // 13.5%
    expect(checkBallWeight(van(100), { label: "Ute" }).check.status).toBe("over_limit"); // 5%
  });

  it("is over the limit when the vehicle ball rating is exceeded", () => {
    const result = checkBallWeight(
      { label: "Van", atm_kg: 2000, ball_weight_kg: 200 },
      { label: "SUV", max_ball_weight_kg: 150 }
    );
    expect(result.check.status).toBe("over_limit");
    expect(result.ballAtmPct).toBe(10);
  });

  it("is unknown without a ball weight or a positive base", () => {
    expect(checkBallWeight({ label: "Van", atm_kg: 2000 }, { label: "Ute" }).check.status).toBe("unknown");

    const zeroBase = checkBallWeight({ label: "Van", atm_kg: 0, ball_weight_kg: 100 }, { label: "Ute" });
    expect(zeroBase.check.status).toBe("unknown");
    expect(zeroBase.ballAtmPct).toBeNull();
    expect(zeroBase.ballLoadedPct).toBeNull();
  });
});

describe("rear load", () => {
  it("adds 27 kg per e-bike", () => {
    expect(totalRearLoadKg({ rear_load_kg: 10, num_ebikes: 2 })).toBe(64);
    expect(totalRearLoadKg({})).toBe(0);
  });

  it("bands the caravan rear load and omits it when empty", () => {
    expect(checkCaravanRearLoad({})).toBeNull();
    expect(checkCaravanRearLoad({ rear_load_kg: 49 })?.status).toBe("ok");
    expect(checkCaravanRearLoad({ num_ebikes: 2 })?.status).toBe("near_limit");
    expect(checkCaravanRearLoad({ rear_load_kg: 100 })?.status).toBe("over_limit");
  });
});

describe("checkFrontLoad", () => {
  const van = { label: "Van", atm_kg: 2000, ball_weight_kg: 200 };
  const ute = { label: "Ute", max_ball_weight_kg: 350 };

  it("is omitted without heavy front storage or extra front mass", () => {
    expect(checkFrontLoad(van, ute, {}, 10)).toBeNull();
  });

  it("counts a front water tank litre for kilogram", () => {
    expect(frontExtraKg({ water_front_tank_litres: 80 })).toBe(80);
    expect(frontExtraKg({ front_extra_kg: 40, water_front_tank_litres: 80 })).toBe(40);
  });

  it("is never ok", () => {
    const result = checkFrontLoad(van, ute, { front_storage_heavy: true }, 10);
    expect(result?.status).toBe("near_limit");
    expect(result?.detail.startsWith("Extra load mounted towards the front of the van")).toBe(true);
  });

  it("mentions a high ball percentage and the extra mass", () => {
    const result = checkFrontLoad(van, ute, { front_extra_kg: 45 }, 12.5);
    expect(result?.status).toBe("near_limit");
    const reasons =
      "Ball weight is already on the high side at about 12.5% of ATM. " +
      "Extra weight at the front tends to push this even higher. " +
      "There's roughly 45 kg of additional gear mounted towards the front.";
    expect(result?.detail.startsWith(reasons)).toBe(true);
  });

  it("is over the limit when the ball limit is already exceeded", () => {
    const result = checkFrontLoad(van, { label: "SUV", max_ball_weight_kg: 150 }, { front_storage_heavy: true }, 10);
    expect(result?.status).toBe("over_limit");
  });
});

describe("motorhome checks", () => {
  it("bands the current weight against GVM", () => {
    expect(checkCombinedMass({ label: "MH" }).status).toBe("unknown");
    expect(checkCombinedMass({ label: "MH", gvm_kg: 4500, current_weight_kg: 4000 }).status).toBe("ok");
    expect(checkCombinedMass({ label: "MH", gvm_kg: 4500, current_weight_kg: 4050 }).status).toBe("near_limit");
    expect(checkCombinedMass({ label: "MH", gvm_kg: 4500, current_weight_kg: 4600 }).status).toBe("over_limit");
  });

  it("omits an axle without both figures", () => {
    expect(checkAxle("front", 1800, null)).toBeNull();
    expect(checkAxle("rear", null, 2000)).toBeNull();
    expect(checkAxle("rear", 2500, 2600)).toEqual({
      item: "axle_rating",
      status: "over_limit",
      detail:
        "The rear axle appears to be over its rated load (2600 kg vs 2500 kg). " +
        "This is a red flag for handling, tyre life and legal compliance.",
    });
  });

  it("flags long overhangs carrying 60 kg or more", () => {
    expect(checkMotorhomeRearLoad({ label: "MH" }, { rear_load_kg: 80 })).toBeNull();
    expect(checkMotorhomeRearLoad({ label: "MH", rear_overhang_m: 2.5 }, {})).toBeNull();
    expect(checkMotorhomeRearLoad({ label: "MH", rear_overhang_m: 2.0 }, { rear_load_kg: 60 })?.status).toBe(
      "near_limit"
    );
    expect(checkMotorhomeRearLoad({ label: "MH", rear_overhang_m: 1.9 }, { rear_load_kg: 200 })?.status).toBe("ok");
    expect(checkMotorhomeRearLoad({ label: "MH", rear_overhang_m: 2.4 }, { num_ebikes: 2 })?.status).toBe(
      "ok"
    );
  });

  it("collects combined mass, axles and rear load in order", () => {
    const checks = evaluateMotorhomeChecks(
      {
        label: "MH",
        gvm_kg: 4500,
        current_weight_kg: 4000,
        front_axle_rating_kg: 1800,
        front_axle_actual_kg: 1500,
        rear_axle_rating_kg: 2800,
        rear_axle_actual_kg: 2600,
        rear_overhang_m: 2.2,
      },
      { num_ebikes: 3 }
    );
    expect(checks.map((c) => [c.item, c.status])).toEqual([
      ["combined_mass", "ok"],
      ["axle_rating", "ok"],
      ["axle_rating", "near_limit"],
      ["rear_load", "near_limit"],
    ]);
  });
});

describe("overallStatus", () => {
  it("takes the most severe status", () => {
    expect(overallStatus([check("ok"), check("near_limit"), check("unknown")])).toEqual({
      status: "near_limits",
      colour: "amber",
    });
    expect(overallStatus([check("ok"), check("over_limit")])).toEqual({ status: "over_limits", colour: "red" });
    expect(overallStatus([check("unknown"), check("ok")])).toEqual({ status: "ok", colour: "green" });
  });

  it("is unknown when nothing could be checked", () => {
    expect(overallStatus([check("unknown")])).toEqual({ status: "unknown", colour: "grey" });
    expect(overallStatus([])).toEqual({ status: "unknown", colour: "grey" });
  });
});

describe("buildAdvice", () => {
  it("adds the weighbridge reminder only for near or over limits", () => {
    const checks = [{ item: "tow_rating" as const, status: "near_limit" as const, detail: "Close." }];
    expect(buildAdvice("near_limits", checks).detailed).toEqual(["Close.", WEIGHBRIDGE_ADMONITION]);
    expect(buildAdvice("ok", [check("ok")]).detailed).toEqual([""]);
  });
});

describe("evaluateCaravanChecks", () => {
  it("always has tow rating and ball weight, plus optional rear and front checks", () => {
    const { checks, ballAtmPct, ballLoadedPct } = evaluateCaravanChecks(
      { label: "Ute", tow_rating_braked_kg: 3500, max_ball_weight_kg: 350 },
      { label: "Van", atm_kg: 2800, loaded_estimate_kg: 2500, ball_weight_kg: 250 },
      { num_ebikes: 2, front_storage_heavy: true }
    );

    expect(checks.map((c) => [c.item, c.status])).toEqual([
      ["tow_rating", "ok"],
      ["ball_weight", "ok"],
      ["rear_load", "near_limit"],
      ["front_load", "near_limit"],
    ]);
    expect(ballLoadedPct).toBe(10);
    expect(ballAtmPct).toBeCloseTo(8.928571, 5);
  });
});
