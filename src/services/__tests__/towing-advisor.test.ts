import { describe, it, expect } from "vitest";
import { InputError } from "../../errors";
import type { CaravanInfo, VehicleInfo } from "../../types";
import { createReferenceCatalog } from "../reference-catalog";
import { evaluateTowing } from "../towing-advisor";

const vehicle: VehicleInfo = {
  vehicle_id: "test-ute",
  make: "Testmake",
  model: "Hauler",
  year_range: "2018-2024",
  variant: "diesel",
  country_region: "NZ",
  braked_tow_capacity_kg: 3500,
  unbraked_tow_capacity_kg: 750,
  max_ball_weight_kg: 350,
  gvm_kg: 3100,
  gcm_kg: 6000,
  confidence: "medium",
  notes: "Reference figures.",
};

const caravan: CaravanInfo = {
  caravan_id: "test-van",
  brand: "Roamer",
  model: "Twenty",
  variant: null,
  length_category: "20 ft",
  country_region: "NZ",
  atm_kg: 2800,
  tare_kg: 2200,
  axle_rating_kg: 2900,
  ball_weight_empty_kg: 180,
  typical_ball_loaded_pct_min: 8,
  typical_ball_loaded_pct_max: 11,
  confidence: "low",
  notes: null,
};

const catalog = createReferenceCatalog({ vehicles: [vehicle], caravans: [caravan], stops: [] });

describe("evaluateTowing", () => {
  it("evaluates a towed caravan from the declared numbers", () => {
    const result = evaluateTowing(
      {
        rig_type: "towed_caravan",
        vehicle: { label: "Ute", tow_rating_braked_kg: 3000, max_ball_weight_kg: 300 },
        caravan: { label: "Van", atm_kg: 3000, loaded_estimate_kg: 2600, ball_weight_kg: 260 },
      },
      catalog
    );

    expect(result.status).toBe("ok");
    expect(result.risk_colour).toBe("green");
    expect(result.ball_weight_percent_of_atm).toBe(8.67);
    expect(result.ball_weight_percent_of_loaded).toBe(10);
    expect(result.checks.map((c) => c.item)).toEqual(["tow_rating", "ball_weight"]);
    expect(result.advice.detailed).toHaveLength(2);
    expect(result.disclaimer.startsWith("This is general guidance only based on the numbers you entered and typical towing advice.")).toBe(true);
    expect(result.inputs_echo.vehicle_lookup).toBeNull();
  });

  it("requires both vehicle and caravan for a towed caravan", () => {
    expect(() =>
      evaluateTowing({ rig_type: "towed_caravan", vehicle: { label: "Ute" } }, catalog)
    ).toThrow(InputError);
  });

  it("fills only the vehicle fields the user left empty", () => {
    const result = evaluateTowing(
      {
        rig_type: "towed_caravan",
        vehicle: { label: "My ute", tow_rating_braked_kg: 3000 },
        caravan: { label: "Van", atm_kg: 2000, ball_weight_kg: 200 },
        use_vehicle_lookup: true,
        vehicle_make: "testmake",
        vehicle_model: "haul",
        vehicle_year: 2020,
      },
      catalog
    );

    expect(result.inputs_echo.vehicle).toEqual({
      label: "My ute",
      tow_rating_braked_kg: 3000,
      max_ball_weight_kg: 350,
      notes: "Reference figures.",
    });
    expect(result.inputs_echo.vehicle_lookup).toEqual({
      used: true,
      make: "testmake",
      model: "haul",
      year: 2020,
      variant: null,
      match_id: "test-ute",
      match_confidence: "medium",
    });
  });

  it("fills only the caravan fields the user left empty", () => {
    const result = evaluateTowing(
      {
        rig_type: "towed_caravan",
        vehicle: { label: "My ute", tow_rating_braked_kg: 3000, max_ball_weight_kg: 300 },
        caravan: { label: "My van", atm_kg: 2000, ball_weight_kg: 200 },
        use_caravan_lookup: true,
        caravan_brand: "roamer",
        caravan_model: "twenty",
      },
      catalog
    );

    expect(result.inputs_echo.caravan).toEqual({
      label: "My van",
      atm_kg: 2000,
      ball_weight_kg: 200,
      axle_rating_kg: 2900,
    });
    expect(result.ball_weight_percent_of_atm).toBe(10);
    expect(result.inputs_echo.caravan_lookup).toEqual({
      used: true,
      brand: "roamer",
      model: "twenty",
      length_category: null,
      match_id: "test-van",
      match_confidence: "low",
    });
  });

  it("builds the whole rig from lookups when no blocks are given", () => {
    const result = evaluateTowing(
      {
        rig_type: "towed_caravan",
        use_vehicle_lookup: true,
        vehicle_make: "Testmake",
        vehicle_model: "Hauler",
        use_caravan_lookup: true,
        caravan_brand: "roamer",
        caravan_model: "twenty",
        caravan_length_category: "20ft",
      },
      catalog
    );

    expect(result.inputs_echo.vehicle).toEqual({
      label: "2018-2024 Testmake Hauler",
      tow_rating_braked_kg: 3500,
      max_ball_weight_kg: 350,
      notes: "Reference figures.",
    });
    expect(result.inputs_echo.caravan).toEqual({
      label: "Roamer Twenty",
      atm_kg: 2800,
      loaded_estimate_kg: null,
      ball_weight_kg: null,
      axle_rating_kg: 2900,
    });
    // 2800 kg against a 3500 kg rating; no ball weight known
    expect(result.checks.map((c) => [c.item, c.status])).toEqual([
      ["tow_rating", "ok"],
      ["ball_weight", "unknown"],
    ]);
    expect(result.status).toBe("ok");
  });

  it("records a lookup that found nothing", () => {
    const result = evaluateTowing(
      {
        rig_type: "towed_caravan",
        vehicle: { label: "Ute" },
        caravan: { label: "Van" },
        use_caravan_lookup: true,
        caravan_brand: "Nobody",
        caravan_model: "Nothing",
      },
      catalog
    );

    expect(result.inputs_echo.caravan_lookup).toEqual({
      used: true,
      brand: "Nobody",
      model: "Nothing",
      length_category: null,
      match_id: null,
      match_confidence: "none",
    });
    expect(result.status).toBe("unknown");
    expect(result.risk_colour).toBe("grey");
  });

  it("evaluates a campervan with the motorhome rules", () => {
    const result = evaluateTowing(
      {
        rig_type: "campervan",
        motorhome: { label: "Van conversion", gvm_kg: 3500, current_weight_kg: 3600 },
      },
      catalog
    );

    expect(result.status).toBe("over_limits");
    expect(result.risk_colour).toBe("red");
    expect(result.ball_weight_percent_of_atm).toBeNull();
    expect(result.advice.detailed.at(-1)).toBe(
      "Before travelling long distances, get weights measured on a certified weighbridge and review " +
        "your manufacturer's limits. Consider shifting heavy items forward or redistributing load " +
        "where appropriate."
    );
    expect(result.disclaimer.startsWith("This is general guidance only based on the numbers you entered and typical motorhome loading")).toBe(true);
  });

  it("requires a motorhome block for motorhomes", () => {
    expect(() => evaluateTowing({ rig_type: "motorhome" }, catalog)).toThrow(
      "For 'motorhome' you must provide a 'motorhome' block."
    );
  });
});
