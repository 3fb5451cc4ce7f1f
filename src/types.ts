/* ── Locations ── */

export type Location = {
  name: string;
  latitude?: number | null;
  longitude?: number | null;
};

export type ResolvedLocation = {
  name: string;
  latitude: number;
  longitude: number;
};

/* ── Weather ── */

/** Open-Meteo style daily block: parallel arrays aligned by index. */
export type DailyWeatherSeries = {
  time: string[];
  precipitation_sum: Array<number | null>;
  wind_speed_10m_max: Array<number | null>;
  wind_gusts_10m_max: Array<number | null>;
  temperature_2m_min: Array<number | null>;
};

export type WeatherDay = {
  date: string; // YYYY-MM-DD
  rainMm: number;
  windMaxKmh: number;
  windGustKmh: number;
  tempMinC: number;
};

/* ── Towing / loading ── */

export type CheckItem =
  | "tow_rating"
  | "ball_weight"
  | "axle_rating"
  | "rear_load"
  | "front_load"
  | "combined_mass";

export type CheckStatus = "ok" | "near_limit" | "over_limit" | "unknown";

export type TowingCheck = {
  item: CheckItem;
  status: CheckStatus;
  detail: string;
};

export type OverallStatus = "ok" | "near_limits" | "over_limits" | "unknown";
export type RiskColour = "green" | "amber" | "red" | "grey";

export type RigType = "towed_caravan" | "motorhome" | "campervan";

export type VehicleSpec = {
  label: string;
  tow_rating_braked_kg?: number | null;
  max_ball_weight_kg?: number | null;
  notes?: string | null;
};

export type CaravanSpec = {
  label: string;
  atm_kg?: number | null;
  loaded_estimate_kg?: number | null;
  ball_weight_kg?: number | null;
  axle_rating_kg?: number | null;
};

export type MotorhomeSpec = {
  label: string;
  gvm_kg?: number | null;
  current_weight_kg?: number | null;
  front_axle_rating_kg?: number | null;
  rear_axle_rating_kg?: number | null;
  front_axle_actual_kg?: number | null;
  rear_axle_actual_kg?: number | null;
  rear_overhang_m?: number | null;
};

export type ExtrasSpec = {
  rear_load_kg?: number | null;
  num_ebikes?: number | null;
  front_storage_heavy?: boolean | null;
  front_extra_kg?: number | null;
  water_front_tank_litres?: number | null;
  water_rear_tank_litres?: number | null;
  notes?: string | null;
};

/* ── Reference tables ── */

export type VehicleInfo = {
  vehicle_id: string;
  make: string;
  model: string;
  year_range: string;
  variant: string;
  country_region: string | null;
  braked_tow_capacity_kg: number | null;
  unbraked_tow_capacity_kg: number | null;
  max_ball_weight_kg: number | null;
  gvm_kg: number | null;
  gcm_kg: number | null;
  confidence: string;
  notes: string;
};

export type CaravanInfo = {
  caravan_id: string;
  brand: string;
  model: string;
  variant: string | null;
  length_category: string | null;
  country_region: string | null;
  atm_kg: number | null;
  tare_kg: number | null;
  axle_rating_kg: number | null;
  ball_weight_empty_kg: number | null;
  typical_ball_loaded_pct_min: number | null;
  typical_ball_loaded_pct_max: number | null;
  confidence: string;
  notes: string | null;
};
