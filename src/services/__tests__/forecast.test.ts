import { afterEach, describe, it, expect, vi } from "vitest";
import { UpstreamError } from "../../errors";
import {
  assessDay,
  buildTravelDaySummary,
  fetchWeatherDays,
  isIsoCalendarDate,
  selectTravelDay,
  toWeatherDays,
} from "../forecast";
import { CALM, STORMY, constantWeather, seriesOf } from "./fakes";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("isIsoCalendarDate", () => {
  it("accepts real calendar dates only", () => {
    expect(isIsoCalendarDate("2028-02-29")).toBe(true);
    expect(isIsoCalendarDate("2026-02-29")).toBe(false);
    expect(isIsoCalendarDate("2026-13-01")).toBe(false);
    expect(isIsoCalendarDate("2026-1-01")).toBe(false);
    expect(isIsoCalendarDate("not a date")).toBe(false);
  });
});

describe("toWeatherDays", () => {
  it("skips unusable entries and stops at the shortest array", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const days = toWeatherDays({
      time: ["2026-03-02", "2026-03-03", "2026-02-30", "2026-03-05"],
      precipitation_sum: [1, null, 0, 2],
      wind_speed_10m_max: [20, 20, 20, 20],
      wind_gusts_10m_max: [30, 30, 30, 30],
      temperature_2m_min: [5, 5, 5],
    });

    expect(days).toEqual([{ date: "2026-03-02", rainMm: 1, windMaxKmh: 20, windGustKmh: 30, tempMinC: 5 }]);
    expect(warn).toHaveBeenCalledTimes(2);
  });
});

describe("assessDay", () => {
  it("derives average wind, stress and the park-up flag", () => {
    expect(assessDay({ date: "2026-03-02", rainMm: 3, windMaxKmh: 50, windGustKmh: 45, tempMinC: 4 })).toEqual({
      date: "2026-03-02",
      rainMm: 3,
      windMaxKmh: 50,
      windAvgKmh: 35,
      windGustKmh: 45,
      overnightTempC: 4,
      towingStress: 86,
      parkUp: true,
    });
  });
});

describe("selectTravelDay", () => {
  const days = toWeatherDays(
    seriesOf([
      { date: "2026-03-02", ...CALM },
      { date: "2026-03-03", ...STORMY },
    ])
  );

  it("picks the matching date", () => {
    const { day, matched } = selectTravelDay(days, "2026-03-03");
    expect(matched).toBe(true);
    expect(day.date).toBe("2026-03-03");
  });

  it("falls back to the first usable day", () => {
    const { day, matched } = selectTravelDay(days, "2026-04-01");
    expect(matched).toBe(false);
    expect(day.date).toBe("2026-03-02");
  });
});

describe("fetchWeatherDays", () => {
  it("fails as an upstream error when no day is usable", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const weather = constantWeather([{ date: "2026-03-02", rain: null, windMax: 10, gust: 10, tempMin: 5 }]);

    const result = fetchWeatherDays(weather, -41, 174, 3);
    await expect(result).rejects.toBeInstanceOf(UpstreamError);
    await expect(result).rejects.toThrow("Weather service returned no usable daily data");
  });
});

describe("buildTravelDaySummary", () => {
  const location = { name: "Picton", latitude: -41.29, longitude: 174.0 };

  it("summarises the travel date with the touring wording", async () => {
    const weather = constantWeather([
      { date: "2026-03-02", ...STORMY },
      { date: "2026-03-03", rain: 0, windMax: 20, gust: 25, tempMin: 8 },
    ]);
    const getDailyWeather = vi.spyOn(weather, "getDailyWeather");

    const day = await buildTravelDaySummary(weather, location, "2026-03-03");

    expect(getDailyWeather).toHaveBeenCalledWith(-41.29, 174.0, 5);
    expect(day).toEqual({
      date: "2026-03-03",
      rain_mm: 0,
      wind_avg_kmh: 14,
      wind_gust_kmh: 25,
      towing_stress: 8,
      overnight_temp_c: 8,
      ai_summary:
        "Light winds for most of the day. Mostly dry with only light or brief showers, if any. " +
        "Overnight temperatures are fairly mild.",
      park_up_flag: false,
    });
  });

  it("uses the first day but keeps the requested date when the forecast has no match", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const weather = constantWeather([
      { date: "2026-03-02", ...STORMY },
      { date: "2026-03-03", ...CALM },
    ]);

    const day = await buildTravelDaySummary(weather, location, "2026-03-20");

    expect(day.date).toBe("2026-03-20");
    expect(day.towing_stress).toBe(86);
    expect(day.park_up_flag).toBe(true);
    expect(warn).toHaveBeenCalledWith("[forecast] No forecast for 2026-03-20 at Picton; using 2026-03-02");
  });
});
