import dotenv from "dotenv";
import path from "path";
import { z } from "zod";

dotenv.config();

const PROJECT_ROOT = path.resolve(__dirname, "..");

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((value) => value === "true" || value === "1");

const schema = z.object({
  PORT: z.coerce.number().default(8000),
  CORS_ORIGIN: z.string().default("http://localhost:5173"),
  DATA_DIR: z.string().default(path.join(PROJECT_ROOT, "data")),
  MAPBOX_TOKEN: z.string().optional(),
  TOWING_TIME_FACTOR: z.coerce.number().positive().default(1.1),
  ROUTING_FALLBACK: booleanFlag,
  WEATHER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  GEOCODE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  DIRECTIONS_TIMEOUT_MS: z.coerce.number().int().positive().default(12_000),
});

const parsed = schema.safeParse(process.env);

if (!parsed.success) {
  console.error("Invalid environment configuration:", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const config = parsed.data;
