import cors from "cors";
import crypto from "crypto";
import express from "express";
import { createBriefingRouter } from "./routes/briefing";
import { createCaravanRouter } from "./routes/caravan";
import { createTouringRouter } from "./routes/touring";
import { createTowingRouter } from "./routes/towing";
import { createVehicleRouter } from "./routes/vehicle";
import type { DirectionsProvider } from "./services/directions";
import type { Geocoder } from "./services/geocoder";
import type { ReferenceCatalog } from "./services/reference-catalog";
import type { WeatherProvider } from "./services/weather-client";

export type AppDeps = {
  weather: WeatherProvider;
  geocoder: Geocoder;
  directions: DirectionsProvider;
  catalog: ReferenceCatalog;
  allowRoutingFallback: boolean;
  corsOrigin: string;
};

/** express.json() tags its failures with a 4xx `status` and a `type` such as "entity.too.large". */
function bodyParserError(error: unknown): { status: number; type: string; message: string } | null {
  if (!(error instanceof Error) || !("status" in error) || !("type" in error)) return null;
  const { status, type } = error;
  if (typeof status !== "number" || typeof type !== "string" || status < 400 || status >= 500) return null;
  return { status, type, message: error.message };
}

export function createApp({ weather, geocoder, directions, catalog, allowRoutingFallback, corsOrigin }: AppDeps) {
  const app = express();

  app.disable("x-powered-by");
  app.use(cors({ origin: corsOrigin }));
  app.use(express.json({ limit: "1mb" }));

  app.use((req, res, next) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    res.setHeader("X-Request-Id", requestId);
    res.on("finish", () => {
      const elapsed = Date.now() - startedAt;
      console.log(`[${requestId}] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${elapsed}ms)`);
    });
    next();
  });

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, service: "touring-advisor-backend" });
  });

  app.use("/briefing", createBriefingRouter({ weather }));
  app.use("/caravan", createCaravanRouter({ weather, catalog }));
  app.use(
    "/touring",
    createTouringRouter({ weather, geocoder, directions, stops: catalog.stops, allowRoutingFallback })
  );
  app.use("/towing", createTowingRouter({ catalog }));
  app.use("/vehicle", createVehicleRouter({ catalog }));

  app.use((error: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const bodyError = bodyParserError(error);
    if (bodyError) {
      const message = bodyError.type === "entity.parse.failed" ? "Malformed JSON body" : bodyError.message;
      res.status(bodyError.status).json({ error: message });
      return;
    }
    console.error("Unhandled error:", error);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
