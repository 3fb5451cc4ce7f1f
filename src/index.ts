import { createApp } from "./app";
import { config } from "./config";
import { createMapboxDirections } from "./services/directions";
import { createOpenMeteoGeocoder } from "./services/geocoder";
import { loadReferenceCatalog } from "./services/reference-catalog";
import { createOpenMeteoWeather } from "./services/weather-client";
import { createFetchWithTimeout } from "./utils/http-client";

async function start() {
  const catalog = loadReferenceCatalog(config.DATA_DIR);

  if (!config.MAPBOX_TOKEN) {
    console.warn(
      config.ROUTING_FALLBACK
        ? "MAPBOX_TOKEN is not set; drive times will use the straight-line estimate."
        : "MAPBOX_TOKEN is not set and ROUTING_FALLBACK is off; touring plans will fail."
    );
  }

  const app = createApp({
    weather: createOpenMeteoWeather(createFetchWithTimeout(config.WEATHER_TIMEOUT_MS)),
    geocoder: createOpenMeteoGeocoder(createFetchWithTimeout(config.GEOCODE_TIMEOUT_MS)),
    directions: createMapboxDirections(createFetchWithTimeout(config.DIRECTIONS_TIMEOUT_MS), {
      token: config.MAPBOX_TOKEN,
      towingTimeFactor: config.TOWING_TIME_FACTOR,
    }),
    catalog,
    allowRoutingFallback: config.ROUTING_FALLBACK,
    corsOrigin: config.CORS_ORIGIN,
  });

  app.listen(config.PORT, () => {
    console.log(`API listening on http://localhost:${config.PORT}`);
  });
}

start().catch((error) => {
  console.error("Failed to start API:", error);
  process.exit(1);
});
