import { loadFleetConfig } from "@skyroute/fleet";
import { ElevationClient, WeatherClient } from "@skyroute/providers";
import { createApp } from "./app.js";
import { FleetRuntime } from "./services/fleet-runtime.service.js";
import { loadZonesFile } from "./services/zone-loader.service.js";

const PORT = parseInt(process.env["PORT"] ?? "3000", 10);
const PROFILE = process.env["SKYROUTE_PROFILE"];
const ZONES_FILE = process.env["SKYROUTE_ZONES_FILE"];
const ELEVATION_API_URL = process.env["ELEVATION_API_URL"];
const WEATHER_API_URL = process.env["WEATHER_API_URL"];

const config = loadFleetConfig(PROFILE);

const runtime = new FleetRuntime({
  config,
  zones: ZONES_FILE ? loadZonesFile(ZONES_FILE) : [],
  ...(ELEVATION_API_URL
    ? {
        elevation: new ElevationClient({
          baseUrl: ELEVATION_API_URL,
          apiKey: process.env["ELEVATION_API_KEY"],
          timeout: config.planner.collaboratorTimeoutMs,
        }),
      }
    : {}),
  ...(WEATHER_API_URL
    ? {
        weather: new WeatherClient({
          baseUrl: WEATHER_API_URL,
          apiKey: process.env["WEATHER_API_KEY"],
          timeout: config.weather.timeoutMs,
          location: config.base,
        }),
      }
    : {}),
});

const app = createApp(runtime);

const server = app.listen(PORT, () => {
  console.log(`\nSkyroute dispatch server running at http://localhost:${PORT}`);
  console.log(`Profile: ${PROFILE ?? "base"}\n`);
  runtime.start().catch((err: unknown) => {
    console.error("[runtime] Failed to start:", err);
    process.exitCode = 1;
    server.close();
  });
});

function shutdown(signal: string): void {
  console.log(`\n${signal} received, shutting down`);
  runtime
    .stop()
    .catch((err: unknown) => console.error("[runtime] Stop failed:", err))
    .finally(() => server.close());
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
