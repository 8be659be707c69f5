import express from "express";
import cors from "cors";
import { createRouter } from "./routes.js";
import { errorHandler } from "./middleware/error-handler.js";
import type { FleetRuntime } from "./services/fleet-runtime.service.js";

export function createApp(runtime: FleetRuntime): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  app.use(createRouter(runtime));

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
