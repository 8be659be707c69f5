import { Router, type NextFunction, type Request, type Response } from "express";
import { ConfigController } from "./controllers/config.controller.js";
import type { Controller } from "./controllers/controller.js";
import { HealthController } from "./controllers/health.controller.js";
import { TaskController } from "./controllers/task.controller.js";
import { VehicleController } from "./controllers/vehicle.controller.js";
import { WeatherController } from "./controllers/weather.controller.js";
import {
  AbortDeliveryRequestSchema,
  AssignTaskRequestSchema,
  CreateTaskRequestSchema,
} from "./models/requests.js";
import type { FleetRuntime } from "./services/fleet-runtime.service.js";

type ControllerClass<C extends Controller> = new (runtime: FleetRuntime) => C;

/**
 * Adapt a controller method to an Express handler: a fresh controller per
 * request, JSON out, rejections forwarded to the error handler.
 */
function handle<C extends Controller>(
  runtime: FleetRuntime,
  ControllerType: ControllerClass<C>,
  action: (controller: C, req: Request) => unknown,
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const controller = new ControllerType(runtime);
    Promise.resolve()
      .then(() => action(controller, req))
      .then((body) => {
        res.status(controller.getStatus() ?? 200).json(body);
      })
      .catch(next);
  };
}

/** Path parameter; Express always fills declared ones */
function param(req: Request, name: string): string {
  return req.params[name] ?? "";
}

export function createRouter(runtime: FleetRuntime): Router {
  const router = Router();

  router.get("/health", handle(runtime, HealthController, (c) => c.getHealth()));

  // Vehicles
  router.get("/api/vehicles", handle(runtime, VehicleController, (c) => c.listVehicles()));
  router.get("/api/vehicles/geojson", handle(runtime, VehicleController, (c) => c.getFleetGeoJson()));
  router.post(
    "/api/vehicles/:id/abort",
    handle(runtime, VehicleController, (c, req) =>
      c.abortDelivery(param(req, "id"), AbortDeliveryRequestSchema.parse(req.body ?? {})),
    ),
  );

  // Tasks
  router.get("/api/tasks", handle(runtime, TaskController, (c) => c.listTasks()));
  router.get("/api/tasks/:id", handle(runtime, TaskController, (c, req) => c.getTask(param(req, "id"))));
  router.post(
    "/api/tasks",
    handle(runtime, TaskController, (c, req) => c.createTask(CreateTaskRequestSchema.parse(req.body ?? {}))),
  );
  router.post(
    "/api/tasks/:id/assign",
    handle(runtime, TaskController, (c, req) =>
      c.assignTask(param(req, "id"), AssignTaskRequestSchema.parse(req.body)),
    ),
  );

  // Config
  router.get("/api/config", handle(runtime, ConfigController, (c) => c.getConfig()));
  router.get("/api/config/profiles", handle(runtime, ConfigController, (c) => c.getProfiles()));

  // Conditions
  router.get("/api/weather", handle(runtime, WeatherController, (c) => c.getWeather()));

  return router;
}
