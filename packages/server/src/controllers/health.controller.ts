import type { HealthResponse } from "../models/responses.js";
import { Controller } from "./controller.js";

export class HealthController extends Controller {
  /** Liveness plus fleet counters */
  public getHealth(): HealthResponse {
    const { dispatch, scheduler } = this.runtime;
    return {
      status: "ok",
      uptime: process.uptime(),
      schedulerRunning: scheduler.isRunning(),
      vehicles: dispatch.listVehicles().length,
      tasks: dispatch.tasks.size,
    };
  }
}
