import type { FleetRuntime } from "../services/fleet-runtime.service.js";

/**
 * Base for request-scoped controllers. One instance serves one request, so
 * a status set by a handler cannot leak into another response.
 */
export abstract class Controller {
  private statusCode: number | undefined;

  constructor(protected readonly runtime: FleetRuntime) {}

  public setStatus(statusCode: number): void {
    this.statusCode = statusCode;
  }

  public getStatus(): number | undefined {
    return this.statusCode;
  }
}
