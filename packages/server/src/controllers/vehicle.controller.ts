import type { Task, VehicleSnapshot } from "@skyroute/types";
import { fleetToGeoJson, type GeoJsonFeatureCollection } from "@skyroute/routing";
import type { AbortDeliveryRequest } from "../models/requests.js";
import { Controller } from "./controller.js";

export class VehicleController extends Controller {
  public listVehicles(): VehicleSnapshot[] {
    return this.runtime.dispatch.listVehicles();
  }

  /** Vehicles, their remaining routes, open tasks and no-fly zones */
  public getFleetGeoJson(): GeoJsonFeatureCollection {
    const { dispatch, zones } = this.runtime;
    return fleetToGeoJson(dispatch.listVehicles(), dispatch.listTasks(), { zones });
  }

  /** Fail the vehicle's current delivery and send it home */
  public async abortDelivery(vehicleId: string, body: AbortDeliveryRequest): Promise<Task> {
    return this.runtime.dispatch.abortDelivery(vehicleId, body.reason);
  }
}
