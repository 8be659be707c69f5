import { listProfiles, type FleetConfig } from "@skyroute/fleet";
import type { ProfileListItem } from "../models/responses.js";
import { Controller } from "./controller.js";

export class ConfigController extends Controller {
  /** Configuration the fleet is running with */
  public getConfig(): FleetConfig {
    return this.runtime.config;
  }

  /** List all available fleet profiles */
  public getProfiles(): ProfileListItem[] {
    return listProfiles();
  }
}
