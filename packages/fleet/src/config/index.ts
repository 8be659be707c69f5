export {
  FleetConfigSchema,
  DEFAULT_FLEET_CONFIG,
  deepMerge,
  findConfigsRoot,
  loadFleetConfig,
  listProfiles,
  type FleetConfig,
  type ProfileInfo,
} from "./fleet-config.js";
