// Base
export { BaseClient, type ClientConfig, type RequestParams } from "./baseClient.js";

// Collaborator clients
export { ElevationClient } from "./elevationClient.js";
export { WeatherClient, type WeatherClientConfig } from "./weatherClient.js";

// Response schemas
export {
  ElevationResponseSchema,
  WeatherResponseSchema,
  type ElevationResponse,
  type WeatherResponse,
} from "./types.js";
