export { createApp } from "./app.js";
export { createRouter } from "./routes.js";
export { errorHandler, type JsonReply } from "./middleware/error-handler.js";
export { FleetRuntime, type FleetRuntimeDeps } from "./services/fleet-runtime.service.js";
export { parseZones, loadZonesFile } from "./services/zone-loader.service.js";
export type * from "./models/responses.js";
export * from "./models/requests.js";
