/**
 * @skyroute/fleet
 *
 * Vehicles, tasks and the loop that moves them.
 *
 * - Domain: vehicle agents with a phase state machine, task store
 * - Motion: per-tick stepping toward waypoints
 * - Scheduler: serialised tick loop with delivery and reassignment hooks
 * - Dispatch: assign / deliver / abort / return-to-base
 * - Conditions: weather polling
 * - Config: layered JSON fleet configuration
 */

export * from "./domain/index.js";
export * from "./motion/index.js";
export * from "./scheduler/index.js";
export * from "./dispatch/index.js";
export * from "./conditions/index.js";
export * from "./config/index.js";
