/**
 * @skyroute/types
 *
 * Shared domain types for the delivery routing engine.
 *
 * - Geo: coordinates, bounding boxes, restricted zones
 * - Graph: route nodes and weighted edges
 * - Fleet: vehicles, phases, tasks
 * - Conditions: weather and risk inputs
 */

export * from "./geo.js";
export * from "./graph.js";
export * from "./fleet.js";
export * from "./conditions.js";
