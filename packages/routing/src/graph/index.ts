export { RouteGraph, edgeKey } from "./route-graph.js";
export type { Neighbor } from "./route-graph.js";
