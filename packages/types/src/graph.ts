/**
 * Route graph representation.
 *
 * Nodes are waypoints a vehicle can fly through (base, task destinations,
 * vehicle positions at planning time, any wired airway points). Edges are
 * undirected legs between them, weighted by the cost model.
 */

import type { Coordinate } from "./geo.js";

/** A node in the route graph */
export interface RouteNode {
  id: string;
  coordinate: Coordinate;
  /** Known elevation in meters; looked up from the elevation provider when absent */
  elevationMeters?: number;
}

/** An undirected edge between two route nodes */
export interface RouteEdge {
  /** Canonical key: the two node ids sorted and joined */
  key: string;
  nodeA: string;
  nodeB: string;
  /** Base distance in meters */
  distanceMeters: number;
  /** Base travel time in seconds */
  timeSeconds: number;
  /** Base risk factor for this leg */
  baseRisk: number;
  /** Cost model output for (distance, time, baseRisk); never rescaled in place */
  baseWeight: number;
}
