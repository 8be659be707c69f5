/**
 * Risk-aware route planner.
 *
 * Owns the route graph. A plan is an A* search over stored base weights
 * scaled by the vehicle's learned risk factor, followed by a feasibility
 * pass over every node of the candidate. A violation rejects the whole
 * candidate; there is no backtracking to a second-best path.
 */

import type { Coordinate, FlightConditions, RouteEdge, RouteNode } from "@skyroute/types";
import { CostModel } from "../cost/cost-model.js";
import { ValidationError } from "../errors.js";
import { RouteGraph } from "../graph/route-graph.js";
import type { RiskEstimator } from "../risk/risk-estimator.js";
import { aStar } from "../search/astar.js";
import {
  DEFAULT_FEASIBILITY_OPTIONS,
  FeasibilityChecker,
  type ElevationProvider,
  type FeasibilityOptions,
  type FeasibilityViolation,
  type SpatialIndex,
} from "../constraints/feasibility.js";

export interface RoutePlannerOptions extends FeasibilityOptions {
  /** Multiplier on the straight-line A* heuristic */
  heuristicScale: number;
}

export const DEFAULT_PLANNER_OPTIONS: RoutePlannerOptions = {
  ...DEFAULT_FEASIBILITY_OPTIONS,
  heuristicScale: 1,
};

export interface RoutePlannerDeps {
  costModel?: CostModel;
  riskEstimator?: RiskEstimator;
  spatialIndex?: SpatialIndex;
  elevationProvider?: ElevationProvider;
}

export interface PlanRequest {
  /** Vehicle whose learned risk scales the weights; 1.0 when absent */
  vehicleId?: string;
  conditions?: FlightConditions;
}

export interface RoutePlan {
  nodeIds: string[];
  /** Node coordinates captured when the path was found */
  coordinates: Coordinate[];
  riskFactor: number;
  /** Sum of risk-scaled edge weights */
  cost: number;
}

export type NoRouteReason = "disconnected" | "constraint-violation";

export type PlanResult =
  | { status: "found"; plan: RoutePlan }
  | { status: "no-route"; reason: NoRouteReason; message: string; violation?: FeasibilityViolation };

export class RoutePlanner {
  readonly graph: RouteGraph;
  readonly options: RoutePlannerOptions;
  private readonly feasibility: FeasibilityChecker;
  private readonly riskEstimator: RiskEstimator | undefined;

  constructor(deps: RoutePlannerDeps = {}, options: Partial<RoutePlannerOptions> = {}) {
    this.options = { ...DEFAULT_PLANNER_OPTIONS, ...options };
    if (!(this.options.heuristicScale >= 0)) {
      throw new ValidationError(`heuristicScale must be non-negative (got ${this.options.heuristicScale})`);
    }
    this.graph = new RouteGraph(deps.costModel ?? new CostModel());
    this.riskEstimator = deps.riskEstimator;
    this.feasibility = new FeasibilityChecker(
      { spatialIndex: deps.spatialIndex, elevationProvider: deps.elevationProvider },
      this.options,
    );
  }

  addNode(id: string, coordinate: Coordinate, elevationMeters?: number): RouteNode {
    return this.graph.addNode(id, coordinate, elevationMeters);
  }

  addEdge(a: string, b: string, distanceMeters: number, timeSeconds: number, baseRisk = 1.0): RouteEdge {
    return this.graph.addEdge(a, b, distanceMeters, timeSeconds, baseRisk);
  }

  hasNode(id: string): boolean {
    return this.graph.hasNode(id);
  }

  getNode(id: string): RouteNode | undefined {
    return this.graph.getNode(id);
  }

  get nodeCount(): number {
    return this.graph.nodeCount;
  }

  get edgeCount(): number {
    return this.graph.edgeCount;
  }

  /**
   * Plan the cheapest feasible path from start to goal.
   *
   * No-route is a normal result. Unknown start or goal ids throw
   * ValidationError.
   */
  async planRoute(start: string, goal: string, request: PlanRequest = {}): Promise<PlanResult> {
    for (const [label, id] of [["start", start], ["goal", goal]] as const) {
      if (!this.graph.hasNode(id)) {
        throw new ValidationError(`unknown ${label} node ${id}`, { nodeId: id });
      }
    }

    const { vehicleId, conditions } = request;
    const riskFactor =
      vehicleId !== undefined && this.riskEstimator
        ? await this.riskEstimator.getRiskFactor(vehicleId, conditions)
        : 1.0;

    const found = aStar(this.graph, start, goal, {
      riskFactor,
      heuristicScale: this.options.heuristicScale,
    });
    if (!found) {
      const message = `no connected path from ${start} to ${goal}`;
      console.log(`[planner] ${message}`);
      return { status: "no-route", reason: "disconnected", message };
    }

    // Copy before awaiting lookups; the graph may change meanwhile
    const nodes: RouteNode[] = [];
    for (const id of found.path) {
      const node = this.graph.getNode(id);
      if (node) nodes.push({ ...node, coordinate: { ...node.coordinate } });
    }

    const check = await this.feasibility.checkPath(nodes);
    if (!check.feasible) {
      const message = check.violation?.message ?? `path from ${start} to ${goal} is infeasible`;
      console.log(`[planner] rejected ${start} -> ${goal}: ${message}`);
      return { status: "no-route", reason: "constraint-violation", message, violation: check.violation };
    }

    console.log(
      `[planner] ${start} -> ${goal}: ${nodes.length} nodes, cost=${found.cost.toFixed(1)}, risk=${riskFactor.toFixed(3)}, expanded=${found.expanded}`,
    );
    return {
      status: "found",
      plan: {
        nodeIds: found.path,
        coordinates: nodes.map((node) => node.coordinate),
        riskFactor,
        cost: found.cost,
      },
    };
  }

  /**
   * Sum of risk-scaled weights along consecutive pairs.
   * +∞ for fewer than two nodes; throws when a pair has no edge.
   */
  getPathCost(path: readonly string[], riskFactor = 1): number {
    if (path.length < 2) return Infinity;
    let total = 0;
    for (let i = 1; i < path.length; i++) {
      const a = path[i - 1];
      const b = path[i];
      const edge = a !== undefined && b !== undefined ? this.graph.getEdge(a, b) : undefined;
      if (!edge) {
        throw new ValidationError(`no edge between ${a} and ${b}`, { from: a, to: b });
      }
      total += edge.baseWeight * riskFactor;
    }
    return total;
  }
}
