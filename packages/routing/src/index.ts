/**
 * @skyroute/routing
 *
 * A risk-aware route engine for delivery vehicles.
 *
 * Key concepts:
 * - Route graph: waypoints joined by legs weighted by the cost model
 * - Risk factor: learned multiplier per (vehicle, conditions)
 * - Feasibility: restricted zones and the elevation ceiling
 * - Plan: the cheapest feasible path, or a no-route result
 *
 * Pipeline:
 * 1. Add nodes and edges -> RouteGraph (weights from CostModel)
 * 2. Read the vehicle's risk factor -> RiskEstimator
 * 3. A* over risk-scaled weights -> candidate path
 * 4. Check every node against zones and elevation -> PlanResult
 */

export * from "./errors.js";
export * from "./concurrency/index.js";
export * from "./cost/index.js";
export * from "./risk/index.js";
export * from "./geo/index.js";
export * from "./graph/index.js";
export * from "./search/index.js";
export * from "./constraints/index.js";
export * from "./planner/index.js";
export * from "./export/index.js";
