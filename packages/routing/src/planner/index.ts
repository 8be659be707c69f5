export {
  RoutePlanner,
  DEFAULT_PLANNER_OPTIONS,
  type RoutePlannerOptions,
  type RoutePlannerDeps,
  type PlanRequest,
  type RoutePlan,
  type PlanResult,
  type NoRouteReason,
} from "./route-planner.js";
