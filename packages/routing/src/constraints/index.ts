export {
  FeasibilityChecker,
  DEFAULT_FEASIBILITY_OPTIONS,
  type SpatialIndex,
  type ElevationProvider,
  type CollaboratorFailurePolicy,
  type ViolationKind,
  type FeasibilityViolation,
  type FeasibilityResult,
  type FeasibilityOptions,
  type FeasibilityCollaborators,
} from "./feasibility.js";
export { ZoneSpatialIndex } from "./zone-index.js";
export {
  pointInRing,
  pointInPolygon,
  distanceToRing,
  discIntersectsPolygon,
  discIntersectsZone,
  zoneBounds,
  boxesOverlap,
} from "./zone-geometry.js";
