export { canTransition, assertTransition } from "./phase.js";
export { VehicleAgent, VehicleState, type AdvanceOutcome } from "./vehicle-agent.js";
export { TaskStore, type TaskStoreOptions } from "./task-store.js";
