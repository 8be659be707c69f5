export {
  VehicleScheduler,
  DEFAULT_TICK_INTERVAL_MS,
  DEFAULT_SPEED_MPS,
  type DeliveryCallback,
  type TaskFactory,
  type AssignmentCallback,
  type AssignmentResult,
  type ForcedIdleCallback,
  type VehicleSchedulerOptions,
} from "./vehicle-scheduler.js";
