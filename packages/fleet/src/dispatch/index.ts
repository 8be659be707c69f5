export {
  DispatchService,
  BASE_NODE_ID,
  UNKNOWN_TASK_COST,
  type WeatherSource,
  type DispatchDeps,
  type DispatchOptions,
  type AssignResult,
} from "./dispatch.service.js";
