import type { RoutePlan } from "@skyroute/routing";
import type { Task, VehicleSnapshot, WeatherReport } from "@skyroute/types";

export interface HealthResponse {
  status: "ok";
  uptime: number;
  schedulerRunning: boolean;
  vehicles: number;
  tasks: number;
}

export interface AssignTaskResponse {
  task: Task;
  vehicle: VehicleSnapshot;
  plan: RoutePlan;
}

export interface WeatherResponse {
  /** Whether a weather feed is configured */
  monitoring: boolean;
  report: WeatherReport | null;
}

export interface ProfileListItem {
  name: string;
  description: string;
}

export interface ErrorResponse {
  message: string;
  details?: unknown;
}
