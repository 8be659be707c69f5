/**
 * Fleet domain: vehicles and delivery tasks.
 */

import type { Coordinate } from "./geo.js";

/**
 * Lifecycle stage of a vehicle.
 *
 * - IDLE: no active task
 * - OUTBOUND: flying toward a task's destination
 * - RETURN: flying back to base after a delivery
 */
export type VehiclePhase = "IDLE" | "OUTBOUND" | "RETURN";

/** Read-only view of a vehicle's state */
export interface VehicleSnapshot {
  id: string;
  position: Coordinate;
  phase: VehiclePhase;
  /** Ordered waypoints of the active route (empty when none) */
  route: Coordinate[];
  /** Index of the next waypoint to reach; equals route.length when finished */
  nextWaypointIndex: number;
  currentTaskId: string | null;
  moving: boolean;
}

/** Task outcome; "pending" until the task is delivered or fails */
export type TaskOutcome = "pending" | "success" | "failure";

/** A delivery task */
export interface Task {
  id: string;
  destination: Coordinate;
  assignedVehicleId: string | null;
  delivered: boolean;
  /** Epoch ms */
  createdAt: number;
  startedAt: number | null;
  completedAt: number | null;
  /** Planned route cost, set on assignment */
  cost: number | null;
  outcome: TaskOutcome;
  /** Reason recorded for a failed delivery */
  failureReason?: string;
}
