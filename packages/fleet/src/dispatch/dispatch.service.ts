/**
 * Dispatch service: assigns tasks to vehicles, closes deliveries and sends
 * vehicles home.
 *
 * Every change to a vehicle happens inside that vehicle's lock. Task claims
 * are taken synchronously inside the lock before the first await, and a
 * failed plan releases the claim, so a rejected assignment leaves no trace.
 */

import type {
  BoundingBox,
  Coordinate,
  FlightConditions,
  Task,
  VehicleSnapshot,
  WeatherReport,
} from "@skyroute/types";
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  haversineDistance,
  isValidCoordinate,
  type NoRouteReason,
  type RandomSource,
  type RiskEstimator,
  type RoutePlan,
  type RoutePlanner,
} from "@skyroute/routing";
import { TaskStore } from "../domain/task-store.js";
import { VehicleAgent, type VehicleState } from "../domain/vehicle-agent.js";
import type { TaskFactory } from "../scheduler/vehicle-scheduler.js";

/** Route graph id of the base every vehicle starts from and returns to */
export const BASE_NODE_ID = "base";

/** Cost fed back for a finished task whose planned cost is unknown */
export const UNKNOWN_TASK_COST = 1000;

/** Anything that can report the latest weather synchronously */
export interface WeatherSource {
  getLatest(): WeatherReport | null;
}

export interface DispatchDeps {
  planner: RoutePlanner;
  riskEstimator: RiskEstimator;
  weather?: WeatherSource;
  tasks?: TaskStore;
}

export interface DispatchOptions {
  base: Coordinate;
  /** Random task destinations are drawn from this box */
  serviceArea: BoundingBox;
  vehicleIds: string[];
  /** Used to derive leg travel times */
  speedMetersPerSecond: number;
  random?: RandomSource;
}

export type AssignResult =
  | { status: "assigned"; task: Task; vehicle: VehicleSnapshot; plan: RoutePlan }
  | { status: "no-route"; task: Task; reason: NoRouteReason; message: string };

/** Waypoints to fly: the plan minus its first node, which is where the vehicle already is */
function flightPath(plan: RoutePlan): Coordinate[] {
  return plan.coordinates.length > 1 ? plan.coordinates.slice(1) : plan.coordinates;
}

export class DispatchService {
  readonly tasks: TaskStore;
  private readonly planner: RoutePlanner;
  private readonly riskEstimator: RiskEstimator;
  private readonly weather: WeatherSource | undefined;
  private readonly vehicles = new Map<string, VehicleAgent>();
  /** Conditions each task was planned under, for the learning update */
  private readonly taskConditions = new Map<string, FlightConditions>();
  private readonly random: RandomSource;

  /** Scheduler hook: a new task at a random spot in the service area */
  readonly taskFactory: TaskFactory = {
    create: () => this.createTask(),
    discard: (taskId, reason) => this.discardTask(taskId, reason),
  };

  constructor(
    deps: DispatchDeps,
    private readonly options: DispatchOptions,
  ) {
    this.planner = deps.planner;
    this.riskEstimator = deps.riskEstimator;
    this.weather = deps.weather;
    this.tasks = deps.tasks ?? new TaskStore();
    this.random = options.random ?? Math.random;

    if (!(options.speedMetersPerSecond > 0)) {
      throw new ValidationError(`speedMetersPerSecond must be positive (got ${options.speedMetersPerSecond})`);
    }
    const { serviceArea } = options;
    if (serviceArea.minLat > serviceArea.maxLat || serviceArea.minLng > serviceArea.maxLng) {
      throw new ValidationError("serviceArea min bounds must not exceed max bounds", { ...serviceArea });
    }

    this.planner.addNode(BASE_NODE_ID, options.base);
    for (const id of options.vehicleIds) {
      if (this.vehicles.has(id)) {
        throw new ValidationError(`duplicate vehicle id ${id}`);
      }
      this.vehicles.set(id, new VehicleAgent(id, options.base));
    }
    console.log(`[dispatch] ${this.vehicles.size} vehicles at base (${options.base.lat}, ${options.base.lng})`);
  }

  get agents(): VehicleAgent[] {
    return [...this.vehicles.values()];
  }

  getVehicle(id: string): VehicleAgent {
    const agent = this.vehicles.get(id);
    if (!agent) throw new NotFoundError(`vehicle ${id}`);
    return agent;
  }

  listVehicles(): VehicleSnapshot[] {
    return this.agents.map((agent) => agent.snapshot());
  }

  listTasks(): Task[] {
    return this.tasks.list();
  }

  getTask(id: string): Task {
    return this.tasks.require(id);
  }

  /** Conditions to plan under right now */
  currentConditions(): FlightConditions {
    return {
      weather: this.weather?.getLatest()?.category ?? "unknown",
      elevationBand: "unknown",
    };
  }

  /** New task at the given destination, or a random one in the service area */
  createTask(destination?: Coordinate): Task {
    const target = destination ?? this.randomDestination();
    if (!isValidCoordinate(target)) {
      throw new ValidationError("invalid task destination", { ...target });
    }
    const task = this.tasks.create(target);
    console.log(`[dispatch] Created ${task.id} at (${task.destination.lat.toFixed(5)}, ${task.destination.lng.toFixed(5)})`);
    return task;
  }

  /**
   * Plan a vehicle's flight to a task and send it OUTBOUND.
   *
   * Throws NotFoundError for unknown ids and ConflictError for a busy
   * vehicle or a task that is taken or finished. A no-route plan is
   * returned as a result and leaves the task open.
   */
  async assignTask(vehicleId: string, taskId: string): Promise<AssignResult> {
    const agent = this.getVehicle(vehicleId);
    this.tasks.require(taskId);

    return agent.exclusive(async (state) => {
      if (state.phase !== "IDLE") {
        throw new ConflictError(`vehicle ${vehicleId} is busy (${state.phase})`, { vehicleId, phase: state.phase });
      }
      const task = this.tasks.claim(taskId, vehicleId);

      try {
        const origin = `${vehicleId}:origin:${taskId}`;
        const destination = `task:${taskId}`;
        this.link(origin, state.position, destination, task.destination);

        const conditions = this.currentConditions();
        const result = await this.planner.planRoute(origin, destination, { vehicleId, conditions });
        if (result.status === "no-route") {
          this.tasks.release(taskId, vehicleId);
          console.log(`[dispatch] No route for ${taskId} with ${vehicleId}: ${result.message}`);
          return { status: "no-route", task: this.tasks.require(taskId), reason: result.reason, message: result.message };
        }

        const started = this.tasks.markStarted(taskId, result.plan.cost);
        this.taskConditions.set(taskId, conditions);
        state.beginOutbound(taskId, flightPath(result.plan));
        console.log(
          `[dispatch] ${vehicleId} -> ${taskId}: ${result.plan.nodeIds.length} nodes, cost=${result.plan.cost.toFixed(1)}`,
        );
        return { status: "assigned", task: started, vehicle: state.snapshot(), plan: result.plan };
      } catch (err) {
        this.tasks.release(taskId, vehicleId);
        throw err;
      }
    });
  }

  /**
   * Delivery callback: close the vehicle's task as a success, learn from it
   * and send the vehicle home. A callback for a task the vehicle no longer
   * carries (e.g. aborted meanwhile) is ignored.
   */
  async completeDelivery(vehicleId: string, expectedTaskId?: string | null): Promise<void> {
    const agent = this.getVehicle(vehicleId);
    await agent.exclusive(async (state) => {
      const taskId = state.taskId;
      if (expectedTaskId !== undefined && expectedTaskId !== null && expectedTaskId !== taskId) {
        console.log(`[dispatch] Ignoring stale delivery of ${expectedTaskId} by ${vehicleId}`);
        return;
      }
      if (state.phase !== "OUTBOUND" || taskId === null) {
        throw new ConflictError(`vehicle ${vehicleId} has no delivery in progress`, { vehicleId });
      }

      const task = this.tasks.markDelivered(taskId);
      await this.learn(vehicleId, task, "success");
      console.log(`[dispatch] ${vehicleId} delivered ${taskId}`);
      await this.routeHome(state);
    });
  }

  /**
   * Fail the vehicle's current delivery and send it home. The task is
   * terminal: it stays undelivered and is not offered again.
   */
  async abortDelivery(vehicleId: string, reason = "aborted"): Promise<Task> {
    const agent = this.getVehicle(vehicleId);
    return agent.exclusive(async (state) => {
      const taskId = state.taskId;
      if (state.phase !== "OUTBOUND" || taskId === null) {
        throw new ConflictError(`vehicle ${vehicleId} has no delivery in progress`, { vehicleId });
      }

      const task = this.tasks.markFailed(taskId, reason);
      await this.learn(vehicleId, task, "failure");
      console.log(`[dispatch] ${vehicleId} aborted ${taskId}: ${reason}`);
      await this.routeHome(state);
      return task;
    });
  }

  /**
   * Retire an open task that no vehicle holds, e.g. one created for a
   * reassignment that found no route. Claimed or finished tasks are left alone.
   */
  discardTask(taskId: string, reason: string): void {
    const task = this.tasks.get(taskId);
    if (!task || task.outcome !== "pending" || task.assignedVehicleId !== null) return;
    this.tasks.markFailed(taskId, reason);
    console.log(`[dispatch] Discarded ${taskId}: ${reason}`);
  }

  /**
   * Recovery hook for a vehicle the scheduler forced IDLE while it held a
   * task: the task fails so it cannot sit assigned and pending for good.
   */
  releaseForcedTask(vehicleId: string, taskId: string, reason: string): void {
    const task = this.tasks.get(taskId);
    if (!task || task.outcome !== "pending" || task.assignedVehicleId !== vehicleId) return;
    this.tasks.markFailed(taskId, `vehicle ${vehicleId} forced idle: ${reason}`);
    this.taskConditions.delete(taskId);
    console.warn(`[dispatch] Failed ${taskId} after ${vehicleId} was forced idle: ${reason}`);
  }

  /** Reassignment hook: create a task and assign it to the vehicle */
  async dispatchNext(vehicleId: string): Promise<AssignResult> {
    this.getVehicle(vehicleId);
    const task = this.createTask();
    return this.assignTask(vehicleId, task.id);
  }

  // ── Internal ──────────────────────────────────────────────────────────

  /** Add both endpoints and a direct leg between them */
  private link(fromId: string, from: Coordinate, toId: string, to: Coordinate): void {
    this.planner.addNode(fromId, from);
    this.planner.addNode(toId, to);
    const distance = haversineDistance(from, to);
    this.planner.addEdge(fromId, toId, distance, distance / this.options.speedMetersPerSecond);
  }

  private async learn(vehicleId: string, task: Task, outcome: "success" | "failure"): Promise<void> {
    const conditions = this.taskConditions.get(task.id) ?? this.currentConditions();
    this.taskConditions.delete(task.id);
    await this.riskEstimator.updateExperience(vehicleId, outcome, conditions, task.cost ?? UNKNOWN_TASK_COST);
  }

  /** Plan back to base and go RETURN; force IDLE when there is no way home */
  private async routeHome(state: VehicleState): Promise<void> {
    const node = `${state.id}:return`;
    this.link(node, state.position, BASE_NODE_ID, this.options.base);

    const result = await this.planner.planRoute(node, BASE_NODE_ID, {
      vehicleId: state.id,
      conditions: this.currentConditions(),
    });
    if (result.status === "found") {
      state.beginReturn(flightPath(result.plan));
      return;
    }
    console.warn(`[dispatch] No route home for ${state.id}: ${result.message}; forcing IDLE`);
    state.forceIdle();
  }

  private randomDestination(): Coordinate {
    const { minLat, maxLat, minLng, maxLng } = this.options.serviceArea;
    return {
      lat: minLat + this.random() * (maxLat - minLat),
      lng: minLng + this.random() * (maxLng - minLng),
    };
  }
}
