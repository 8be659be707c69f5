/**
 * Tick loop that moves vehicles and drives the delivery lifecycle.
 *
 * Each tick advances every vehicle one step under that vehicle's lock, then
 * runs the side effects (delivery, reassignment) after the lock is released.
 * Ticks never overlap: the next one is scheduled only after the previous
 * one has finished.
 *
 * A vehicle back at base waits for a task until one is assigned to it. A
 * reassignment that finds no route is retried on the next tick, and one that
 * loses the vehicle to another dispatcher is dropped.
 */

import type { Task } from "@skyroute/types";
import { ConflictError, Mutex, ValidationError, describeError } from "@skyroute/routing";
import type { AdvanceOutcome, VehicleAgent } from "../domain/vehicle-agent.js";

/** Called once when a vehicle reaches the end of its outbound route */
export type DeliveryCallback = (vehicleId: string, taskId: string | null) => void | Promise<void>;

/** Produces the next task for a vehicle that is back at base */
export interface TaskFactory {
  create(): Task | Promise<Task>;
  /** Retire a created task that could not be assigned */
  discard?(taskId: string, reason: string): void | Promise<void>;
}

export type AssignmentResult = { status: "assigned" } | { status: "no-route"; message: string };

/** Assigns a freshly created task to a vehicle */
export type AssignmentCallback = (
  vehicleId: string,
  taskId: string,
) => AssignmentResult | Promise<AssignmentResult>;

/** A vehicle was forced IDLE while it still held a task */
export type ForcedIdleCallback = (vehicleId: string, taskId: string, reason: string) => void | Promise<void>;

export interface VehicleSchedulerOptions {
  /** Milliseconds between ticks (default 2000) */
  tickIntervalMs?: number;
  /** Cruise speed in m/s (default 10) */
  speedMetersPerSecond?: number;
  taskFactory?: TaskFactory;
  assign?: AssignmentCallback;
  onForcedIdle?: ForcedIdleCallback;
}

export const DEFAULT_TICK_INTERVAL_MS = 2000;
export const DEFAULT_SPEED_MPS = 10;

export class VehicleScheduler {
  private readonly tickIntervalMs: number;
  private readonly speedMetersPerSecond: number;
  private readonly taskFactory: TaskFactory | undefined;
  private readonly assign: AssignmentCallback | undefined;
  private readonly onForcedIdle: ForcedIdleCallback | undefined;
  private readonly tickLock = new Mutex();
  /** Vehicles back at base still waiting for their next task */
  private readonly awaitingTask = new Set<string>();

  private running = false;
  private deliver: DeliveryCallback | undefined;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private inFlight: Promise<void> | undefined;
  private tickCount = 0;

  constructor(
    private readonly vehicles: () => readonly VehicleAgent[],
    options: VehicleSchedulerOptions = {},
  ) {
    this.tickIntervalMs = options.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.speedMetersPerSecond = options.speedMetersPerSecond ?? DEFAULT_SPEED_MPS;
    this.taskFactory = options.taskFactory;
    this.assign = options.assign;
    this.onForcedIdle = options.onForcedIdle;

    if (!(this.tickIntervalMs > 0)) {
      throw new ValidationError(`tickIntervalMs must be positive (got ${this.tickIntervalMs})`);
    }
    if (!(this.speedMetersPerSecond > 0)) {
      throw new ValidationError(`speedMetersPerSecond must be positive (got ${this.speedMetersPerSecond})`);
    }
  }

  /** Meters a vehicle covers in one tick */
  get stepMeters(): number {
    return this.speedMetersPerSecond * (this.tickIntervalMs / 1000);
  }

  get ticks(): number {
    return this.tickCount;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Start the loop; calling it again while running does nothing */
  start(deliver: DeliveryCallback): void {
    if (this.running) return;
    this.running = true;
    this.deliver = deliver;
    console.log(
      `[scheduler] Starting: interval=${this.tickIntervalMs}ms, speed=${this.speedMetersPerSecond}m/s, vehicles=${this.vehicles().length}`,
    );
    // An in-flight tick schedules the next one itself
    if (!this.inFlight) this.scheduleNext();
  }

  /** Stop the loop; resolves once any in-flight tick has finished */
  async stop(): Promise<void> {
    if (this.running) {
      this.running = false;
      console.log(`[scheduler] Stopping after ${this.tickCount} ticks`);
    }
    if (this.timer !== undefined) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    await this.inFlight;
  }

  /** Run one cycle now, after any cycle already in progress */
  tick(): Promise<void> {
    return this.tickLock.runExclusive(() => this.runCycle());
  }

  // ── Internal ──────────────────────────────────────────────────────────

  private scheduleNext(): void {
    if (!this.running || this.timer !== undefined) return;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.inFlight = this.loopTick();
    }, this.tickIntervalMs);
  }

  private async loopTick(): Promise<void> {
    try {
      await this.tick();
    } catch (err) {
      console.error(`[scheduler] Tick ${this.tickCount} failed: ${describeError(err)}`);
    } finally {
      this.inFlight = undefined;
      this.scheduleNext();
    }
  }

  private async runCycle(): Promise<void> {
    this.tickCount++;
    const step = this.stepMeters;
    for (const agent of this.vehicles()) {
      try {
        const outcome = await agent.exclusive((state) => state.advance(step));
        await this.afterStep(agent, outcome);
      } catch (err) {
        await this.recover(agent, describeError(err));
      }
    }
  }

  /** Side effects of a step; runs with the vehicle lock released */
  private async afterStep(agent: VehicleAgent, outcome: AdvanceOutcome): Promise<void> {
    if (outcome.kind === "delivered") {
      console.log(`[scheduler] ${agent.id} reached destination of ${outcome.taskId ?? "no task"}`);
      if (this.deliver) await this.deliver(agent.id, outcome.taskId);
      return;
    }

    if (outcome.kind === "returned") {
      console.log(`[scheduler] ${agent.id} back at base`);
      if (this.taskFactory && this.assign) this.awaitingTask.add(agent.id);
    }

    if (this.awaitingTask.has(agent.id)) await this.reassign(agent);
  }

  /** Give a waiting vehicle a new task, unless someone else already has */
  private async reassign(agent: VehicleAgent): Promise<void> {
    if (!this.taskFactory || !this.assign) return;
    if (!(await this.isFree(agent))) {
      this.awaitingTask.delete(agent.id);
      return;
    }

    const task = await this.taskFactory.create();
    let result: AssignmentResult;
    try {
      result = await this.assign(agent.id, task.id);
    } catch (err) {
      await this.discard(task.id, describeError(err));
      if (!(err instanceof ConflictError)) throw err;
      if (await this.isFree(agent)) {
        console.warn(`[scheduler] Reassignment of ${agent.id} lost ${task.id}: ${err.message}; retrying next tick`);
      } else {
        console.log(`[scheduler] ${agent.id} was dispatched elsewhere; dropping ${task.id}`);
        this.awaitingTask.delete(agent.id);
      }
      return;
    }

    if (result.status === "no-route") {
      console.warn(`[scheduler] No route for ${task.id} with ${agent.id}: ${result.message}; retrying next tick`);
      await this.discard(task.id, `no route: ${result.message}`);
      return;
    }
    this.awaitingTask.delete(agent.id);
  }

  private isFree(agent: VehicleAgent): Promise<boolean> {
    return agent.exclusive((state) => state.phase === "IDLE" && state.taskId === null);
  }

  private async discard(taskId: string, reason: string): Promise<void> {
    if (this.taskFactory?.discard) await this.taskFactory.discard(taskId, reason);
  }

  /** Force the vehicle IDLE and hand back any task it was holding */
  private async recover(agent: VehicleAgent, reason: string): Promise<void> {
    console.error(`[scheduler] Vehicle ${agent.id} failed: ${reason}; forcing IDLE`);
    const heldTaskId = await agent.exclusive((state) => {
      const taskId = state.taskId;
      state.forceIdle();
      return taskId;
    });
    if (heldTaskId === null || !this.onForcedIdle) return;
    try {
      await this.onForcedIdle(agent.id, heldTaskId, reason);
    } catch (err) {
      console.error(`[scheduler] Could not release ${heldTaskId} from ${agent.id}: ${describeError(err)}`);
    }
  }
}
