/**
 * A vehicle and the lock that guards it.
 *
 * All mutation goes through {@link VehicleAgent.exclusive}, which hands the
 * caller the mutable {@link VehicleState} only while it holds the vehicle's
 * mutex. Each state method is synchronous, so a snapshot taken outside the
 * lock never sees a half-applied change.
 */

import type { Coordinate, VehiclePhase, VehicleSnapshot } from "@skyroute/types";
import { Mutex, ValidationError } from "@skyroute/routing";
import { stepToward } from "../motion/motion.js";
import { assertTransition } from "./phase.js";

/** What one motion step did */
export type AdvanceOutcome =
  | { kind: "stationary" }
  | { kind: "moved" }
  | { kind: "waypoint"; index: number }
  /** Reached the end of an outbound route */
  | { kind: "delivered"; taskId: string | null }
  /** Reached the end of a return route and went IDLE */
  | { kind: "returned" };

export class VehicleState {
  private _phase: VehiclePhase = "IDLE";
  private _position: Coordinate;
  private route: Coordinate[] = [];
  private nextWaypointIndex = 0;
  private currentTaskId: string | null = null;
  private moving = false;

  constructor(
    readonly id: string,
    position: Coordinate,
  ) {
    this._position = { ...position };
  }

  get phase(): VehiclePhase {
    return this._phase;
  }

  get position(): Coordinate {
    return { ...this._position };
  }

  get taskId(): string | null {
    return this.currentTaskId;
  }

  snapshot(): VehicleSnapshot {
    return {
      id: this.id,
      position: { ...this._position },
      phase: this._phase,
      route: this.route.map((c) => ({ ...c })),
      nextWaypointIndex: this.nextWaypointIndex,
      currentTaskId: this.currentTaskId,
      moving: this.moving,
    };
  }

  /** IDLE -> OUTBOUND carrying a task */
  beginOutbound(taskId: string, route: Coordinate[]): void {
    assertTransition(this._phase, "OUTBOUND");
    if (route.length === 0) {
      throw new ValidationError(`outbound route for ${this.id} is empty`);
    }
    this._phase = "OUTBOUND";
    this.currentTaskId = taskId;
    this.installRoute(route);
  }

  /** OUTBOUND -> RETURN; the task is finished either way */
  beginReturn(route: Coordinate[]): void {
    assertTransition(this._phase, "RETURN");
    if (route.length === 0) {
      throw new ValidationError(`return route for ${this.id} is empty`);
    }
    this._phase = "RETURN";
    this.currentTaskId = null;
    this.installRoute(route);
  }

  /** Recovery: drop everything and go IDLE from any phase */
  forceIdle(): void {
    this._phase = "IDLE";
    this.currentTaskId = null;
    this.route = [];
    this.nextWaypointIndex = 0;
    this.moving = false;
  }

  /**
   * Move up to stepMeters toward the next waypoint, snapping onto it when
   * it is within reach. At most one waypoint is consumed per call.
   */
  advance(stepMeters: number): AdvanceOutcome {
    const target = this.route[this.nextWaypointIndex];
    if (!this.moving || !target) return { kind: "stationary" };

    const step = stepToward(this._position, target, stepMeters);
    this._position = step.position;
    if (!step.arrived) return { kind: "moved" };

    this.nextWaypointIndex++;
    if (this.nextWaypointIndex < this.route.length) {
      return { kind: "waypoint", index: this.nextWaypointIndex - 1 };
    }

    this.moving = false;
    if (this._phase === "OUTBOUND") {
      return { kind: "delivered", taskId: this.currentTaskId };
    }
    if (this._phase === "RETURN") {
      assertTransition(this._phase, "IDLE");
      this._phase = "IDLE";
      this.route = [];
      this.nextWaypointIndex = 0;
      return { kind: "returned" };
    }
    return { kind: "stationary" };
  }

  private installRoute(route: Coordinate[]): void {
    this.route = route.map((c) => ({ ...c }));
    this.nextWaypointIndex = 0;
    this.moving = true;
  }
}

export class VehicleAgent {
  private readonly state: VehicleState;
  private readonly lock = new Mutex();

  constructor(
    readonly id: string,
    position: Coordinate,
  ) {
    this.state = new VehicleState(id, position);
  }

  /** Run fn with exclusive access to the vehicle's state */
  exclusive<T>(fn: (state: VehicleState) => T | Promise<T>): Promise<T> {
    return this.lock.runExclusive(() => fn(this.state));
  }

  snapshot(): VehicleSnapshot {
    return this.state.snapshot();
  }

  get phase(): VehiclePhase {
    return this.state.phase;
  }
}
