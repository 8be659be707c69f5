/**
 * In-memory delivery task registry.
 *
 * Claiming is a synchronous check-and-set so that two concurrent
 * assignments of the same task cannot both pass before either awaits.
 * Tasks are never deleted.
 */

import type { Coordinate, Task } from "@skyroute/types";
import { ConflictError, NotFoundError, ValidationError, isValidCoordinate } from "@skyroute/routing";

export interface TaskStoreOptions {
  /** Produces unique task ids (default task-1, task-2, ...) */
  idGenerator?: () => string;
  /** Epoch ms (default Date.now) */
  clock?: () => number;
}

function copyTask(task: Task): Task {
  return { ...task, destination: { ...task.destination } };
}

export class TaskStore {
  private readonly tasks = new Map<string, Task>();
  private readonly nextId: () => string;
  private readonly now: () => number;

  constructor(options: TaskStoreOptions = {}) {
    let counter = 0;
    this.nextId = options.idGenerator ?? (() => `task-${++counter}`);
    this.now = options.clock ?? Date.now;
  }

  get size(): number {
    return this.tasks.size;
  }

  create(destination: Coordinate): Task {
    if (!isValidCoordinate(destination)) {
      throw new ValidationError("invalid task destination", { ...destination });
    }
    const id = this.nextId();
    if (this.tasks.has(id)) {
      throw new ConflictError(`task ${id} already exists`);
    }
    const task: Task = {
      id,
      destination: { lat: destination.lat, lng: destination.lng },
      assignedVehicleId: null,
      delivered: false,
      createdAt: this.now(),
      startedAt: null,
      completedAt: null,
      cost: null,
      outcome: "pending",
    };
    this.tasks.set(id, task);
    return copyTask(task);
  }

  get(id: string): Task | undefined {
    const task = this.tasks.get(id);
    return task ? copyTask(task) : undefined;
  }

  require(id: string): Task {
    return copyTask(this.find(id));
  }

  /** All tasks in creation order */
  list(): Task[] {
    return [...this.tasks.values()].map(copyTask);
  }

  /**
   * Reserve an open task for a vehicle. Throws ConflictError when the task
   * is finished or already held by any vehicle.
   */
  claim(taskId: string, vehicleId: string): Task {
    const task = this.find(taskId);
    if (task.delivered || task.outcome !== "pending") {
      throw new ConflictError(`task ${taskId} is already ${task.outcome === "failure" ? "failed" : "delivered"}`, {
        taskId,
      });
    }
    if (task.assignedVehicleId !== null) {
      throw new ConflictError(`task ${taskId} is already assigned to ${task.assignedVehicleId}`, {
        taskId,
        assignedVehicleId: task.assignedVehicleId,
      });
    }
    task.assignedVehicleId = vehicleId;
    return copyTask(task);
  }

  /** Undo a claim that never started; a no-op for anyone else's claim */
  release(taskId: string, vehicleId: string): void {
    const task = this.tasks.get(taskId);
    if (task && task.assignedVehicleId === vehicleId && task.startedAt === null) {
      task.assignedVehicleId = null;
    }
  }

  markStarted(taskId: string, cost: number): Task {
    const task = this.find(taskId);
    task.startedAt = this.now();
    task.cost = cost;
    return copyTask(task);
  }

  markDelivered(taskId: string): Task {
    const task = this.find(taskId);
    this.assertOpen(task);
    task.delivered = true;
    task.completedAt = this.now();
    task.outcome = "success";
    return copyTask(task);
  }

  /** Terminal failure; the task stays undelivered and is not re-dispatched */
  markFailed(taskId: string, reason: string): Task {
    const task = this.find(taskId);
    this.assertOpen(task);
    task.completedAt = this.now();
    task.outcome = "failure";
    task.failureReason = reason;
    return copyTask(task);
  }

  private find(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) throw new NotFoundError(`task ${id}`);
    return task;
  }

  private assertOpen(task: Task): void {
    if (task.outcome !== "pending") {
      throw new ConflictError(`task ${task.id} is already finished (${task.outcome})`, { taskId: task.id });
    }
  }
}
