import type { Task } from "@skyroute/types";
import { NoRouteError } from "@skyroute/routing";
import type { AssignTaskRequest, CreateTaskRequest } from "../models/requests.js";
import type { AssignTaskResponse } from "../models/responses.js";
import { Controller } from "./controller.js";

export class TaskController extends Controller {
  public listTasks(): Task[] {
    return this.runtime.dispatch.listTasks();
  }

  public getTask(taskId: string): Task {
    return this.runtime.dispatch.getTask(taskId);
  }

  public createTask(body: CreateTaskRequest): Task {
    const task = this.runtime.dispatch.createTask(body.destination);
    this.setStatus(201);
    return task;
  }

  /** Plan and start a delivery; a missing route surfaces as 404 */
  public async assignTask(taskId: string, body: AssignTaskRequest): Promise<AssignTaskResponse> {
    const result = await this.runtime.dispatch.assignTask(body.vehicleId, taskId);
    if (result.status === "no-route") {
      throw new NoRouteError(result.message, { taskId, vehicleId: body.vehicleId, reason: result.reason });
    }
    return { task: result.task, vehicle: result.vehicle, plan: result.plan };
  }
}
