import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { BoundingBox, Coordinate, RestrictedZone } from "@skyroute/types";
import {
  ConflictError,
  NotFoundError,
  RiskEstimator,
  RoutePlanner,
  ZoneSpatialIndex,
  haversineDistance,
  type RoutePlannerDeps,
} from "@skyroute/routing";
import { BASE_NODE_ID, DispatchService, type WeatherSource } from "./dispatch.service.js";
import { VehicleScheduler, type TaskFactory } from "../scheduler/vehicle-scheduler.js";

const BASE: Coordinate = { lat: 37.7, lng: -122.4 };
/** ~56m north of base */
const DEST: Coordinate = { lat: 37.7005, lng: -122.4 };
/** Random destinations land in the middle: (37.7005, -122.3995) */
const AREA: BoundingBox = { minLat: 37.7, maxLat: 37.701, minLng: -122.4, maxLng: -122.399 };

interface Fixture {
  dispatch: DispatchService;
  planner: RoutePlanner;
  riskEstimator: RiskEstimator;
}

function makeDispatch(
  vehicleIds = ["drone-1", "drone-2"],
  plannerDeps: Omit<RoutePlannerDeps, "riskEstimator"> = {},
  weather?: WeatherSource,
): Fixture {
  const riskEstimator = new RiskEstimator({ random: () => 0.5 });
  const planner = new RoutePlanner({ riskEstimator, ...plannerDeps });
  const dispatch = new DispatchService(
    { planner, riskEstimator, weather },
    { base: BASE, serviceArea: AREA, vehicleIds, speedMetersPerSecond: 10, random: () => 0.5 },
  );
  return { dispatch, planner, riskEstimator };
}

/** Cost of a direct leg at risk 1.0 with default weights */
function legCost(from: Coordinate, to: Coordinate): number {
  const d = haversineDistance(from, to);
  return 0.4 * d + 0.3 * (d / 10) + 0.3;
}

function zoneAround(center: Coordinate, half = 0.0002): RestrictedZone {
  return {
    id: "zone",
    polygons: [
      [
        [
          { lat: center.lat - half, lng: center.lng - half },
          { lat: center.lat - half, lng: center.lng + half },
          { lat: center.lat + half, lng: center.lng + half },
          { lat: center.lat + half, lng: center.lng - half },
        ],
      ],
    ],
  };
}

describe("DispatchService", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it("starts every vehicle IDLE at base", () => {
    const { dispatch, planner } = makeDispatch();
    expect(planner.getNode(BASE_NODE_ID)?.coordinate).toEqual(BASE);
    expect(dispatch.listVehicles().map((v) => [v.id, v.phase, v.position])).toEqual([
      ["drone-1", "IDLE", BASE],
      ["drone-2", "IDLE", BASE],
    ]);
  });

  it("rejects duplicate vehicle ids", () => {
    expect(() => makeDispatch(["drone-1", "drone-1"])).toThrow("duplicate vehicle id drone-1");
  });

  describe("createTask", () => {
    it("uses the given destination", () => {
      const { dispatch } = makeDispatch();
      expect(dispatch.createTask(DEST).destination).toEqual(DEST);
    });

    it("draws a destination from the service area", () => {
      const { dispatch } = makeDispatch();
      const task = dispatch.createTask();
      expect(task.destination.lat).toBeCloseTo(37.7005, 9);
      expect(task.destination.lng).toBeCloseTo(-122.3995, 9);
      expect(dispatch.taskFactory.create()).toMatchObject({ id: "task-2" });
    });
  });

  describe("assignTask", () => {
    it("plans a direct leg and sends the vehicle out", async () => {
      const { dispatch, planner } = makeDispatch();
      const task = dispatch.createTask(DEST);
      const result = await dispatch.assignTask("drone-1", task.id);

      expect(result.status).toBe("assigned");
      if (result.status !== "assigned") return;
      expect(result.plan.nodeIds).toEqual(["drone-1:origin:task-1", "task:task-1"]);
      expect(result.plan.cost).toBeCloseTo(legCost(BASE, DEST), 6);
      expect(result.task).toMatchObject({ assignedVehicleId: "drone-1", cost: result.plan.cost });
      expect(result.task.startedAt).not.toBeNull();
      expect(result.vehicle).toMatchObject({
        phase: "OUTBOUND",
        currentTaskId: "task-1",
        moving: true,
        route: [DEST],
        nextWaypointIndex: 0,
      });
      expect(planner.hasNode("task:task-1")).toBe(true);
    });

    it("rejects unknown ids", async () => {
      const { dispatch } = makeDispatch();
      const task = dispatch.createTask(DEST);
      await expect(dispatch.assignTask("ghost", task.id)).rejects.toBeInstanceOf(NotFoundError);
      await expect(dispatch.assignTask("drone-1", "task-99")).rejects.toThrow("task task-99 not found");
    });

    it("rejects a busy vehicle without touching the task", async () => {
      const { dispatch } = makeDispatch();
      const first = dispatch.createTask(DEST);
      const second = dispatch.createTask(DEST);
      await dispatch.assignTask("drone-1", first.id);
      await expect(dispatch.assignTask("drone-1", second.id)).rejects.toThrow("vehicle drone-1 is busy (OUTBOUND)");
      expect(dispatch.getTask(second.id).assignedVehicleId).toBeNull();
    });

    it("lets only one of two concurrent assignments of a task win", async () => {
      const { dispatch } = makeDispatch();
      const task = dispatch.createTask(DEST);
      const results = await Promise.allSettled([
        dispatch.assignTask("drone-1", task.id),
        dispatch.assignTask("drone-2", task.id),
      ]);

      const [won, lost] = results;
      expect(won?.status).toBe("fulfilled");
      expect(lost?.status).toBe("rejected");
      if (lost?.status === "rejected") expect(lost.reason).toBeInstanceOf(ConflictError);
      expect(dispatch.getVehicle("drone-2").phase).toBe("IDLE");
      expect(dispatch.getTask(task.id).assignedVehicleId).toBe("drone-1");
    });

    it("returns no-route and releases the claim when the destination is restricted", async () => {
      const { dispatch } = makeDispatch(["drone-1"], { spatialIndex: new ZoneSpatialIndex([zoneAround(DEST)]) });
      const task = dispatch.createTask(DEST);
      const result = await dispatch.assignTask("drone-1", task.id);

      expect(result).toMatchObject({ status: "no-route", reason: "constraint-violation" });
      expect(dispatch.getTask(task.id)).toMatchObject({ assignedVehicleId: null, startedAt: null, outcome: "pending" });
      expect(dispatch.getVehicle("drone-1").phase).toBe("IDLE");
    });

    it("rejects a delivered task", async () => {
      const { dispatch } = makeDispatch();
      const task = dispatch.createTask(DEST);
      await dispatch.assignTask("drone-1", task.id);
      await dispatch.completeDelivery("drone-1");
      await expect(dispatch.assignTask("drone-2", task.id)).rejects.toThrow("task task-1 is already delivered");
    });
  });

  describe("completeDelivery", () => {
    it("closes the task, learns from it and heads home", async () => {
      const { dispatch, riskEstimator } = makeDispatch();
      const task = dispatch.createTask(DEST);
      await dispatch.assignTask("drone-1", task.id);
      await dispatch.completeDelivery("drone-1");

      const done = dispatch.getTask(task.id);
      expect(done).toMatchObject({ delivered: true, outcome: "success" });
      expect(done.completedAt).not.toBeNull();

      const cost = done.cost ?? 0;
      const [entry] = await riskEstimator.snapshot();
      expect(entry?.signature).toBe("unknown|unknown");
      expect(entry?.value).toBeCloseTo(0.7 + 0.3 * Math.max(1, 2000 / (cost + 1)), 9);

      expect(dispatch.getVehicle("drone-1").snapshot()).toMatchObject({
        phase: "RETURN",
        currentTaskId: null,
        moving: true,
        route: [BASE],
      });
    });

    it("forces IDLE when there is no way back to base", async () => {
      const { dispatch, planner } = makeDispatch(["drone-1"]);
      const task = dispatch.createTask(DEST);
      await dispatch.assignTask("drone-1", task.id);
      planner.addNode(BASE_NODE_ID, BASE, 900);

      await dispatch.completeDelivery("drone-1");
      expect(dispatch.getVehicle("drone-1").snapshot()).toMatchObject({ phase: "IDLE", moving: false, route: [] });
      expect(dispatch.getTask(task.id).outcome).toBe("success");
    });

    it("rejects a vehicle with nothing to deliver", async () => {
      const { dispatch } = makeDispatch();
      await expect(dispatch.completeDelivery("drone-1")).rejects.toThrow("vehicle drone-1 has no delivery in progress");
    });
  });

  describe("abortDelivery", () => {
    it("fails the task, learns a failure and heads home", async () => {
      const { dispatch, riskEstimator } = makeDispatch();
      const task = dispatch.createTask(DEST);
      await dispatch.assignTask("drone-1", task.id);

      const failed = await dispatch.abortDelivery("drone-1", "operator abort");
      expect(failed).toMatchObject({ delivered: false, outcome: "failure", failureReason: "operator abort" });
      expect(failed.completedAt).not.toBeNull();

      const [entry] = await riskEstimator.snapshot();
      expect(entry?.value).toBeCloseTo(0.7 - 15, 9);
      expect(dispatch.getVehicle("drone-1").phase).toBe("RETURN");
      await expect(dispatch.assignTask("drone-2", task.id)).rejects.toThrow("task task-1 is already failed");
    });

    it("ignores the delivery callback for an aborted task", async () => {
      const { dispatch } = makeDispatch();
      const task = dispatch.createTask(DEST);
      await dispatch.assignTask("drone-1", task.id);
      await dispatch.abortDelivery("drone-1");
      await dispatch.completeDelivery("drone-1", task.id);
      expect(dispatch.getTask(task.id).outcome).toBe("failure");
      expect(dispatch.getVehicle("drone-1").phase).toBe("RETURN");
    });

    it("rejects an idle vehicle", async () => {
      const { dispatch } = makeDispatch();
      await expect(dispatch.abortDelivery("drone-1")).rejects.toBeInstanceOf(ConflictError);
    });
  });

  describe("discardTask", () => {
    it("fails an open task nobody holds", () => {
      const { dispatch } = makeDispatch();
      const task = dispatch.createTask(DEST);
      dispatch.discardTask(task.id, "no route: blocked");
      expect(dispatch.getTask(task.id)).toMatchObject({ outcome: "failure", failureReason: "no route: blocked" });
    });

    it("leaves claimed, finished and unknown tasks alone", async () => {
      const { dispatch } = makeDispatch();
      const held = dispatch.createTask(DEST);
      await dispatch.assignTask("drone-1", held.id);
      dispatch.discardTask(held.id, "late");
      dispatch.discardTask("task-99", "late");
      expect(dispatch.getTask(held.id)).toMatchObject({ outcome: "pending", assignedVehicleId: "drone-1" });
    });
  });

  describe("releaseForcedTask", () => {
    it("fails the task the vehicle was holding", async () => {
      const { dispatch } = makeDispatch();
      const task = dispatch.createTask(DEST);
      await dispatch.assignTask("drone-1", task.id);
      dispatch.releaseForcedTask("drone-1", task.id, "callback exploded");
      expect(dispatch.getTask(task.id)).toMatchObject({
        outcome: "failure",
        failureReason: "vehicle drone-1 forced idle: callback exploded",
      });
      expect(console.warn).toHaveBeenCalledWith(
        "[dispatch] Failed task-1 after drone-1 was forced idle: callback exploded",
      );
    });

    it("ignores a task held by another vehicle or already closed", async () => {
      const { dispatch } = makeDispatch();
      const task = dispatch.createTask(DEST);
      await dispatch.assignTask("drone-1", task.id);
      dispatch.releaseForcedTask("drone-2", task.id, "stale");
      expect(dispatch.getTask(task.id).outcome).toBe("pending");

      await dispatch.completeDelivery("drone-1");
      dispatch.releaseForcedTask("drone-1", task.id, "stale");
      expect(dispatch.getTask(task.id)).toMatchObject({ outcome: "success", delivered: true });
    });
  });

  it("dispatchNext creates and assigns a task", async () => {
    const { dispatch } = makeDispatch();
    const result = await dispatch.dispatchNext("drone-2");
    expect(result.status).toBe("assigned");
    expect(dispatch.listTasks()).toHaveLength(1);
    expect(dispatch.getVehicle("drone-2").snapshot().currentTaskId).toBe("task-1");
  });

  it("plans under the latest weather", () => {
    const weather: WeatherSource = { getLatest: () => ({ category: "Rain", raw: {}, fetchedAt: 0 }) };
    const { dispatch } = makeDispatch(["drone-1"], {}, weather);
    expect(dispatch.currentConditions()).toEqual({ weather: "Rain", elevationBand: "unknown" });
    expect(makeDispatch().dispatch.currentConditions()).toEqual({ weather: "unknown", elevationBand: "unknown" });
  });

  it("runs a full delivery cycle under the scheduler", async () => {
    vi.useFakeTimers();
    const { dispatch } = makeDispatch(["drone-1"]);
    const phasesAtAssign: string[] = [];
    const create = vi.spyOn(dispatch.taskFactory, "create");
    const scheduler = new VehicleScheduler(() => dispatch.agents, {
      tickIntervalMs: 2000,
      speedMetersPerSecond: 10,
      taskFactory: dispatch.taskFactory,
      assign: (vehicleId, taskId) => {
        phasesAtAssign.push(dispatch.getVehicle(vehicleId).phase);
        return dispatch.assignTask(vehicleId, taskId);
      },
    });
    const deliver = vi.fn((vehicleId: string, taskId: string | null) => dispatch.completeDelivery(vehicleId, taskId));

    const first = dispatch.createTask(DEST);
    await dispatch.assignTask("drone-1", first.id);
    scheduler.start(deliver);

    // 56m out at 20m per tick: delivered on the third tick
    await vi.advanceTimersByTimeAsync(4000);
    expect(deliver).not.toHaveBeenCalled();
    await vi.advanceTimersByTimeAsync(2000);
    expect(deliver).toHaveBeenCalledTimes(1);
    expect(dispatch.getTask(first.id)).toMatchObject({ delivered: true, outcome: "success" });
    expect(dispatch.getVehicle("drone-1").phase).toBe("RETURN");

    // and back at base three ticks later
    await vi.advanceTimersByTimeAsync(6000);
    await scheduler.stop();

    expect(deliver).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledTimes(1);
    expect(phasesAtAssign).toEqual(["IDLE"]);
    expect(dispatch.listTasks().map((t) => [t.id, t.assignedVehicleId, t.outcome])).toEqual([
      ["task-1", "drone-1", "success"],
      ["task-2", "drone-1", "pending"],
    ]);
    expect(dispatch.getVehicle("drone-1").snapshot()).toMatchObject({ phase: "OUTBOUND", currentTaskId: "task-2" });
  });

  it("keeps a manual assignment that lands while the scheduler is reassigning", async () => {
    vi.useFakeTimers();
    const { dispatch } = makeDispatch(["drone-1"]);
    const first = dispatch.createTask(DEST);
    const manual = dispatch.createTask(DEST);
    const taskFactory: TaskFactory = {
      create: async () => {
        await dispatch.assignTask("drone-1", manual.id);
        return dispatch.createTask();
      },
      discard: (taskId, reason) => dispatch.discardTask(taskId, reason),
    };
    const scheduler = new VehicleScheduler(() => dispatch.agents, {
      taskFactory,
      assign: (vehicleId, taskId) => dispatch.assignTask(vehicleId, taskId),
      onForcedIdle: (vehicleId, taskId, reason) => dispatch.releaseForcedTask(vehicleId, taskId, reason),
    });

    await dispatch.assignTask("drone-1", first.id);
    scheduler.start((vehicleId, taskId) => dispatch.completeDelivery(vehicleId, taskId));
    await vi.advanceTimersByTimeAsync(12_000);
    await scheduler.stop();

    expect(dispatch.getVehicle("drone-1").snapshot()).toMatchObject({ phase: "OUTBOUND", currentTaskId: "task-2" });
    const kept = dispatch.getTask("task-2");
    expect(kept).toMatchObject({ assignedVehicleId: "drone-1", outcome: "pending" });
    expect(kept.startedAt).not.toBeNull();
    expect(dispatch.getTask("task-3")).toMatchObject({
      outcome: "failure",
      assignedVehicleId: null,
      failureReason: "vehicle drone-1 is busy (OUTBOUND)",
    });
  });

  it("fails a reassigned task with no route and leaves the vehicle waiting at base", async () => {
    vi.useFakeTimers();
    // covers the random destination, not the first delivery
    const { dispatch } = makeDispatch(["drone-1"], {
      spatialIndex: new ZoneSpatialIndex([zoneAround({ lat: 37.7005, lng: -122.3995 })]),
    });
    const scheduler = new VehicleScheduler(() => dispatch.agents, {
      taskFactory: dispatch.taskFactory,
      assign: (vehicleId, taskId) => dispatch.assignTask(vehicleId, taskId),
    });

    const first = dispatch.createTask(DEST);
    await dispatch.assignTask("drone-1", first.id);
    scheduler.start((vehicleId, taskId) => dispatch.completeDelivery(vehicleId, taskId));
    await vi.advanceTimersByTimeAsync(12_000);
    await scheduler.stop();

    const orphan = dispatch.getTask("task-2");
    expect(orphan).toMatchObject({ outcome: "failure", assignedVehicleId: null });
    expect(orphan.failureReason).toMatch(/^no route: /);
    expect(dispatch.getVehicle("drone-1").snapshot()).toMatchObject({ phase: "IDLE", currentTaskId: null });
    expect(console.warn).toHaveBeenCalledWith(expect.stringMatching(/^\[scheduler\] No route for task-2 with drone-1: /));
  });
});
