import { describe, it, expect } from "vitest";
import { ValidationError } from "@skyroute/routing";
import { VehicleAgent, VehicleState } from "./vehicle-agent.js";

const BASE = { lat: 37.7, lng: -122.4 };
const NEAR = { lat: 37.7001, lng: -122.4 };
const FAR = { lat: 37.71, lng: -122.4 };

function makeState(): VehicleState {
  return new VehicleState("drone-1", BASE);
}

describe("VehicleState", () => {
  it("starts IDLE and stationary", () => {
    const state = makeState();
    expect(state.snapshot()).toEqual({
      id: "drone-1",
      position: BASE,
      phase: "IDLE",
      route: [],
      nextWaypointIndex: 0,
      currentTaskId: null,
      moving: false,
    });
    expect(state.advance(20)).toEqual({ kind: "stationary" });
  });

  it("moves toward the first waypoint", () => {
    const state = makeState();
    state.beginOutbound("task-1", [FAR]);
    expect(state.advance(20)).toEqual({ kind: "moved" });
    expect(state.position.lat).toBeGreaterThan(BASE.lat);
    expect(state.position.lat).toBeLessThan(FAR.lat);
  });

  it("reports each intermediate waypoint and the delivery", () => {
    const state = makeState();
    state.beginOutbound("task-1", [NEAR, { lat: 37.7002, lng: -122.4 }]);
    expect(state.advance(20)).toEqual({ kind: "waypoint", index: 0 });
    expect(state.advance(20)).toEqual({ kind: "delivered", taskId: "task-1" });
    const snapshot = state.snapshot();
    expect(snapshot.moving).toBe(false);
    expect(snapshot.phase).toBe("OUTBOUND");
    expect(snapshot.nextWaypointIndex).toBe(2);
    expect(state.advance(20)).toEqual({ kind: "stationary" });
  });

  it("goes IDLE at the end of a return route", () => {
    const state = makeState();
    state.beginOutbound("task-1", [NEAR]);
    state.advance(20);
    state.beginReturn([BASE]);
    expect(state.taskId).toBeNull();
    expect(state.advance(20)).toEqual({ kind: "returned" });
    expect(state.snapshot()).toMatchObject({ phase: "IDLE", route: [], nextWaypointIndex: 0, moving: false });
  });

  it("rejects illegal transitions and empty routes", () => {
    const state = makeState();
    expect(() => state.beginReturn([BASE])).toThrow(ValidationError);
    expect(() => state.beginOutbound("task-1", [])).toThrow("outbound route for drone-1 is empty");
    state.beginOutbound("task-1", [FAR]);
    expect(() => state.beginOutbound("task-2", [FAR])).toThrow(ValidationError);
  });

  it("can be forced IDLE from any phase", () => {
    const state = makeState();
    state.beginOutbound("task-1", [FAR]);
    state.forceIdle();
    expect(state.snapshot()).toMatchObject({ phase: "IDLE", currentTaskId: null, moving: false, route: [] });
  });

  it("copies routes on the way in and out", () => {
    const state = makeState();
    const route = [{ ...FAR }];
    state.beginOutbound("task-1", route);
    route[0] = BASE;
    const snapshot = state.snapshot();
    expect(snapshot.route).toEqual([FAR]);
    snapshot.position.lat = 0;
    expect(state.position).toEqual(BASE);
  });
});

describe("VehicleAgent", () => {
  it("serialises access to the state", async () => {
    const agent = new VehicleAgent("drone-1", BASE);
    const order: string[] = [];
    await Promise.all([
      agent.exclusive(async (state) => {
        order.push("first:start");
        await new Promise((resolve) => setTimeout(resolve, 0));
        state.beginOutbound("task-1", [FAR]);
        order.push("first:end");
      }),
      agent.exclusive((state) => {
        order.push(`second:${state.phase}`);
      }),
    ]);
    expect(order).toEqual(["first:start", "first:end", "second:OUTBOUND"]);
    expect(agent.phase).toBe("OUTBOUND");
  });
});
