import { describe, it, expect } from "vitest";
import { haversineDistance } from "@skyroute/routing";
import { stepToward } from "./motion.js";

const BASE = { lat: 37.7, lng: -122.4 };
const TARGET = { lat: 37.71, lng: -122.41 };

describe("stepToward", () => {
  it("moves strictly closer without overshooting", () => {
    const before = haversineDistance(BASE, TARGET);
    const result = stepToward(BASE, TARGET, 20);
    const after = haversineDistance(result.position, TARGET);
    expect(result.arrived).toBe(false);
    expect(after).toBeLessThan(before);
    expect(before - after).toBeCloseTo(20, 0);
  });

  it("snaps onto the target when within one step", () => {
    const near = { lat: 37.70005, lng: -122.4 };
    const result = stepToward(near, BASE, 20);
    expect(result).toEqual({ position: BASE, arrived: true, remainingMeters: haversineDistance(near, BASE) });
  });

  it("snaps when already at the target", () => {
    expect(stepToward(BASE, BASE, 20).arrived).toBe(true);
  });

  it("reaches the target after enough steps", () => {
    let position = BASE;
    let steps = 0;
    for (;;) {
      const result = stepToward(position, TARGET, 200);
      position = result.position;
      steps++;
      if (result.arrived) break;
    }
    expect(position).toEqual(TARGET);
    // ~1.4km at 200m per step
    expect(steps).toBe(8);
  });
});
