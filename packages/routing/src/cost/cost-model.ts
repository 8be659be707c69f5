/**
 * Edge cost model.
 *
 * Collapses an edge's distance, travel time and risk into the scalar weight
 * the planner searches over: weight = distance·Wd + time·Wt + risk·Wr.
 */

import { ValidationError } from "../errors.js";

/** Per-dimension multipliers; non-negative, need not sum to 1 */
export interface CostWeights {
  distance: number;
  time: number;
  risk: number;
}

export const DEFAULT_COST_WEIGHTS: CostWeights = {
  distance: 0.4,
  time: 0.3,
  risk: 0.3,
};

function assertNonNegative(label: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${label} must be a finite, non-negative number (got ${value})`, {
      [label]: value,
    });
  }
}

/**
 * Weighted edge cost. Pure; rejects negative or non-finite inputs.
 */
export function computeEdgeCost(
  distance: number,
  time: number,
  riskFactor: number,
  weights: CostWeights = DEFAULT_COST_WEIGHTS,
): number {
  assertNonNegative("distance", distance);
  assertNonNegative("time", time);
  assertNonNegative("riskFactor", riskFactor);
  return distance * weights.distance + time * weights.time + riskFactor * weights.risk;
}

export class CostModel {
  readonly weights: Readonly<CostWeights>;

  constructor(weights: Partial<CostWeights> = {}) {
    const merged: CostWeights = { ...DEFAULT_COST_WEIGHTS, ...weights };
    assertNonNegative("weights.distance", merged.distance);
    assertNonNegative("weights.time", merged.time);
    assertNonNegative("weights.risk", merged.risk);
    this.weights = Object.freeze(merged);
  }

  computeEdgeCost(distance: number, time: number, riskFactor = 1.0): number {
    return computeEdgeCost(distance, time, riskFactor, this.weights);
  }
}
