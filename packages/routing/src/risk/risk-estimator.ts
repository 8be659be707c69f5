/**
 * Learned risk multiplier per (vehicle, conditions).
 *
 * A bandit-style table: every completed or failed delivery nudges the value
 * for the conditions it was flown under toward a reward, and planning reads
 * it back (plus a little exploration noise) as the multiplier applied to
 * every edge weight.
 */

import type { DeliveryOutcome, FlightConditions } from "@skyroute/types";
import { Mutex } from "../concurrency/mutex.js";
import { ValidationError } from "../errors.js";
import type { RandomSource } from "./random.js";

export interface RiskEstimatorOptions {
  /** Step size α of the update (default 0.3) */
  learningRate?: number;
  /** Half-width of the uniform exploration noise (default 0.05) */
  explorationNoise?: number;
  /** Floor applied on read so edge weights never reach zero (default 0.1) */
  minRiskFactor?: number;
  /** Value for keys never updated (default 1.0) */
  initialValue?: number;
  /** Noise source; inject a seeded one for reproducible plans */
  random?: RandomSource;
}

export const DEFAULT_RISK_OPTIONS: Required<Omit<RiskEstimatorOptions, "random">> = {
  learningRate: 0.3,
  explorationNoise: 0.05,
  minRiskFactor: 0.1,
  initialValue: 1.0,
};

/** Reward fed back for a failed delivery */
export const FAILURE_REWARD = -50;

export interface RiskTableEntry {
  vehicleId: string;
  signature: string;
  value: number;
}

/** Stable signature for a set of conditions: "<weather>|<elevationBand>" */
export function conditionSignature(conditions: FlightConditions = {}): string {
  const weather = conditions.weather?.trim() || "unknown";
  const band = conditions.elevationBand?.trim() || "unknown";
  return `${weather}|${band}`;
}

/** Reward for an outcome: cheaper successful deliveries earn more, never below 1 */
export function outcomeReward(outcome: DeliveryOutcome, costIncurred: number): number {
  if (outcome === "failure") return FAILURE_REWARD;
  return Math.max(1, 2000 / (costIncurred + 1));
}

function tableKey(vehicleId: string, signature: string): string {
  return JSON.stringify([vehicleId, signature]);
}

export class RiskEstimator {
  private readonly table = new Map<string, RiskTableEntry>();
  private readonly lock = new Mutex();
  private readonly options: Required<Omit<RiskEstimatorOptions, "random">>;
  private readonly random: RandomSource;

  constructor(options: RiskEstimatorOptions = {}) {
    const { random, ...rest } = options;
    this.options = { ...DEFAULT_RISK_OPTIONS, ...rest };
    this.random = random ?? Math.random;

    const { learningRate, explorationNoise, minRiskFactor } = this.options;
    if (!(learningRate > 0 && learningRate <= 1)) {
      throw new ValidationError(`learningRate must be in (0, 1] (got ${learningRate})`);
    }
    if (!(explorationNoise >= 0)) {
      throw new ValidationError(`explorationNoise must be non-negative (got ${explorationNoise})`);
    }
    if (!(minRiskFactor > 0)) {
      throw new ValidationError(`minRiskFactor must be positive (got ${minRiskFactor})`);
    }
  }

  /**
   * Multiplier for planning: learned value + noise in [-noise, +noise],
   * floored at minRiskFactor.
   */
  async getRiskFactor(vehicleId: string, conditions: FlightConditions = {}): Promise<number> {
    const learned = await this.lock.runExclusive(() => this.read(vehicleId, conditions));
    const noise = (this.random() * 2 - 1) * this.options.explorationNoise;
    return Math.max(this.options.minRiskFactor, learned + noise);
  }

  /**
   * Fold one delivery outcome into the table:
   * new = (1 - α)·old + α·reward. Returns the new value.
   */
  async updateExperience(
    vehicleId: string,
    outcome: DeliveryOutcome,
    conditions: FlightConditions,
    costIncurred: number,
  ): Promise<number> {
    if (!Number.isFinite(costIncurred) || costIncurred < 0) {
      throw new ValidationError(`costIncurred must be a finite, non-negative number (got ${costIncurred})`);
    }
    const reward = outcomeReward(outcome, costIncurred);
    const alpha = this.options.learningRate;

    return this.lock.runExclusive(() => {
      const signature = conditionSignature(conditions);
      const old = this.read(vehicleId, conditions);
      const value = (1 - alpha) * old + alpha * reward;
      this.table.set(tableKey(vehicleId, signature), { vehicleId, signature, value });
      return value;
    });
  }

  /** Copy of every learned entry */
  async snapshot(): Promise<RiskTableEntry[]> {
    return this.lock.runExclusive(() => [...this.table.values()].map((entry) => ({ ...entry })));
  }

  private read(vehicleId: string, conditions: FlightConditions): number {
    const entry = this.table.get(tableKey(vehicleId, conditionSignature(conditions)));
    return entry?.value ?? this.options.initialValue;
  }
}
