export {
  RiskEstimator,
  conditionSignature,
  outcomeReward,
  DEFAULT_RISK_OPTIONS,
  FAILURE_REWARD,
  type RiskEstimatorOptions,
  type RiskTableEntry,
} from "./risk-estimator.js";
export { createSeededRandom, type RandomSource } from "./random.js";
