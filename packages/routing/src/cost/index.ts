export { CostModel, computeEdgeCost, DEFAULT_COST_WEIGHTS, type CostWeights } from "./cost-model.js";
