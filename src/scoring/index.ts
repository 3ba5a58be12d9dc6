import type { FeatureVector } from "../features/types.js";
import type { WeightConfig } from "../config/weights.js";
import { scoreLogistic } from "./logistic.js";
import type { ScoreResult } from "./types.js";

export type { ScoreResult, ScoringStrategy } from "./types.js";
export { createLogisticStrategy, scoreLogistic, sigmoid, LOGISTIC_STRATEGY } from "./logistic.js";
export {
  createCappedAdditiveStrategy,
  createCappedAdditiveConfig,
  scoreCappedAdditive,
  DEFAULT_CAPPED_CONFIG,
  CAPPED_ADDITIVE_STRATEGY,
} from "./cappedAdditive.js";
export type { CappedAdditiveConfig, CappedAdditiveInput } from "./cappedAdditive.js";

/** Default scoring: the logistic model over `weights`. */
export function score(features: FeatureVector, weights: WeightConfig): ScoreResult {
  return scoreLogistic(features, weights);
}
