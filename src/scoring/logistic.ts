/**
 * Linear model squashed by a logistic: risk = 1 / (1 + e^-z),
 * z = bias + sum(w_i * x_i). Pure; weights are passed in.
 */

import type { FeatureName, FeatureVector } from "../features/types.js";
import { FEATURE_NAMES, zeroFeatures } from "../features/types.js";
import type { WeightConfig } from "../config/weights.js";
import { scaledFeature } from "../config/weights.js";
import type { ScoreResult, ScoringStrategy } from "./types.js";

export const LOGISTIC_STRATEGY = "logistic";

function clampFinite(x: number): number {
  if (x > Number.MAX_VALUE) return Number.MAX_VALUE;
  if (x < -Number.MAX_VALUE) return -Number.MAX_VALUE;
  return x;
}

export function sigmoid(z: number): number {
  return 1 / (1 + Math.exp(-z));
}

export function scoreLogistic(features: FeatureVector, weights: WeightConfig): ScoreResult {
  const contributions: Record<FeatureName, number> = { ...zeroFeatures() };
  let z = weights.bias;
  for (const name of FEATURE_NAMES) {
    const x = scaledFeature(features, name, weights.scaling);
    const c = clampFinite(weights.weights[name] * x);
    contributions[name] = c;
    z += c;
  }
  return {
    risk: sigmoid(z),
    z,
    contributions: Object.freeze(contributions),
    strategy: LOGISTIC_STRATEGY,
  };
}

export function createLogisticStrategy(weights: WeightConfig): ScoringStrategy {
  return {
    name: LOGISTIC_STRATEGY,
    score: (features) => scoreLogistic(features, weights),
  };
}
