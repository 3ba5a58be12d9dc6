import type { FeatureName, FeatureVector } from "../features/types.js";

export interface ScoreResult {
  /** Bounded risk in [0, 1]. */
  risk: number;
  /** Unbounded linear sum before squashing or clamping. */
  z: number;
  /** Signed per-feature share of `z`. */
  contributions: Readonly<Record<FeatureName, number>>;
  strategy: string;
}

/**
 * Any scorer that returns a [0,1] risk and a per-feature breakdown can stand
 * in for the logistic model.
 */
export interface ScoringStrategy {
  readonly name: string;
  score(features: FeatureVector): ScoreResult;
}
