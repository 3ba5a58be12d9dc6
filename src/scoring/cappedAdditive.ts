/**
 * Additive scorer with per-feature caps: each feature adds min(w * x, cap),
 * the sum is clamped to [0, 1]. Alternative to the logistic model.
 */

import type { FeatureName, FeatureVector } from "../features/types.js";
import { FEATURE_NAMES, zeroFeatures } from "../features/types.js";
import type { ScoreResult, ScoringStrategy } from "./types.js";

export const CAPPED_ADDITIVE_STRATEGY = "capped";

export interface CappedAdditiveConfig {
  readonly weights: Readonly<Record<FeatureName, number>>;
  readonly caps: Readonly<Record<FeatureName, number>>;
}

export interface CappedAdditiveInput {
  weights?: Partial<Record<FeatureName, number>>;
  caps?: Partial<Record<FeatureName, number>>;
}

function buildCappedConfig(
  input: CappedAdditiveInput,
  base: CappedAdditiveConfig | null,
  source: string,
): CappedAdditiveConfig {
  const weights: Record<FeatureName, number> = { ...zeroFeatures() };
  const caps: Record<FeatureName, number> = { ...zeroFeatures() };
  for (const name of FEATURE_NAMES) {
    const w = input.weights?.[name] ?? base?.weights[name] ?? 0;
    const cap = input.caps?.[name] ?? base?.caps[name] ?? 0;
    if (!Number.isFinite(w) || w < 0) {
      throw new Error(`${source}: weight "${name}" must be a non-negative number`);
    }
    if (!Number.isFinite(cap) || cap < 0 || cap > 1) {
      throw new Error(`${source}: cap "${name}" must be a number in [0, 1]`);
    }
    weights[name] = w;
    caps[name] = cap;
  }
  return Object.freeze({ weights: Object.freeze(weights), caps: Object.freeze(caps) });
}

export const DEFAULT_CAPPED_CONFIG: CappedAdditiveConfig = buildCappedConfig(
  {
    weights: {
      critical_changes: 0.15,
      type_changes: 0.12,
      removed_fields: 0.08,
      added_fields: 0.02,
      value_changes: 0.02,
      array_len_changes: 0.02,
    },
    caps: {
      critical_changes: 0.45,
      type_changes: 0.25,
      removed_fields: 0.2,
      added_fields: 0.1,
      value_changes: 0.1,
      array_len_changes: 0.1,
    },
  },
  null,
  "capped",
);

export function createCappedAdditiveConfig(
  input: CappedAdditiveInput = {},
  base: CappedAdditiveConfig = DEFAULT_CAPPED_CONFIG,
  source = "capped",
): CappedAdditiveConfig {
  return buildCappedConfig(input, base, source);
}

export function scoreCappedAdditive(features: FeatureVector, config: CappedAdditiveConfig): ScoreResult {
  const contributions: Record<FeatureName, number> = { ...zeroFeatures() };
  let z = 0;
  for (const name of FEATURE_NAMES) {
    const c = Math.min(config.weights[name] * features[name], config.caps[name]);
    contributions[name] = c;
    z += c;
  }
  return {
    risk: Math.min(Math.max(z, 0), 1),
    z,
    contributions: Object.freeze(contributions),
    strategy: CAPPED_ADDITIVE_STRATEGY,
  };
}

export function createCappedAdditiveStrategy(config: CappedAdditiveConfig = DEFAULT_CAPPED_CONFIG): ScoringStrategy {
  return {
    name: CAPPED_ADDITIVE_STRATEGY,
    score: (features) => scoreCappedAdditive(features, config),
  };
}
