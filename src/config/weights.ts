/**
 * Linear weight configuration for the logistic scorer. Immutable once built;
 * weights are configuration, never learned state.
 */

import type { FeatureName, FeatureVector } from "../features/types.js";
import { FEATURE_NAMES, zeroFeatures } from "../features/types.js";

/** `x = min(value / divisor, cap)` before weighting. */
export interface FeatureScaling {
  readonly divisor: number;
  readonly cap: number;
}

export interface WeightConfig {
  readonly weights: Readonly<Record<FeatureName, number>>;
  readonly bias: number;
  readonly scaling: Readonly<Partial<Record<FeatureName, FeatureScaling>>>;
  readonly allowNegative: boolean;
}

export interface WeightConfigInput {
  weights?: Partial<Record<FeatureName, number>>;
  bias?: number;
  /** null drops the base scaling for that feature. */
  scaling?: Partial<Record<FeatureName, FeatureScaling | null>>;
  allowNegative?: boolean;
}

function buildWeightConfig(input: WeightConfigInput, base: WeightConfig | null, source: string): WeightConfig {
  const allowNegative = input.allowNegative ?? base?.allowNegative ?? false;

  const bias = input.bias ?? base?.bias ?? 0;
  if (!Number.isFinite(bias)) {
    throw new Error(`${source}: bias must be a finite number`);
  }

  const weights: Record<FeatureName, number> = { ...zeroFeatures() };
  for (const name of FEATURE_NAMES) {
    const w = input.weights?.[name] ?? base?.weights[name] ?? 0;
    if (!Number.isFinite(w)) {
      throw new Error(`${source}: weight "${name}" must be a finite number`);
    }
    if (w < 0 && !allowNegative) {
      throw new Error(`${source}: weight "${name}" is negative (${w}); set allowNegative to permit it`);
    }
    weights[name] = w;
  }

  const scaling: Partial<Record<FeatureName, FeatureScaling>> = {};
  for (const name of FEATURE_NAMES) {
    const override = input.scaling?.[name];
    const s = override === undefined ? base?.scaling[name] : override;
    if (s === undefined || s === null) continue;
    if (!Number.isFinite(s.divisor) || s.divisor <= 0) {
      throw new Error(`${source}: scaling "${name}" divisor must be a positive number`);
    }
    if (!Number.isFinite(s.cap) || s.cap <= 0) {
      throw new Error(`${source}: scaling "${name}" cap must be a positive number`);
    }
    scaling[name] = Object.freeze({ divisor: s.divisor, cap: s.cap });
  }

  return Object.freeze({
    weights: Object.freeze(weights),
    bias,
    scaling: Object.freeze(scaling),
    allowNegative,
  });
}

/** Interpretable defaults: critical paths and type changes dominate. */
export const DEFAULT_WEIGHTS: WeightConfig = buildWeightConfig(
  {
    weights: {
      critical_changes: 0.18,
      type_changes: 0.14,
      removed_fields: 0.1,
      added_fields: 0.05,
      array_len_changes: 0.07,
      numeric_delta_max: 0.16,
      numeric_delta_sum: 0.06,
      value_changes: 0.04,
    },
    bias: -1.2,
    scaling: {
      numeric_delta_max: { divisor: 5, cap: 10 },
      numeric_delta_sum: { divisor: 10, cap: 10 },
      value_changes: { divisor: 10, cap: 10 },
    },
  },
  null,
  "weights",
);

/** Fields missing from `input` fall back to `base` (DEFAULT_WEIGHTS). */
export function createWeightConfig(
  input: WeightConfigInput = {},
  base: WeightConfig = DEFAULT_WEIGHTS,
  source = "weights",
): WeightConfig {
  return buildWeightConfig(input, base, source);
}

export function scaledFeature(
  features: FeatureVector,
  name: FeatureName,
  scaling: Readonly<Partial<Record<FeatureName, FeatureScaling>>>,
): number {
  const value = features[name];
  const s = scaling[name];
  return s ? Math.min(value / s.divisor, s.cap) : value;
}
