import type { Change } from "../diff/types.js";

/** Fixed feature order; contributions and reports follow it. */
export const FEATURE_NAMES = [
  "added_fields",
  "removed_fields",
  "type_changes",
  "value_changes",
  "numeric_delta_sum",
  "numeric_delta_max",
  "array_len_changes",
  "critical_changes",
] as const;

export type FeatureName = (typeof FEATURE_NAMES)[number];

export type FeatureVector = Readonly<Record<FeatureName, number>>;

export interface CriticalEvidence {
  change: Change;
  /** Criticality weight of the most specific matching pattern. */
  weight: number;
  pattern: string;
}

export interface ExtractionResult {
  features: FeatureVector;
  criticalEvidence: CriticalEvidence[];
}

export function isFeatureName(value: unknown): value is FeatureName {
  return FEATURE_NAMES.some((name) => name === value);
}

export function zeroFeatures(): FeatureVector {
  return {
    added_fields: 0,
    removed_fields: 0,
    type_changes: 0,
    value_changes: 0,
    numeric_delta_sum: 0,
    numeric_delta_max: 0,
    array_len_changes: 0,
    critical_changes: 0,
  };
}
