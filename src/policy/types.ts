import type { ChangeKind } from "../diff/types.js";
import type { FeatureName, FeatureVector } from "../features/types.js";

/** Gating decision for one baseline/candidate comparison. */
export type DecisionLabel = "PASS" | "WARN" | "FAIL";

export const DECISION_LABELS: readonly DecisionLabel[] = ["PASS", "WARN", "FAIL"];

export type ComparisonOp = ">=" | ">" | "<=" | "<" | "==";

export const COMPARISON_OPS: readonly ComparisonOp[] = [">=", ">", "<=", "<", "=="];

export interface FeatureCondition {
  readonly feature: FeatureName;
  readonly op: ComparisonOp;
  readonly value: number;
}

/**
 * force: outcome replaces the threshold band.
 * escalate: outcome is a floor; a more severe band still wins.
 */
export type OverrideMode = "force" | "escalate";

/** Conditions are ANDed. Rules are tried in order; the first match applies. */
export interface OverrideRule {
  readonly name: string;
  readonly conditions: readonly FeatureCondition[];
  readonly outcome: DecisionLabel;
  readonly mode: OverrideMode;
}

export interface FeatureEvidence {
  source: "feature";
  feature: FeatureName;
  value: number;
  contribution: number;
}

export interface ChangeEvidence {
  source: "change";
  /** Rendered path, e.g. `$.playback.items[2].url`. */
  path: string;
  kind: ChangeKind;
  oldValue: unknown;
  newValue: unknown;
  criticality: number;
  pattern: string;
  contribution: number;
}

export type Evidence = FeatureEvidence | ChangeEvidence;

export interface Decision {
  label: DecisionLabel;
  risk: number;
  features: FeatureVector;
  contributions: Readonly<Record<FeatureName, number>>;
  evidence: Evidence[];
  /** Name of the first matching override rule, null when none matched. */
  matchedRule: string | null;
  gateBlocked: boolean;
}
