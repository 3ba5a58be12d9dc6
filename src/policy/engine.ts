/**
 * Policy engine. Total over valid inputs: override rules first (first match
 * wins), then threshold bands [0,warn) PASS, [warn,fail) WARN, [fail,1] FAIL.
 * Evidence is ranked by absolute contribution.
 */

import type { FeatureName, FeatureVector, CriticalEvidence } from "../features/types.js";
import { FEATURE_NAMES, zeroFeatures } from "../features/types.js";
import type { PolicyConfig } from "../config/policy.js";
import { renderPath } from "../json/path.js";
import { fromJsonValue } from "../json/value.js";
import type { ComparisonOp, Decision, DecisionLabel, Evidence, FeatureCondition, OverrideRule } from "./types.js";

const SEVERITY: Record<DecisionLabel, number> = { PASS: 0, WARN: 1, FAIL: 2 };

export interface DecisionEvidenceInput {
  contributions: Readonly<Record<FeatureName, number>>;
  criticalEvidence: readonly CriticalEvidence[];
}

function compare(actual: number, op: ComparisonOp, expected: number): boolean {
  switch (op) {
    case ">=":
      return actual >= expected;
    case ">":
      return actual > expected;
    case "<=":
      return actual <= expected;
    case "<":
      return actual < expected;
    case "==":
      return actual === expected;
  }
}

export function conditionHolds(condition: FeatureCondition, features: FeatureVector): boolean {
  return compare(features[condition.feature], condition.op, condition.value);
}

export function ruleMatches(rule: OverrideRule, features: FeatureVector): boolean {
  return rule.conditions.every((c) => conditionHolds(c, features));
}

export function findOverride(rules: readonly OverrideRule[], features: FeatureVector): OverrideRule | null {
  for (const rule of rules) {
    if (ruleMatches(rule, features)) return rule;
  }
  return null;
}

/** Band lower bounds are inclusive. */
export function thresholdLabel(risk: number, policy: PolicyConfig): DecisionLabel {
  if (risk >= policy.failThreshold) return "FAIL";
  if (risk >= policy.warnThreshold) return "WARN";
  return "PASS";
}

export function moreSevere(a: DecisionLabel, b: DecisionLabel): DecisionLabel {
  return SEVERITY[b] > SEVERITY[a] ? b : a;
}

/**
 * Features and critical changes with a non-zero contribution, sorted by
 * absolute contribution. A change contributes its criticality times the
 * critical_changes weight share. Ties keep features first, then input order.
 */
export function rankEvidence(
  features: FeatureVector,
  input: DecisionEvidenceInput,
  topN: number,
): Evidence[] {
  const criticalWeight = features.critical_changes > 0
    ? input.contributions.critical_changes / features.critical_changes
    : 0;

  const items: Evidence[] = [];
  for (const name of FEATURE_NAMES) {
    const contribution = input.contributions[name];
    if (contribution === 0) continue;
    items.push({ source: "feature", feature: name, value: features[name], contribution });
  }
  for (const ev of input.criticalEvidence) {
    const contribution = ev.weight * criticalWeight;
    if (contribution === 0) continue;
    const change = ev.change;
    items.push({
      source: "change",
      path: renderPath(change.path),
      kind: change.kind,
      oldValue: change.kind === "added" ? null : fromJsonValue(change.oldValue),
      newValue: change.kind === "removed" ? null : fromJsonValue(change.newValue),
      criticality: ev.weight,
      pattern: ev.pattern,
      contribution,
    });
  }

  // stable sort: ties keep insertion order
  return items
    .sort((a, b) => Math.abs(b.contribution) - Math.abs(a.contribution))
    .slice(0, topN);
}

export function isGateBlocked(label: DecisionLabel, policy: PolicyConfig): boolean {
  if (label === "FAIL") return policy.hardGate;
  if (label === "WARN") return policy.requireApprovalOnWarn;
  return false;
}

/**
 * Decide PASS / WARN / FAIL. Without `evidence` only the label and risk are
 * meaningful; contributions default to zero and the evidence list is empty.
 */
export function decide(
  risk: number,
  features: FeatureVector,
  policy: PolicyConfig,
  evidence?: DecisionEvidenceInput,
): Decision {
  const banded = thresholdLabel(risk, policy);
  const rule = findOverride(policy.overrides, features);

  let label = banded;
  if (rule) {
    label = rule.mode === "force" ? rule.outcome : moreSevere(banded, rule.outcome);
  }

  const contributions = evidence?.contributions ?? zeroFeatures();
  return {
    label,
    risk,
    features,
    contributions,
    evidence: evidence ? rankEvidence(features, evidence, policy.topN) : [],
    matchedRule: rule ? rule.name : null,
    gateBlocked: isGateBlocked(label, policy),
  };
}
