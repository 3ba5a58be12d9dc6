/**
 * diff -> extract -> score -> decide. Stateless: one call per
 * baseline/candidate pair, safe to run from any number of callers at once.
 */

import type { Change } from "./diff/types.js";
import { diff } from "./diff/engine.js";
import type { CriticalEvidence, FeatureVector } from "./features/types.js";
import { extract } from "./features/extract.js";
import type { CriticalityConfig } from "./config/criticality.js";
import { DEFAULT_CRITICALITY } from "./config/criticality.js";
import type { WeightConfig } from "./config/weights.js";
import { DEFAULT_WEIGHTS } from "./config/weights.js";
import type { AllowedDriftPath, PolicyConfig } from "./config/policy.js";
import { DEFAULT_POLICY } from "./config/policy.js";
import type { ScoreResult, ScoringStrategy } from "./scoring/index.js";
import { createLogisticStrategy } from "./scoring/index.js";
import { decide } from "./policy/engine.js";
import type { Decision } from "./policy/types.js";
import type { JsonValue } from "./json/value.js";
import { matchesPrefix } from "./json/path.js";

export interface GateConfig {
  criticality: CriticalityConfig;
  weights: WeightConfig;
  policy: PolicyConfig;
  /** Defaults to the logistic model over `weights`. */
  scoring?: ScoringStrategy;
}

export const DEFAULT_GATE_CONFIG: GateConfig = Object.freeze({
  criticality: DEFAULT_CRITICALITY,
  weights: DEFAULT_WEIGHTS,
  policy: DEFAULT_POLICY,
});

export interface Evaluation {
  changes: Change[];
  /** Changes dropped by the policy's allowedDriftPaths. */
  suppressed: Change[];
  features: FeatureVector;
  criticalEvidence: CriticalEvidence[];
  score: ScoreResult;
  decision: Decision;
}

export function partitionAllowed(
  changes: readonly Change[],
  allowed: readonly AllowedDriftPath[],
): { kept: Change[]; suppressed: Change[] } {
  const kept: Change[] = [];
  const suppressed: Change[] = [];
  for (const change of changes) {
    if (allowed.some((a) => matchesPrefix(a.path, change.path))) {
      suppressed.push(change);
    } else {
      kept.push(change);
    }
  }
  return { kept, suppressed };
}

export function evaluate(
  baseline: JsonValue,
  candidate: JsonValue,
  config: GateConfig = DEFAULT_GATE_CONFIG,
): Evaluation {
  const { kept, suppressed } = partitionAllowed(diff(baseline, candidate), config.policy.allowedDriftPaths);
  const { features, criticalEvidence } = extract(kept, config.criticality);
  const strategy = config.scoring ?? createLogisticStrategy(config.weights);
  const score = strategy.score(features);
  const decision = decide(score.risk, features, config.policy, {
    contributions: score.contributions,
    criticalEvidence,
  });
  return { changes: kept, suppressed, features, criticalEvidence, score, decision };
}
