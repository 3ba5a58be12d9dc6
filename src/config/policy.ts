/**
 * Policy configuration: thresholds, ordered override rules, evidence size and
 * gate behaviour. Malformed values are rejected here, never at decision time.
 */

import type { PathPattern } from "../json/path.js";
import { parsePathPattern } from "../json/path.js";
import type { DecisionLabel, FeatureCondition, OverrideMode, OverrideRule } from "../policy/types.js";
import { COMPARISON_OPS, DECISION_LABELS } from "../policy/types.js";
import { isFeatureName } from "../features/types.js";

export const DEFAULT_TOP_N = 5;

export interface AllowedDriftPath {
  readonly pattern: string;
  readonly path: PathPattern;
}

export interface PolicyConfig {
  readonly name: string;
  readonly version: string;
  readonly warnThreshold: number;
  readonly failThreshold: number;
  readonly overrides: readonly OverrideRule[];
  readonly topN: number;
  /** FAIL blocks the gate. */
  readonly hardGate: boolean;
  /** WARN blocks the gate until approved. */
  readonly requireApprovalOnWarn: boolean;
  /** Changes under these prefixes are dropped before extraction. */
  readonly allowedDriftPaths: readonly AllowedDriftPath[];
}

export interface OverrideRuleInput {
  name: string;
  conditions: readonly FeatureCondition[];
  outcome: DecisionLabel;
  mode?: OverrideMode;
}

export interface PolicyConfigInput {
  name?: string;
  version?: string;
  warnThreshold?: number;
  failThreshold?: number;
  overrides?: readonly OverrideRuleInput[];
  topN?: number;
  hardGate?: boolean;
  requireApprovalOnWarn?: boolean;
  allowedDriftPaths?: readonly string[];
}

function checkThreshold(value: number, label: string, source: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new Error(`${source}: ${label} must be a number in [0, 1], got ${String(value)}`);
  }
}

function buildRule(input: OverrideRuleInput, position: number, source: string): OverrideRule {
  const where = `${source}: overrides[${position}]`;
  if (typeof input.name !== "string" || input.name.trim() === "") {
    throw new Error(`${where}: name must be a non-empty string`);
  }
  if (input.conditions.length === 0) {
    throw new Error(`${where} "${input.name}": needs at least one condition`);
  }
  const conditions: FeatureCondition[] = [];
  for (const c of input.conditions) {
    if (!isFeatureName(c.feature)) {
      throw new Error(`${where} "${input.name}": unknown feature "${String(c.feature)}"`);
    }
    if (!COMPARISON_OPS.includes(c.op)) {
      throw new Error(`${where} "${input.name}": unknown operator "${String(c.op)}"`);
    }
    if (!Number.isFinite(c.value)) {
      throw new Error(`${where} "${input.name}": condition value must be a finite number`);
    }
    conditions.push(Object.freeze({ feature: c.feature, op: c.op, value: c.value }));
  }
  if (!DECISION_LABELS.includes(input.outcome)) {
    throw new Error(`${where} "${input.name}": outcome must be PASS, WARN or FAIL`);
  }
  const mode = input.mode ?? "force";
  if (mode !== "force" && mode !== "escalate") {
    throw new Error(`${where} "${input.name}": mode must be force or escalate`);
  }
  return Object.freeze({
    name: input.name,
    conditions: Object.freeze(conditions),
    outcome: input.outcome,
    mode,
  });
}

function buildPolicyConfig(input: PolicyConfigInput, base: PolicyConfig | null, source: string): PolicyConfig {
  const warnThreshold = input.warnThreshold ?? base?.warnThreshold ?? 0.45;
  const failThreshold = input.failThreshold ?? base?.failThreshold ?? 0.72;
  checkThreshold(warnThreshold, "warnThreshold", source);
  checkThreshold(failThreshold, "failThreshold", source);
  if (warnThreshold >= failThreshold) {
    throw new Error(`${source}: warnThreshold (${warnThreshold}) must be below failThreshold (${failThreshold})`);
  }

  const topN = input.topN ?? base?.topN ?? DEFAULT_TOP_N;
  if (!Number.isInteger(topN) || topN < 1) {
    throw new Error(`${source}: topN must be a positive integer`);
  }

  let overrides: readonly OverrideRule[];
  if (input.overrides !== undefined) {
    const built = input.overrides.map((r, i) => buildRule(r, i, source));
    const names = new Set<string>();
    for (const rule of built) {
      if (names.has(rule.name)) throw new Error(`${source}: duplicate override rule "${rule.name}"`);
      names.add(rule.name);
    }
    overrides = Object.freeze(built);
  } else {
    overrides = base?.overrides ?? Object.freeze([]);
  }

  let allowedDriftPaths: readonly AllowedDriftPath[];
  if (input.allowedDriftPaths !== undefined) {
    allowedDriftPaths = Object.freeze(
      input.allowedDriftPaths.map((pattern) => {
        try {
          return Object.freeze({ pattern, path: parsePathPattern(pattern) });
        } catch (err) {
          const msg = err instanceof Error ? err.message : String(err);
          throw new Error(`${source}: invalid allowedDriftPaths entry: ${msg}`);
        }
      }),
    );
  } else {
    allowedDriftPaths = base?.allowedDriftPaths ?? Object.freeze([]);
  }

  return Object.freeze({
    name: input.name ?? base?.name ?? "default",
    version: input.version ?? base?.version ?? "1.0.0",
    warnThreshold,
    failThreshold,
    overrides,
    topN,
    hardGate: input.hardGate ?? base?.hardGate ?? true,
    requireApprovalOnWarn: input.requireApprovalOnWarn ?? base?.requireApprovalOnWarn ?? false,
    allowedDriftPaths,
  });
}

/** Three or more critical changes with a type change fail regardless of score. */
export const CRITICAL_TYPE_CHANGE_RULE: OverrideRuleInput = {
  name: "critical_type_change",
  conditions: [
    { feature: "critical_changes", op: ">=", value: 3 },
    { feature: "type_changes", op: ">=", value: 1 },
  ],
  outcome: "FAIL",
  mode: "force",
};

export const CRITICAL_PATHS_CHANGED_RULE: OverrideRuleInput = {
  name: "critical_paths_changed",
  conditions: [{ feature: "critical_changes", op: ">=", value: 2 }],
  outcome: "WARN",
  mode: "escalate",
};

export const DEFAULT_POLICY: PolicyConfig = buildPolicyConfig(
  {
    name: "default",
    warnThreshold: 0.45,
    failThreshold: 0.72,
    overrides: [CRITICAL_TYPE_CHANGE_RULE, CRITICAL_PATHS_CHANGED_RULE],
  },
  null,
  "policy",
);

/** Production: lower thresholds, WARN needs approval. */
export const STRICT_POLICY: PolicyConfig = buildPolicyConfig(
  {
    name: "strict",
    warnThreshold: 0.35,
    failThreshold: 0.6,
    requireApprovalOnWarn: true,
  },
  DEFAULT_POLICY,
  "policy",
);

/** Development: higher thresholds, no overrides, FAIL does not block. */
export const PERMISSIVE_POLICY: PolicyConfig = buildPolicyConfig(
  {
    name: "permissive",
    warnThreshold: 0.6,
    failThreshold: 0.85,
    overrides: [],
    hardGate: false,
  },
  DEFAULT_POLICY,
  "policy",
);

export const POLICY_PRESETS: Readonly<Record<string, PolicyConfig>> = Object.freeze({
  default: DEFAULT_POLICY,
  strict: STRICT_POLICY,
  permissive: PERMISSIVE_POLICY,
});

/** Fields missing from `input` fall back to `base` (DEFAULT_POLICY). */
export function createPolicyConfig(
  input: PolicyConfigInput = {},
  base: PolicyConfig = DEFAULT_POLICY,
  source = "policy",
): PolicyConfig {
  return buildPolicyConfig(input, base, source);
}
