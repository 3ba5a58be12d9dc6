/**
 * .drift-gate.yml loader. Closed schema: unknown keys or invalid values throw
 * (the CLI exits 3). A missing file in the repository root means defaults.
 */

import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { parse } from "yaml";
import type { GateConfig } from "../pipeline.js";
import type { FeatureName } from "../features/types.js";
import { FEATURE_NAMES, isFeatureName } from "../features/types.js";
import type { ComparisonOp, DecisionLabel, FeatureCondition, OverrideMode } from "../policy/types.js";
import { COMPARISON_OPS, DECISION_LABELS } from "../policy/types.js";
import type { CriticalityConfig } from "./criticality.js";
import { DEFAULT_CRITICALITY, EMPTY_CRITICALITY, createCriticalityConfig } from "./criticality.js";
import type { FeatureScaling, WeightConfigInput } from "./weights.js";
import { DEFAULT_WEIGHTS, createWeightConfig } from "./weights.js";
import type { OverrideRuleInput, PolicyConfig, PolicyConfigInput } from "./policy.js";
import { DEFAULT_POLICY, POLICY_PRESETS, createPolicyConfig } from "./policy.js";
import type { CappedAdditiveInput } from "../scoring/index.js";
import { createCappedAdditiveConfig, createCappedAdditiveStrategy, createLogisticStrategy } from "../scoring/index.js";

export const CONFIG_FILE = ".drift-gate.yml";

const ALLOWED_KEYS = new Set(["policy", "weights", "criticality", "scoring", "capped"]);
const POLICY_KEYS = new Set([
  "preset",
  "name",
  "version",
  "warnThreshold",
  "failThreshold",
  "topN",
  "hardGate",
  "requireApprovalOnWarn",
  "allowedDriftPaths",
  "overrides",
]);
const WEIGHT_KEYS = new Set(["bias", "allowNegative", "weights", "scaling"]);
const CAPPED_KEYS = new Set(["weights", "caps"]);
const RULE_KEYS = new Set(["name", "conditions", "outcome", "mode"]);
const CONDITION_RE = /^\s*([a-z_]+)\s*(>=|<=|==|>|<)\s*(-?\d+(?:\.\d+)?)\s*$/;
const VALID_SCORING = new Set(["logistic", "capped"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function checkKeys(obj: Record<string, unknown>, allowed: Set<string>, where: string): void {
  for (const key of Object.keys(obj)) {
    if (!allowed.has(key)) {
      throw new Error(`${where}: unknown key "${key}"`);
    }
  }
}

function optionalNumber(obj: Record<string, unknown>, key: string, where: string): number | undefined {
  const v = obj[key];
  if (v === undefined) return undefined;
  if (typeof v !== "number" || !Number.isFinite(v)) {
    throw new Error(`${where}: ${key} must be a number`);
  }
  return v;
}

function optionalBoolean(obj: Record<string, unknown>, key: string, where: string): boolean | undefined {
  const v = obj[key];
  if (v === undefined) return undefined;
  if (typeof v !== "boolean") {
    throw new Error(`${where}: ${key} must be true or false`);
  }
  return v;
}

function optionalString(obj: Record<string, unknown>, key: string, where: string): string | undefined {
  const v = obj[key];
  if (v === undefined) return undefined;
  if (typeof v !== "string") {
    throw new Error(`${where}: ${key} must be a string`);
  }
  return v;
}

function isComparisonOp(value: unknown): value is ComparisonOp {
  return COMPARISON_OPS.some((op) => op === value);
}

function isDecisionLabel(value: unknown): value is DecisionLabel {
  return DECISION_LABELS.some((label) => label === value);
}

/** Accepts "critical_changes >= 3" or { feature, op, value }. */
function parseCondition(raw: unknown, where: string): FeatureCondition {
  if (typeof raw === "string") {
    const m = raw.match(CONDITION_RE);
    if (!m) throw new Error(`${where}: condition "${raw}" must look like "critical_changes >= 3"`);
    const [, feature, op, value] = m;
    if (!isFeatureName(feature)) throw new Error(`${where}: unknown feature "${feature ?? ""}"`);
    if (!isComparisonOp(op)) throw new Error(`${where}: unknown operator "${op ?? ""}"`);
    return { feature, op, value: Number(value) };
  }
  if (!isRecord(raw)) throw new Error(`${where}: condition must be a string or an object`);
  checkKeys(raw, new Set(["feature", "op", "value"]), where);
  if (!isFeatureName(raw.feature)) throw new Error(`${where}: unknown feature "${String(raw.feature)}"`);
  if (!isComparisonOp(raw.op)) throw new Error(`${where}: unknown operator "${String(raw.op)}"`);
  if (typeof raw.value !== "number" || !Number.isFinite(raw.value)) {
    throw new Error(`${where}: condition value must be a number`);
  }
  return { feature: raw.feature, op: raw.op, value: raw.value };
}

function parseRule(raw: unknown, where: string): OverrideRuleInput {
  if (!isRecord(raw)) throw new Error(`${where}: must be an object`);
  checkKeys(raw, RULE_KEYS, where);
  const name = optionalString(raw, "name", where);
  if (name === undefined) throw new Error(`${where}: name is required`);
  if (!Array.isArray(raw.conditions)) throw new Error(`${where}: conditions must be a list`);
  const conditions = raw.conditions.map((c, i) => parseCondition(c, `${where}.conditions[${i}]`));
  if (!isDecisionLabel(raw.outcome)) throw new Error(`${where}: outcome must be PASS, WARN or FAIL`);
  let mode: OverrideMode | undefined;
  if (raw.mode !== undefined) {
    if (raw.mode !== "force" && raw.mode !== "escalate") {
      throw new Error(`${where}: mode must be force or escalate`);
    }
    mode = raw.mode;
  }
  return { name, conditions, outcome: raw.outcome, mode };
}

function parsePolicy(raw: unknown, source: string): PolicyConfig {
  const where = `${source}: policy`;
  if (typeof raw === "string") {
    const preset = POLICY_PRESETS[raw];
    if (!preset) throw new Error(`${where}: unknown preset "${raw}" (default, strict, permissive)`);
    return preset;
  }
  if (!isRecord(raw)) throw new Error(`${where}: must be a preset name or an object`);
  checkKeys(raw, POLICY_KEYS, where);

  let base = DEFAULT_POLICY;
  const presetName = optionalString(raw, "preset", where);
  if (presetName !== undefined) {
    const preset = POLICY_PRESETS[presetName];
    if (!preset) throw new Error(`${where}: unknown preset "${presetName}" (default, strict, permissive)`);
    base = preset;
  }

  const input: PolicyConfigInput = {
    name: optionalString(raw, "name", where),
    version: optionalString(raw, "version", where),
    warnThreshold: optionalNumber(raw, "warnThreshold", where),
    failThreshold: optionalNumber(raw, "failThreshold", where),
    topN: optionalNumber(raw, "topN", where),
    hardGate: optionalBoolean(raw, "hardGate", where),
    requireApprovalOnWarn: optionalBoolean(raw, "requireApprovalOnWarn", where),
  };

  if (raw.allowedDriftPaths !== undefined) {
    const list = raw.allowedDriftPaths;
    if (!Array.isArray(list)) throw new Error(`${where}: allowedDriftPaths must be a list of paths`);
    const paths: string[] = [];
    for (let i = 0; i < list.length; i++) {
      const v: unknown = list[i];
      if (typeof v !== "string") throw new Error(`${where}: allowedDriftPaths[${i}] must be a string`);
      paths.push(v);
    }
    input.allowedDriftPaths = paths;
  }

  if (raw.overrides !== undefined) {
    if (!Array.isArray(raw.overrides)) throw new Error(`${where}: overrides must be a list`);
    input.overrides = raw.overrides.map((r, i) => parseRule(r, `${where}.overrides[${i}]`));
  }

  return createPolicyConfig(input, base, source);
}

function parseFeatureMap<T>(
  raw: unknown,
  where: string,
  read: (value: unknown, key: FeatureName) => T,
): Partial<Record<FeatureName, T>> {
  if (!isRecord(raw)) throw new Error(`${where}: must be a map of feature names`);
  const out: Partial<Record<FeatureName, T>> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!isFeatureName(key)) {
      throw new Error(`${where}: unknown feature "${key}" (expected one of ${FEATURE_NAMES.join(", ")})`);
    }
    out[key] = read(value, key);
  }
  return out;
}

function parseWeights(raw: unknown, source: string): WeightConfigInput {
  const where = `${source}: weights`;
  if (!isRecord(raw)) throw new Error(`${where}: must be an object`);
  checkKeys(raw, WEIGHT_KEYS, where);
  const input: WeightConfigInput = {
    bias: optionalNumber(raw, "bias", where),
    allowNegative: optionalBoolean(raw, "allowNegative", where),
  };
  if (raw.weights !== undefined) {
    input.weights = parseFeatureMap(raw.weights, `${where}.weights`, (value, key) => {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new Error(`${where}.weights: ${key} must be a number`);
      }
      return value;
    });
  }
  if (raw.scaling !== undefined) {
    input.scaling = parseFeatureMap(raw.scaling, `${where}.scaling`, (value, key): FeatureScaling | null => {
      if (value === null) return null;
      if (!isRecord(value)) throw new Error(`${where}.scaling: ${key} must be { divisor, cap } or null`);
      checkKeys(value, new Set(["divisor", "cap"]), `${where}.scaling.${key}`);
      const divisor = optionalNumber(value, "divisor", `${where}.scaling.${key}`);
      const cap = optionalNumber(value, "cap", `${where}.scaling.${key}`);
      if (divisor === undefined || cap === undefined) {
        throw new Error(`${where}.scaling: ${key} needs both divisor and cap`);
      }
      return { divisor, cap };
    });
  }
  return input;
}

/** `capped: { weights, caps }`; range checks happen in createCappedAdditiveConfig. */
function parseCapped(raw: unknown, source: string): CappedAdditiveInput {
  const where = `${source}: capped`;
  if (!isRecord(raw)) throw new Error(`${where}: must be an object`);
  checkKeys(raw, CAPPED_KEYS, where);
  const input: CappedAdditiveInput = {};
  for (const key of ["weights", "caps"] as const) {
    if (raw[key] === undefined) continue;
    input[key] = parseFeatureMap(raw[key], `${where}.${key}`, (value, name) => {
      if (typeof value !== "number") throw new Error(`${where}.${key}: ${name} must be a number`);
      return value;
    });
  }
  return input;
}

function parseCriticality(raw: unknown, source: string): CriticalityConfig {
  const where = `${source}: criticality`;
  if (raw === "default") return DEFAULT_CRITICALITY;
  if (raw === "none") return EMPTY_CRITICALITY;
  if (!isRecord(raw)) throw new Error(`${where}: must be "default", "none" or a map of path pattern to weight`);
  const entries: [string, number][] = [];
  for (const [pattern, weight] of Object.entries(raw)) {
    if (typeof weight !== "number") {
      throw new Error(`${where}: weight for "${pattern}" must be a number in [0, 1]`);
    }
    entries.push([pattern, weight]);
  }
  return createCriticalityConfig(entries, where);
}

/** Validate an already-parsed YAML/JSON document into a GateConfig. */
export function parseGateConfig(raw: unknown, source = CONFIG_FILE): GateConfig {
  if (raw === null || raw === undefined) {
    return { criticality: DEFAULT_CRITICALITY, weights: DEFAULT_WEIGHTS, policy: DEFAULT_POLICY };
  }
  if (!isRecord(raw)) {
    throw new Error(`${source}: root must be an object`);
  }
  checkKeys(raw, ALLOWED_KEYS, source);

  let scoring = "logistic";
  if (raw.scoring !== undefined) {
    if (typeof raw.scoring !== "string" || !VALID_SCORING.has(raw.scoring)) {
      throw new Error(`${source}: scoring must be logistic or capped`);
    }
    scoring = raw.scoring;
  }
  if (scoring === "capped" && raw.weights !== undefined) {
    throw new Error(`${source}: weights apply to logistic scoring; use capped.weights and capped.caps`);
  }
  if (scoring !== "capped" && raw.capped !== undefined) {
    throw new Error(`${source}: capped needs scoring: capped`);
  }

  const policy = raw.policy === undefined ? DEFAULT_POLICY : parsePolicy(raw.policy, source);
  const weights = raw.weights === undefined
    ? DEFAULT_WEIGHTS
    : createWeightConfig(parseWeights(raw.weights, source), DEFAULT_WEIGHTS, `${source}: weights`);
  const criticality = raw.criticality === undefined ? DEFAULT_CRITICALITY : parseCriticality(raw.criticality, source);

  if (scoring === "capped") {
    const capped = raw.capped === undefined
      ? createCappedAdditiveConfig()
      : createCappedAdditiveConfig(parseCapped(raw.capped, source), undefined, `${source}: capped`);
    return { criticality, weights, policy, scoring: createCappedAdditiveStrategy(capped) };
  }
  return { criticality, weights, policy, scoring: createLogisticStrategy(weights) };
}

function readYaml(path: string, source: string): unknown {
  try {
    const content = readFileSync(path, "utf8");
    return parse(content);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${source}: invalid YAML: ${msg}`);
  }
}

/** Explicit config file; a missing file is an error. */
export function loadGateConfigFile(path: string): GateConfig {
  if (!existsSync(path)) {
    throw new Error(`${path}: config file not found`);
  }
  return parseGateConfig(readYaml(path, path), path);
}

/** `.drift-gate.yml` in `repoRoot`; defaults when absent. */
export function loadGateConfig(repoRoot: string): GateConfig {
  const path = join(repoRoot, CONFIG_FILE);
  if (!existsSync(path)) {
    return parseGateConfig(null);
  }
  return parseGateConfig(readYaml(path, CONFIG_FILE), CONFIG_FILE);
}
