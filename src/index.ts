export type {
  JsonValue,
  JsonKind,
  JsonNull,
  JsonBool,
  JsonNumber,
  JsonString,
  JsonArray,
  JsonObject,
} from "./json/value.js";
export {
  toJsonValue,
  parseJsonValue,
  fromJsonValue,
  jsonEquals,
  writeJson,
  jsonKind,
  sameKind,
  jsonNull,
  jsonBool,
  jsonNumber,
  jsonString,
  jsonArray,
  jsonObject,
} from "./json/value.js";

export type { Path, PathPattern, PathSegment, PatternSegment } from "./json/path.js";
export {
  ROOT,
  LENGTH,
  WILDCARD,
  field,
  index,
  renderPath,
  parsePath,
  parsePathPattern,
  matchesPrefix,
  isLengthMarker,
  pathsEqual,
} from "./json/path.js";

export type { Change, ChangeKind } from "./diff/types.js";
export { diff, invertChange, invertChanges, describeChange } from "./diff/engine.js";

export type { FeatureVector, FeatureName, CriticalEvidence, ExtractionResult } from "./features/types.js";
export { FEATURE_NAMES, zeroFeatures } from "./features/types.js";
export { extract } from "./features/extract.js";

export type { CriticalityConfig, CriticalityRule } from "./config/criticality.js";
export { createCriticalityConfig, criticalityFor, DEFAULT_CRITICALITY, EMPTY_CRITICALITY } from "./config/criticality.js";
export type { WeightConfig, WeightConfigInput, FeatureScaling } from "./config/weights.js";
export { createWeightConfig, DEFAULT_WEIGHTS } from "./config/weights.js";
export type { PolicyConfig, PolicyConfigInput, OverrideRuleInput } from "./config/policy.js";
export {
  createPolicyConfig,
  DEFAULT_POLICY,
  STRICT_POLICY,
  PERMISSIVE_POLICY,
  POLICY_PRESETS,
} from "./config/policy.js";
export { loadGateConfig, loadGateConfigFile, parseGateConfig, CONFIG_FILE } from "./config/gateYaml.js";

export type { ScoreResult, ScoringStrategy, CappedAdditiveConfig } from "./scoring/index.js";
export {
  score,
  createLogisticStrategy,
  createCappedAdditiveStrategy,
  createCappedAdditiveConfig,
} from "./scoring/index.js";

export type { Decision, DecisionLabel, Evidence, OverrideRule, FeatureCondition } from "./policy/types.js";
export { decide } from "./policy/engine.js";

export type { GateConfig, Evaluation } from "./pipeline.js";
export { evaluate, DEFAULT_GATE_CONFIG } from "./pipeline.js";

export type { ValidationReport } from "./report/buildReport.js";
export { buildReport, serializeReport, hashReport } from "./report/buildReport.js";
export { formatSummary, formatGithub, formatMarkdown } from "./report/format.js";
