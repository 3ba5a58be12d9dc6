/**
 * Validation report: plain, ordered, hashable. No timestamps, no host data;
 * the same evaluation always serializes to the same bytes.
 */

import { createHash } from "crypto";
import type { Evaluation } from "../pipeline.js";
import type { Change, ChangeKind } from "../diff/types.js";
import type { FeatureName, FeatureVector } from "../features/types.js";
import { FEATURE_NAMES } from "../features/types.js";
import type { DecisionLabel, Evidence } from "../policy/types.js";
import type { PolicyConfig } from "../config/policy.js";
import { renderPath } from "../json/path.js";
import { fromJsonValue } from "../json/value.js";
import { stableStringify } from "../determinism/StableJson.js";

export const REPORT_VERSION = "1";

export interface ReportChange {
  path: string;
  kind: ChangeKind;
  old_value?: unknown;
  new_value?: unknown;
}

export interface ReportMeta {
  baseline?: string;
  candidate?: string;
  config?: string;
}

export interface ValidationReport {
  report_version: string;
  decision: DecisionLabel;
  risk_score: number;
  gate_blocked: boolean;
  matched_rule: string | null;
  strategy: string;
  policy: {
    name: string;
    version: string;
    warn_threshold: number;
    fail_threshold: number;
    top_n: number;
  };
  features: FeatureVector;
  contributions: Record<FeatureName, number>;
  top_signals: Evidence[];
  change_count: number;
  suppressed_count: number;
  changes: ReportChange[];
  meta?: ReportMeta;
  report_hash?: string;
}

export function round(value: number, digits: number): number {
  const f = 10 ** digits;
  const r = Math.round(value * f) / f;
  return Number.isFinite(r) ? r : value;
}

export function toReportChange(change: Change): ReportChange {
  const out: ReportChange = { path: renderPath(change.path), kind: change.kind };
  if (change.kind !== "added") out.old_value = fromJsonValue(change.oldValue);
  if (change.kind !== "removed") out.new_value = fromJsonValue(change.newValue);
  return out;
}

function roundContributions(contributions: Readonly<Record<FeatureName, number>>): Record<FeatureName, number> {
  const out: Record<FeatureName, number> = { ...contributions };
  for (const name of FEATURE_NAMES) out[name] = round(contributions[name], 6);
  return out;
}

function policySummary(policy: PolicyConfig): ValidationReport["policy"] {
  return {
    name: policy.name,
    version: policy.version,
    warn_threshold: policy.warnThreshold,
    fail_threshold: policy.failThreshold,
    top_n: policy.topN,
  };
}

export function buildReport(evaluation: Evaluation, policy: PolicyConfig, meta?: ReportMeta): ValidationReport {
  const { decision, score } = evaluation;
  const report: ValidationReport = {
    report_version: REPORT_VERSION,
    decision: decision.label,
    risk_score: round(decision.risk, 4),
    gate_blocked: decision.gateBlocked,
    matched_rule: decision.matchedRule,
    strategy: score.strategy,
    policy: policySummary(policy),
    features: { ...decision.features },
    contributions: roundContributions(decision.contributions),
    top_signals: decision.evidence.map((e) => ({ ...e, contribution: round(e.contribution, 6) })),
    change_count: evaluation.changes.length,
    suppressed_count: evaluation.suppressed.length,
    changes: evaluation.changes.map(toReportChange),
  };
  if (meta != null) report.meta = { ...meta };
  report.report_hash = hashReport(report);
  return report;
}

/** Byte-identical serialization. */
export function serializeReport(report: ValidationReport): string {
  return stableStringify(report);
}

/** SHA256 over the report without its own hash field. */
export function hashReport(report: ValidationReport): string {
  const { report_hash: _ignored, ...body } = report;
  return createHash("sha256").update(stableStringify(body), "utf8").digest("hex");
}
