/**
 * Report renderers: terminal summary, GitHub workflow annotations, Markdown
 * CI comment. Presentation only; deterministic over the report.
 */

import type { ValidationReport, ReportChange } from "./buildReport.js";
import type { Evidence } from "../policy/types.js";
import type { DecisionLabel } from "../policy/types.js";
import { stableStringify } from "../determinism/StableJson.js";

export const MAX_CHANGE_LINES = 10;
export const MAX_ANNOTATIONS = 5;
const PREVIEW_MAX = 60;

const MARKDOWN_ICON: Record<DecisionLabel, string> = {
  PASS: "✅",
  WARN: "⚠️",
  FAIL: "❌",
};

const GITHUB_LEVEL: Record<DecisionLabel, "notice" | "warning" | "error"> = {
  PASS: "notice",
  WARN: "warning",
  FAIL: "error",
};

function preview(value: unknown): string {
  const text = stableStringify(value);
  return text.length > PREVIEW_MAX ? text.slice(0, PREVIEW_MAX - 3) + "..." : text;
}

function signed(n: number): string {
  return (n >= 0 ? "+" : "") + n.toFixed(4);
}

export function describeReportChange(c: ReportChange): string {
  const where = `[${c.kind}] ${c.path}`;
  if (c.kind === "added") return `${where}: ${preview(c.new_value)}`;
  if (c.kind === "removed") return `${where}: ${preview(c.old_value)}`;
  return `${where}: ${preview(c.old_value)} -> ${preview(c.new_value)}`;
}

export function describeEvidence(e: Evidence): string {
  if (e.source === "feature") {
    return `${e.feature} = ${e.value} (${signed(e.contribution)})`;
  }
  return `[${e.kind}] ${e.path} criticality ${e.criticality} (${signed(e.contribution)})`;
}

/** Short recommendations keyed off the features; stable order. */
export function recommendations(report: ValidationReport): string[] {
  const out: string[] = [];
  const f = report.features;
  if (f.type_changes > 0) {
    out.push("Type changes break clients that parse by type; restore the previous representation or version the field.");
  }
  if (f.removed_fields > 0) out.push("Removed fields break consumers; confirm no client still reads them.");
  if (f.critical_changes > 0) out.push("Review changes to critical paths before promoting this build.");
  if (f.array_len_changes > 0) out.push("Array lengths changed; check pagination and list rendering.");
  if (report.decision === "WARN") out.push("Verify the flagged changes are intentional.");
  if (out.length === 0) out.push("No action required.");
  return out;
}

export function formatSummary(report: ValidationReport): string {
  const lines: string[] = [];
  lines.push(`drift-gate: ${report.decision}`);
  lines.push(`  risk score:   ${report.risk_score.toFixed(4)} (warn >= ${report.policy.warn_threshold}, fail >= ${report.policy.fail_threshold})`);
  const suppressed = report.suppressed_count > 0 ? ` (${report.suppressed_count} allowed)` : "";
  lines.push(`  changes:      ${report.change_count}${suppressed}`);
  if (report.matched_rule) lines.push(`  override:     ${report.matched_rule}`);
  lines.push(`  gate:         ${report.gate_blocked ? "blocked" : "open"}`);

  if (report.top_signals.length > 0) {
    lines.push("");
    lines.push("Top signals:");
    for (const e of report.top_signals) lines.push(`  ${describeEvidence(e)}`);
  }

  if (report.changes.length > 0) {
    lines.push("");
    lines.push("Changes:");
    for (const c of report.changes.slice(0, MAX_CHANGE_LINES)) lines.push(`  ${describeReportChange(c)}`);
    if (report.changes.length > MAX_CHANGE_LINES) {
      lines.push(`  ... and ${report.changes.length - MAX_CHANGE_LINES} more`);
    }
  }
  return lines.join("\n");
}

/** Workflow-command data escaping. */
export function escapeGithubData(text: string): string {
  return text.replace(/%/g, "%25").replace(/\r/g, "%0D").replace(/\n/g, "%0A");
}

export function formatGithub(report: ValidationReport): string {
  const lines: string[] = [];
  const level = GITHUB_LEVEL[report.decision];
  const rule = report.matched_rule ? `, rule ${report.matched_rule}` : "";
  lines.push(
    `::${level} title=drift-gate::${escapeGithubData(
      `${report.decision}, risk ${report.risk_score.toFixed(4)} (${report.change_count} changes${rule})`,
    )}`,
  );
  let annotated = 0;
  for (const c of report.changes) {
    if (annotated >= MAX_ANNOTATIONS) break;
    if (c.kind === "type_changed") {
      lines.push(`::error::${escapeGithubData(`Type change at ${c.path}: ${preview(c.old_value)} -> ${preview(c.new_value)}`)}`);
      annotated++;
    } else if (c.kind === "removed") {
      lines.push(`::warning::${escapeGithubData(`Removed field at ${c.path}`)}`);
      annotated++;
    }
  }
  return lines.join("\n");
}

export function formatMarkdown(report: ValidationReport): string {
  const lines: string[] = [];
  lines.push(`### ${MARKDOWN_ICON[report.decision]} drift-gate: ${report.decision}`);
  lines.push("");
  lines.push(
    `**Risk score:** ${report.risk_score.toFixed(4)} (warn ≥ ${report.policy.warn_threshold}, fail ≥ ${report.policy.fail_threshold}, policy \`${report.policy.name}\`)`,
  );
  if (report.matched_rule) lines.push(`**Override:** \`${report.matched_rule}\``);
  lines.push(`**Changes:** ${report.change_count}${report.gate_blocked ? " · gate blocked" : ""}`);

  if (report.top_signals.length > 0) {
    lines.push("");
    lines.push("| Signal | Contribution |");
    lines.push("| --- | --- |");
    for (const e of report.top_signals) {
      const label = e.source === "feature" ? `\`${e.feature}\` = ${e.value}` : `${e.kind} \`${e.path}\``;
      lines.push(`| ${label.replace(/\|/g, "\\|")} | ${signed(e.contribution)} |`);
    }
  }

  lines.push("");
  lines.push("**Recommendations:**");
  for (const r of recommendations(report)) lines.push(`- ${r}`);
  return lines.join("\n");
}
