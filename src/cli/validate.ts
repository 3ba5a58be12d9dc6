/**
 * `drift-gate validate`: compare a candidate response file against a baseline
 * file and map the decision to an exit code (0 PASS, 1 WARN, 2 FAIL, 3 error).
 * Never throws; every failure becomes exit 3 with a message on stderr.
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import type { DecisionLabel } from "../policy/types.js";
import type { GateConfig } from "../pipeline.js";
import { evaluate } from "../pipeline.js";
import type { JsonValue } from "../json/value.js";
import { parseJsonValue } from "../json/value.js";
import { loadGateConfig, loadGateConfigFile } from "../config/gateYaml.js";
import { buildReport, serializeReport } from "../report/buildReport.js";
import type { ValidationReport } from "../report/buildReport.js";
import { formatGithub, formatMarkdown, formatSummary } from "../report/format.js";

export const EXIT_PASS = 0;
export const EXIT_WARN = 1;
export const EXIT_FAIL = 2;
export const EXIT_ERROR = 3;

export type OutputFormat = "summary" | "json" | "github" | "markdown";

const FORMATS: readonly OutputFormat[] = ["summary", "json", "github", "markdown"];

export const USAGE = [
  "usage: drift-gate validate --baseline <file> --candidate <file> [options]",
  "",
  "options:",
  "  -b, --baseline <file>    baseline JSON response",
  "  -c, --candidate <file>   candidate JSON response",
  "  --config <file>          gate configuration (default: ./.drift-gate.yml when present)",
  "  -f, --format <format>    summary | json | github | markdown (default: summary)",
  "  --fail-on-warn           exit 2 on WARN",
  "",
  "exit codes: 0 PASS, 1 WARN, 2 FAIL, 3 error",
].join("\n");

export interface CliIo {
  out: (text: string) => void;
  err: (text: string) => void;
  cwd: string;
}

export interface ValidateArgs {
  baseline: string;
  candidate: string;
  config: string | null;
  format: OutputFormat;
  failOnWarn: boolean;
}

function defaultIo(): CliIo {
  return {
    out: (text) => console.log(text),
    err: (text) => console.error(text),
    cwd: process.cwd(),
  };
}

function isFormat(value: string): value is OutputFormat {
  return FORMATS.some((f) => f === value);
}

function flagValue(args: readonly string[], names: readonly string[]): string | null {
  for (const name of names) {
    const i = args.indexOf(name);
    if (i < 0) continue;
    const v = args[i + 1];
    if (v === undefined || v.startsWith("-")) {
      throw new Error(`${name} needs a value`);
    }
    return v;
  }
  return null;
}

const KNOWN_FLAGS = new Set([
  "-b",
  "--baseline",
  "-c",
  "--candidate",
  "--config",
  "-f",
  "--format",
  "--fail-on-warn",
]);
const VALUE_FLAGS = new Set(["-b", "--baseline", "-c", "--candidate", "--config", "-f", "--format"]);

/** Parses the arguments after `validate`. Throws on anything malformed. */
export function parseValidateArgs(args: readonly string[]): ValidateArgs {
  for (let i = 0; i < args.length; i++) {
    const a = args[i] ?? "";
    if (!KNOWN_FLAGS.has(a)) throw new Error(`unknown argument "${a}"`);
    if (VALUE_FLAGS.has(a)) i++;
  }

  const baseline = flagValue(args, ["-b", "--baseline"]);
  const candidate = flagValue(args, ["-c", "--candidate"]);
  if (baseline === null) throw new Error("--baseline is required");
  if (candidate === null) throw new Error("--candidate is required");

  const format = flagValue(args, ["-f", "--format"]) ?? "summary";
  if (!isFormat(format)) {
    throw new Error(`--format must be one of ${FORMATS.join(", ")}`);
  }

  return {
    baseline,
    candidate,
    config: flagValue(args, ["--config"]),
    format,
    failOnWarn: args.includes("--fail-on-warn"),
  };
}

export function exitCodeFor(label: DecisionLabel, failOnWarn: boolean): number {
  if (label === "FAIL") return EXIT_FAIL;
  if (label === "WARN") return failOnWarn ? EXIT_FAIL : EXIT_WARN;
  return EXIT_PASS;
}

export function renderReport(report: ValidationReport, format: OutputFormat): string {
  switch (format) {
    case "json":
      return serializeReport(report);
    case "github":
      return formatGithub(report);
    case "markdown":
      return formatMarkdown(report);
    case "summary":
      return formatSummary(report);
  }
}

function readJsonFile(path: string, label: string): JsonValue {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`cannot read ${label} ${path}: ${msg}`);
  }
  try {
    return parseJsonValue(text);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${label} ${path} is not valid JSON: ${msg}`);
  }
}

/** Runs `validate` and returns the exit code. */
export function runValidate(args: readonly string[], io: CliIo = defaultIo()): number {
  let parsed: ValidateArgs;
  try {
    parsed = parseValidateArgs(args);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    io.err(`drift-gate: ${msg}`);
    io.err(USAGE);
    return EXIT_ERROR;
  }

  try {
    const config: GateConfig = parsed.config !== null
      ? loadGateConfigFile(resolve(io.cwd, parsed.config))
      : loadGateConfig(io.cwd);
    const baseline = readJsonFile(resolve(io.cwd, parsed.baseline), "baseline");
    const candidate = readJsonFile(resolve(io.cwd, parsed.candidate), "candidate");

    const evaluation = evaluate(baseline, candidate, config);
    const report = buildReport(evaluation, config.policy, {
      baseline: parsed.baseline,
      candidate: parsed.candidate,
      ...(parsed.config !== null ? { config: parsed.config } : {}),
    });
    io.out(renderReport(report, parsed.format));
    return exitCodeFor(report.decision, parsed.failOnWarn);
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    io.err(`drift-gate: ${msg}`);
    return EXIT_ERROR;
  }
}

/** Entry for the bin script: `drift-gate <command> ...`. */
export function main(argv: readonly string[], io: CliIo = defaultIo()): number {
  const [command, ...rest] = argv;
  if (command === "validate") return runValidate(rest, io);
  if (command === "--help" || command === "-h" || command === "help") {
    io.out(USAGE);
    return EXIT_PASS;
  }
  io.err(command === undefined ? "drift-gate: missing command" : `drift-gate: unknown command "${command}"`);
  io.err(USAGE);
  return EXIT_ERROR;
}
