import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { loadGateConfig, loadGateConfigFile, parseGateConfig } from "../src/config/gateYaml.js";
import { createCriticalityConfig, criticalityFor, DEFAULT_CRITICALITY, EMPTY_CRITICALITY } from "../src/config/criticality.js";
import { DEFAULT_POLICY, PERMISSIVE_POLICY, STRICT_POLICY } from "../src/config/policy.js";
import { DEFAULT_WEIGHTS } from "../src/config/weights.js";
import { parsePath } from "../src/json/path.js";
import { zeroFeatures } from "../src/features/types.js";

describe("criticality configuration", () => {
  it("rejects empty, malformed and length patterns", () => {
    expect(() => createCriticalityConfig([["", 1]])).toThrow(/non-empty path/);
    expect(() => createCriticalityConfig([["playback", 1]])).toThrow(/criticality: invalid pattern/);
    expect(() => createCriticalityConfig([["$.items#length", 1]])).toThrow(/array length marker/);
  });

  it("rejects weights outside [0, 1] and duplicates", () => {
    expect(() => createCriticalityConfig([["$.a", 1.5]])).toThrow('criticality: weight for "$.a" must be a number in [0, 1]');
    expect(() => createCriticalityConfig([["$.a[*]", 1], ["$.a.*", 0.5]])).toThrow('criticality: duplicate pattern "$.a.*"');
  });

  it("ties between equally long patterns go to the earlier rule", () => {
    const config = createCriticalityConfig([
      ["$.ads[*]", 0.4],
      ["$.ads.slot", 0.9],
    ]);
    expect(criticalityFor(config, parsePath("$.ads.slot.id"))?.weight).toBe(0.4);
  });

  it("the default profile covers playback paths", () => {
    expect(criticalityFor(DEFAULT_CRITICALITY, parsePath("$.playback.url"))?.weight).toBe(1);
    expect(criticalityFor(DEFAULT_CRITICALITY, parsePath("$.title"))).toBeNull();
  });
});

describe("parseGateConfig", () => {
  it("an empty document means defaults", () => {
    const config = parseGateConfig(null);
    expect(config.policy).toBe(DEFAULT_POLICY);
    expect(config.weights).toBe(DEFAULT_WEIGHTS);
    expect(config.criticality).toBe(DEFAULT_CRITICALITY);
  });

  it("accepts preset names and criticality keywords", () => {
    expect(parseGateConfig({ policy: "strict" }).policy).toBe(STRICT_POLICY);
    expect(parseGateConfig({ policy: "permissive" }).policy).toBe(PERMISSIVE_POLICY);
    expect(parseGateConfig({ criticality: "none" }).criticality).toBe(EMPTY_CRITICALITY);
  });

  it("parses both condition forms", () => {
    const config = parseGateConfig({
      policy: {
        overrides: [
          { name: "text", conditions: ["removed_fields >= 4"], outcome: "FAIL" },
          { name: "object", conditions: [{ feature: "added_fields", op: ">", value: 10 }], outcome: "WARN", mode: "escalate" },
        ],
      },
    });
    expect(config.policy.overrides).toEqual([
      { name: "text", conditions: [{ feature: "removed_fields", op: ">=", value: 4 }], outcome: "FAIL", mode: "force" },
      { name: "object", conditions: [{ feature: "added_fields", op: ">", value: 10 }], outcome: "WARN", mode: "escalate" },
    ]);
  });

  it("rejects unknown keys at every level", () => {
    expect(() => parseGateConfig({ polcy: "strict" })).toThrow('.drift-gate.yml: unknown key "polcy"');
    expect(() => parseGateConfig({ policy: { warn: 0.3 } })).toThrow('.drift-gate.yml: policy: unknown key "warn"');
    expect(() => parseGateConfig({ weights: { weights: { bogus: 1 } } })).toThrow(/unknown feature "bogus"/);
  });

  it("rejects invalid values", () => {
    expect(() => parseGateConfig({ policy: { warnThreshold: 0.8 } })).toThrow(
      ".drift-gate.yml: warnThreshold (0.8) must be below failThreshold (0.72)",
    );
    expect(() => parseGateConfig({ policy: { overrides: [{ name: "x", conditions: ["removed_fields => 4"], outcome: "FAIL" }] } })).toThrow(
      /must look like "critical_changes >= 3"/,
    );
    expect(() => parseGateConfig({ policy: "lenient" })).toThrow(/unknown preset "lenient"/);
    expect(() => parseGateConfig({ criticality: { "$.a": 2 } })).toThrow(
      '.drift-gate.yml: criticality: weight for "$.a" must be a number in [0, 1]',
    );
    expect(() => parseGateConfig({ weights: { weights: { added_fields: -1 } } })).toThrow(/is negative/);
    expect(() => parseGateConfig({ scoring: "linear" })).toThrow(".drift-gate.yml: scoring must be logistic or capped");
    expect(() => parseGateConfig([1])).toThrow(".drift-gate.yml: root must be an object");
  });

  it("selects the scoring strategy", () => {
    expect(parseGateConfig({ scoring: "capped" }).scoring?.name).toBe("capped");
    expect(parseGateConfig({}).scoring?.name).toBe("logistic");
  });

  it("feeds capped weights and caps into the capped strategy", () => {
    const config = parseGateConfig({
      scoring: "capped",
      capped: { weights: { critical_changes: 0.3 }, caps: { critical_changes: 0.6 } },
    });
    const result = config.scoring?.score({ ...zeroFeatures(), critical_changes: 3, type_changes: 1 });
    expect(result?.strategy).toBe("capped");
    expect(result?.contributions.critical_changes).toBe(0.6);
    expect(result?.contributions.type_changes).toBe(0.12);
    expect(result?.risk).toBeCloseTo(0.72, 10);
  });

  it("rejects scoring sections that would be ignored", () => {
    expect(() => parseGateConfig({ scoring: "capped", weights: { bias: -1 } })).toThrow(
      ".drift-gate.yml: weights apply to logistic scoring; use capped.weights and capped.caps",
    );
    expect(() => parseGateConfig({ capped: { caps: { added_fields: 0.5 } } })).toThrow(
      ".drift-gate.yml: capped needs scoring: capped",
    );
    expect(() => parseGateConfig({ scoring: "logistic", capped: {} })).toThrow(
      ".drift-gate.yml: capped needs scoring: capped",
    );
  });

  it("validates capped weights and caps", () => {
    expect(() => parseGateConfig({ scoring: "capped", capped: { caps: { type_changes: 2 } } })).toThrow(
      '.drift-gate.yml: capped: cap "type_changes" must be a number in [0, 1]',
    );
    expect(() => parseGateConfig({ scoring: "capped", capped: { weights: { added_fields: -0.1 } } })).toThrow(
      '.drift-gate.yml: capped: weight "added_fields" must be a non-negative number',
    );
    expect(() => parseGateConfig({ scoring: "capped", capped: { limits: {} } })).toThrow(
      '.drift-gate.yml: capped: unknown key "limits"',
    );
    expect(() => parseGateConfig({ scoring: "capped", capped: { caps: { bogus: 1 } } })).toThrow(/unknown feature "bogus"/);
  });
});

describe("loadGateConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "drift-gate-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("missing file means defaults", () => {
    const config = loadGateConfig(dir);
    expect(config.policy).toBe(DEFAULT_POLICY);
    expect(config.criticality).toBe(DEFAULT_CRITICALITY);
  });

  it("reads .drift-gate.yml from the repository root", () => {
    writeFileSync(
      join(dir, ".drift-gate.yml"),
      [
        "policy:",
        "  preset: strict",
        "  warnThreshold: 0.4",
        "  topN: 3",
        "  allowedDriftPaths:",
        '    - "$.meta.requestId"',
        "  overrides:",
        "    - name: many_removals",
        "      conditions:",
        '        - "removed_fields >= 4"',
        "      outcome: FAIL",
        "weights:",
        "  bias: -1",
        "  weights:",
        "    added_fields: 0.2",
        "  scaling:",
        "    value_changes: null",
        "criticality:",
        '  "$.playback": 1',
        '  "$.ads[*].url": 0.85',
        "scoring: logistic",
        "",
      ].join("\n"),
    );
    const config = loadGateConfig(dir);
    expect(config.policy.name).toBe("strict");
    expect(config.policy.warnThreshold).toBe(0.4);
    expect(config.policy.failThreshold).toBe(0.6);
    expect(config.policy.topN).toBe(3);
    expect(config.policy.requireApprovalOnWarn).toBe(true);
    expect(config.policy.allowedDriftPaths.map((p) => p.pattern)).toEqual(["$.meta.requestId"]);
    expect(config.policy.overrides.map((r) => r.name)).toEqual(["many_removals"]);
    expect(config.weights.bias).toBe(-1);
    expect(config.weights.weights.added_fields).toBe(0.2);
    expect(config.weights.weights.critical_changes).toBe(0.18);
    expect(config.weights.scaling.value_changes).toBeUndefined();
    expect(config.criticality.rules.map((r) => [r.pattern, r.weight])).toEqual([
      ["$.playback", 1],
      ["$.ads[*].url", 0.85],
    ]);
    expect(config.scoring?.name).toBe("logistic");
  });

  it("reads a capped scoring section from YAML", () => {
    const path = join(dir, "capped.yml");
    writeFileSync(path, ["scoring: capped", "capped:", "  caps:", "    removed_fields: 0.3", ""].join("\n"));
    const result = loadGateConfigFile(path).scoring?.score({ ...zeroFeatures(), removed_fields: 5 });
    expect(result?.contributions.removed_fields).toBe(0.3);
  });

  it("reports YAML syntax errors with the file name", () => {
    writeFileSync(join(dir, ".drift-gate.yml"), "policy: [\n");
    expect(() => loadGateConfig(dir)).toThrow(/^\.drift-gate\.yml: invalid YAML/);
  });

  it("an explicit file must exist", () => {
    const path = join(dir, "missing.yml");
    expect(() => loadGateConfigFile(path)).toThrow(`${path}: config file not found`);
  });

  it("an explicit file is read with its own path in errors", () => {
    const path = join(dir, "gate.yml");
    writeFileSync(path, "scoring: linear\n");
    expect(() => loadGateConfigFile(path)).toThrow(`${path}: scoring must be logistic or capped`);
  });
});
