import { decide, rankEvidence, thresholdLabel } from "../src/policy/engine.js";
import {
  createPolicyConfig,
  DEFAULT_POLICY,
  PERMISSIVE_POLICY,
  STRICT_POLICY,
} from "../src/config/policy.js";
import type { FeatureName, FeatureVector, CriticalEvidence } from "../src/features/types.js";
import { zeroFeatures } from "../src/features/types.js";
import { parsePath } from "../src/json/path.js";
import { jsonNumber, jsonString } from "../src/json/value.js";

function features(partial: Partial<Record<FeatureName, number>>): FeatureVector {
  return { ...zeroFeatures(), ...partial };
}

const BANDS_ONLY = createPolicyConfig({ overrides: [] });

describe("threshold bands", () => {
  it("lower bounds are inclusive", () => {
    expect(decide(0.45, zeroFeatures(), BANDS_ONLY).label).toBe("WARN");
    expect(decide(0.72, zeroFeatures(), BANDS_ONLY).label).toBe("FAIL");
    expect(decide(0.4499, zeroFeatures(), BANDS_ONLY).label).toBe("PASS");
    expect(decide(0.7199, zeroFeatures(), BANDS_ONLY).label).toBe("WARN");
  });

  it("covers the ends of the range", () => {
    expect(thresholdLabel(0, BANDS_ONLY)).toBe("PASS");
    expect(thresholdLabel(1, BANDS_ONLY)).toBe("FAIL");
  });
});

describe("override rules", () => {
  it("critical type change forces FAIL at any risk", () => {
    const decision = decide(0.1, features({ critical_changes: 3, type_changes: 1 }), DEFAULT_POLICY);
    expect(decision.label).toBe("FAIL");
    expect(decision.matchedRule).toBe("critical_type_change");
  });

  it("two critical changes escalate to at least WARN", () => {
    const low = decide(0.1, features({ critical_changes: 2 }), DEFAULT_POLICY);
    expect(low.label).toBe("WARN");
    expect(low.matchedRule).toBe("critical_paths_changed");

    const high = decide(0.9, features({ critical_changes: 2 }), DEFAULT_POLICY);
    expect(high.label).toBe("FAIL");
    expect(high.matchedRule).toBe("critical_paths_changed");
  });

  it("a forced outcome can lower the band", () => {
    const policy = createPolicyConfig({
      overrides: [
        { name: "additions_only", conditions: [{ feature: "added_fields", op: ">=", value: 1 }], outcome: "PASS" },
      ],
    });
    const decision = decide(0.99, features({ added_fields: 4 }), policy);
    expect(decision.label).toBe("PASS");
    expect(decision.matchedRule).toBe("additions_only");
  });

  it("the first matching rule wins", () => {
    const policy = createPolicyConfig({
      overrides: [
        { name: "first", conditions: [{ feature: "removed_fields", op: ">", value: 0 }], outcome: "WARN" },
        { name: "second", conditions: [{ feature: "removed_fields", op: ">", value: 0 }], outcome: "FAIL" },
      ],
    });
    const decision = decide(0, features({ removed_fields: 1 }), policy);
    expect(decision.label).toBe("WARN");
    expect(decision.matchedRule).toBe("first");
  });

  it("all conditions must hold", () => {
    const decision = decide(0.1, features({ critical_changes: 3 }), createPolicyConfig({
      overrides: [
        {
          name: "both",
          conditions: [
            { feature: "critical_changes", op: ">=", value: 3 },
            { feature: "type_changes", op: "==", value: 1 },
          ],
          outcome: "FAIL",
        },
      ],
    }));
    expect(decision.label).toBe("PASS");
    expect(decision.matchedRule).toBeNull();
  });
});

describe("gate", () => {
  it("default policy blocks on FAIL only", () => {
    expect(decide(0.9, zeroFeatures(), DEFAULT_POLICY).gateBlocked).toBe(true);
    expect(decide(0.5, zeroFeatures(), DEFAULT_POLICY).gateBlocked).toBe(false);
  });

  it("strict policy blocks on WARN", () => {
    const decision = decide(0.4, zeroFeatures(), STRICT_POLICY);
    expect(decision.label).toBe("WARN");
    expect(decision.gateBlocked).toBe(true);
  });

  it("permissive policy never blocks", () => {
    const decision = decide(0.9, features({ critical_changes: 5, type_changes: 2 }), PERMISSIVE_POLICY);
    expect(decision.label).toBe("FAIL");
    expect(decision.matchedRule).toBeNull();
    expect(decision.gateBlocked).toBe(false);
  });
});

describe("evidence", () => {
  const criticalEvidence: CriticalEvidence[] = [
    {
      change: { kind: "value_changed", path: parsePath("$.playback.url"), oldValue: jsonString("a"), newValue: jsonString("b") },
      weight: 1,
      pattern: "$.playback",
    },
    {
      change: { kind: "removed", path: parsePath("$.ads.slot"), oldValue: jsonNumber(3) },
      weight: 0.5,
      pattern: "$.ads",
    },
  ];
  const vector = features({ critical_changes: 2, type_changes: 1, removed_fields: 2 });
  const contributions = { ...zeroFeatures(), critical_changes: 0.36, type_changes: 0.14, removed_fields: 0.2 };

  it("ranks features and critical changes by contribution", () => {
    const ranked = rankEvidence(vector, { contributions, criticalEvidence }, 5);
    expect(ranked.map((e) => (e.source === "feature" ? e.feature : e.path))).toEqual([
      "critical_changes",
      "removed_fields",
      "$.playback.url",
      "type_changes",
      "$.ads.slot",
    ]);
    const playback = ranked[2];
    expect(playback?.contribution).toBeCloseTo(0.18, 10);
    expect(ranked[4]?.contribution).toBeCloseTo(0.09, 10);
  });

  it("keeps change details on change evidence", () => {
    const [, , playback] = rankEvidence(vector, { contributions, criticalEvidence }, 5);
    expect(playback).toEqual({
      source: "change",
      path: "$.playback.url",
      kind: "value_changed",
      oldValue: "a",
      newValue: "b",
      criticality: 1,
      pattern: "$.playback",
      contribution: expect.any(Number),
    });
  });

  it("truncates to topN", () => {
    const policy = createPolicyConfig({ topN: 3, overrides: [] });
    const decision = decide(0.3, vector, policy, { contributions, criticalEvidence });
    expect(decision.evidence).toHaveLength(3);
  });

  it("drops change evidence that contributes nothing", () => {
    const muted: CriticalEvidence[] = [
      ...criticalEvidence,
      {
        change: { kind: "added", path: parsePath("$.debug.trace"), newValue: jsonString("x") },
        weight: 0,
        pattern: "$.debug",
      },
    ];
    const ranked = rankEvidence(features({ critical_changes: 3 }), { contributions, criticalEvidence: muted }, 10);
    expect(ranked.map((e) => (e.source === "feature" ? e.feature : e.path))).toEqual([
      "critical_changes",
      "removed_fields",
      "type_changes",
      "$.playback.url",
      "$.ads.slot",
    ]);
  });

  it("is empty without contributions", () => {
    const decision = decide(0.3, vector, DEFAULT_POLICY);
    expect(decision.evidence).toEqual([]);
    expect(decision.contributions).toEqual(zeroFeatures());
  });
});

describe("policy configuration", () => {
  it("rejects inverted thresholds", () => {
    expect(() => createPolicyConfig({ warnThreshold: 0.8 })).toThrow(
      "policy: warnThreshold (0.8) must be below failThreshold (0.72)",
    );
  });

  it("rejects thresholds outside [0, 1]", () => {
    expect(() => createPolicyConfig({ failThreshold: 1.2 })).toThrow(
      "policy: failThreshold must be a number in [0, 1], got 1.2",
    );
  });

  it("rejects a non-positive topN", () => {
    expect(() => createPolicyConfig({ topN: 0 })).toThrow("policy: topN must be a positive integer");
  });

  it("rejects duplicate rule names and empty conditions", () => {
    const rule = { name: "dup", conditions: [{ feature: "added_fields" as const, op: ">=" as const, value: 1 }], outcome: "WARN" as const };
    expect(() => createPolicyConfig({ overrides: [rule, rule] })).toThrow('policy: duplicate override rule "dup"');
    expect(() => createPolicyConfig({ overrides: [{ ...rule, conditions: [] }] })).toThrow(/needs at least one condition/);
  });

  it("rejects malformed allowed drift paths", () => {
    expect(() => createPolicyConfig({ allowedDriftPaths: ["meta"] })).toThrow(/invalid allowedDriftPaths entry/);
  });

  it("presets inherit the default overrides", () => {
    expect(STRICT_POLICY.overrides.map((r) => r.name)).toEqual(["critical_type_change", "critical_paths_changed"]);
    expect(PERMISSIVE_POLICY.overrides).toEqual([]);
  });
});
