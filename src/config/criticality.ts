/**
 * Criticality profile: ordered path-prefix patterns with a weight in [0,1].
 * A change under any pattern counts as critical; the weight ranks evidence.
 */

import type { Path, PathPattern } from "../json/path.js";
import { matchesPrefix, parsePathPattern, pathsEqual } from "../json/path.js";

export interface CriticalityRule {
  readonly pattern: string;
  readonly path: PathPattern;
  readonly weight: number;
}

export interface CriticalityConfig {
  readonly rules: readonly CriticalityRule[];
}

/** Validates every pattern and weight; throws on the first bad entry. */
export function createCriticalityConfig(
  entries: Iterable<readonly [string, number]>,
  source = "criticality",
): CriticalityConfig {
  const rules: CriticalityRule[] = [];
  for (const [pattern, weight] of entries) {
    if (pattern.trim() === "") {
      throw new Error(`${source}: pattern must be a non-empty path such as "$.playback"`);
    }
    let path: PathPattern;
    try {
      path = parsePathPattern(pattern);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`${source}: invalid pattern: ${msg}`);
    }
    if (path.some((segment) => segment.kind === "length")) {
      throw new Error(`${source}: pattern "${pattern}" must not target an array length marker`);
    }
    if (!Number.isFinite(weight) || weight < 0 || weight > 1) {
      throw new Error(`${source}: weight for "${pattern}" must be a number in [0, 1]`);
    }
    if (rules.some((r) => pathsEqual(r.path, path))) {
      throw new Error(`${source}: duplicate pattern "${pattern}"`);
    }
    rules.push(Object.freeze({ pattern, path, weight }));
  }
  return Object.freeze({ rules: Object.freeze(rules) });
}

export const EMPTY_CRITICALITY: CriticalityConfig = createCriticalityConfig([]);

/** Streaming-service profile: playback, entitlement and ad paths. */
export const DEFAULT_CRITICALITY: CriticalityConfig = createCriticalityConfig([
  ["$.playback", 1.0],
  ["$.drm", 0.95],
  ["$.entitlement", 0.95],
  ["$.manifest", 0.95],
  ["$.license", 0.9],
  ["$.ads", 0.85],
  ["$.auth", 0.8],
]);

/**
 * Most specific matching rule (longest pattern); ties go to the earlier rule.
 * Null when the path is not critical.
 */
export function criticalityFor(config: CriticalityConfig, path: Path): CriticalityRule | null {
  let best: CriticalityRule | null = null;
  for (const rule of config.rules) {
    if (!matchesPrefix(rule.path, path)) continue;
    if (best === null || rule.path.length > best.path.length) best = rule;
  }
  return best;
}
