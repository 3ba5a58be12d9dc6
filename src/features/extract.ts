/**
 * Variance feature extraction: one linear pass over a change list.
 * Length markers count toward array_len_changes, never value_changes or the
 * numeric deltas; index-wise added/removed entries already carry the
 * element-level drift. A marker under a critical pattern is critical.
 */

import type { Change } from "../diff/types.js";
import { isLengthMarker } from "../json/path.js";
import type { CriticalityConfig } from "../config/criticality.js";
import { criticalityFor } from "../config/criticality.js";
import type { CriticalEvidence, ExtractionResult, FeatureName } from "./types.js";
import { zeroFeatures } from "./types.js";

function saturatingAdd(a: number, b: number): number {
  const sum = a + b;
  return Number.isFinite(sum) ? sum : Number.MAX_VALUE;
}

function countKind(counts: Record<FeatureName, number>, change: Change): void {
  switch (change.kind) {
    case "added":
      counts.added_fields += 1;
      break;
    case "removed":
      counts.removed_fields += 1;
      break;
    case "type_changed":
      counts.type_changes += 1;
      break;
    case "value_changed":
      counts.value_changes += 1;
      if (change.numericDelta !== undefined) {
        counts.numeric_delta_sum = saturatingAdd(counts.numeric_delta_sum, change.numericDelta);
        counts.numeric_delta_max = Math.max(counts.numeric_delta_max, change.numericDelta);
      }
      break;
  }
}

export function extract(changes: readonly Change[], criticality: CriticalityConfig): ExtractionResult {
  const counts: Record<FeatureName, number> = { ...zeroFeatures() };
  const criticalEvidence: CriticalEvidence[] = [];

  for (const change of changes) {
    if (isLengthMarker(change.path)) {
      counts.array_len_changes += 1;
    } else {
      countKind(counts, change);
    }

    const rule = criticalityFor(criticality, change.path);
    if (rule) {
      counts.critical_changes += 1;
      criticalEvidence.push({ change, weight: rule.weight, pattern: rule.pattern });
    }
  }

  return { features: Object.freeze(counts), criticalEvidence };
}
