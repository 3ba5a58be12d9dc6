/**
 * Deterministic JSON stringification with binary key ordering.
 * Array order is preserved (change lists and evidence are already ordered).
 * Follows JSON.stringify for the edge cases: non-finite numbers become null,
 * undefined object members are skipped. Works from an explicit task stack, so
 * deeply nested report values serialize without recursion.
 */

import { sortedKeys } from "./CanonicalOrder.js";

type Task = { readonly literal: string } | { readonly value: unknown };

function scalarText(value: unknown): string {
  if (typeof value === "boolean") return String(value);
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "null";
  if (typeof value === "string") return JSON.stringify(value);
  return "null";
}

export function stableStringify(obj: unknown): string {
  const parts: string[] = [];
  const tasks: Task[] = [{ value: obj }];
  for (let task = tasks.pop(); task !== undefined; task = tasks.pop()) {
    if ("literal" in task) {
      parts.push(task.literal);
      continue;
    }
    const { value } = task;

    if (Array.isArray(value)) {
      tasks.push({ literal: "]" });
      for (let i = value.length - 1; i >= 0; i--) {
        tasks.push({ value: value[i] });
        if (i > 0) tasks.push({ literal: "," });
      }
      tasks.push({ literal: "[" });
      continue;
    }

    if (typeof value === "object" && value !== null) {
      const entries = new Map<string, unknown>(Object.entries(value));
      const keys = sortedKeys(value).filter((k) => entries.get(k) !== undefined);
      tasks.push({ literal: "}" });
      for (let i = keys.length - 1; i >= 0; i--) {
        const k = keys[i];
        if (k === undefined) continue;
        tasks.push({ value: entries.get(k) }, { literal: JSON.stringify(k) + ":" });
        if (i > 0) tasks.push({ literal: "," });
      }
      tasks.push({ literal: "{" });
      continue;
    }

    parts.push(scalarText(value));
  }
  return parts.join("");
}
