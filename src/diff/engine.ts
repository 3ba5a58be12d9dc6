/**
 * Hierarchical JSON diff. Depth-first, pre-order over the baseline's own
 * key/index order; candidate-only keys follow the baseline keys of the same
 * object, in candidate order. No error path: every pair yields a list.
 */

import type { JsonArray, JsonObject, JsonValue } from "../json/value.js";
import { jsonNumber, writeJson } from "../json/value.js";
import type { Path, PathSegment } from "../json/path.js";
import { LENGTH, field, index, renderPath } from "../json/path.js";
import type { Change } from "./types.js";

const PREVIEW_MAX = 60;

export function numericDelta(before: number, after: number): number {
  const delta = Math.abs(after - before);
  return Number.isFinite(delta) ? delta : Number.MAX_VALUE;
}

/** Parent-linked path; materialized only when a change is emitted. */
interface PathNode {
  readonly parent: PathNode | null;
  readonly segment: PathSegment;
}

function pathOf(node: PathNode | null, last?: PathSegment): Path {
  const segments: PathSegment[] = last === undefined ? [] : [last];
  for (let n = node; n !== null; n = n.parent) segments.push(n.segment);
  return Object.freeze(segments.reverse());
}

function child(node: PathNode | null, segment: PathSegment): PathNode {
  return { parent: node, segment };
}

/** An open container pair; `next` is the baseline member or overlap index to visit. */
type Frame =
  | {
      readonly kind: "object";
      readonly before: JsonObject;
      readonly after: JsonObject;
      readonly at: PathNode | null;
      readonly members: readonly (readonly [string, JsonValue])[];
      next: number;
    }
  | {
      readonly kind: "array";
      readonly before: JsonArray;
      readonly after: JsonArray;
      readonly at: PathNode | null;
      next: number;
    };

function visit(before: JsonValue, after: JsonValue, at: PathNode | null, stack: Frame[], out: Change[]): void {
  if (before.kind !== after.kind) {
    out.push({ kind: "type_changed", path: pathOf(at), oldValue: before, newValue: after });
    return;
  }

  switch (before.kind) {
    case "object":
      if (after.kind === "object") {
        stack.push({ kind: "object", before, after, at, members: [...before.entries], next: 0 });
      }
      return;
    case "array":
      if (after.kind === "array") {
        const oldLen = before.items.length;
        const newLen = after.items.length;
        if (oldLen !== newLen) {
          out.push({
            kind: "value_changed",
            path: pathOf(at, LENGTH),
            oldValue: jsonNumber(oldLen),
            newValue: jsonNumber(newLen),
            numericDelta: Math.abs(newLen - oldLen),
          });
        }
        stack.push({ kind: "array", before, after, at, next: 0 });
      }
      return;
    case "null":
      return;
    case "number":
      if (after.kind === "number" && after.value !== before.value) {
        out.push({
          kind: "value_changed",
          path: pathOf(at),
          oldValue: before,
          newValue: after,
          numericDelta: numericDelta(before.value, after.value),
        });
      }
      return;
    case "bool":
    case "string":
      if ("value" in after && after.value !== before.value) {
        out.push({ kind: "value_changed", path: pathOf(at), oldValue: before, newValue: after });
      }
      return;
  }
}

/** Advances an object frame by one baseline key; false once the frame is closed. */
function stepObject(frame: Extract<Frame, { kind: "object" }>, stack: Frame[], out: Change[]): boolean {
  const member = frame.members[frame.next];
  if (member !== undefined) {
    frame.next += 1;
    const [key, oldValue] = member;
    const newValue = frame.after.entries.get(key);
    if (newValue === undefined) {
      out.push({ kind: "removed", path: pathOf(frame.at, field(key)), oldValue });
    } else {
      visit(oldValue, newValue, child(frame.at, field(key)), stack, out);
    }
    return true;
  }
  for (const [key, newValue] of frame.after.entries) {
    if (!frame.before.entries.has(key)) {
      out.push({ kind: "added", path: pathOf(frame.at, field(key)), newValue });
    }
  }
  return false;
}

/** Advances an array frame by one overlap index; false once the frame is closed. */
function stepArray(frame: Extract<Frame, { kind: "array" }>, stack: Frame[], out: Change[]): boolean {
  const { before, after } = frame;
  const overlap = Math.min(before.items.length, after.items.length);
  if (frame.next < overlap) {
    const i = frame.next;
    frame.next += 1;
    const oldItem = before.items[i];
    const newItem = after.items[i];
    if (oldItem !== undefined && newItem !== undefined) visit(oldItem, newItem, child(frame.at, index(i)), stack, out);
    return true;
  }
  for (let i = overlap; i < before.items.length; i++) {
    const oldValue = before.items[i];
    if (oldValue !== undefined) out.push({ kind: "removed", path: pathOf(frame.at, index(i)), oldValue });
  }
  for (let i = overlap; i < after.items.length; i++) {
    const newValue = after.items[i];
    if (newValue !== undefined) out.push({ kind: "added", path: pathOf(frame.at, index(i)), newValue });
  }
  return false;
}

/**
 * Ordered change list from baseline to candidate. Empty when equal.
 * Runs on an explicit frame stack, so nesting depth is bounded by memory.
 */
export function diff(baseline: JsonValue, candidate: JsonValue): Change[] {
  const out: Change[] = [];
  const stack: Frame[] = [];
  visit(baseline, candidate, null, stack, out);
  for (let frame = stack[stack.length - 1]; frame !== undefined; frame = stack[stack.length - 1]) {
    // a step may push a child frame; only a closed frame is popped
    const open = frame.kind === "object" ? stepObject(frame, stack, out) : stepArray(frame, stack, out);
    if (!open) stack.pop();
  }
  return out;
}

/** The same change seen from candidate to baseline. */
export function invertChange(change: Change): Change {
  switch (change.kind) {
    case "added":
      return { kind: "removed", path: change.path, oldValue: change.newValue };
    case "removed":
      return { kind: "added", path: change.path, newValue: change.oldValue };
    case "type_changed":
      return { kind: "type_changed", path: change.path, oldValue: change.newValue, newValue: change.oldValue };
    case "value_changed":
      return change.numericDelta === undefined
        ? { kind: "value_changed", path: change.path, oldValue: change.newValue, newValue: change.oldValue }
        : {
            kind: "value_changed",
            path: change.path,
            oldValue: change.newValue,
            newValue: change.oldValue,
            numericDelta: change.numericDelta,
          };
  }
}

export function invertChanges(changes: readonly Change[]): Change[] {
  return changes.map(invertChange);
}

export function previewValue(value: JsonValue): string {
  const text = writeJson(value, PREVIEW_MAX);
  return text.length > PREVIEW_MAX ? text.slice(0, PREVIEW_MAX - 3) + "..." : text;
}

/** One line per change, e.g. `[type_changed] $.a.bitrate: 8000 -> "8000"`. */
export function describeChange(change: Change): string {
  const where = `[${change.kind}] ${renderPath(change.path)}`;
  switch (change.kind) {
    case "added":
      return `${where}: ${previewValue(change.newValue)}`;
    case "removed":
      return `${where}: ${previewValue(change.oldValue)}`;
    case "type_changed":
    case "value_changed":
      return `${where}: ${previewValue(change.oldValue)} -> ${previewValue(change.newValue)}`;
  }
}
