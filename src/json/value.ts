/**
 * Closed representation of decoded JSON. Every diff branch matches on `kind`,
 * so number 8000 and string "8000" never compare equal.
 */

export type JsonKind = "null" | "bool" | "number" | "string" | "array" | "object";

export interface JsonNull {
  readonly kind: "null";
}

export interface JsonBool {
  readonly kind: "bool";
  readonly value: boolean;
}

export interface JsonNumber {
  readonly kind: "number";
  readonly value: number;
}

export interface JsonString {
  readonly kind: "string";
  readonly value: string;
}

export interface JsonArray {
  readonly kind: "array";
  readonly items: readonly JsonValue[];
}

/** Entries keep insertion order for stable output; order is not compared. */
export interface JsonObject {
  readonly kind: "object";
  readonly entries: ReadonlyMap<string, JsonValue>;
}

export type JsonValue = JsonNull | JsonBool | JsonNumber | JsonString | JsonArray | JsonObject;

const NULL_VALUE: JsonNull = Object.freeze({ kind: "null" });

export function jsonNull(): JsonNull {
  return NULL_VALUE;
}

export function jsonBool(value: boolean): JsonBool {
  return Object.freeze({ kind: "bool", value });
}

export function jsonNumber(value: number): JsonNumber {
  if (!Number.isFinite(value)) {
    throw new Error(`json: number must be finite, got ${String(value)}`);
  }
  return Object.freeze({ kind: "number", value });
}

export function jsonString(value: string): JsonString {
  return Object.freeze({ kind: "string", value });
}

export function jsonArray(items: readonly JsonValue[]): JsonArray {
  return Object.freeze({ kind: "array", items: Object.freeze([...items]) });
}

/**
 * Read-only view over an object's members. The backing map is a private
 * field, so a JsonObject cannot be changed after construction, even through
 * a cast.
 */
class ObjectEntries implements ReadonlyMap<string, JsonValue> {
  readonly #map: Map<string, JsonValue>;

  constructor(entries: Iterable<readonly [string, JsonValue]>) {
    this.#map = new Map();
    for (const [key, value] of entries) this.#map.set(key, value);
    Object.freeze(this);
  }

  get size(): number {
    return this.#map.size;
  }

  get(key: string): JsonValue | undefined {
    return this.#map.get(key);
  }

  has(key: string): boolean {
    return this.#map.has(key);
  }

  forEach(callback: (value: JsonValue, key: string, map: ReadonlyMap<string, JsonValue>) => void): void {
    this.#map.forEach((value, key) => callback(value, key, this));
  }

  entries() {
    return this.#map.entries();
  }

  keys() {
    return this.#map.keys();
  }

  values() {
    return this.#map.values();
  }

  [Symbol.iterator]() {
    return this.#map[Symbol.iterator]();
  }
}

export function jsonObject(entries: Iterable<readonly [string, JsonValue]>): JsonObject {
  return Object.freeze({ kind: "object", entries: new ObjectEntries(entries) });
}

export function jsonKind(value: JsonValue): JsonKind {
  return value.kind;
}

export function sameKind(a: JsonValue, b: JsonValue): boolean {
  return a.kind === b.kind;
}

/** Structural equality. Object key order is ignored; array order is not. */
export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  const pending: [JsonValue, JsonValue][] = [[a, b]];
  for (let pair = pending.pop(); pair !== undefined; pair = pending.pop()) {
    const [left, right] = pair;
    switch (left.kind) {
      case "null":
        if (right.kind !== "null") return false;
        break;
      case "bool":
      case "number":
      case "string":
        if (!("value" in right) || right.kind !== left.kind || right.value !== left.value) return false;
        break;
      case "array":
        if (right.kind !== "array" || right.items.length !== left.items.length) return false;
        for (let i = 0; i < left.items.length; i++) {
          const l = left.items[i];
          const r = right.items[i];
          if (l === undefined || r === undefined) return false;
          pending.push([l, r]);
        }
        break;
      case "object":
        if (right.kind !== "object" || right.entries.size !== left.entries.size) return false;
        for (const [key, l] of left.entries) {
          const r = right.entries.get(key);
          if (r === undefined) return false;
          pending.push([l, r]);
        }
        break;
    }
  }
  return true;
}

/** A container being converted; children are taken in order from `next`. */
type ConvertFrame =
  | {
      readonly kind: "array";
      readonly source: object;
      readonly location: string;
      readonly children: readonly unknown[];
      readonly items: JsonValue[];
    }
  | {
      readonly kind: "object";
      readonly source: object;
      readonly location: string;
      readonly children: readonly (readonly [string, unknown])[];
      readonly entries: [string, JsonValue][];
    };

/** Scalars convert at once; containers open a frame and yield undefined. */
function enter(input: unknown, location: string, stack: ConvertFrame[], ancestors: Set<object>): JsonValue | undefined {
  if (input === null) return jsonNull();
  if (typeof input === "boolean") return jsonBool(input);
  if (typeof input === "number") {
    if (!Number.isFinite(input)) {
      throw new Error(`json: non-finite number at ${location}`);
    }
    return jsonNumber(input);
  }
  if (typeof input === "string") return jsonString(input);
  if (typeof input !== "object") {
    throw new Error(`json: unsupported ${typeof input} at ${location}`);
  }

  if (ancestors.has(input)) {
    throw new Error(`json: cyclic structure at ${location}`);
  }
  ancestors.add(input);
  if (Array.isArray(input)) {
    const children: unknown[] = [...input];
    stack.push({ kind: "array", source: input, location, children, items: [] });
  } else {
    stack.push({ kind: "object", source: input, location, children: Object.entries(input), entries: [] });
  }
  return undefined;
}

function progress(frame: ConvertFrame): number {
  return frame.kind === "array" ? frame.items.length : frame.entries.length;
}

function accept(frame: ConvertFrame, value: JsonValue): void {
  if (frame.kind === "array") {
    frame.items.push(value);
    return;
  }
  const child = frame.children[frame.entries.length];
  if (child !== undefined) frame.entries.push([child[0], value]);
}

/**
 * Convert an already-decoded JS value. Throws for anything JSON cannot carry
 * (undefined, functions, bigint, non-finite numbers, cycles). Shared acyclic
 * references are fine. Nesting depth is bounded by memory, not the call stack.
 */
export function toJsonValue(input: unknown): JsonValue {
  const stack: ConvertFrame[] = [];
  const ancestors = new Set<object>();
  const root = enter(input, "$", stack, ancestors);
  if (root !== undefined) return root;

  for (let frame = stack[stack.length - 1]; frame !== undefined; frame = stack[stack.length - 1]) {
    const i = progress(frame);
    if (frame.kind === "array" && i < frame.children.length) {
      const child = enter(frame.children[i], `${frame.location}[${i}]`, stack, ancestors);
      if (child !== undefined) accept(frame, child);
      continue;
    }
    if (frame.kind === "object") {
      const pair = frame.children[i];
      if (pair !== undefined) {
        const child = enter(pair[1], `${frame.location}.${pair[0]}`, stack, ancestors);
        if (child !== undefined) accept(frame, child);
        continue;
      }
    }

    stack.pop();
    ancestors.delete(frame.source);
    const done = frame.kind === "array" ? jsonArray(frame.items) : jsonObject(frame.entries);
    const parent = stack[stack.length - 1];
    if (parent === undefined) return done;
    accept(parent, done);
  }
  throw new Error("json: conversion stack emptied before the root closed");
}

export function parseJsonValue(text: string): JsonValue {
  const decoded: unknown = JSON.parse(text);
  return toJsonValue(decoded);
}

type FillTask =
  | { readonly kind: "array"; readonly from: JsonArray; readonly into: unknown[] }
  | { readonly kind: "object"; readonly from: JsonObject; readonly into: Record<string, unknown> };

function plainNode(value: JsonValue, tasks: FillTask[]): unknown {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "number":
    case "string":
      return value.value;
    case "array": {
      const into: unknown[] = [];
      tasks.push({ kind: "array", from: value, into });
      return into;
    }
    case "object": {
      const into: Record<string, unknown> = {};
      tasks.push({ kind: "object", from: value, into });
      return into;
    }
  }
}

/** Plain JS view of a value, for reports and serialization. */
export function fromJsonValue(value: JsonValue): unknown {
  const tasks: FillTask[] = [];
  const root = plainNode(value, tasks);
  for (let task = tasks.pop(); task !== undefined; task = tasks.pop()) {
    if (task.kind === "array") {
      for (const item of task.from.items) task.into.push(plainNode(item, tasks));
      continue;
    }
    for (const [key, item] of task.from.entries) {
      // defineProperty keeps a literal "__proto__" key as data
      Object.defineProperty(task.into, key, {
        value: plainNode(item, tasks),
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
  }
  return root;
}

/**
 * Compact JSON text, members in insertion order. Writing stops once the text
 * is longer than `limit`, so previews of large values stay cheap.
 */
export function writeJson(value: JsonValue, limit = Infinity): string {
  const tasks: (JsonValue | string)[] = [value];
  let out = "";
  for (let task = tasks.pop(); task !== undefined && out.length <= limit; task = tasks.pop()) {
    if (typeof task === "string") {
      out += task;
      continue;
    }
    switch (task.kind) {
      case "null":
        out += "null";
        break;
      case "bool":
      case "number":
        out += String(task.value);
        break;
      case "string":
        out += JSON.stringify(task.value);
        break;
      case "array": {
        tasks.push("]");
        for (let i = task.items.length - 1; i >= 0; i--) {
          const item = task.items[i];
          if (item !== undefined) tasks.push(item);
          if (i > 0) tasks.push(",");
        }
        tasks.push("[");
        break;
      }
      case "object": {
        const members = [...task.entries];
        tasks.push("}");
        for (let i = members.length - 1; i >= 0; i--) {
          const member = members[i];
          if (member !== undefined) tasks.push(member[1], `${JSON.stringify(member[0])}:`);
          if (i > 0) tasks.push(",");
        }
        tasks.push("{");
        break;
      }
    }
  }
  return out;
}
