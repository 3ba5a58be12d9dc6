/**
 * Structured JSON paths. Segments are the source of truth; the rendered
 * `$.a["b.c"][2]` form exists for display and configuration only.
 */

export interface FieldSegment {
  readonly kind: "field";
  readonly name: string;
}

export interface IndexSegment {
  readonly kind: "index";
  readonly index: number;
}

/** Synthetic segment carried only by array length-marker changes. */
export interface LengthSegment {
  readonly kind: "length";
}

/** Pattern-only segment: matches any field or index. */
export interface WildcardSegment {
  readonly kind: "wildcard";
}

export type PathSegment = FieldSegment | IndexSegment | LengthSegment;
export type PatternSegment = PathSegment | WildcardSegment;

export type Path = readonly PathSegment[];
export type PathPattern = readonly PatternSegment[];

export const ROOT: Path = Object.freeze([]);
export const LENGTH: LengthSegment = Object.freeze({ kind: "length" });
export const WILDCARD: WildcardSegment = Object.freeze({ kind: "wildcard" });

const IDENTIFIER_RE = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function field(name: string): FieldSegment {
  return Object.freeze({ kind: "field", name });
}

export function index(i: number): IndexSegment {
  return Object.freeze({ kind: "index", index: i });
}

export function isLengthMarker(path: Path): boolean {
  const last = path[path.length - 1];
  return last !== undefined && last.kind === "length";
}

function segmentsEqual(a: PatternSegment, b: PatternSegment): boolean {
  switch (a.kind) {
    case "field":
      return b.kind === "field" && b.name === a.name;
    case "index":
      return b.kind === "index" && b.index === a.index;
    case "length":
      return b.kind === "length";
    case "wildcard":
      return b.kind === "wildcard";
  }
}

export function pathsEqual(a: PathPattern, b: PathPattern): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined || right === undefined || !segmentsEqual(left, right)) return false;
  }
  return true;
}

function segmentMatches(pattern: PatternSegment, segment: PathSegment): boolean {
  if (pattern.kind === "wildcard") return segment.kind !== "length";
  return segmentsEqual(pattern, segment);
}

/** Segment-wise prefix test. `$.play` does not match `$.playback`. */
export function matchesPrefix(pattern: PathPattern, path: Path): boolean {
  if (pattern.length > path.length) return false;
  for (let i = 0; i < pattern.length; i++) {
    const p = pattern[i];
    const s = path[i];
    if (p === undefined || s === undefined || !segmentMatches(p, s)) return false;
  }
  return true;
}

function renderSegment(segment: PatternSegment): string {
  switch (segment.kind) {
    case "field":
      return IDENTIFIER_RE.test(segment.name) ? `.${segment.name}` : `[${JSON.stringify(segment.name)}]`;
    case "index":
      return `[${segment.index}]`;
    case "length":
      return "#length";
    case "wildcard":
      return "[*]";
  }
}

export function renderPath(path: PathPattern): string {
  return "$" + path.map(renderSegment).join("");
}

/** Index of the closing quote of a JSON string literal starting at `start`. */
function findStringEnd(text: string, start: number): number {
  for (let i = start + 1; i < text.length; i++) {
    const ch = text[i];
    if (ch === "\\") {
      i++;
      continue;
    }
    if (ch === '"') return i;
  }
  return -1;
}

function parseSegments(text: string): PatternSegment[] {
  const source = text.trim();
  if (!source.startsWith("$")) {
    throw new Error(`path "${text}": must start with "$"`);
  }
  const segments: PatternSegment[] = [];
  let i = 1;
  while (i < source.length) {
    const ch = source[i];
    if (ch === ".") {
      let end = i + 1;
      while (end < source.length && source[end] !== "." && source[end] !== "[" && source[end] !== "#") end++;
      const name = source.slice(i + 1, end);
      if (name === "") throw new Error(`path "${text}": empty field name at offset ${i}`);
      segments.push(name === "*" ? WILDCARD : field(name));
      i = end;
      continue;
    }
    if (ch === "[") {
      const close = source[i + 1] === '"' ? findStringEnd(source, i + 1) + 1 : source.indexOf("]", i);
      if (close <= 0 || source[close] !== "]") {
        throw new Error(`path "${text}": unterminated bracket at offset ${i}`);
      }
      const inner = source.slice(i + 1, close);
      if (inner === "*") {
        segments.push(WILDCARD);
      } else if (/^\d+$/.test(inner)) {
        segments.push(index(Number(inner)));
      } else if (inner.startsWith('"')) {
        let name: unknown;
        try {
          name = JSON.parse(inner);
        } catch {
          throw new Error(`path "${text}": invalid quoted field at offset ${i}`);
        }
        if (typeof name !== "string") {
          throw new Error(`path "${text}": invalid quoted field at offset ${i}`);
        }
        segments.push(field(name));
      } else {
        throw new Error(`path "${text}": bracket must hold an index, "*" or a quoted field`);
      }
      i = close + 1;
      continue;
    }
    if (source.startsWith("#length", i) && i + "#length".length === source.length) {
      segments.push(LENGTH);
      i = source.length;
      continue;
    }
    throw new Error(`path "${text}": unexpected "${ch ?? ""}" at offset ${i}`);
  }
  return segments;
}

/** Parse a pattern as written in configuration; `*` and `[*]` are wildcards. */
export function parsePathPattern(text: string): PathPattern {
  return Object.freeze(parseSegments(text));
}

/** Parse a concrete path (no wildcards). */
export function parsePath(text: string): Path {
  const segments: PathSegment[] = [];
  for (const segment of parseSegments(text)) {
    if (segment.kind === "wildcard") {
      throw new Error(`path "${text}": wildcard not allowed in a concrete path`);
    }
    segments.push(segment);
  }
  return Object.freeze(segments);
}
