import type { JsonValue } from "../json/value.js";
import type { Path } from "../json/path.js";

export type ChangeKind = "added" | "removed" | "type_changed" | "value_changed";

export interface AddedChange {
  readonly kind: "added";
  readonly path: Path;
  readonly newValue: JsonValue;
}

export interface RemovedChange {
  readonly kind: "removed";
  readonly path: Path;
  readonly oldValue: JsonValue;
}

/** Both values present, different JsonValue kinds. */
export interface TypeChangedChange {
  readonly kind: "type_changed";
  readonly path: Path;
  readonly oldValue: JsonValue;
  readonly newValue: JsonValue;
}

/**
 * Both values present, same kind, different content. `numericDelta` is
 * |new - old| for numbers (saturated at Number.MAX_VALUE), absent otherwise.
 * Array length markers are value changes on a path ending in LENGTH.
 */
export interface ValueChangedChange {
  readonly kind: "value_changed";
  readonly path: Path;
  readonly oldValue: JsonValue;
  readonly newValue: JsonValue;
  readonly numericDelta?: number;
}

export type Change = AddedChange | RemovedChange | TypeChangedChange | ValueChangedChange;
