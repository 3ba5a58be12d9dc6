/**
 * Key order for serialized reports: plain UTF-16 code unit comparison, the
 * same on every host. No localeCompare or Intl.Collator here; both follow
 * ICU data and the process locale.
 */

export type Ordering = -1 | 0 | 1;

export function stringCompareBinary(a: string, b: string): Ordering {
  return a === b ? 0 : a < b ? -1 : 1;
}

/** Own enumerable keys, code unit order. */
export function sortedKeys(obj: object): string[] {
  return Object.keys(obj).sort(stringCompareBinary);
}
