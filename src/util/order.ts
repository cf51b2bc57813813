/**
 * Ordering and text helpers shared by the model types.
 * String order is binary (UTF-16 code unit ascending), never locale-dependent.
 */

export type Comparator<T> = (a: T, b: T) => number;

export type Predicate<T> = (value: T) => boolean;

/** Binary string comparison. Returns -1 | 0 | 1. */
export function stringCompareBinary(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function numberCompare(a: number, b: number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Flip a comparison result so that ascending becomes descending. */
export function invert(result: number): number {
  return numberCompare(0, result);
}

export function sortStrings(arr: Iterable<string>): string[] {
  return [...arr].sort(stringCompareBinary);
}

export function trimmed(value: string | null | undefined): string {
  return value != null ? value.trim() : "";
}

export function hasText(value: string | null | undefined): value is string {
  return trimmed(value).length > 0;
}

/** Absent predicates match nothing. */
export function nonMatchingWhenAbsent<T>(predicate: Predicate<T> | null | undefined): Predicate<T> {
  return predicate ?? (() => false);
}
