import { TypeMismatchError } from "./errors.js";
import type { Before, Orderable } from "./types.js";

/**
 * Three-way comparison of two orderable values.
 *
 * Operands must both be numbers or both be strings; NaN is rejected.
 * Nothing is coerced: a mismatch throws TypeMismatchError on the spot.
 */
export function compareElements(a: Orderable, b: Orderable): number {
  if (typeof a === "number" && typeof b === "number" && !Number.isNaN(a) && !Number.isNaN(b)) {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  throw new TypeMismatchError(a, b);
}

/** `a < b` when ascending, `a > b` when descending. */
export function directionPredicate<T extends Orderable>(ascending: boolean): Before<T> {
  return ascending ? (a, b) => compareElements(a, b) < 0 : (a, b) => compareElements(a, b) > 0;
}

export function isSorted<T extends Orderable>(seq: readonly T[], ascending: boolean = true): boolean {
  const before = directionPredicate<T>(ascending);
  for (let i = 1; i < seq.length; i++) {
    if (before(seq[i], seq[i - 1])) return false;
  }
  return true;
}
