import { InvalidParameterError } from "./errors.js";
import type { PivotStrategy, ResolvedSortOptions, SortOptions } from "./types.js";

export function resolveSortOptions(options?: SortOptions): ResolvedSortOptions {
  return {
    ascending: options?.ascending ?? true,
    inPlace: options?.inPlace ?? false,
    buildIndex: options?.buildIndex ?? false,
  };
}

/**
 * Validates a caller-supplied shell sort gap against a sequence of `length`.
 * Sequences of 0 or 1 elements accept a gap of 1.
 */
export function checkGap(gap: number, length: number): number {
  if (!Number.isInteger(gap) || gap < 1) {
    throw new InvalidParameterError("gap", gap, "must be a positive integer");
  }
  const max = Math.max(length, 1);
  if (gap > max) {
    throw new InvalidParameterError("gap", gap, `must not exceed the sequence length ${max}`);
  }
  return gap;
}

/** Picks the pivot position inside [lo, hi]. */
export type PivotSelector = (lo: number, hi: number) => number;

/**
 * Turns a pivot strategy into a position selector.
 *
 * `median-of-three` needs the values, so it receives a lookup that compares
 * two positions (true when the first must come before the second).
 */
export function pivotSelector(strategy: PivotStrategy, precedes: (i: number, j: number) => boolean): PivotSelector {
  if (typeof strategy === "number") {
    if (!Number.isFinite(strategy) || strategy < 0 || strategy > 1) {
      throw new InvalidParameterError("pivot", strategy, "a relative pivot position must be between 0 and 1");
    }
    return (lo, hi) => lo + Math.floor(strategy * (hi - lo));
  }

  switch (strategy) {
    case "first":
      return (lo) => lo;
    case "last":
      return (_lo, hi) => hi;
    case "middle":
      return (lo, hi) => lo + ((hi - lo) >> 1);
    case "median-of-three":
      return (lo, hi) => {
        const mid = lo + ((hi - lo) >> 1);
        // order the three candidates and keep the one in the middle
        let a = lo;
        let b = mid;
        let c = hi;
        if (precedes(b, a)) [a, b] = [b, a];
        if (precedes(c, b)) [b, c] = [c, b];
        if (precedes(b, a)) [a, b] = [b, a];
        return b;
      };
    default:
      throw new InvalidParameterError(
        "pivot",
        strategy,
        "must be one of: first, middle, last, median-of-three, or a number between 0 and 1",
      );
  }
}
