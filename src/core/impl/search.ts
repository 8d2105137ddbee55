import { compareElements } from "../order.js";
import type { Orderable, SearchOptions } from "../types.js";

/**
 * Left-to-right scan for the first element equal to `target`.
 *
 * Works on any sequence. With `sorted: true` the scan stops once it has
 * passed the place the target would occupy in that direction.
 * Returns `undefined` when the target is absent.
 */
export function sequentialSearch<T extends Orderable>(
  seq: readonly T[],
  target: T,
  options?: SearchOptions,
): number | undefined {
  const sorted = options?.sorted ?? false;
  const ascending = options?.ascending ?? true;

  for (let i = 0; i < seq.length; i++) {
    const c = compareElements(seq[i], target);
    if (c === 0) return i;
    if (sorted && (ascending ? c > 0 : c < 0)) return undefined;
  }
  return undefined;
}

/**
 * Binary search over an ascending sequence.
 *
 * Precondition: `seq` is sorted ascending. This is not checked; on unsorted
 * input the result is unspecified (it may miss a present target).
 * With duplicates, any one matching index may be returned.
 * Returns `undefined` when the target is absent.
 */
export function binarySearch<T extends Orderable>(seq: readonly T[], target: T): number | undefined {
  let start = 0;
  let end = seq.length - 1;

  while (start <= end) {
    const mid = (start + end) >> 1;
    const c = compareElements(seq[mid], target);
    if (c === 0) return mid;
    if (c > 0) end = mid - 1;
    else start = mid + 1;
  }
  return undefined;
}
