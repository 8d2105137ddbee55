import { pivotSelector, resolveSortOptions } from "../options.js";
import type { Orderable, PivotStrategy, QuickSortOptions, SortResult } from "../types.js";
import { SortBuffer } from "./sortBuffer.js";

export const DEFAULT_PIVOT: PivotStrategy = "median-of-three";

/**
 * Quick sort with a configurable pivot. Unstable.
 *
 * Iterative: the larger side of each partition waits on an explicit stack
 * while the smaller one is processed, so pending ranges stay O(log N) even
 * when every pivot is the worst choice.
 */
export function quickSort<T extends Orderable>(seq: T[], options?: QuickSortOptions): SortResult<T> {
  const buf = new SortBuffer(seq, resolveSortOptions(options));
  const choosePivot = pivotSelector(options?.pivot ?? DEFAULT_PIVOT, (i, j) => buf.precedes(i, j));

  const pending: Array<[number, number]> = [[0, buf.length - 1]];
  for (let range = pending.pop(); range; range = pending.pop()) {
    let [lo, hi] = range;
    while (lo < hi) {
      const p = partition(buf, lo, hi, choosePivot(lo, hi));
      if (p - lo < hi - p) {
        pending.push([p + 1, hi]);
        hi = p - 1;
      } else {
        pending.push([lo, p - 1]);
        lo = p + 1;
      }
    }
  }

  return buf.result();
}

/**
 * Moves everything that must precede the pivot to its left and the rest to
 * its right. Returns the pivot's final position.
 */
export function partition<T extends Orderable>(buf: SortBuffer<T>, lo: number, hi: number, pivotAt: number): number {
  buf.swap(pivotAt, hi);
  let store = lo;
  for (let j = lo; j < hi; j++) {
    if (buf.precedes(j, hi)) {
      buf.swap(store, j);
      store++;
    }
  }
  buf.swap(store, hi);
  return store;
}
