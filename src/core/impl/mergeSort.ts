import { resolveSortOptions } from "../options.js";
import type { Orderable, SortOptions, SortResult } from "../types.js";
import { SortBuffer, type Slot } from "./sortBuffer.js";

/**
 * Top-down merge sort. Stable, O(N log N), O(N) auxiliary space.
 *
 * In place, the merged output is written back into the caller's array.
 */
export function mergeSort<T extends Orderable>(seq: T[], options?: SortOptions): SortResult<T> {
  const buf = new SortBuffer(seq, resolveSortOptions(options));
  sortRange(buf, 0, buf.length);
  return buf.result();
}

function sortRange<T extends Orderable>(buf: SortBuffer<T>, start: number, end: number): void {
  if (end - start < 2) return;
  const mid = start + ((end - start) >> 1);
  sortRange(buf, start, mid);
  sortRange(buf, mid, end);
  merge(buf, buf.slots(start, mid), buf.slots(mid, end), start);
}

// Takes from the left run unless the right front must precede it, which keeps equal elements in input order.
function merge<T extends Orderable>(buf: SortBuffer<T>, left: Slot<T>[], right: Slot<T>[], start: number): void {
  let i = 0;
  let j = 0;
  let k = start;

  while (i < left.length && j < right.length) {
    if (buf.before(right[j].value, left[i].value)) {
      buf.put(k++, right[j++]);
    } else {
      buf.put(k++, left[i++]);
    }
  }
  while (i < left.length) buf.put(k++, left[i++]);
  while (j < right.length) buf.put(k++, right[j++]);
}
