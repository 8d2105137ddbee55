import { compareElements } from "../order.js";
import { resolveSortOptions } from "../options.js";
import type { Orderable, SortOptions, SortResult } from "../types.js";
import { BinaryHeap } from "./binaryHeap.js";
import { SortBuffer, type Slot } from "./sortBuffer.js";

/**
 * Heapifies the input (min mode ascending, max mode descending) and refills
 * it from the root outward. Unstable.
 */
export function heapSort<T extends Orderable>(seq: T[], options?: SortOptions): SortResult<T> {
  const resolved = resolveSortOptions(options);
  const buf = new SortBuffer(seq, resolved);
  const heap = new BinaryHeap<Slot<T>>(resolved.ascending ? "min" : "max", buf.slots(0, buf.length), (a, b) =>
    compareElements(a.value, b.value),
  );

  for (let i = 0; i < buf.length; i++) buf.put(i, heap.extractRoot());
  return buf.result();
}
