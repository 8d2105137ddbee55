import { checkGap, resolveSortOptions } from "../options.js";
import type { Orderable, ShellSortOptions, SortOptions, SortResult } from "../types.js";
import { SortBuffer } from "./sortBuffer.js";

/** N-1 full passes of adjacent compare-and-swap. Stable. */
export function bubbleSort<T extends Orderable>(seq: T[], options?: SortOptions): SortResult<T> {
  const buf = new SortBuffer(seq, resolveSortOptions(options));
  for (let pass = buf.length - 1; pass > 0; pass--) {
    for (let i = 0; i < pass; i++) {
      if (buf.precedes(i + 1, i)) buf.swap(i, i + 1);
    }
  }
  return buf.result();
}

/** Bubble sort that stops after the first pass without swaps. Stable. */
export function shortBubbleSort<T extends Orderable>(seq: T[], options?: SortOptions): SortResult<T> {
  const buf = new SortBuffer(seq, resolveSortOptions(options));
  for (let pass = buf.length - 1; pass > 0; pass--) {
    let swapped = false;
    for (let i = 0; i < pass; i++) {
      if (buf.precedes(i + 1, i)) {
        buf.swap(i, i + 1);
        swapped = true;
      }
    }
    if (!swapped) break;
  }
  return buf.result();
}

/** Swaps the extreme of the unsorted remainder into each position. Unstable. */
export function selectionSort<T extends Orderable>(seq: T[], options?: SortOptions): SortResult<T> {
  const buf = new SortBuffer(seq, resolveSortOptions(options));
  const n = buf.length;
  for (let i = 0; i < n - 1; i++) {
    let extreme = i;
    for (let j = i + 1; j < n; j++) {
      if (buf.precedes(j, extreme)) extreme = j;
    }
    if (extreme !== i) buf.swap(i, extreme);
  }
  return buf.result();
}

/** Stable; linear on input that is already in order. */
export function insertionSort<T extends Orderable>(seq: T[], options?: SortOptions): SortResult<T> {
  const buf = new SortBuffer(seq, resolveSortOptions(options));
  gappedInsertion(buf, 1);
  return buf.result();
}

/**
 * Insertion sort over a halving gap sequence.
 *
 * The first gap is `options.gap` when given, otherwise half the length.
 */
export function shellSort<T extends Orderable>(seq: T[], options?: ShellSortOptions): SortResult<T> {
  const first = options?.gap !== undefined ? checkGap(options.gap, seq.length) : seq.length >> 1;
  const buf = new SortBuffer(seq, resolveSortOptions(options));
  for (let gap = first; gap >= 1; gap >>= 1) {
    gappedInsertion(buf, gap);
  }
  return buf.result();
}

// Sorts every gap-strided sub-sequence; with gap 1 this is plain insertion sort.
function gappedInsertion<T extends Orderable>(buf: SortBuffer<T>, gap: number): void {
  const values = buf.values;
  for (let i = gap; i < buf.length; i++) {
    const slot = buf.take(i);
    let j = i;
    while (j >= gap && buf.before(slot.value, values[j - gap])) {
      buf.move(j - gap, j);
      j -= gap;
    }
    buf.put(j, slot);
  }
}
