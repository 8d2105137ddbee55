import { EmptyHeapError, InvalidModeError } from "../errors.js";
import type { Heap } from "../heap.js";
import { compareElements } from "../order.js";
import type { Compare, HeapMode, Orderable } from "../types.js";

export function isHeapMode(v: unknown): v is HeapMode {
  return v === "min" || v === "max";
}

/**
 * Array-backed binary heap.
 *
 * `compare` follows Array.sort semantics; the mode decides whether the
 * smallest (min) or largest (max) element sits at the root. Both modes share
 * one sift implementation through the `better` predicate.
 */
export class BinaryHeap<T> implements Heap<T> {
  readonly mode: HeapMode;
  private readonly data: T[];
  private readonly better: (a: T, b: T) => boolean;

  /** `mode` is checked at run time; anything but "min" or "max" throws InvalidModeError. */
  constructor(mode: string, initial: Iterable<T>, compare: Compare<T>) {
    if (!isHeapMode(mode)) throw new InvalidModeError(mode);
    this.mode = mode;
    this.better = mode === "min" ? (a, b) => compare(a, b) < 0 : (a, b) => compare(a, b) > 0;
    this.data = Array.from(initial);

    // bottom-up heapify, O(N)
    for (let i = (this.data.length >> 1) - 1; i >= 0; i--) this.siftDown(i);
  }

  size(): number {
    return this.data.length;
  }

  isEmpty(): boolean {
    return this.data.length === 0;
  }

  peekRoot(): T {
    if (this.data.length === 0) throw new EmptyHeapError("peekRoot");
    return this.data[0];
  }

  insert(item: T): void {
    const a = this.data;
    a.push(item);
    let i = a.length - 1;
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!this.better(a[i], a[p])) break;
      [a[i], a[p]] = [a[p], a[i]];
      i = p;
    }
  }

  extractRoot(): T {
    const a = this.data;
    if (a.length === 0) throw new EmptyHeapError("extractRoot");

    const top = a[0];
    const last = a[a.length - 1];
    a.length--;
    if (a.length) {
      a[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  /** Extracts every element, best first. Leaves the heap empty. */
  drain(): T[] {
    const out: T[] = [];
    while (this.data.length) out.push(this.extractRoot());
    return out;
  }

  toArray(): T[] {
    return Array.from(this.data);
  }

  private siftDown(i: number): void {
    const a = this.data;
    const n = a.length;

    while (true) {
      const l = i * 2 + 1;
      const r = l + 1;
      let best = i;

      if (l < n && this.better(a[l], a[best])) best = l;
      if (r < n && this.better(a[r], a[best])) best = r;
      if (best === i) return;

      [a[i], a[best]] = [a[best], a[i]];
      i = best;
    }
  }
}

/** Heap over plain numbers or strings, ordered by `compareElements`. */
export function createHeap<T extends Orderable>(mode: string = "min", initial: Iterable<T> = []): BinaryHeap<T> {
  return new BinaryHeap<T>(mode, initial, compareElements);
}
