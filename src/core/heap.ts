import type { HeapMode } from "./types.js";

/**
 * Binary heap contract.
 *
 * The root is the smallest element in min mode and the largest in max mode.
 */
export interface Heap<T> {
  readonly mode: HeapMode;
  size(): number;
  isEmpty(): boolean;
  /** Throws EmptyHeapError when empty. */
  peekRoot(): T;
  insert(item: T): void;
  /** Throws EmptyHeapError when empty. */
  extractRoot(): T;
  /** Converts heap contents to array (heap order). */
  toArray(): T[];
}
