/** Shared core types used by module contracts. */

/** Element types the library can order. One call must not mix them. */
export type Orderable = number | string;

/** Three-way comparison with Array.sort semantics: <0 means a before b. */
export type Compare<T> = (a: T, b: T) => number;

/** Ordering predicate: true when `a` must come before `b`. */
export type Before<T> = (a: T, b: T) => boolean;

export type HeapMode = "min" | "max";

export type SortMethod =
  | "bubble"
  | "short-bubble"
  | "selection"
  | "insertion"
  | "shell"
  | "quick"
  | "merge"
  | "heap";

/**
 * Pivot choice for quick sort.
 *
 * A number is a relative position within the range being partitioned:
 * 0 picks the first element, 1 the last.
 */
export type PivotStrategy = "first" | "middle" | "last" | "median-of-three" | number;

export interface SortOptions {
  /** Defaults to true. */
  ascending?: boolean;
  /** Sort the caller's array instead of a copy. */
  inPlace?: boolean;
  /** Also return the index array. */
  buildIndex?: boolean;
}

export interface ShellSortOptions extends SortOptions {
  /** First gap; must be a positive integer not larger than the sequence. */
  gap?: number;
}

export interface QuickSortOptions extends SortOptions {
  pivot?: PivotStrategy;
}

/** Options accepted by the dispatcher; `gap` and `pivot` reach only shell and quick. */
export interface SortConfig extends ShellSortOptions, QuickSortOptions {}

export interface ResolvedSortOptions {
  ascending: boolean;
  inPlace: boolean;
  buildIndex: boolean;
}

export interface SortResult<T> {
  /** The caller's array when sorting in place, a new one otherwise. */
  sorted: T[];
  /** `index[k]` is the original position of `sorted[k]`; set only when requested. */
  index?: number[];
}

export interface SearchOptions {
  /** Set when the sequence is known sorted, to stop early. */
  sorted?: boolean;
  /** Direction the sequence is sorted in. Defaults to true. */
  ascending?: boolean;
}
