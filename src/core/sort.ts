import { UnknownMethodError } from "./errors.js";
import {
  bubbleSort,
  heapSort,
  insertionSort,
  mergeSort,
  quickSort,
  selectionSort,
  shellSort,
  shortBubbleSort,
} from "./impl/index.js";
import type { Orderable, SortConfig, SortMethod, SortResult } from "./types.js";

export const SORT_METHODS: readonly SortMethod[] = [
  "bubble",
  "short-bubble",
  "selection",
  "insertion",
  "shell",
  "quick",
  "merge",
  "heap",
];

const METHOD_NAMES: readonly string[] = SORT_METHODS;

export function isSortMethod(v: unknown): v is SortMethod {
  return typeof v === "string" && METHOD_NAMES.includes(v);
}

/**
 * Sorts `seq` with the named algorithm.
 *
 * `method` is checked at run time, so names coming from outside TypeScript
 * (CLI flags, config files) fail with UnknownMethodError instead of falling
 * through. Options reach the algorithm unchanged.
 */
export function sort<T extends Orderable>(method: string, seq: T[], options: SortConfig = {}): SortResult<T> {
  if (!isSortMethod(method)) throw new UnknownMethodError(method, SORT_METHODS);

  switch (method) {
    case "bubble":
      return bubbleSort(seq, options);
    case "short-bubble":
      return shortBubbleSort(seq, options);
    case "selection":
      return selectionSort(seq, options);
    case "insertion":
      return insertionSort(seq, options);
    case "shell":
      return shellSort(seq, options);
    case "quick":
      return quickSort(seq, options);
    case "merge":
      return mergeSort(seq, options);
    case "heap":
      return heapSort(seq, options);
    default:
      return assertNever(method);
  }
}

function assertNever(method: never): never {
  throw new UnknownMethodError(String(method), SORT_METHODS);
}
