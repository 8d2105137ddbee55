import { InvalidParameterError } from "../errors.js";
import type { Orderable } from "../types.js";

/** Reverses `seq` in place and returns it. */
export function reverse<T>(seq: T[]): T[] {
  for (let i = 0, j = seq.length - 1; i < j; i++, j--) {
    [seq[i], seq[j]] = [seq[j], seq[i]];
  }
  return seq;
}

/** `index.map(i => original[i])`: the sequence an index array describes. */
export function applyIndex<T>(original: readonly T[], index: readonly number[]): T[] {
  return index.map((i) => {
    if (!Number.isInteger(i) || i < 0 || i >= original.length) {
      throw new InvalidParameterError("index", i, `must be a position in [0, ${original.length})`);
    }
    return original[i];
  });
}

/**
 * Recovers the index array of a sorted copy from its original.
 *
 * Equal elements are matched to original positions left to right, so the
 * result is always a permutation even when values repeat.
 */
export function buildIndex<T extends Orderable>(sorted: readonly T[], original: readonly T[]): number[] {
  if (sorted.length !== original.length) {
    throw new InvalidParameterError(
      "sorted",
      sorted.length,
      `length must match the original sequence length ${original.length}`,
    );
  }

  const positions = new Map<T, number[]>();
  for (let i = original.length - 1; i >= 0; i--) {
    let arr = positions.get(original[i]);
    if (!arr) {
      arr = [];
      positions.set(original[i], arr);
    }
    arr.push(i);
  }

  return sorted.map((value) => {
    // stored in reverse, so pop() yields the leftmost unused position
    const origin = positions.get(value)?.pop();
    if (origin === undefined) {
      throw new InvalidParameterError("sorted", value, "has no unused counterpart in the original sequence");
    }
    return origin;
  });
}
