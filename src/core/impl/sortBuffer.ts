import { directionPredicate } from "../order.js";
import type { Before, Orderable, ResolvedSortOptions, SortResult } from "../types.js";

/** A value together with the position it held in the input. */
export interface Slot<T> {
  value: T;
  origin: number;
}

/**
 * The single mutable array every sort works against.
 *
 * Holds either the caller's array (in place) or a copy, plus the optional
 * origin positions, which follow each value through every swap and move.
 */
export class SortBuffer<T extends Orderable> {
  readonly values: T[];
  readonly origins: number[] | undefined;
  readonly before: Before<T>;

  constructor(source: T[], options: ResolvedSortOptions) {
    this.values = options.inPlace ? source : source.slice();
    this.origins = options.buildIndex ? source.map((_, i) => i) : undefined;
    this.before = directionPredicate<T>(options.ascending);
  }

  get length(): number {
    return this.values.length;
  }

  /** True when the element at `i` must come before the one at `j`. */
  precedes(i: number, j: number): boolean {
    return this.before(this.values[i], this.values[j]);
  }

  swap(i: number, j: number): void {
    const v = this.values;
    [v[i], v[j]] = [v[j], v[i]];
    const o = this.origins;
    if (o) [o[i], o[j]] = [o[j], o[i]];
  }

  take(i: number): Slot<T> {
    return { value: this.values[i], origin: this.origins ? this.origins[i] : i };
  }

  put(i: number, slot: Slot<T>): void {
    this.values[i] = slot.value;
    if (this.origins) this.origins[i] = slot.origin;
  }

  /** Copies the slot at `from` over the one at `to`. */
  move(from: number, to: number): void {
    this.values[to] = this.values[from];
    if (this.origins) this.origins[to] = this.origins[from];
  }

  slots(start: number, end: number): Slot<T>[] {
    const out: Slot<T>[] = [];
    for (let i = start; i < end; i++) out.push(this.take(i));
    return out;
  }

  result(): SortResult<T> {
    return this.origins ? { sorted: this.values, index: this.origins } : { sorted: this.values };
  }
}
