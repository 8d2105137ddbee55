export * from "./types.js";
export type { Heap } from "./heap.js";
export * from "./errors.js";
export { compareElements, directionPredicate, isSorted } from "./order.js";
export { checkGap, pivotSelector, resolveSortOptions, type PivotSelector } from "./options.js";
export { SORT_METHODS, isSortMethod, sort } from "./sort.js";
export * from "./impl/index.js";
