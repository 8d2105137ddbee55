export { BinaryHeap, createHeap, isHeapMode } from "./binaryHeap.js";
export { bubbleSort, insertionSort, selectionSort, shellSort, shortBubbleSort } from "./elementarySorts.js";
export { heapSort } from "./heapSort.js";
export { applyIndex, buildIndex, reverse } from "./indexing.js";
export { mergeSort } from "./mergeSort.js";
export { DEFAULT_PIVOT, partition, quickSort } from "./quickSort.js";
export { binarySearch, sequentialSearch } from "./search.js";
export { SortBuffer, type Slot } from "./sortBuffer.js";
