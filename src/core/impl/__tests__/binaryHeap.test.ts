import { describe, expect, it } from "vitest";
import { BinaryHeap, EmptyHeapError, InvalidModeError, createHeap, type HeapMode } from "../../index.js";

function holdsHeapOrder(items: number[], mode: HeapMode): boolean {
  for (let i = 1; i < items.length; i++) {
    const parent = items[(i - 1) >> 1];
    if (mode === "min" ? items[i] < parent : items[i] > parent) return false;
  }
  return true;
}

describe("BinaryHeap", () => {
  it("puts the largest element at the root in max mode", () => {
    const heap = createHeap("max", [5, 3, 1, 4, 2]);
    expect(heap.peekRoot()).toBe(5);
    expect(heap.size()).toBe(5);
  });

  it("heapifies a copy and leaves the input untouched", () => {
    const input = [9, 4, 7, 1, 8, 2];
    const heap = createHeap("min", input);
    expect(input).toEqual([9, 4, 7, 1, 8, 2]);
    expect(holdsHeapOrder(heap.toArray(), "min")).toBe(true);
    expect(heap.peekRoot()).toBe(1);
  });

  it("drains in order for both modes", () => {
    expect(createHeap("min", [5, 3, 1, 4, 2]).drain()).toEqual([1, 2, 3, 4, 5]);
    expect(createHeap("max", ["d", "f", "a", "k"]).drain()).toEqual(["k", "f", "d", "a"]);
  });

  it("keeps heap order across inserts and extracts", () => {
    const heap = createHeap<number>("min");
    const seen: number[] = [];

    for (const v of [6, 2, 9, 2, 5, 0, 7]) {
      heap.insert(v);
      seen.push(v);
      expect(holdsHeapOrder(heap.toArray(), "min")).toBe(true);
      expect(heap.peekRoot()).toBe(Math.min(...seen));
    }

    const out: number[] = [];
    while (!heap.isEmpty()) {
      out.push(heap.extractRoot());
      expect(holdsHeapOrder(heap.toArray(), "min")).toBe(true);
    }
    expect(out).toEqual([0, 2, 2, 5, 6, 7, 9]);
  });

  it("returns the maximum from every extract in max mode", () => {
    const heap = createHeap<number>("max", [3, 8, 1]);
    heap.insert(10);
    expect(heap.extractRoot()).toBe(10);
    heap.insert(4);
    expect(heap.extractRoot()).toBe(8);
    expect(heap.extractRoot()).toBe(4);
    expect(heap.toArray().sort()).toEqual([1, 3]);
  });

  it("throws EmptyHeapError when peeking or extracting from an empty heap", () => {
    const heap = createHeap<number>("max");
    expect(heap.isEmpty()).toBe(true);
    expect(() => heap.peekRoot()).toThrow(EmptyHeapError);
    expect(() => heap.extractRoot()).toThrow("extractRoot called on an empty heap");
  });

  it("rejects modes other than min and max", () => {
    let caught: unknown;
    try {
      createHeap("median", [1, 2]);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(InvalidModeError);
    expect(caught).toMatchObject({ code: "INVALID_MODE", mode: "median" });
  });

  it("orders arbitrary items through a custom compare", () => {
    const heap = new BinaryHeap<{ id: string; priority: number }>(
      "max",
      [
        { id: "a", priority: 1 },
        { id: "b", priority: 7 },
        { id: "c", priority: 3 },
      ],
      (x, y) => x.priority - y.priority,
    );
    expect(heap.mode).toBe("max");
    expect(heap.drain().map((x) => x.id)).toEqual(["b", "c", "a"]);
  });
});
