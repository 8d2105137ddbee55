import { describe, expect, it } from "vitest";
import {
  InvalidParameterError,
  SORT_METHODS,
  UnknownMethodError,
  isSortMethod,
  quickSort,
  shellSort,
  sort,
} from "../index.js";

describe("sort", () => {
  it.each(SORT_METHODS)("dispatches %s", (method) => {
    expect(sort(method, [9, 2, 7, 2, 5])).toEqual({ sorted: [2, 2, 5, 7, 9] });
    expect(sort(method, ["b", "c", "a"], { ascending: false })).toEqual({ sorted: ["c", "b", "a"] });
  });

  it("returns exactly what the algorithm returns", () => {
    const input = [4, 8, 1, 8, 3, 0];
    expect(sort("quick", input, { pivot: "first", buildIndex: true })).toEqual(
      quickSort(input, { pivot: "first", buildIndex: true }),
    );
    expect(sort("shell", input, { gap: 3, ascending: false })).toEqual(shellSort(input, { gap: 3, ascending: false }));
  });

  it("forwards in-place and index options", () => {
    const input = [3, 1, 2];
    const result = sort("merge", input, { inPlace: true, buildIndex: true });
    expect(result.sorted).toBe(input);
    expect(result).toEqual({ sorted: [1, 2, 3], index: [1, 2, 0] });
  });

  it("forwards algorithm-specific parameters to the algorithm that reads them", () => {
    expect(() => sort("shell", [3, 2, 1], { gap: 0 })).toThrow(InvalidParameterError);
    expect(() => sort("quick", [3, 2, 1], { pivot: 3 })).toThrow(InvalidParameterError);
    expect(sort("bubble", [3, 2, 1], { gap: 0, pivot: 3 }).sorted).toEqual([1, 2, 3]);
  });

  it("sorts empty and single-element sequences for every method", () => {
    for (const method of SORT_METHODS) {
      expect(sort(method, []).sorted).toEqual([]);
      expect(sort(method, [42], { buildIndex: true })).toEqual({ sorted: [42], index: [0] });
    }
  });

  it("rejects unknown method names", () => {
    let caught: unknown;
    try {
      sort("bogo", [2, 1]);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(UnknownMethodError);
    expect(caught).toMatchObject({ code: "UNKNOWN_METHOD", method: "bogo", supported: SORT_METHODS });
  });
});

describe("isSortMethod", () => {
  it("accepts exactly the supported names", () => {
    expect(isSortMethod("short-bubble")).toBe(true);
    expect(isSortMethod("shortbubble")).toBe(false);
    expect(isSortMethod(3)).toBe(false);
  });
});
