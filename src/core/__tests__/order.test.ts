import { describe, expect, it } from "vitest";
import {
  InvalidParameterError,
  TypeMismatchError,
  checkGap,
  compareElements,
  directionPredicate,
  isSorted,
  pivotSelector,
  resolveSortOptions,
} from "../index.js";

describe("compareElements", () => {
  it("orders numbers and strings", () => {
    expect(compareElements(1, 2)).toBe(-1);
    expect(compareElements(2, 2)).toBe(0);
    expect(compareElements("b", "a")).toBe(1);
  });

  it("refuses to coerce between types", () => {
    expect(() => compareElements(1, "a")).toThrow(TypeMismatchError);
    expect(() => compareElements(1, "a")).toThrow('cannot order 1 against "a"');
  });

  it("treats NaN as not orderable", () => {
    expect(() => compareElements(Number.NaN, 1)).toThrow(TypeMismatchError);
  });
});

describe("directionPredicate", () => {
  it("is a < b ascending and a > b descending", () => {
    const up = directionPredicate<number>(true);
    const down = directionPredicate<number>(false);
    expect(up(1, 2)).toBe(true);
    expect(up(2, 1)).toBe(false);
    expect(up(2, 2)).toBe(false);
    expect(down(2, 1)).toBe(true);
    expect(down(1, 2)).toBe(false);
    expect(down(2, 2)).toBe(false);
  });
});

describe("isSorted", () => {
  it("checks order per direction", () => {
    expect(isSorted([1, 2, 2, 3])).toBe(true);
    expect(isSorted([1, 3, 2])).toBe(false);
    expect(isSorted(["c", "b", "a"], false)).toBe(true);
    expect(isSorted([])).toBe(true);
  });
});

describe("resolveSortOptions", () => {
  it("fills defaults", () => {
    expect(resolveSortOptions()).toEqual({ ascending: true, inPlace: false, buildIndex: false });
    expect(resolveSortOptions({ inPlace: true, buildIndex: true })).toEqual({
      ascending: true,
      inPlace: true,
      buildIndex: true,
    });
  });
});

describe("checkGap", () => {
  it("accepts positive integers up to the length", () => {
    expect(checkGap(3, 5)).toBe(3);
    expect(checkGap(1, 0)).toBe(1);
  });

  it("carries the offending value", () => {
    let caught: unknown;
    try {
      checkGap(0, 5);
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(InvalidParameterError);
    expect(caught).toMatchObject({ code: "INVALID_PARAMETER", param: "gap", value: 0 });
  });
});

describe("pivotSelector", () => {
  const values = [50, 10, 30, 20, 40, 60, 0, 70, 25];
  const precedes = (i: number, j: number) => values[i] < values[j];

  it("picks fixed positions", () => {
    expect(pivotSelector("first", precedes)(2, 8)).toBe(2);
    expect(pivotSelector("last", precedes)(2, 8)).toBe(8);
    expect(pivotSelector("middle", precedes)(2, 8)).toBe(5);
  });

  it("maps relative positions onto the range", () => {
    expect(pivotSelector(0, precedes)(0, 9)).toBe(0);
    expect(pivotSelector(0.5, precedes)(0, 9)).toBe(4);
    expect(pivotSelector(1, precedes)(0, 9)).toBe(9);
  });

  it("takes the median of first, middle and last", () => {
    // positions 0, 4, 8 hold 50, 40, 25
    expect(pivotSelector("median-of-three", precedes)(0, 8)).toBe(4);
    // positions 1, 2, 3 hold 10, 30, 20
    expect(pivotSelector("median-of-three", precedes)(1, 3)).toBe(3);
  });

  it("rejects relative positions outside [0, 1]", () => {
    expect(() => pivotSelector(2, precedes)).toThrow(InvalidParameterError);
    expect(() => pivotSelector(Number.POSITIVE_INFINITY, precedes)).toThrow(InvalidParameterError);
  });
});
