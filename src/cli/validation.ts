import { InvalidParameterError, type Orderable, type PivotStrategy } from "../core/index.js";

const NAMED_PIVOTS: readonly string[] = ["first", "middle", "last", "median-of-three"];

export function asNumber(v: string): number | undefined {
  if (v.trim() === "") return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

export function asInt(v: string): number | undefined {
  const n = asNumber(v);
  return n !== undefined && Number.isInteger(n) ? n : undefined;
}

/** Numbers when every token parses as a finite number, otherwise the raw strings. */
export function parseValues(raw: readonly string[]): Orderable[] {
  const numbers: number[] = [];
  for (const token of raw) {
    const n = asNumber(token);
    if (n === undefined) return Array.from(raw);
    numbers.push(n);
  }
  return numbers;
}

export function parseGap(raw: string): number {
  const gap = asInt(raw);
  if (gap === undefined) throw new InvalidParameterError("gap", raw, "must be a positive integer");
  return gap;
}

export function parsePivot(raw: string): PivotStrategy {
  if (isNamedPivot(raw)) return raw;
  const n = asNumber(raw);
  if (n === undefined) {
    throw new InvalidParameterError(
      "pivot",
      raw,
      "must be one of: first, middle, last, median-of-three, or a number between 0 and 1",
    );
  }
  return n;
}

function isNamedPivot(v: string): v is "first" | "middle" | "last" | "median-of-three" {
  return NAMED_PIVOTS.includes(v);
}
