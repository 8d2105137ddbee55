export type ErrorCode =
  | "INVALID_PARAMETER"
  | "UNKNOWN_METHOD"
  | "EMPTY_HEAP"
  | "INVALID_MODE"
  | "TYPE_MISMATCH";

export class SortKitError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidParameterError extends SortKitError {
  constructor(
    readonly param: string,
    readonly value: unknown,
    reason: string,
  ) {
    super("INVALID_PARAMETER", `invalid ${param}: ${reason} (got ${describe(value)})`);
  }
}

export class UnknownMethodError extends SortKitError {
  constructor(
    readonly method: string,
    readonly supported: readonly string[],
  ) {
    super("UNKNOWN_METHOD", `unknown sort method ${describe(method)}; expected one of: ${supported.join(", ")}`);
  }
}

export class EmptyHeapError extends SortKitError {
  constructor(readonly operation: "peekRoot" | "extractRoot") {
    super("EMPTY_HEAP", `${operation} called on an empty heap`);
  }
}

export class InvalidModeError extends SortKitError {
  constructor(readonly mode: unknown) {
    super("INVALID_MODE", `heap mode must be one of: min, max (got ${describe(mode)})`);
  }
}

export class TypeMismatchError extends SortKitError {
  constructor(
    readonly left: unknown,
    readonly right: unknown,
  ) {
    super("TYPE_MISMATCH", `cannot order ${describe(left)} against ${describe(right)}`);
  }
}

function describe(v: unknown): string {
  if (typeof v === "string") return JSON.stringify(v);
  if (typeof v === "number" || typeof v === "boolean" || typeof v === "bigint") return String(v);
  if (v === null) return "null";
  if (v === undefined) return "undefined";
  return typeof v;
}
