import {
  EmptyHeapError,
  InvalidModeError,
  InvalidParameterError,
  SortKitError,
  TypeMismatchError,
  UnknownMethodError,
} from "../core/index.js";

export interface FieldError {
  path: string;
  message: string;
}

export interface Problem {
  type: string;
  title: string;
  status: number;
  detail?: string;
  code?: string;
  errors?: FieldError[];
}

export function problem(params: { status: number; code: string; detail?: string; errors?: FieldError[] }): Problem {
  const type = `https://errors.sortkit.local/${params.code.toLowerCase().replace(/_/g, "-")}`;
  const title = codeToTitle(params.code);
  return {
    type,
    title,
    status: params.status,
    detail: params.detail,
    code: params.code,
    errors: params.errors,
  };
}

/** Maps a library error onto a problem document; anything else is INTERNAL. */
export function problemFor(err: unknown): Problem {
  if (err instanceof InvalidParameterError) {
    return problem({
      status: 400,
      code: err.code,
      detail: err.message,
      errors: [{ path: `$.${err.param}`, message: err.message }],
    });
  }
  if (err instanceof UnknownMethodError) {
    return problem({
      status: 400,
      code: err.code,
      detail: err.message,
      errors: [{ path: "$.method", message: `must be one of: ${err.supported.join(", ")}` }],
    });
  }
  if (err instanceof InvalidModeError) {
    return problem({
      status: 400,
      code: err.code,
      detail: err.message,
      errors: [{ path: "$.mode", message: "must be one of: min, max" }],
    });
  }
  if (err instanceof EmptyHeapError) {
    return problem({ status: 409, code: err.code, detail: err.message });
  }
  if (err instanceof TypeMismatchError) {
    return problem({ status: 422, code: err.code, detail: err.message });
  }
  if (err instanceof SortKitError) {
    return problem({ status: 400, code: err.code, detail: err.message });
  }
  return problem({ status: 500, code: "INTERNAL", detail: "internal error" });
}

function codeToTitle(code: string): string {
  switch (code) {
    case "INVALID_PARAMETER":
      return "Invalid parameter";
    case "UNKNOWN_METHOD":
      return "Unknown method";
    case "EMPTY_HEAP":
      return "Empty heap";
    case "INVALID_MODE":
      return "Invalid heap mode";
    case "TYPE_MISMATCH":
      return "Type mismatch";
    default:
      return "Internal error";
  }
}
