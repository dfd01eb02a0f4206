import { Failure, PlusCodeErrorKind, Result, Success } from "./types";
import { PlusCodeError } from "./PlusCodeError";

export function ok<T>(value: T): Success<T> {
  return { ok: true, value };
}

export function err(error: PlusCodeErrorKind): Failure {
  return { ok: false, error };
}

/**
 * Return the value of a successful result, or throw a PlusCodeError
 */
export function unwrap<T>(result: Result<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw new PlusCodeError(result.error);
}
