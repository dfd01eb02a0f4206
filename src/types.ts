/**
 * Type definitions shared by the plus code encoder, decoder and shortener
 */

export type PlusCodeErrorKind =
  | "invalid_code"
  | "full_code_expected"
  | "cannot_shorten_padded_codes"
  | "code_length_too_small"
  | "invalid_code_length"
  | "invalid_location";

export interface Success<T> {
  ok: true;
  value: T;
}

export interface Failure {
  ok: false;
  error: PlusCodeErrorKind;
}

export type Result<T> = Success<T> | Failure;

/**
 * Fixed-point location, scaled so the finest grid digit is one unit
 */
export interface IntegerLocation {
  latInt: number;
  lngInt: number;
}
