import { CodeArea } from "./CodeArea";
import { CodeShortener } from "./CodeShortener";
import { CodeValidator } from "./CodeValidator";
import { CoordinateNormalizer } from "./CoordinateNormalizer";
import { PlusCodeDecoder } from "./PlusCodeDecoder";
import { PlusCodeEncoder } from "./PlusCodeEncoder";
import { PAIR_CODE_LENGTH } from "./constants";
import { IntegerLocation, Result } from "./types";

export { CodeArea } from "./CodeArea";
export { CodeAlphabet } from "./CodeAlphabet";
export { PlusCodeError } from "./PlusCodeError";
export { ok, err, unwrap } from "./Result";
export {
  SEPARATOR,
  SEPARATOR_POSITION,
  PADDING_CHARACTER,
  MIN_DIGIT_COUNT,
  MAX_DIGIT_COUNT,
  PAIR_CODE_LENGTH,
} from "./constants";
export type {
  Failure,
  IntegerLocation,
  PlusCodeErrorKind,
  Result,
  Success,
} from "./types";

/**
 * Encode a location into a plus code. The default length of 10 gives an
 * area of about 13.5 x 13.5 meters at the equator.
 *
 * @example
 * encode(47.36559, 8.524997); // { ok: true, value: "8FVC9G8F+6X" }
 */
export function encode(
  latitude: number,
  longitude: number,
  codeLength: number = PAIR_CODE_LENGTH
): Result<string> {
  return PlusCodeEncoder.encode(latitude, longitude, codeLength);
}

/**
 * Decode a full plus code into the area it covers
 */
export function decode(code: string): Result<CodeArea> {
  return PlusCodeDecoder.decode(code);
}

/**
 * Drop leading characters from a full code, relative to a nearby location
 *
 * @example
 * shorten("8FVC9G8F+6X", 47.5, 8.5); // { ok: true, value: "9G8F+6X" }
 */
export function shorten(
  code: string,
  latitude: number,
  longitude: number
): Result<string> {
  return CodeShortener.shorten(code, latitude, longitude);
}

/**
 * Recover the full code nearest to a reference location
 *
 * @example
 * recoverNearest("9G8F+6X", 47.4, 8.6); // { ok: true, value: "8FVC9G8F+6X" }
 */
export function recoverNearest(
  code: string,
  referenceLatitude: number,
  referenceLongitude: number
): Result<string> {
  return CodeShortener.recoverNearest(
    code,
    referenceLatitude,
    referenceLongitude
  );
}

export function isValid(code: string): boolean {
  return CodeValidator.isValid(code);
}

export function isShort(code: string): boolean {
  return CodeValidator.isShort(code);
}

export function isFull(code: string): boolean {
  return CodeValidator.isFull(code);
}

export function clipLatitude(latitude: number): number {
  return CoordinateNormalizer.clipLatitude(latitude);
}

export function normalizeLongitude(longitude: number): number {
  return CoordinateNormalizer.normalizeLongitude(longitude);
}

export function locationToIntegers(
  latitude: number,
  longitude: number
): IntegerLocation {
  return PlusCodeEncoder.locationToIntegers(latitude, longitude);
}

export function encodeIntegers(
  latInt: number,
  lngInt: number,
  codeLength: number
): Result<string> {
  return PlusCodeEncoder.encodeIntegers(latInt, lngInt, codeLength);
}
