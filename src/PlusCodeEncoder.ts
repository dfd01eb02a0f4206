import { IntegerLocation, Result } from "./types";
import { CodeAlphabet } from "./CodeAlphabet";
import { err, ok } from "./Result";
import {
  FINAL_LAT_PRECISION,
  FINAL_LNG_PRECISION,
  GRID_CODE_LENGTH,
  GRID_COLUMNS,
  GRID_ROWS,
  LATITUDE_MAX,
  LONGITUDE_MAX,
  MAX_DIGIT_COUNT,
  MIN_DIGIT_COUNT,
  PADDING_CHARACTER,
  PAIR_CODE_LENGTH,
  SEPARATOR,
  SEPARATOR_POSITION,
} from "./constants";

/**
 * PlusCodeEncoder - Converts locations into plus codes
 *
 * Coordinates are first turned into fixed-point integers so that every digit
 * up to the fifteenth is extracted with exact integer arithmetic.
 */
export class PlusCodeEncoder {
  /**
   * Encode a location into a code of the given length (default 10).
   * Latitude is clamped and longitude wrapped during integer conversion.
   */
  static encode(
    latitude: number,
    longitude: number,
    codeLength: number = PAIR_CODE_LENGTH
  ): Result<string> {
    const { latInt, lngInt } = this.locationToIntegers(latitude, longitude);
    return this.encodeIntegers(latInt, lngInt, codeLength);
  }

  /**
   * Convert degrees into non-negative fixed-point integers
   */
  static locationToIntegers(
    latitude: number,
    longitude: number
  ): IntegerLocation {
    const latRange = 2 * LATITUDE_MAX * FINAL_LAT_PRECISION;
    let latInt =
      Math.floor(latitude * FINAL_LAT_PRECISION) +
      LATITUDE_MAX * FINAL_LAT_PRECISION;
    if (latInt < 0) {
      latInt = 0;
    } else if (latInt >= latRange) {
      latInt = latRange - 1;
    }

    const lngRange = 2 * LONGITUDE_MAX * FINAL_LNG_PRECISION;
    let lngInt =
      Math.floor(longitude * FINAL_LNG_PRECISION) +
      LONGITUDE_MAX * FINAL_LNG_PRECISION;
    if (lngInt < 0 || lngInt >= lngRange) {
      lngInt = ((lngInt % lngRange) + lngRange) % lngRange;
    }

    return { latInt, lngInt };
  }

  /**
   * Encode fixed-point integers into a code of the given length. The
   * integers must be non-negative; values past the top of the grid wrap.
   */
  static encodeIntegers(
    latInt: number,
    lngInt: number,
    codeLength: number
  ): Result<string> {
    if (!this.isSupportedLength(codeLength)) {
      return err("invalid_code_length");
    }
    // NaN or infinite degrees end up here as non-integers
    if (!this.isGridInteger(latInt) || !this.isGridInteger(lngInt)) {
      return err("invalid_location");
    }

    const length = Math.min(codeLength, MAX_DIGIT_COUNT);
    let latValue = latInt;
    let lngValue = lngInt;
    let code = "";

    if (length > PAIR_CODE_LENGTH) {
      // Grid digits come out least significant first
      for (let i = 0; i < GRID_CODE_LENGTH; i++) {
        const digit =
          (latValue % GRID_ROWS) * GRID_COLUMNS + (lngValue % GRID_COLUMNS);
        code = CodeAlphabet.indexToChar(digit) + code;
        latValue = Math.floor(latValue / GRID_ROWS);
        lngValue = Math.floor(lngValue / GRID_COLUMNS);
      }
    } else {
      latValue = Math.floor(latValue / GRID_ROWS ** GRID_CODE_LENGTH);
      lngValue = Math.floor(lngValue / GRID_COLUMNS ** GRID_CODE_LENGTH);
    }

    for (let i = 0; i < PAIR_CODE_LENGTH / 2; i++) {
      code =
        CodeAlphabet.indexToChar(latValue % CodeAlphabet.BASE) +
        CodeAlphabet.indexToChar(lngValue % CodeAlphabet.BASE) +
        code;
      latValue = Math.floor(latValue / CodeAlphabet.BASE);
      lngValue = Math.floor(lngValue / CodeAlphabet.BASE);
    }

    code =
      code.slice(0, SEPARATOR_POSITION) +
      SEPARATOR +
      code.slice(SEPARATOR_POSITION);

    if (length >= SEPARATOR_POSITION) {
      return ok(code.slice(0, length + 1));
    }

    return ok(
      code.slice(0, length) +
        PADDING_CHARACTER.repeat(SEPARATOR_POSITION - length) +
        SEPARATOR
    );
  }

  /**
   * Lengths below the separator position must be even, so that padding
   * always replaces whole pairs
   */
  private static isSupportedLength(codeLength: number): boolean {
    if (!Number.isInteger(codeLength) || codeLength < MIN_DIGIT_COUNT) {
      return false;
    }

    return codeLength >= PAIR_CODE_LENGTH || codeLength % 2 === 0;
  }

  private static isGridInteger(value: number): boolean {
    return Number.isSafeInteger(value) && value >= 0;
  }
}
