import { Result } from "./types";
import { CodeAlphabet } from "./CodeAlphabet";
import { CodeArea } from "./CodeArea";
import { CodeValidator } from "./CodeValidator";
import { err, ok } from "./Result";
import {
  FINAL_LAT_PRECISION,
  FINAL_LNG_PRECISION,
  GRID_COLUMNS,
  GRID_LAT_FIRST_PLACE_VALUE,
  GRID_LNG_FIRST_PLACE_VALUE,
  GRID_ROWS,
  LATITUDE_MAX,
  LONGITUDE_MAX,
  MAX_DIGIT_COUNT,
  PADDING_CHARACTER,
  PAIR_CODE_LENGTH,
  PAIR_FIRST_PLACE_VALUE,
  PAIR_PRECISION,
  SEPARATOR,
} from "./constants";

interface PairSection {
  lat: number;
  lng: number;
  placeValue: number;
}

interface GridSection {
  lat: number;
  lng: number;
  rowPlaceValue: number;
  colPlaceValue: number;
}

/**
 * PlusCodeDecoder - Turns full plus codes back into the area they cover
 */
export class PlusCodeDecoder {
  /**
   * Decode a full code into its bounding box
   */
  static decode(code: string): Result<CodeArea> {
    if (!CodeValidator.isValid(code)) {
      return err("invalid_code");
    }
    if (!CodeValidator.isFull(code)) {
      return err("full_code_expected");
    }

    const digits = this.cleanCode(code);
    const pairs = this.decodePairs(digits);
    if (!pairs) {
      return err("invalid_code");
    }

    let lat = pairs.lat / PAIR_PRECISION;
    let lng = pairs.lng / PAIR_PRECISION;
    let latPrecision = pairs.placeValue / PAIR_PRECISION;
    let lngPrecision = pairs.placeValue / PAIR_PRECISION;

    if (digits.length > PAIR_CODE_LENGTH) {
      const grid = this.decodeGrid(digits);
      lat += grid.lat / FINAL_LAT_PRECISION;
      lng += grid.lng / FINAL_LNG_PRECISION;
      latPrecision = grid.rowPlaceValue / FINAL_LAT_PRECISION;
      lngPrecision = grid.colPlaceValue / FINAL_LNG_PRECISION;
    }

    return ok(
      new CodeArea(
        this.round(lat),
        this.round(lng),
        this.round(lat + latPrecision),
        this.round(lng + lngPrecision),
        Math.min(digits.length, MAX_DIGIT_COUNT)
      )
    );
  }

  /**
   * Strip separator and padding, uppercase, and keep at most 15 digits
   */
  private static cleanCode(code: string): string {
    let digits = "";
    for (const char of code) {
      if (char !== SEPARATOR && char !== PADDING_CHARACTER) {
        digits += char;
      }
    }

    return digits.toUpperCase().slice(0, MAX_DIGIT_COUNT);
  }

  /**
   * Sum the lat/lng pairs in units of 1/8000 degree, starting from the
   * south-west corner of the world. Returns null when the pair section
   * does not hold whole pairs, e.g. once padding inside the suffix is
   * stripped.
   */
  private static decodePairs(code: string): PairSection | null {
    const digits = Math.min(code.length, PAIR_CODE_LENGTH);
    if (digits % 2 === 1) {
      return null;
    }

    let lat = -LATITUDE_MAX * PAIR_PRECISION;
    let lng = -LONGITUDE_MAX * PAIR_PRECISION;
    let placeValue = PAIR_FIRST_PLACE_VALUE;

    for (let i = 0; i < digits; i += 2) {
      const latDigit = CodeAlphabet.charToIndex(code.charAt(i));
      const lngDigit = CodeAlphabet.charToIndex(code.charAt(i + 1));
      if (latDigit < 0 || lngDigit < 0) {
        return null;
      }

      lat += latDigit * placeValue;
      lng += lngDigit * placeValue;

      if (i < digits - 2) {
        placeValue /= CodeAlphabet.BASE;
      }
    }

    return { lat, lng, placeValue };
  }

  /**
   * Sum the grid refinement digits that follow the first ten
   */
  private static decodeGrid(code: string): GridSection {
    const digits = Math.min(code.length, MAX_DIGIT_COUNT);
    let lat = 0;
    let lng = 0;
    let rowPlaceValue = GRID_LAT_FIRST_PLACE_VALUE;
    let colPlaceValue = GRID_LNG_FIRST_PLACE_VALUE;

    for (let i = PAIR_CODE_LENGTH; i < digits; i++) {
      const digit = CodeAlphabet.charToIndex(code.charAt(i));
      const row = Math.floor(digit / GRID_COLUMNS);
      const col = digit % GRID_COLUMNS;

      lat += row * rowPlaceValue;
      lng += col * colPlaceValue;

      if (i < digits - 1) {
        rowPlaceValue /= GRID_ROWS;
        colPlaceValue /= GRID_COLUMNS;
      }
    }

    return { lat, lng, rowPlaceValue, colPlaceValue };
  }

  // 14 decimal places hides floating point noise from the divisions above
  private static round(value: number): number {
    return Number(value.toFixed(14));
  }
}
