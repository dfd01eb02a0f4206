import { CodeAlphabet } from "./CodeAlphabet";

// Breaks the code into two parts to aid memorability
export const SEPARATOR = "+";

// Number of digits before the separator in a full code
export const SEPARATOR_POSITION = 8;

export const PADDING_CHARACTER = "0";

export const LATITUDE_MAX = 90;
export const LONGITUDE_MAX = 180;

export const MIN_DIGIT_COUNT = 2;
export const MAX_DIGIT_COUNT = 15;

// Digits encoded as lat/lng pairs; a 10 digit code is roughly 13.5m square
export const PAIR_CODE_LENGTH = 10;

// Place value of the first pair when the last pair has place value 1
export const PAIR_FIRST_PLACE_VALUE =
  CodeAlphabet.BASE ** (PAIR_CODE_LENGTH / 2 - 1);

// Inverse of the precision of the pair section
export const PAIR_PRECISION = CodeAlphabet.BASE ** 3;

// Degrees covered by each digit of a pair
export const PAIR_RESOLUTIONS: readonly number[] = [
  20.0, 1.0, 0.05, 0.0025, 0.000125,
];

export const GRID_CODE_LENGTH = MAX_DIGIT_COUNT - PAIR_CODE_LENGTH;
export const GRID_COLUMNS = 4;
export const GRID_ROWS = 5;

export const GRID_LAT_FIRST_PLACE_VALUE = GRID_ROWS ** (GRID_CODE_LENGTH - 1);
export const GRID_LNG_FIRST_PLACE_VALUE =
  GRID_COLUMNS ** (GRID_CODE_LENGTH - 1);

// Scale factors that make a coordinate a whole number of finest grid cells
export const FINAL_LAT_PRECISION =
  PAIR_PRECISION * GRID_ROWS ** GRID_CODE_LENGTH;
export const FINAL_LNG_PRECISION =
  PAIR_PRECISION * GRID_COLUMNS ** GRID_CODE_LENGTH;

export const MIN_TRIMMABLE_CODE_LENGTH = 6;

// A prefix is only dropped when the reference point is within this share of
// the prefix's resolution from the code center
export const SHORTEN_SAFETY_FACTOR = 0.3;
