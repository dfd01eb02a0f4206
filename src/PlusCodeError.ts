import { PlusCodeErrorKind } from "./types";

const MESSAGES: Record<PlusCodeErrorKind, string> = {
  invalid_code: "Invalid plus code",
  full_code_expected: "A full plus code is required",
  cannot_shorten_padded_codes: "Padded plus codes cannot be shortened",
  code_length_too_small: "Plus code is too short to be shortened",
  invalid_code_length:
    "Invalid code length: must be at least 2, and even when below 10",
  invalid_location: "Location must be finite and inside the integer grid",
};

/**
 * PlusCodeError - Thrown by `unwrap` when a codec operation failed
 */
export class PlusCodeError extends Error {
  readonly kind: PlusCodeErrorKind;

  constructor(kind: PlusCodeErrorKind, detail?: string) {
    super(detail ? `${MESSAGES[kind]}: ${detail}` : MESSAGES[kind]);
    this.name = "PlusCodeError";
    this.kind = kind;
  }
}
