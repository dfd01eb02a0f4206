import { CodeAlphabet } from "./CodeAlphabet";
import {
  LATITUDE_MAX,
  LONGITUDE_MAX,
  PADDING_CHARACTER,
  SEPARATOR,
  SEPARATOR_POSITION,
} from "./constants";

/**
 * CodeValidator - Classifies strings as invalid, short or full plus codes
 */
export class CodeValidator {
  private static readonly VALID_CHARS =
    CodeAlphabet.CHARS + SEPARATOR + PADDING_CHARACTER;

  /**
   * Check that a code is well formed.
   *
   * Exactly one separator is required, after an even number of at most
   * eight characters. Padding is only allowed in front of a separator at
   * position eight, as one even run that is not at the start, with nothing
   * after the separator.
   */
  static isValid(code: string): boolean {
    const parts = code.split(SEPARATOR);
    if (parts.length !== 2) return false;

    const [prefix, suffix] = parts;
    if (prefix === undefined || suffix === undefined) return false;
    if (!prefix && !suffix) return false;

    const separatorPosition = prefix.length;
    if (separatorPosition > SEPARATOR_POSITION || separatorPosition % 2 === 1) {
      return false;
    }

    if (prefix.includes(PADDING_CHARACTER)) {
      return this.isValidPadding(code, prefix);
    }

    // A single digit after the separator is never produced by the encoder
    if (suffix.length === 1) return false;

    return this.hasOnlyCodeChars(code);
  }

  /**
   * A short code has had leading digits removed and needs a reference
   * location to be recovered
   */
  static isShort(code: string): boolean {
    if (!this.isValid(code)) return false;

    return code.indexOf(SEPARATOR) < SEPARATOR_POSITION;
  }

  /**
   * A full code is valid, not short, and its first pair decodes to a legal
   * latitude and longitude
   */
  static isFull(code: string): boolean {
    if (!this.isValid(code) || this.isShort(code)) return false;

    const firstLatValue =
      CodeAlphabet.charToIndex(code.charAt(0)) * CodeAlphabet.BASE;
    if (firstLatValue >= LATITUDE_MAX * 2) return false;

    if (code.length > 1) {
      const firstLngValue =
        CodeAlphabet.charToIndex(code.charAt(1)) * CodeAlphabet.BASE;
      return firstLngValue < LONGITUDE_MAX * 2;
    }

    return true;
  }

  private static isValidPadding(code: string, prefix: string): boolean {
    // Short codes cannot be padded
    if (prefix.length < SEPARATOR_POSITION) return false;

    if (prefix.startsWith(PADDING_CHARACTER)) return false;

    const padding = prefix.slice(
      prefix.indexOf(PADDING_CHARACTER),
      prefix.lastIndexOf(PADDING_CHARACTER) + 1
    );
    if (padding.length % 2 === 1) return false;

    for (const char of padding) {
      if (char !== PADDING_CHARACTER) return false;
    }

    return code.endsWith(SEPARATOR) && this.hasOnlyCodeChars(code);
  }

  // Characters are uppercased one at a time: some, like ligatures, expand
  // into several letters
  private static hasOnlyCodeChars(code: string): boolean {
    for (const char of code) {
      const upper = char.toUpperCase();
      if (upper.length !== 1 || !this.VALID_CHARS.includes(upper)) {
        return false;
      }
    }

    return true;
  }
}
