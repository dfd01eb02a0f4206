/**
 * CodeAlphabet - Maps plus code characters to digit values and back
 */
export class CodeAlphabet {
  // 20 characters, no vowels, no easily confused glyphs
  static readonly CHARS = "23456789CFGHJMPQRVWX";

  static readonly BASE = CodeAlphabet.CHARS.length;

  /**
   * Convert a code character to its digit value (0-19), case-insensitive
   * @returns -1 when the character is not part of the alphabet
   */
  static charToIndex(char: string): number {
    if (char.length !== 1) return -1;

    return this.CHARS.indexOf(char.toUpperCase());
  }

  /**
   * Convert a digit value back to its code character
   */
  static indexToChar(index: number): string {
    if (!Number.isInteger(index) || index < 0 || index >= this.BASE) return "";

    return this.CHARS.charAt(index);
  }
}
