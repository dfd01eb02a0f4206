import { Result } from "./types";
import { CodeValidator } from "./CodeValidator";
import { CoordinateNormalizer } from "./CoordinateNormalizer";
import { PlusCodeDecoder } from "./PlusCodeDecoder";
import { PlusCodeEncoder } from "./PlusCodeEncoder";
import { CodeAlphabet } from "./CodeAlphabet";
import { err, ok } from "./Result";
import {
  LATITUDE_MAX,
  MIN_TRIMMABLE_CODE_LENGTH,
  PADDING_CHARACTER,
  PAIR_RESOLUTIONS,
  SEPARATOR,
  SEPARATOR_POSITION,
  SHORTEN_SAFETY_FACTOR,
} from "./constants";

/**
 * CodeShortener - Drops leading digits from full codes near a reference
 * location, and restores them from one
 */
export class CodeShortener {
  /**
   * Remove as many leading characters from a full code as the distance
   * between its center and the reference location allows.
   *
   * Returns the uppercased code untouched when the reference is too far
   * away for any prefix to be dropped.
   */
  static shorten(
    code: string,
    latitude: number,
    longitude: number
  ): Result<string> {
    if (!CodeValidator.isFull(code)) {
      return err("full_code_expected");
    }
    if (code.includes(PADDING_CHARACTER)) {
      return err("cannot_shorten_padded_codes");
    }

    const fullCode = code.toUpperCase();
    const decoded = PlusCodeDecoder.decode(fullCode);
    if (!decoded.ok) {
      return decoded;
    }

    const area = decoded.value;
    if (area.codeLength < MIN_TRIMMABLE_CODE_LENGTH) {
      return err("code_length_too_small");
    }

    const lat = CoordinateNormalizer.clipLatitude(latitude);
    const lng = CoordinateNormalizer.normalizeLongitude(longitude);
    const range = Math.max(
      Math.abs(area.latitudeCenter - lat),
      Math.abs(area.longitudeCenter - lng)
    );

    // Finest resolution first, so the longest safe prefix is removed
    for (let i = PAIR_RESOLUTIONS.length - 2; i >= 0; i--) {
      const resolution = PAIR_RESOLUTIONS[i];
      if (
        resolution !== undefined &&
        range < resolution * SHORTEN_SAFETY_FACTOR
      ) {
        return ok(fullCode.slice((i + 1) * 2));
      }
    }

    return ok(fullCode);
  }

  /**
   * Recover the full code nearest to the reference location that ends with
   * the given short code. Full codes are returned uppercased.
   */
  static recoverNearest(
    code: string,
    referenceLatitude: number,
    referenceLongitude: number
  ): Result<string> {
    if (CodeValidator.isFull(code)) {
      return ok(code.toUpperCase());
    }
    if (!CodeValidator.isShort(code)) {
      return err("invalid_code");
    }

    const lat = CoordinateNormalizer.clipLatitude(referenceLatitude);
    const lng = CoordinateNormalizer.normalizeLongitude(referenceLongitude);
    const shortCode = code.toUpperCase();

    const paddingLength = SEPARATOR_POSITION - shortCode.indexOf(SEPARATOR);
    // Size in degrees of the area the missing digits cover
    const resolution = CodeAlphabet.BASE ** (2 - paddingLength / 2);
    const halfResolution = resolution / 2;

    const referenceCode = PlusCodeEncoder.encode(lat, lng);
    if (!referenceCode.ok) {
      return referenceCode;
    }

    const decoded = PlusCodeDecoder.decode(
      referenceCode.value.slice(0, paddingLength) + shortCode
    );
    if (!decoded.ok) {
      return decoded;
    }

    const area = decoded.value;

    // The candidate may sit in the neighbouring cell of the reference; move
    // it one resolution closer when it is more than half a cell away
    let latitudeCenter = area.latitudeCenter;
    if (
      lat + halfResolution < latitudeCenter &&
      latitudeCenter - resolution >= -LATITUDE_MAX
    ) {
      latitudeCenter -= resolution;
    } else if (
      lat - halfResolution > latitudeCenter &&
      latitudeCenter + resolution <= LATITUDE_MAX
    ) {
      latitudeCenter += resolution;
    }

    let longitudeCenter = area.longitudeCenter;
    if (lng + halfResolution < longitudeCenter) {
      longitudeCenter -= resolution;
    } else if (lng - halfResolution > longitudeCenter) {
      longitudeCenter += resolution;
    }

    return PlusCodeEncoder.encode(
      latitudeCenter,
      longitudeCenter,
      area.codeLength
    );
  }
}
