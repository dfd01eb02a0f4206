import { LATITUDE_MAX, LONGITUDE_MAX } from "./constants";

/**
 * CoordinateNormalizer - Brings raw coordinates into the ranges the codec works in
 */
export class CoordinateNormalizer {
  /**
   * Clamp a latitude into [-90, 90]
   */
  static clipLatitude(latitude: number): number {
    return Math.min(LATITUDE_MAX, Math.max(-LATITUDE_MAX, latitude));
  }

  /**
   * Wrap a longitude into [-180, 180), however many turns away it is
   */
  static normalizeLongitude(longitude: number): number {
    if (longitude >= -LONGITUDE_MAX && longitude < LONGITUDE_MAX) {
      return longitude;
    }

    const turn = 2 * LONGITUDE_MAX;
    const shifted = (((longitude + LONGITUDE_MAX) % turn) + turn) % turn;

    return shifted - LONGITUDE_MAX;
  }
}
