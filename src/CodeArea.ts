import { LATITUDE_MAX, LONGITUDE_MAX } from "./constants";

/**
 * CodeArea - The rectangle a decoded plus code stands for
 *
 * Holds the south-west (lo) and north-east (hi) corners in degrees, the
 * center, and the number of significant digits that produced the area.
 * Centers never exceed 90 degrees latitude or 180 degrees longitude.
 */
export class CodeArea {
  readonly latitudeLo: number;
  readonly longitudeLo: number;
  readonly latitudeHi: number;
  readonly longitudeHi: number;
  readonly latitudeCenter: number;
  readonly longitudeCenter: number;
  readonly codeLength: number;

  constructor(
    latitudeLo: number,
    longitudeLo: number,
    latitudeHi: number,
    longitudeHi: number,
    codeLength: number
  ) {
    this.latitudeLo = latitudeLo;
    this.longitudeLo = longitudeLo;
    this.latitudeHi = latitudeHi;
    this.longitudeHi = longitudeHi;
    this.codeLength = codeLength;

    this.latitudeCenter = Math.min(
      latitudeLo + (latitudeHi - latitudeLo) / 2,
      LATITUDE_MAX
    );
    this.longitudeCenter = Math.min(
      longitudeLo + (longitudeHi - longitudeLo) / 2,
      LONGITUDE_MAX
    );
  }
}
