import { CoordinateNormalizer } from "../CoordinateNormalizer";

describe("CoordinateNormalizer", () => {
  describe("clipLatitude", () => {
    it("should leave latitudes in range alone", () => {
      expect(CoordinateNormalizer.clipLatitude(47.5)).toBe(47.5);
      expect(CoordinateNormalizer.clipLatitude(-90)).toBe(-90);
      expect(CoordinateNormalizer.clipLatitude(90)).toBe(90);
    });

    it("should clamp latitudes past the poles", () => {
      expect(CoordinateNormalizer.clipLatitude(120)).toBe(90);
      expect(CoordinateNormalizer.clipLatitude(-90.5)).toBe(-90);
    });

    it("should be idempotent", () => {
      [-1000, -90.1, 0, 45, 90.1, 1000].forEach((latitude) => {
        const once = CoordinateNormalizer.clipLatitude(latitude);
        expect(CoordinateNormalizer.clipLatitude(once)).toBe(once);
      });
    });
  });

  describe("normalizeLongitude", () => {
    it("should leave longitudes in range alone", () => {
      expect(CoordinateNormalizer.normalizeLongitude(8.5)).toBe(8.5);
      expect(CoordinateNormalizer.normalizeLongitude(-180)).toBe(-180);
      expect(CoordinateNormalizer.normalizeLongitude(179.5)).toBe(179.5);
    });

    it("should wrap 180 to -180", () => {
      expect(CoordinateNormalizer.normalizeLongitude(180)).toBe(-180);
      expect(CoordinateNormalizer.normalizeLongitude(540)).toBe(-180);
    });

    it("should wrap longitudes one turn away", () => {
      expect(CoordinateNormalizer.normalizeLongitude(-181)).toBe(179);
      expect(CoordinateNormalizer.normalizeLongitude(190)).toBe(-170);
    });

    it("should wrap longitudes many turns away", () => {
      expect(CoordinateNormalizer.normalizeLongitude(720.5)).toBe(0.5);
      expect(CoordinateNormalizer.normalizeLongitude(1000000)).toBe(-80);
      expect(CoordinateNormalizer.normalizeLongitude(-1000000)).toBe(80);
    });

    it("should be idempotent", () => {
      [-1000000, -540, -180.25, 0, 180, 359.75, 1000000].forEach(
        (longitude) => {
          const once = CoordinateNormalizer.normalizeLongitude(longitude);
          expect(once).toBeGreaterThanOrEqual(-180);
          expect(once).toBeLessThan(180);
          expect(CoordinateNormalizer.normalizeLongitude(once)).toBe(once);
        }
      );
    });
  });
});
