import {
  decode,
  encode,
  encodeIntegers,
  isFull,
  isShort,
  isValid,
  locationToIntegers,
  recoverNearest,
  shorten,
  unwrap,
} from "../src";
import {
  readDecodingCases,
  readEncodingCases,
  readShorteningCases,
  readValidityCases,
} from "./fixtures";

describe("Plus codes", () => {
  const validityCases = readValidityCases();
  const encodingCases = readEncodingCases();
  const decodingCases = readDecodingCases();
  const shorteningCases = readShorteningCases();

  describe("Validity", () => {
    it("should classify every fixture code", () => {
      validityCases.forEach((testCase) => {
        expect({
          code: testCase.code,
          isValid: isValid(testCase.code),
          isShort: isShort(testCase.code),
          isFull: isFull(testCase.code),
        }).toEqual(testCase);
      });
    });

    it("should never report a code as both short and full", () => {
      validityCases.forEach(({ code }) => {
        if (isFull(code)) {
          expect(isValid(code)).toBe(true);
          expect(isShort(code)).toBe(false);
        }
        if (isShort(code)) {
          expect(isValid(code)).toBe(true);
        }
      });
    });
  });

  describe("Encoding", () => {
    it("should encode every fixture location", () => {
      encodingCases.forEach((testCase) => {
        expect(encode(testCase.lat, testCase.lng, testCase.length)).toEqual({
          ok: true,
          value: testCase.code,
        });
      });
    });

    it("should produce the same codes through the integer entry points", () => {
      encodingCases.forEach((testCase) => {
        const { latInt, lngInt } = locationToIntegers(
          testCase.lat,
          testCase.lng
        );
        expect(unwrap(encodeIntegers(latInt, lngInt, testCase.length))).toBe(
          testCase.code
        );
      });
    });
  });

  describe("Decoding", () => {
    it("should decode every fixture code to its bounds", () => {
      decodingCases.forEach((testCase) => {
        const area = unwrap(decode(testCase.code));

        expect(area.codeLength).toBe(testCase.length);
        expect(Math.abs(area.latitudeLo - testCase.latLo)).toBeLessThan(1e-10);
        expect(Math.abs(area.longitudeLo - testCase.lngLo)).toBeLessThan(1e-10);
        expect(Math.abs(area.latitudeHi - testCase.latHi)).toBeLessThan(1e-10);
        expect(Math.abs(area.longitudeHi - testCase.lngHi)).toBeLessThan(1e-10);
      });
    });

    it("should reject short and malformed codes", () => {
      expect(decode("CJ+2VX")).toEqual({
        ok: false,
        error: "full_code_expected",
      });
      expect(decode("asdsa+21")).toEqual({ ok: false, error: "invalid_code" });
    });
  });

  describe("Shortening and recovery", () => {
    it("should shorten fixture codes", () => {
      shorteningCases
        .filter((testCase) => testCase.testType !== "R")
        .forEach((testCase) => {
          expect(shorten(testCase.fullCode, testCase.lat, testCase.lng)).toEqual(
            { ok: true, value: testCase.shortCode }
          );
        });
    });

    it("should recover fixture codes", () => {
      shorteningCases
        .filter((testCase) => testCase.testType !== "S")
        .forEach((testCase) => {
          expect(
            recoverNearest(testCase.shortCode, testCase.lat, testCase.lng)
          ).toEqual({ ok: true, value: testCase.fullCode });
        });
    });

    it("should recover what it shortened", () => {
      shorteningCases
        .filter((testCase) => testCase.testType === "B")
        .forEach(({ fullCode, lat, lng }) => {
          const shortCode = unwrap(shorten(fullCode, lat, lng));
          expect(unwrap(recoverNearest(shortCode, lat, lng))).toBe(fullCode);
        });
    });

    it("should refuse to shorten a short code", () => {
      expect(shorten("CJ+2VX", 1.2, 2.3)).toEqual({
        ok: false,
        error: "full_code_expected",
      });
    });
  });

  describe("Round trip", () => {
    const lengths = [2, 4, 6, 8, 10, 11, 12, 13, 14, 15];
    const tolerance = 1e-9;

    it("should decode to an area containing the encoded location", () => {
      for (let i = 0; i < 200; i++) {
        const lat = 89.99 * Math.sin(i * 1.7);
        const lng = 179.99 * Math.cos(i * 2.3);

        lengths.forEach((length) => {
          const area = unwrap(decode(unwrap(encode(lat, lng, length))));

          expect(area.latitudeLo - tolerance).toBeLessThanOrEqual(lat);
          expect(area.latitudeHi + tolerance).toBeGreaterThanOrEqual(lat);
          expect(area.longitudeLo - tolerance).toBeLessThanOrEqual(lng);
          expect(area.longitudeHi + tolerance).toBeGreaterThanOrEqual(lng);
          expect(area.codeLength).toBe(length);
        });
      }
    });

    it("should contain the extreme corners of the world", () => {
      const north = unwrap(decode(unwrap(encode(90, 180))));
      expect(north.latitudeHi).toBeCloseTo(90, 10);
      expect(north.longitudeLo).toBe(-180);

      const south = unwrap(decode(unwrap(encode(-90, -180))));
      expect(south.latitudeLo).toBe(-90);
      expect(south.longitudeLo).toBe(-180);
    });
  });
});
