import * as fs from "fs";
import * as path from "path";

export interface ValidityCase {
  code: string;
  isValid: boolean;
  isShort: boolean;
  isFull: boolean;
}

export interface EncodingCase {
  lat: number;
  lng: number;
  length: number;
  code: string;
}

export interface DecodingCase {
  code: string;
  length: number;
  latLo: number;
  lngLo: number;
  latHi: number;
  lngHi: number;
}

export interface ShorteningCase {
  fullCode: string;
  lat: number;
  lng: number;
  shortCode: string;
  testType: "B" | "S" | "R";
}

export const FIXTURE_DIR = path.join(__dirname, "data");

/**
 * Parse CSV line handling quoted fields
 */
export function parseCsvLine(line: string): string[] {
  const result: string[] = [];
  let current = "";
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === "," && !inQuotes) {
      result.push(current.trim());
      current = "";
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

/**
 * Read the data rows of a fixture file, skipping blank and `#` comment lines
 */
export function readFixture(name: string): string[][] {
  const content = fs.readFileSync(path.join(FIXTURE_DIR, name), "utf-8");
  const rows: string[][] = [];

  for (const rawLine of content.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;

    rows.push(parseCsvLine(line));
  }

  return rows;
}

function field(row: string[], index: number): string {
  const value = row[index];
  if (value === undefined) {
    throw new Error(`Missing column ${index} in fixture row: ${row.join(",")}`);
  }
  return value;
}

function numberField(row: string[], index: number): number {
  const value = parseFloat(field(row, index));
  if (isNaN(value)) {
    throw new Error(`Column ${index} is not a number: ${row.join(",")}`);
  }
  return value;
}

export function readValidityCases(): ValidityCase[] {
  return readFixture("validity.csv").map((row) => ({
    code: field(row, 0),
    isValid: field(row, 1) === "true",
    isShort: field(row, 2) === "true",
    isFull: field(row, 3) === "true",
  }));
}

export function readEncodingCases(): EncodingCase[] {
  return readFixture("encoding.csv").map((row) => ({
    lat: numberField(row, 0),
    lng: numberField(row, 1),
    length: numberField(row, 2),
    code: field(row, 3),
  }));
}

export function readDecodingCases(): DecodingCase[] {
  return readFixture("decoding.csv").map((row) => ({
    code: field(row, 0),
    length: numberField(row, 1),
    latLo: numberField(row, 2),
    lngLo: numberField(row, 3),
    latHi: numberField(row, 4),
    lngHi: numberField(row, 5),
  }));
}

export function readShorteningCases(): ShorteningCase[] {
  return readFixture("shortening.csv").map((row) => {
    const testType = field(row, 4);
    if (testType !== "B" && testType !== "S" && testType !== "R") {
      throw new Error(`Unknown test type "${testType}"`);
    }

    return {
      fullCode: field(row, 0),
      lat: numberField(row, 1),
      lng: numberField(row, 2),
      shortCode: field(row, 3),
      testType,
    };
  });
}
