import { createReadStream } from "fs";
import { resolve } from "path";
import { createInterface } from "readline";
import {
  clipLatitude,
  decode,
  encode,
  encodeIntegers,
  locationToIntegers,
  normalizeLongitude,
} from "../src";

/**
 * Streams an encoding fixture (lat,lng,length,code) through the codec and
 * reports how many rows encode to the expected code and decode back to an
 * area containing the location.
 *
 * Usage: npm run verify [-- path/to/encoding.csv]
 */

const DEFAULT_FIXTURE = resolve(__dirname, "../tests/data/encoding.csv");

// Digits come from exact integer arithmetic, so every row must match
const ALLOWED_ERROR_RATE = 0;

interface VerifyResult {
  totalRows: number;
  validRows: number;
  invalidRows: number;
  encodeMatches: number;
  encodeMismatches: number;
  integerMismatches: number;
  containmentFailures: number;
  errors: Array<{
    line: number;
    issue: string;
    expected?: string;
    actual?: string;
  }>;
}

function parseCsvLine(line: string): string[] {
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
 * Check every fixture row against the codec
 */
async function verifyEncodings(csvPath: string): Promise<VerifyResult> {
  const result: VerifyResult = {
    totalRows: 0,
    validRows: 0,
    invalidRows: 0,
    encodeMatches: 0,
    encodeMismatches: 0,
    integerMismatches: 0,
    containmentFailures: 0,
    errors: [],
  };

  const rl = createInterface({
    input: createReadStream(csvPath),
    crlfDelay: Infinity,
  });

  let lineNumber = 0;

  for await (const line of rl) {
    lineNumber++;
    if (!line.trim() || line.startsWith("#")) continue;

    result.totalRows++;

    const [latStr, lngStr, lengthStr, expected] = parseCsvLine(line);
    const lat = parseFloat(latStr ?? "");
    const lng = parseFloat(lngStr ?? "");
    const length = parseInt(lengthStr ?? "", 10);

    if (isNaN(lat) || isNaN(lng) || isNaN(length) || !expected) {
      result.invalidRows++;
      result.errors.push({ line: lineNumber, issue: "Malformed fixture row" });
      continue;
    }

    result.validRows++;

    const encoded = encode(lat, lng, length);
    if (!encoded.ok) {
      result.encodeMismatches++;
      result.errors.push({
        line: lineNumber,
        issue: `encode failed with ${encoded.error}`,
        expected,
      });
      continue;
    }

    if (encoded.value === expected) {
      result.encodeMatches++;
    } else {
      result.encodeMismatches++;
      result.errors.push({
        line: lineNumber,
        issue: "encode mismatch",
        expected,
        actual: encoded.value,
      });
    }

    const { latInt, lngInt } = locationToIntegers(lat, lng);
    const fromIntegers = encodeIntegers(latInt, lngInt, length);
    if (!fromIntegers.ok || fromIntegers.value !== encoded.value) {
      result.integerMismatches++;
      result.errors.push({
        line: lineNumber,
        issue: "encodeIntegers disagrees with encode",
        expected: encoded.value,
        actual: fromIntegers.ok ? fromIntegers.value : fromIntegers.error,
      });
    }

    const decoded = decode(encoded.value);
    const clippedLat = clipLatitude(lat);
    const normalizedLng = normalizeLongitude(lng);
    if (
      !decoded.ok ||
      decoded.value.latitudeLo > clippedLat + 1e-9 ||
      decoded.value.latitudeHi < clippedLat - 1e-9 ||
      decoded.value.longitudeLo > normalizedLng + 1e-9 ||
      decoded.value.longitudeHi < normalizedLng - 1e-9
    ) {
      result.containmentFailures++;
      result.errors.push({
        line: lineNumber,
        issue: "decoded area does not contain the location",
        actual: encoded.value,
      });
    }
  }

  return result;
}

function generateReport(result: VerifyResult, elapsed: number): boolean {
  console.log("\n" + "=".repeat(60));
  console.log("           PLUS CODE VERIFICATION REPORT");
  console.log("=".repeat(60));

  const errorRate =
    result.validRows > 0 ? result.encodeMismatches / result.validRows : 0;

  console.log(`   Rows processed:           ${result.totalRows}`);
  console.log(`   Invalid rows:             ${result.invalidRows}`);
  console.log(`   Encode matches:           ${result.encodeMatches}`);
  console.log(`   Encode mismatches:        ${result.encodeMismatches}`);
  console.log(`   Integer path mismatches:  ${result.integerMismatches}`);
  console.log(`   Containment failures:     ${result.containmentFailures}`);
  console.log(`   Encode error rate:        ${(errorRate * 100).toFixed(2)}%`);
  console.log(`   Time:                     ${elapsed.toFixed(3)}s`);

  if (result.errors.length > 0) {
    console.log("\n   ERROR EXAMPLES (first 10):");
    result.errors.slice(0, 10).forEach((error, index) => {
      console.log(`   ${index + 1}. line ${error.line}: ${error.issue}`);
      if (error.expected !== undefined || error.actual !== undefined) {
        console.log(`      want ${error.expected ?? "-"}, got ${error.actual ?? "-"}`);
      }
    });

    if (result.errors.length > 10) {
      console.log(`   ... and ${result.errors.length - 10} more errors`);
    }
  }

  console.log("=".repeat(60));

  return (
    errorRate <= ALLOWED_ERROR_RATE &&
    result.invalidRows === 0 &&
    result.integerMismatches === 0 &&
    result.containmentFailures === 0
  );
}

async function main(): Promise<void> {
  const csvPath = resolve(process.argv[2] ?? DEFAULT_FIXTURE);

  console.log(`Verifying ${csvPath}...`);
  const startTime = Date.now();
  const result = await verifyEncodings(csvPath);
  const elapsed = (Date.now() - startTime) / 1000;

  if (!generateReport(result, elapsed)) {
    console.error("Verification failed");
    process.exit(1);
  }
}

main().catch((error) => {
  console.error("Verification aborted:", error);
  process.exit(1);
});
