import * as fs from "node:fs";
import * as path from "node:path";
import type { Measurement } from "../types/air-quality";
import { SchemaError } from "./errors";
import { assertCanonicalMeasurement } from "./normalizer-service";

export const SAMPLE_DATA_PATH = path.resolve(__dirname, "..", "data", "sample-measurements.json");

// Where the canned dataset was recorded (Bangkok, 1 Oct 2025 UTC)
export const SAMPLE_LOCATION = { lat: 13.74433, lon: 100.54365 };
export const SAMPLE_WINDOW = {
  start: Date.UTC(2025, 9, 1, 0),
  end: Date.UTC(2025, 9, 2, 0),
};

/**
 * Load the offline dataset. Every record must already satisfy the same
 * contract as normalizer output; one bad record fails the whole load.
 */
export function loadSampleMeasurements(filePath: string = SAMPLE_DATA_PATH): Measurement[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  if (!Array.isArray(parsed)) {
    throw new SchemaError("invalid_value", `${filePath} must contain a JSON array`);
  }

  return parsed.map((record: unknown, index) => {
    try {
      return Object.freeze(assertCanonicalMeasurement(record));
    } catch (error) {
      if (error instanceof SchemaError) {
        throw new SchemaError(error.kind, `sample record ${index}: ${error.message}`, error.field);
      }
      throw error;
    }
  });
}
