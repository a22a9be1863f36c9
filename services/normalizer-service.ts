import { z } from "zod";
import {
  CONCENTRATION_UNIT,
  COLUMN_UNIT,
  POLLUTANTS,
  SOURCE_KINDS,
  type CellExtent,
  type Location,
  type Measurement,
  type Pollutant,
  type SourceKind,
} from "../types/air-quality";
import { SchemaError, type SchemaErrorKind } from "./errors";

/**
 * Default satellite footprint: the Asia-Pacific disc of a geostationary
 * air-quality instrument. Cells centred outside it are rejected.
 */
export const DEFAULT_COVERAGE: CellExtent = {
  minLat: -5,
  minLon: 75,
  maxLat: 45,
  maxLon: 145,
};

export interface NormalizerOptions {
  coverage?: CellExtent;
}

// Molar volume at 25 °C and 1 atm, L/mol
const MOLAR_VOLUME = 24.45;
const AVOGADRO = 6.02214076e23;
// Column densities are spread over an assumed well-mixed boundary layer
const MIXING_HEIGHT_M = 1000;

const MOLECULAR_WEIGHT: Partial<Record<Pollutant, number>> = {
  NO2: 46.0055,
  O3: 47.9982,
};

// µg/m³ per mol/m² of column. PM2.5 is not a gas and has no column product.
const COLUMN_TO_SURFACE: Partial<Record<Pollutant, number>> = {
  NO2: (46.0055 * 1e6) / MIXING_HEIGHT_M,
  O3: (47.9982 * 1e6) / MIXING_HEIGHT_M,
};

const POLLUTANT_CODES: Record<string, Pollutant> = {
  pm25: "PM25",
  "pm2.5": "PM25",
  pm2_5: "PM25",
  no2: "NO2",
  o3: "O3",
};

// Mass concentrations, factor to µg/m³
const MASS_UNITS: Record<string, number> = {
  "µg/m3": 1,
  "ug/m3": 1,
  "mg/m3": 1000,
  "ng/m3": 0.001,
};

// Mixing ratios, factor to ppb
const MIXING_RATIO_UNITS: Record<string, number> = {
  ppb: 1,
  ppm: 1000,
};

// Column densities, factor to mol/m²
const COLUMN_UNITS: Record<string, number> = {
  "mol/m2": 1,
  "molecules/cm2": 1e4 / AVOGADRO,
  "molec/cm2": 1e4 / AVOGADRO,
};

const nullableNumber = z.number().nullish();

const groundRecordSchema = z
  .object({
    parameter: z
      .union([
        z.string(),
        z.object({ name: z.string(), units: z.string().nullish() }),
      ])
      .nullish(),
    value: nullableNumber,
    unit: z.string().nullish(),
    coordinates: z
      .object({ latitude: z.number(), longitude: z.number() })
      .nullish(),
    latitude: nullableNumber,
    longitude: nullableNumber,
    datetime: z
      .union([z.string(), z.number(), z.object({ utc: z.string() })])
      .nullish(),
    sensorId: z.union([z.string(), z.number()]).nullish(),
  })
  .passthrough();

const cellSchema = z.object({
  minLat: z.number(),
  minLon: z.number(),
  maxLat: z.number(),
  maxLon: z.number(),
});

const satelliteRecordSchema = z
  .object({
    product: z.string().nullish(),
    parameter: z.string().nullish(),
    cell: cellSchema.nullish(),
    columnDensity: nullableNumber,
    value: nullableNumber,
    unit: z.string().nullish(),
    timestamp: z.union([z.string(), z.number()]).nullish(),
  })
  .passthrough();

const locationSchema = z.object({
  lat: z.number().finite().min(-90).max(90),
  lon: z.number().finite().min(-180).max(180),
});

const measurementSchema = z
  .object({
    source: z.enum(SOURCE_KINDS),
    pollutant: z.enum(POLLUTANTS),
    value: z.number().finite().nonnegative(),
    unit: z.literal(CONCENTRATION_UNIT),
    location: locationSchema,
    timestamp: z.number().int(),
    spatialResolution: z.discriminatedUnion("kind", [
      z.object({ kind: z.literal("point") }),
      z.object({ kind: z.literal("cell"), extent: cellSchema }),
    ]),
    columnDensity: z
      .object({
        value: z.number().finite().nonnegative(),
        unit: z.literal(COLUMN_UNIT),
      })
      .optional(),
    sensorId: z.string().optional(),
  })
  .superRefine((measurement, ctx) => {
    const expected = measurement.source === "GROUND" ? "point" : "cell";
    if (measurement.spatialResolution.kind !== expected) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["spatialResolution", "kind"],
        message: `${measurement.source} measurements must use a ${expected} resolution`,
      });
    }
  });

function schemaErrorFromIssues(issues: z.ZodIssue[]): SchemaError {
  const [issue] = issues;
  const field = issue ? issue.path.join(".") : undefined;
  if (
    issue &&
    issue.code === z.ZodIssueCode.invalid_type &&
    issue.received === "undefined"
  ) {
    return new SchemaError("missing_field", `${field} is required`, field);
  }
  return new SchemaError(
    "invalid_value",
    issue ? `${field || "record"}: ${issue.message}` : "record is malformed",
    field
  );
}

function requireField<T>(value: T | null | undefined, field: string): T {
  if (value === null || value === undefined) {
    throw new SchemaError("missing_field", `${field} is required`, field);
  }
  return value;
}

function unitKey(unit: string): string {
  return unit
    .trim()
    .toLowerCase()
    .replace(/μ/g, "µ")
    .replace(/\s+/g, "")
    .replace(/³/g, "3")
    .replace(/²/g, "2");
}

export function parsePollutant(code: string): Pollutant {
  const pollutant = POLLUTANT_CODES[code.trim().toLowerCase()];
  if (!pollutant) {
    throw new SchemaError(
      "unsupported_pollutant",
      `pollutant "${code}" is not supported`,
      "pollutant"
    );
  }
  return pollutant;
}

function parseTimestamp(raw: string | number | { utc: string }): number {
  const value =
    typeof raw === "number"
      ? raw
      : Date.parse(typeof raw === "string" ? raw : raw.utc);
  if (!Number.isFinite(value)) {
    throw new SchemaError(
      "invalid_value",
      `timestamp ${JSON.stringify(raw)} cannot be parsed`,
      "timestamp"
    );
  }
  return Math.trunc(value);
}

function checkValue(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new SchemaError(
      "invalid_value",
      `${field} must be a finite, non-negative number (got ${value})`,
      field
    );
  }
  return value;
}

function checkLocation(location: Location): Location {
  const parsed = locationSchema.safeParse(location);
  if (!parsed.success) {
    throw new SchemaError(
      "invalid_value",
      `location (${location.lat}, ${location.lon}) is out of range`,
      "location"
    );
  }
  return parsed.data;
}

/**
 * Convert a surface concentration to µg/m³. Mixing ratios are only
 * meaningful for gases; the unit is never guessed.
 */
export function toMicrogramsPerCubicMeter(
  pollutant: Pollutant,
  value: number,
  unit: string
): number {
  const key = unitKey(unit);

  const massFactor = MASS_UNITS[key];
  if (massFactor !== undefined) {
    return value * massFactor;
  }

  const ratioFactor = MIXING_RATIO_UNITS[key];
  const weight = MOLECULAR_WEIGHT[pollutant];
  if (ratioFactor !== undefined && weight !== undefined) {
    return (value * ratioFactor * weight) / MOLAR_VOLUME;
  }

  throw new SchemaError(
    "unknown_unit",
    `unit "${unit}" is not recognised for ${pollutant}`,
    "unit"
  );
}

function freeze(measurement: Measurement): Measurement {
  Object.freeze(measurement.location);
  if (measurement.spatialResolution.kind === "cell") {
    Object.freeze(measurement.spatialResolution.extent);
  }
  Object.freeze(measurement.spatialResolution);
  if (measurement.columnDensity) {
    Object.freeze(measurement.columnDensity);
  }
  return Object.freeze(measurement);
}

function normalizeGround(raw: unknown): Measurement {
  const parsed = groundRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw schemaErrorFromIssues(parsed.error.issues);
  }
  const record = parsed.data;

  const parameter = requireField(record.parameter, "pollutant");
  const code = typeof parameter === "string" ? parameter : parameter.name;
  const rawValue = requireField(record.value, "value");
  const datetime = requireField(record.datetime, "timestamp");
  const lat = record.coordinates?.latitude ?? record.latitude;
  const lon = record.coordinates?.longitude ?? record.longitude;
  if (lat === null || lat === undefined || lon === null || lon === undefined) {
    throw new SchemaError("missing_field", "location is required", "location");
  }

  const unit =
    record.unit ?? (typeof parameter === "string" ? null : parameter.units);
  if (!unit) {
    throw new SchemaError("unknown_unit", "unit is missing", "unit");
  }

  const pollutant = parsePollutant(code);
  const value = toMicrogramsPerCubicMeter(
    pollutant,
    checkValue(rawValue, "value"),
    unit
  );

  const measurement: Measurement = {
    source: "GROUND",
    pollutant,
    value,
    unit: CONCENTRATION_UNIT,
    location: checkLocation({ lat, lon }),
    timestamp: parseTimestamp(datetime),
    spatialResolution: { kind: "point" },
  };
  if (record.sensorId !== null && record.sensorId !== undefined) {
    measurement.sensorId = String(record.sensorId);
  }
  return measurement;
}

function checkCell(cell: CellExtent): CellExtent {
  const ordered = cell.minLat < cell.maxLat && cell.minLon < cell.maxLon;
  if (
    !ordered ||
    !locationSchema.safeParse({ lat: cell.minLat, lon: cell.minLon }).success ||
    !locationSchema.safeParse({ lat: cell.maxLat, lon: cell.maxLon }).success
  ) {
    throw new SchemaError(
      "invalid_value",
      "cell extent must be ordered and within geographic bounds",
      "cell"
    );
  }
  return { ...cell };
}

export function cellCenter(cell: CellExtent): Location {
  return {
    lat: (cell.minLat + cell.maxLat) / 2,
    lon: (cell.minLon + cell.maxLon) / 2,
  };
}

export function cellContains(cell: CellExtent, location: Location): boolean {
  return (
    location.lat >= cell.minLat &&
    location.lat <= cell.maxLat &&
    location.lon >= cell.minLon &&
    location.lon <= cell.maxLon
  );
}

function normalizeSatellite(
  raw: unknown,
  options: NormalizerOptions
): Measurement {
  const parsed = satelliteRecordSchema.safeParse(raw);
  if (!parsed.success) {
    throw schemaErrorFromIssues(parsed.error.issues);
  }
  const record = parsed.data;

  const code = requireField(record.product ?? record.parameter, "pollutant");
  const rawValue = requireField(
    record.columnDensity ?? record.value,
    "value"
  );
  const timestamp = requireField(record.timestamp, "timestamp");
  const cell = checkCell(requireField(record.cell, "location"));
  if (!record.unit) {
    throw new SchemaError("unknown_unit", "unit is missing", "unit");
  }

  const pollutant = parsePollutant(code);
  const value = checkValue(rawValue, "value");
  const location = cellCenter(cell);

  const coverage = options.coverage ?? DEFAULT_COVERAGE;
  if (!cellContains(coverage, location)) {
    throw new SchemaError(
      "out_of_coverage",
      `cell centred at (${location.lat}, ${location.lon}) is outside satellite coverage`,
      "cell"
    );
  }

  const measurement: Measurement = {
    source: "SATELLITE",
    pollutant,
    value: 0,
    unit: CONCENTRATION_UNIT,
    location,
    timestamp: parseTimestamp(timestamp),
    spatialResolution: { kind: "cell", extent: cell },
  };

  const columnFactor = COLUMN_UNITS[unitKey(record.unit)];
  if (columnFactor === undefined) {
    // Surface-derived product, already a concentration
    measurement.value = toMicrogramsPerCubicMeter(pollutant, value, record.unit);
    return measurement;
  }

  const surfaceFactor = COLUMN_TO_SURFACE[pollutant];
  if (surfaceFactor === undefined) {
    throw new SchemaError(
      "unknown_unit",
      `no column conversion exists for ${pollutant}`,
      "unit"
    );
  }
  const column = value * columnFactor;
  measurement.columnDensity = { value: column, unit: COLUMN_UNIT };
  measurement.value = column * surfaceFactor;
  return measurement;
}

const normalizers: Record<
  SourceKind,
  (raw: unknown, options: NormalizerOptions) => Measurement
> = {
  GROUND: normalizeGround,
  SATELLITE: normalizeSatellite,
};

/**
 * Turn one raw source payload into a canonical, frozen Measurement.
 * Throws SchemaError for anything that cannot be normalized.
 */
export function normalize(
  raw: unknown,
  sourceKind: SourceKind,
  options: NormalizerOptions = {}
): Measurement {
  return freeze(assertCanonicalMeasurement(normalizers[sourceKind](raw, options)));
}

/**
 * Validate something that claims to be a normalized Measurement, e.g. a
 * canned sample record. Returns a fresh copy.
 */
export function assertCanonicalMeasurement(value: unknown): Measurement {
  const parsed = measurementSchema.safeParse(value);
  if (!parsed.success) {
    throw schemaErrorFromIssues(parsed.error.issues);
  }
  return parsed.data;
}

export interface RejectedRecord {
  index: number;
  kind: SchemaErrorKind;
  message: string;
}

export interface BatchResult {
  measurements: Measurement[];
  rejected: RejectedRecord[];
  rejectedByKind: Partial<Record<SchemaErrorKind, number>>;
}

/**
 * Normalize a batch, dropping bad records and reporting each one.
 * Only SchemaError is recovered; anything else is a bug and propagates.
 */
export function normalizeBatch(
  records: readonly unknown[],
  sourceKind: SourceKind,
  options: NormalizerOptions = {}
): BatchResult {
  const result: BatchResult = { measurements: [], rejected: [], rejectedByKind: {} };

  records.forEach((raw, index) => {
    try {
      result.measurements.push(normalize(raw, sourceKind, options));
    } catch (error) {
      if (!(error instanceof SchemaError)) {
        throw error;
      }
      result.rejected.push({ index, kind: error.kind, message: error.message });
      result.rejectedByKind[error.kind] = (result.rejectedByKind[error.kind] ?? 0) + 1;
    }
  });

  return result;
}
