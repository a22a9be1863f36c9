import type { Pollutant } from "../types/air-quality";

export type SchemaErrorKind =
  | "missing_field"
  | "unknown_unit"
  | "unsupported_pollutant"
  | "out_of_coverage"
  | "invalid_value";

export type ClassificationErrorKind = "unsupported_pollutant" | "invalid_value";

export type ForecastErrorKind =
  | "insufficient_history"
  | "invalid_history"
  | "invalid_horizon";

export type QueryErrorKind = "invalid_query";

/**
 * Base class for every error the harmonization pipeline raises on purpose.
 * `kind` is the machine-readable tag callers and the HTTP layer switch on.
 */
export abstract class HarmonizationError<K extends string = string> extends Error {
  abstract readonly stage: "normalize" | "classify" | "forecast" | "query";

  constructor(
    readonly kind: K,
    message: string
  ) {
    super(`${kind}: ${message}`);
    this.name = new.target.name;
  }
}

export class SchemaError extends HarmonizationError<SchemaErrorKind> {
  readonly stage = "normalize";

  constructor(
    kind: SchemaErrorKind,
    message: string,
    readonly field?: string
  ) {
    super(kind, message);
  }
}

export class ClassificationError extends HarmonizationError<ClassificationErrorKind> {
  readonly stage = "classify";

  constructor(
    kind: ClassificationErrorKind,
    message: string,
    readonly pollutant: Pollutant
  ) {
    super(kind, message);
  }
}

export class ForecastError extends HarmonizationError<ForecastErrorKind> {
  readonly stage = "forecast";
}

export class QueryError extends HarmonizationError<QueryErrorKind> {
  readonly stage = "query";
}

export function isHarmonizationError(error: unknown): error is HarmonizationError {
  return error instanceof HarmonizationError;
}
