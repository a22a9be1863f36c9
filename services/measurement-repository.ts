import type {
  Measurement,
  Pollutant,
  SourceKind,
  TimeWindow,
} from "../types/air-quality";
import { toTimeSeries } from "./alignment-service";
import {
  normalizeBatch,
  type NormalizerOptions,
  type RejectedRecord,
} from "./normalizer-service";
import type { SchemaErrorKind } from "./errors";

export interface IngestReport {
  source: SourceKind;
  received: number;
  accepted: number;
  rejected: number;
  rejectedByKind: Partial<Record<SchemaErrorKind, number>>;
  errors: RejectedRecord[];
}

/**
 * In-memory home for canonical measurements. Raw payloads only get in
 * through `ingest`, which runs the normalizer; canned data goes through
 * `add` after its own validation.
 */
export class MeasurementRepository {
  private readonly bySource: Record<SourceKind, Measurement[]> = {
    GROUND: [],
    SATELLITE: [],
  };

  constructor(private readonly normalizerOptions: NormalizerOptions = {}) {}

  get size(): number {
    return this.bySource.GROUND.length + this.bySource.SATELLITE.length;
  }

  ingest(records: readonly unknown[], source: SourceKind): IngestReport {
    const batch = normalizeBatch(records, source, this.normalizerOptions);
    this.add(batch.measurements);

    if (batch.rejected.length > 0) {
      console.warn(
        `Dropped ${batch.rejected.length}/${records.length} ${source} records:`,
        batch.rejectedByKind
      );
    }
    console.log(`Ingested ${batch.measurements.length} ${source} measurements`);

    return {
      source,
      received: records.length,
      accepted: batch.measurements.length,
      rejected: batch.rejected.length,
      rejectedByKind: batch.rejectedByKind,
      errors: batch.rejected,
    };
  }

  add(measurements: readonly Measurement[]): void {
    for (const measurement of measurements) {
      this.bySource[measurement.source].push(measurement);
    }
    this.bySource.GROUND = toTimeSeries(this.bySource.GROUND);
    this.bySource.SATELLITE = toTimeSeries(this.bySource.SATELLITE);
  }

  /** Every stored measurement from one source, ascending by time */
  measurements(source: SourceKind): readonly Measurement[] {
    return this.bySource[source];
  }

  /**
   * Measurements of one pollutant from one source, ascending by time,
   * optionally limited to a window.
   */
  series(source: SourceKind, pollutant: Pollutant, window?: TimeWindow): Measurement[] {
    return this.bySource[source].filter(
      (m) =>
        m.pollutant === pollutant &&
        (!window || (m.timestamp >= window.start && m.timestamp < window.end))
    );
  }

  clear(): void {
    this.bySource.GROUND = [];
    this.bySource.SATELLITE = [];
  }
}
