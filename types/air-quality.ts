// Shared shapes for the harmonization core and the HTTP layer

export const POLLUTANTS = ["PM25", "NO2", "O3"] as const;
export type Pollutant = (typeof POLLUTANTS)[number];

export const SOURCE_KINDS = ["GROUND", "SATELLITE"] as const;
export type SourceKind = (typeof SOURCE_KINDS)[number];

// Concentrations leave the normalizer in µg/m³; mol/m² only appears on the
// column-density provenance of satellite measurements
export const CONCENTRATION_UNIT = "µg/m³";
export const COLUMN_UNIT = "mol/m²";
export type CanonicalUnit = typeof CONCENTRATION_UNIT | typeof COLUMN_UNIT;

export interface Location {
  lat: number;
  lon: number;
}

export interface CellExtent {
  minLat: number;
  minLon: number;
  maxLat: number;
  maxLon: number;
}

export type SpatialResolution =
  | { kind: "point" }
  | { kind: "cell"; extent: CellExtent };

export interface Measurement {
  source: SourceKind;
  pollutant: Pollutant;
  value: number;
  unit: typeof CONCENTRATION_UNIT;
  location: Location;
  /** Epoch milliseconds */
  timestamp: number;
  spatialResolution: SpatialResolution;
  columnDensity?: { value: number; unit: typeof COLUMN_UNIT };
  sensorId?: string;
}

/** Half-open interval `[start, end)` in epoch milliseconds */
export interface TimeWindow {
  start: number;
  end: number;
}

export interface SampleWeights {
  ground: number;
  satellite: number;
}

export interface ContributingObservation {
  timestamp: number;
  value: number;
}

interface SampleBase {
  /** Bucket start, epoch milliseconds */
  timestamp: number;
}

export interface ObservedSample extends SampleBase {
  status: "observed";
  value: number;
  imputed: false;
  weights: SampleWeights;
  ground?: ContributingObservation;
  satellite?: ContributingObservation;
}

export interface ImputedSample extends SampleBase {
  status: "imputed";
  value: number;
  imputed: true;
  weights: SampleWeights;
}

export interface MissingSample extends SampleBase {
  status: "missing";
  value: null;
  imputed: false;
}

export type JointSample = ObservedSample | ImputedSample | MissingSample;

export interface JointSeries {
  location: Location;
  pollutant: Pollutant;
  window: TimeWindow;
  bucketMinutes: number;
  samples: JointSample[];
}

export const CATEGORIES = ["GOOD", "MODERATE", "UNHEALTHY"] as const;
export type Category = (typeof CATEGORIES)[number];

export interface ForecastStep {
  timestamp: number;
  pointEstimate: number;
  lowerBound: number;
  upperBound: number;
}

export interface ForecastResult {
  pollutant: Pollutant;
  model: "damped-holt";
  confidence: number;
  trainingPoints: number;
  imputedShare: number;
  outliersRemoved: number;
  horizon: ForecastStep[];
}

export type AlertReason = "observed" | "forecasted";

export interface AlertEvent {
  pollutant: Pollutant;
  locationKey: string;
  category: Category;
  previousCategory: Category;
  triggeredAt: number;
  reason: AlertReason;
}
