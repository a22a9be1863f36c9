import type {
  ForecastResult,
  ForecastStep,
  JointSeries,
} from "../types/air-quality";
import { ForecastError } from "./errors";

const MS_PER_MIN = 60 * 1000;

export type ConfidenceLevel = 0.8 | 0.9 | 0.95 | 0.99;

// Two-sided standard normal quantiles
const Z_SCORES: Record<ConfidenceLevel, number> = {
  0.8: 1.2816,
  0.9: 1.6449,
  0.95: 1.96,
  0.99: 2.5758,
};

export interface ForecastOptions {
  /** Observed (not interpolated) samples required before fitting */
  minHistory: number;
  /** Level smoothing */
  alpha: number;
  /** Trend smoothing */
  beta: number;
  /** Trend damping per step */
  phi: number;
  /** Share of a full update an imputed sample is allowed to make */
  imputedWeight: number;
  confidence: ConfidenceLevel;
  /** Drop observed values outside 1.5×IQR before fitting */
  removeOutliers: boolean;
}

export const DEFAULT_FORECAST: ForecastOptions = {
  minHistory: 10,
  alpha: 0.5,
  beta: 0.1,
  phi: 0.9,
  imputedWeight: 0.25,
  confidence: 0.8,
  removeOutliers: true,
};

interface HistoryPoint {
  index: number;
  value: number;
  imputed: boolean;
}

function checkOptions(options: ForecastOptions): void {
  const unit = (value: number) => Number.isFinite(value) && value >= 0 && value <= 1;
  if (!Number.isInteger(options.minHistory) || options.minHistory < 2) {
    throw new RangeError(`minHistory must be an integer >= 2, got ${options.minHistory}`);
  }
  if (!unit(options.alpha) || options.alpha === 0 || !unit(options.beta)) {
    throw new RangeError("alpha must be in (0, 1] and beta in [0, 1]");
  }
  if (!unit(options.phi) || options.phi === 0 || !unit(options.imputedWeight)) {
    throw new RangeError("phi must be in (0, 1] and imputedWeight in [0, 1]");
  }
  if (!(options.confidence in Z_SCORES)) {
    throw new RangeError(`unsupported confidence level ${options.confidence}`);
  }
}

/** φ + φ² + … + φⁿ */
function dampSum(phi: number, steps: number): number {
  let total = 0;
  let power = 1;
  for (let i = 0; i < steps; i++) {
    power *= phi;
    total += power;
  }
  return total;
}

/**
 * Linear-interpolated quantile of a sorted array.
 */
export function quantile(sorted: readonly number[], q: number): number {
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (position - lower);
}

/**
 * Tukey fences with the lower fence floored at zero, since concentrations
 * cannot be negative.
 */
export function removeOutliers<T extends { value: number }>(
  points: readonly T[]
): T[] {
  if (points.length < 3) return [...points];

  const sorted = points.map((p) => p.value).sort((a, b) => a - b);
  const q1 = quantile(sorted, 0.25);
  const q3 = quantile(sorted, 0.75);
  const iqr = q3 - q1;
  const lower = Math.max(0, q1 - 1.5 * iqr);
  const upper = q3 + 1.5 * iqr;

  return points.filter((p) => p.value >= lower && p.value <= upper);
}

/**
 * Project a joint series forward `horizonSteps` buckets.
 *
 * Damped-trend exponential smoothing in error-correction form. Missing
 * buckets advance the state without a correction; imputed buckets correct
 * it with `imputedWeight` of the usual gain and count with the same weight
 * in the residual variance, so a long interpolated run cannot pull the fit
 * or narrow the band on its own.
 */
export function forecast(
  series: JointSeries,
  horizonSteps: number,
  options: Partial<ForecastOptions> = {}
): ForecastResult {
  const settings: ForecastOptions = { ...DEFAULT_FORECAST, ...options };
  checkOptions(settings);

  if (!Number.isInteger(horizonSteps) || horizonSteps < 1) {
    throw new ForecastError(
      "invalid_horizon",
      `horizon must be a positive integer, got ${horizonSteps}`
    );
  }

  const history: HistoryPoint[] = [];
  series.samples.forEach((sample, index) => {
    if (sample.status === "missing") return;
    history.push({ index, value: sample.value, imputed: sample.imputed });
  });

  if (history.some((point) => !Number.isFinite(point.value) || point.value < 0)) {
    throw new ForecastError(
      "invalid_history",
      `${series.pollutant} history contains non-finite or negative values`
    );
  }
  // Interpolated buckets never count toward the minimum
  const observed = history.filter((point) => !point.imputed);
  if (observed.length < settings.minHistory) {
    throw new ForecastError(
      "insufficient_history",
      `${series.pollutant} has ${observed.length} observed points, ${settings.minHistory} required`
    );
  }

  const kept = new Set(settings.removeOutliers ? removeOutliers(observed) : observed);
  const firstKept = history.findIndex((point) => kept.has(point));
  const fit = history
    .slice(firstKept)
    .filter((point) => point.imputed || kept.has(point));
  const { alpha, beta, phi, imputedWeight } = settings;

  let level = fit[0].value;
  let trend = 0;
  let weightedSquares = 0;
  let totalWeight = 0;

  for (let i = 1; i < fit.length; i++) {
    const point = fit[i];
    const gap = point.index - fit[i - 1].index;
    const predicted = level + trend * dampSum(phi, gap);
    const error = point.value - predicted;
    const weight = point.imputed ? imputedWeight : 1;

    weightedSquares += weight * error * error;
    totalWeight += weight;

    level = predicted + alpha * weight * error;
    trend = phi ** gap * trend + alpha * beta * weight * error;
  }

  const sigma = totalWeight > 0 ? Math.sqrt(weightedSquares / totalWeight) : 0;
  const z = Z_SCORES[settings.confidence];

  const lastFitted = fit[fit.length - 1];
  const lastSample = series.samples[series.samples.length - 1];
  const stepsSinceFit = series.samples.length - 1 - lastFitted.index;
  const bucketMs = series.bucketMinutes * MS_PER_MIN;

  const horizon: ForecastStep[] = [];
  // 1 + Σ c_j² for j < k, grown as k advances
  let varianceFactor = 1;
  for (let k = 1; k <= stepsSinceFit + horizonSteps; k++) {
    if (k > 1) {
      const c = alpha * (1 + beta * dampSum(phi, k - 1));
      varianceFactor += c * c;
    }
    if (k <= stepsSinceFit) continue;

    const raw = level + trend * dampSum(phi, k);
    const halfWidth = z * sigma * Math.sqrt(varianceFactor);
    const step = k - stepsSinceFit;
    const timestamp = lastSample.timestamp + step * bucketMs;

    if (raw - halfWidth >= 0) {
      horizon.push({
        timestamp,
        pointEstimate: raw,
        lowerBound: raw - halfWidth,
        upperBound: raw + halfWidth,
      });
    } else {
      // Truncated at zero: keep the width by lifting the upper bound
      horizon.push({
        timestamp,
        pointEstimate: Math.max(0, raw),
        lowerBound: 0,
        upperBound: 2 * halfWidth,
      });
    }
  }

  return {
    pollutant: series.pollutant,
    model: "damped-holt",
    confidence: settings.confidence,
    trainingPoints: fit.length,
    imputedShare: fit.filter((point) => point.imputed).length / fit.length,
    outliersRemoved: observed.length - kept.size,
    horizon,
  };
}
