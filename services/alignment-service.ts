import type {
  JointSample,
  JointSeries,
  Location,
  Measurement,
  ObservedSample,
  Pollutant,
  TimeWindow,
} from "../types/air-quality";
import { cellContains } from "./normalizer-service";

const MS_PER_MIN = 60 * 1000;
const EARTH_RADIUS_KM = 6371.0088;

export interface AlignmentOptions {
  /** Bucket width, aligned to epoch 0 */
  bucketMinutes: number;
  /** τg: max distance between a ground reading and the bucket midpoint */
  groundToleranceMinutes: number;
  /** τs: same for satellite cells */
  satelliteToleranceMinutes: number;
  /** Ground sensors farther than this from the query point are ignored */
  maxGroundDistanceKm: number;
}

export const DEFAULT_ALIGNMENT: AlignmentOptions = {
  bucketMinutes: 60,
  groundToleranceMinutes: 120,
  satelliteToleranceMinutes: 120,
  maxGroundDistanceKm: 10,
};

/**
 * Start (epoch ms) of the bucket containing the timestamp.
 */
export function bucketStart(tsMs: number, bucketMinutes: number = 60): number {
  const bucketDurationMs = bucketMinutes * MS_PER_MIN;
  return Math.floor(tsMs / bucketDurationMs) * bucketDurationMs;
}

/**
 * Bucket starts covering `[start, end)`. The first bucket may begin before
 * `start` when the window is not bucket-aligned.
 */
export function bucketStarts(window: TimeWindow, bucketMinutes: number): number[] {
  const durationMs = bucketMinutes * MS_PER_MIN;
  const starts: number[] = [];
  for (let ts = bucketStart(window.start, bucketMinutes); ts < window.end; ts += durationMs) {
    starts.push(ts);
  }
  return starts;
}

export function distanceKm(a: Location, b: Location): number {
  const toRad = (deg: number) => (deg * Math.PI) / 180;
  const dLat = toRad(b.lat - a.lat);
  const dLon = toRad(b.lon - a.lon);
  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Order by timestamp and drop repeated readings from the same source and
 * position at the same instant (first one wins).
 */
export function toTimeSeries(measurements: readonly Measurement[]): Measurement[] {
  const seen = new Set<string>();
  return [...measurements]
    .map((measurement, index) => ({ measurement, index }))
    .sort((a, b) => a.measurement.timestamp - b.measurement.timestamp || a.index - b.index)
    .map(({ measurement }) => measurement)
    .filter((measurement) => {
      const key = [
        measurement.source,
        measurement.sensorId ?? "",
        measurement.location.lat,
        measurement.location.lon,
        measurement.timestamp,
      ].join("|");
      if (seen.has(key)) {
        return false;
      }
      seen.add(key);
      return true;
    });
}

interface Candidate {
  measurement: Measurement;
  age: number;
  distance: number;
}

function pickNearest(
  measurements: readonly Measurement[],
  location: Location,
  midpoint: number,
  toleranceMs: number
): Candidate | undefined {
  let best: Candidate | undefined;
  for (const measurement of measurements) {
    const age = Math.abs(measurement.timestamp - midpoint);
    if (age > toleranceMs) continue;
    const candidate = {
      measurement,
      age,
      distance: distanceKm(location, measurement.location),
    };
    if (!best || compareCandidates(candidate, best) < 0) {
      best = candidate;
    }
  }
  return best;
}

function compareCandidates(a: Candidate, b: Candidate): number {
  return (
    a.age - b.age ||
    a.measurement.timestamp - b.measurement.timestamp ||
    a.distance - b.distance ||
    a.measurement.value - b.measurement.value
  );
}

function groupByBucket(
  measurements: readonly Measurement[],
  bucketMinutes: number
): Map<number, Measurement[]> {
  const groups = new Map<number, Measurement[]>();
  for (const measurement of measurements) {
    const key = bucketStart(measurement.timestamp, bucketMinutes);
    const group = groups.get(key);
    if (group) {
      group.push(measurement);
    } else {
      groups.set(key, [measurement]);
    }
  }
  return groups;
}

function interpolateGaps(samples: JointSample[]): JointSample[] {
  // Nearest observed sample at or after each index, filled right to left
  const nextObserved: (ObservedSample | undefined)[] = new Array(samples.length);
  let next: ObservedSample | undefined;
  for (let i = samples.length - 1; i >= 0; i--) {
    const sample = samples[i];
    if (sample.status === "observed") next = sample;
    nextObserved[i] = next;
  }

  let previous: ObservedSample | undefined;
  return samples.map((sample, index): JointSample => {
    if (sample.status === "observed") {
      previous = sample;
      return sample;
    }

    const following = nextObserved[index];
    if (!previous || !following) {
      return { timestamp: sample.timestamp, status: "missing", value: null, imputed: false };
    }

    const span = following.timestamp - previous.timestamp;
    const fraction = (sample.timestamp - previous.timestamp) / span;
    return {
      timestamp: sample.timestamp,
      status: "imputed",
      value: previous.value + (following.value - previous.value) * fraction,
      imputed: true,
      weights: { ground: 0, satellite: 0 },
    };
  });
}

/**
 * Fuse ground and satellite readings into one bucketed series for a point.
 *
 * Each bucket takes the ground reading nearest its midpoint (within τg and
 * the distance cut-off) and the covering satellite cell nearest its midpoint
 * (within τs). When both exist the ground weight decays linearly with the
 * reading's age: `w_ground = clamp(1 - age/τg, 0, 1)`. Empty buckets between
 * two observed ones are linearly interpolated; empty buckets at either edge
 * stay missing.
 */
export function align(
  location: Location,
  pollutant: Pollutant,
  window: TimeWindow,
  groundSeries: readonly Measurement[],
  satelliteSeries: readonly Measurement[],
  options: Partial<AlignmentOptions> = {}
): JointSeries {
  const settings: AlignmentOptions = { ...DEFAULT_ALIGNMENT, ...options };
  if (!(settings.bucketMinutes > 0)) {
    throw new RangeError(`bucketMinutes must be positive, got ${settings.bucketMinutes}`);
  }
  if (!(window.end > window.start)) {
    throw new RangeError("time window must end after it starts");
  }

  const halfBucketMs = (settings.bucketMinutes * MS_PER_MIN) / 2;
  const groundToleranceMs = settings.groundToleranceMinutes * MS_PER_MIN;
  const satelliteToleranceMs = settings.satelliteToleranceMinutes * MS_PER_MIN;

  const ground = groupByBucket(
    groundSeries.filter(
      (m) =>
        m.source === "GROUND" &&
        m.pollutant === pollutant &&
        distanceKm(location, m.location) <= settings.maxGroundDistanceKm
    ),
    settings.bucketMinutes
  );
  const satellite = groupByBucket(
    satelliteSeries.filter(
      (m) =>
        m.source === "SATELLITE" &&
        m.pollutant === pollutant &&
        m.spatialResolution.kind === "cell" &&
        cellContains(m.spatialResolution.extent, location)
    ),
    settings.bucketMinutes
  );

  const samples = bucketStarts(window, settings.bucketMinutes).map((timestamp): JointSample => {
    const midpoint = timestamp + halfBucketMs;
    const g = pickNearest(ground.get(timestamp) ?? [], location, midpoint, groundToleranceMs);
    const s = pickNearest(satellite.get(timestamp) ?? [], location, midpoint, satelliteToleranceMs);

    if (!g && !s) {
      return { timestamp, status: "missing", value: null, imputed: false };
    }

    const groundWeight = !g
      ? 0
      : !s
        ? 1
        : clamp(1 - g.age / groundToleranceMs, 0, 1);
    const satelliteWeight = 1 - groundWeight;

    const sample: ObservedSample = {
      timestamp,
      status: "observed",
      value:
        groundWeight * (g?.measurement.value ?? 0) +
        satelliteWeight * (s?.measurement.value ?? 0),
      imputed: false,
      weights: { ground: groundWeight, satellite: satelliteWeight },
    };
    if (g) sample.ground = { timestamp: g.measurement.timestamp, value: g.measurement.value };
    if (s) sample.satellite = { timestamp: s.measurement.timestamp, value: s.measurement.value };
    return sample;
  });

  return {
    location: { ...location },
    pollutant,
    window: { ...window },
    bucketMinutes: settings.bucketMinutes,
    samples: interpolateGaps(samples),
  };
}
