import {
  CONCENTRATION_UNIT,
  type Location,
  type Measurement,
  type Pollutant,
  type TimeWindow,
} from "../types/air-quality";
import { distanceKm } from "./alignment-service";
import { locationKey } from "./alert-service";

const HOUR_MS = 60 * 60 * 1000;

// Stations that have not reported for a day are left out of nearby searches
export const STATION_FRESHNESS_MS = 24 * HOUR_MS;

export interface StationSensor {
  pollutant: Pollutant;
  sensorId: string | null;
}

/**
 * A ground monitoring site, derived from the ground measurements that were
 * ingested for one position.
 */
export interface Station {
  id: string;
  location: Location;
  sensors: StationSensor[];
  /** Timestamp of the newest measurement, epoch ms */
  lastUpdated: number;
  measurementCount: number;
}

export interface NearbyStation extends Station {
  distanceKm: number;
}

export interface StationReading {
  value: number;
  unit: typeof CONCENTRATION_UNIT;
  sensorId: string | null;
  timestamp: number;
}

export interface StationLatest {
  stationId: string;
  window: TimeWindow;
  parameters: Partial<Record<Pollutant, StationReading>>;
  sensorsCount: number;
  measurementsFound: number;
}

export interface StationStats {
  stations: number;
  sensors: number;
  /** Number of stations reporting each pollutant */
  stationsByPollutant: Partial<Record<Pollutant, number>>;
}

function sensorKey(sensor: StationSensor): string {
  return `${sensor.pollutant}|${sensor.sensorId ?? ""}`;
}

export function buildStations(ground: readonly Measurement[]): Station[] {
  const stations = new Map<string, Station>();
  const sensorKeys = new Map<string, Set<string>>();

  for (const measurement of ground) {
    if (measurement.source !== "GROUND") continue;

    const id = locationKey(measurement.location);
    let station = stations.get(id);
    if (!station) {
      station = {
        id,
        location: { ...measurement.location },
        sensors: [],
        lastUpdated: measurement.timestamp,
        measurementCount: 0,
      };
      stations.set(id, station);
      sensorKeys.set(id, new Set());
    }

    station.measurementCount += 1;
    station.lastUpdated = Math.max(station.lastUpdated, measurement.timestamp);

    const sensor = { pollutant: measurement.pollutant, sensorId: measurement.sensorId ?? null };
    const seen = sensorKeys.get(id);
    if (seen && !seen.has(sensorKey(sensor))) {
      seen.add(sensorKey(sensor));
      station.sensors.push(sensor);
    }
  }

  return [...stations.values()]
    .map((station) => ({
      ...station,
      sensors: [...station.sensors].sort((a, b) => sensorKey(a).localeCompare(sensorKey(b))),
    }))
    .sort((a, b) => a.id.localeCompare(b.id));
}

/**
 * Stations within `radiusKm` of a point that reported within `maxAgeMs` of
 * `now`, nearest first.
 */
export function stationsNear(
  stations: readonly Station[],
  near: Location,
  radiusKm: number,
  now: number,
  maxAgeMs: number = STATION_FRESHNESS_MS
): NearbyStation[] {
  if (!(radiusKm > 0)) {
    throw new RangeError(`radius must be positive, got ${radiusKm}`);
  }

  return stations
    .filter((station) => now - station.lastUpdated < maxAgeMs)
    .map((station) => ({ ...station, distanceKm: distanceKm(near, station.location) }))
    .filter((station) => station.distanceKm <= radiusKm)
    .sort((a, b) => a.distanceKm - b.distanceKm || a.id.localeCompare(b.id));
}

/**
 * Newest reading per pollutant at one station inside the window, or null
 * when the station is unknown.
 */
export function latestReadings(
  ground: readonly Measurement[],
  stationId: string,
  window: TimeWindow
): StationLatest | null {
  const station = buildStations(ground).find((candidate) => candidate.id === stationId);
  if (!station) return null;

  const parameters: Partial<Record<Pollutant, StationReading>> = {};
  for (const measurement of ground) {
    if (
      measurement.source !== "GROUND" ||
      locationKey(measurement.location) !== stationId ||
      measurement.timestamp < window.start ||
      measurement.timestamp >= window.end
    ) {
      continue;
    }
    const current = parameters[measurement.pollutant];
    if (!current || measurement.timestamp >= current.timestamp) {
      parameters[measurement.pollutant] = {
        value: measurement.value,
        unit: measurement.unit,
        sensorId: measurement.sensorId ?? null,
        timestamp: measurement.timestamp,
      };
    }
  }

  return {
    stationId,
    window: { ...window },
    parameters,
    sensorsCount: station.sensors.length,
    measurementsFound: Object.keys(parameters).length,
  };
}

export function stationStats(stations: readonly Station[]): StationStats {
  const stationsByPollutant: Partial<Record<Pollutant, number>> = {};
  let sensors = 0;

  for (const station of stations) {
    sensors += station.sensors.length;
    for (const pollutant of new Set(station.sensors.map((sensor) => sensor.pollutant))) {
      stationsByPollutant[pollutant] = (stationsByPollutant[pollutant] ?? 0) + 1;
    }
  }

  return { stations: stations.length, sensors, stationsByPollutant };
}
