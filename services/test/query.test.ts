import { describe, it, expect, beforeEach, vi } from "vitest";
import type { JointSeries } from "../../types/air-quality";
import { AlertTracker } from "../alert-service";
import { TtlCache } from "../cache-service";
import { QueryError } from "../errors";
import { MeasurementRepository } from "../measurement-repository";
import { createQueryService, parseQueryRequest } from "../query-service";

const T0 = Date.UTC(2025, 9, 1, 0);
const HOUR_MS = 3600 * 1000;
const HERE = { lat: 13.7445, lon: 100.5435 };
const CELL = { minLat: 13.5, minLon: 100.25, maxLat: 14.0, maxLon: 100.75 };

function groundRecord(parameter: string, value: number, datetime: number) {
  return {
    parameter,
    value,
    unit: "µg/m³",
    latitude: HERE.lat,
    longitude: HERE.lon,
    datetime,
    sensorId: `bkk-${parameter}-01`,
  };
}

function satelliteRecord(product: string, value: number, timestamp: number) {
  return { product, cell: CELL, value, unit: "µg/m³", timestamp };
}

function query(hours: number, pollutants: ("PM25" | "NO2" | "O3")[] = ["PM25"], horizonSteps = 6) {
  return {
    location: HERE,
    pollutants,
    window: { start: T0, end: T0 + hours * HOUR_MS },
    horizonSteps,
  };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  return () => {
    vi.restoreAllMocks();
  };
});

describe("query service", () => {
  it("harmonizes, classifies and alerts end to end", async () => {
    const service = createQueryService({ repository: new MeasurementRepository() });
    service.ingest([groundRecord("pm25", 40, T0), groundRecord("pm25", 50, T0 + 2 * HOUR_MS)], "GROUND");
    service.ingest([satelliteRecord("pm25", 60, T0)], "SATELLITE");

    const result = await service.query(query(3));

    expect(result.jointSeries).toHaveLength(1);
    expect(result.jointSeries[0].samples.map((s) => [s.status, s.value])).toEqual([
      ["observed", 45],
      ["imputed", 47.5],
      ["observed", 50],
    ]);
    expect(result.category).toBe("MODERATE");
    expect(result.categoryInfo?.label).toBe("Moderate");
    expect(result.pollutants).toEqual([
      {
        pollutant: "PM25",
        current: { timestamp: T0 + 2 * HOUR_MS, value: 50, category: "MODERATE" },
        forecastCategories: null,
      },
    ]);
    expect(result.forecast).toEqual([]);
    expect(result.issues).toEqual([
      {
        pollutant: "PM25",
        stage: "forecast",
        kind: "insufficient_history",
        message: "insufficient_history: PM25 has 2 observed points, 10 required",
      },
    ]);
    expect(result.alerts).toEqual([
      {
        pollutant: "PM25",
        locationKey: "13.7445,100.5435",
        category: "MODERATE",
        previousCategory: "GOOD",
        triggeredAt: T0 + 2 * HOUR_MS,
        reason: "observed",
      },
    ]);

    const again = await service.query(query(3));
    expect(again.alerts).toEqual([]);
  });

  it("stays quiet for clean air with a short history", async () => {
    const service = createQueryService({ repository: new MeasurementRepository() });
    service.ingest([groundRecord("pm25", 8, T0), groundRecord("pm25", 9, T0 + HOUR_MS)], "GROUND");

    const result = await service.query(query(2));
    expect(result.category).toBe("GOOD");
    expect(result.alerts).toEqual([]);
    expect(result.issues.map((issue) => issue.kind)).toEqual(["insufficient_history"]);
  });

  it("rates the location by its worst pollutant", async () => {
    const service = createQueryService({ repository: new MeasurementRepository() });
    service.ingest([groundRecord("pm25", 30, T0), groundRecord("no2", 700, T0)], "GROUND");

    const result = await service.query(query(1, ["PM25", "NO2"]));
    expect(result.pollutants.map((report) => report.current?.category)).toEqual([
      "MODERATE",
      "UNHEALTHY",
    ]);
    expect(result.category).toBe("UNHEALTHY");
    expect(result.alerts.map((alert) => [alert.pollutant, alert.category])).toEqual([
      ["PM25", "MODERATE"],
      ["NO2", "UNHEALTHY"],
    ]);
  });

  it("forecasts and classifies the horizon once history is long enough", async () => {
    const service = createQueryService({ repository: new MeasurementRepository() });
    service.ingest(
      Array.from({ length: 12 }, (_, i) => groundRecord("pm25", 10, T0 + i * HOUR_MS)),
      "GROUND"
    );

    const result = await service.query(query(12));
    expect(result.issues).toEqual([]);
    expect(result.forecast).toHaveLength(1);
    expect(result.forecast[0].horizon[0]).toEqual({
      timestamp: T0 + 12 * HOUR_MS,
      pointEstimate: 10,
      lowerBound: 10,
      upperBound: 10,
    });
    expect(result.pollutants[0].forecastCategories).toHaveLength(6);
    expect(result.pollutants[0].forecastCategories?.every((step) => step.category === "GOOD")).toBe(
      true
    );
    expect(result.alerts).toEqual([]);
  });

  it("reports a pollutant without breakpoints instead of failing the query", async () => {
    const service = createQueryService({
      repository: new MeasurementRepository(),
      breakpoints: { PM25: [12.1, 55.5] },
      forecasting: { minHistory: 2 },
    });
    service.ingest([groundRecord("o3", 80, T0), groundRecord("o3", 90, T0 + HOUR_MS)], "GROUND");

    const result = await service.query(query(2, ["O3"]));
    expect(result.category).toBeNull();
    expect(result.issues).toEqual([
      {
        pollutant: "O3",
        stage: "classify",
        kind: "unsupported_pollutant",
        message: "unsupported_pollutant: no breakpoint table for O3",
      },
    ]);
    expect(result.forecast).toHaveLength(1);
    expect(result.pollutants[0].forecastCategories).toBeNull();
  });

  it("flags a pollutant with no readings", async () => {
    const service = createQueryService({ repository: new MeasurementRepository() });
    const result = await service.query(query(2, ["NO2"]));

    expect(result.jointSeries[0].samples.every((s) => s.status === "missing")).toBe(true);
    expect(result.pollutants[0].current).toBeNull();
    expect(result.issues.map((issue) => [issue.stage, issue.kind])).toEqual([
      ["classify", "no_data"],
      ["forecast", "insufficient_history"],
    ]);
    expect(result.category).toBeNull();
    expect(result.categoryInfo).toBeNull();
  });

  it("rejects malformed queries", async () => {
    const service = createQueryService({ repository: new MeasurementRepository() });
    await expect(service.query(query(2, []))).rejects.toThrow(QueryError);
    await expect(service.query(query(2, ["PM25"], 0))).rejects.toThrow(/^invalid_query: horizonSteps/);
    await expect(service.query(query(10_001))).rejects.toThrow(
      "invalid_query: window spans 10001 buckets, at most 10000 allowed"
    );
  });

  it("drops cached series when new data arrives", async () => {
    const cache = new TtlCache<JointSeries>();
    const service = createQueryService({ repository: new MeasurementRepository(), cache });

    const before = await service.query(query(1));
    expect(before.pollutants[0].current).toBeNull();
    expect(cache.size).toBe(1);

    service.ingest([groundRecord("pm25", 20, T0)], "GROUND");
    const after = await service.query(query(1));
    expect(after.pollutants[0].current?.value).toBe(20);
  });

  it("does not forecast from two readings padded out by interpolation", async () => {
    const service = createQueryService({ repository: new MeasurementRepository() });
    service.ingest([groundRecord("pm25", 10, T0), groundRecord("pm25", 40, T0 + 9 * HOUR_MS)], "GROUND");

    const result = await service.query(query(10));
    expect(result.jointSeries[0].samples.filter((s) => s.status === "imputed")).toHaveLength(8);
    expect(result.forecast).toEqual([]);
    expect(result.issues.map((issue) => issue.message)).toEqual([
      "insufficient_history: PM25 has 2 observed points, 10 required",
    ]);
  });

  it("hands out series that cannot change what is cached", async () => {
    const cache = new TtlCache<JointSeries>();
    const service = createQueryService({ repository: new MeasurementRepository(), cache });
    service.ingest([groundRecord("pm25", 10, T0)], "GROUND");

    const first = await service.query(query(1));
    const edited = first.jointSeries[0].samples[0];
    if (edited.status !== "observed") throw new Error("expected an observed sample");
    edited.value = 999;

    const second = await service.query(query(1));
    expect(second.jointSeries[0].samples[0].value).toBe(10);
    expect(second.pollutants[0].current).toEqual({ timestamp: T0, value: 10, category: "GOOD" });
  });

  it("keeps alert state in the injected tracker", async () => {
    const alerts = new AlertTracker();
    const service = createQueryService({ repository: new MeasurementRepository(), alerts });
    service.ingest([groundRecord("pm25", 70, T0)], "GROUND");

    await service.query(query(1));
    expect(alerts.get("13.7445,100.5435", "PM25")).toEqual({
      category: "UNHEALTHY",
      forecasted: null,
    });
  });
});

describe("parseQueryRequest", () => {
  it("dedupes pollutants", () => {
    expect(parseQueryRequest(query(1, ["PM25", "PM25", "NO2"])).pollutants).toEqual(["PM25", "NO2"]);
  });

  it("rejects a window that ends before it starts", () => {
    expect(() =>
      parseQueryRequest({ ...query(1), window: { start: T0, end: T0 - HOUR_MS } })
    ).toThrow("invalid_query: window.end: window.end must be after window.start");
  });

  it("rejects unknown pollutants", () => {
    expect(() => parseQueryRequest({ ...query(1), pollutants: ["SO2"] })).toThrow(QueryError);
  });
});
