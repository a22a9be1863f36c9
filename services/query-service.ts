import { z } from "zod";
import {
  POLLUTANTS,
  type AlertEvent,
  type Category,
  type ForecastResult,
  type JointSample,
  type JointSeries,
  type Location,
  type Pollutant,
  type SourceKind,
  type TimeWindow,
} from "../types/air-quality";
import {
  align,
  bucketStart,
  DEFAULT_ALIGNMENT,
  type AlignmentOptions,
} from "./alignment-service";
import { AlertTracker, locationKey } from "./alert-service";
import { seriesCacheKey, type ReadThroughCache } from "./cache-service";
import {
  classify,
  DEFAULT_BREAKPOINTS,
  describeCategory,
  overallCategory,
  validateBreakpoints,
  type BreakpointTable,
  type CategoryInfo,
} from "./classifier-service";
import { ClassificationError, ForecastError, QueryError } from "./errors";
import { forecast, type ForecastOptions } from "./forecast-service";
import type { IngestReport, MeasurementRepository } from "./measurement-repository";

const MS_PER_MIN = 60 * 1000;
export const MAX_HORIZON_STEPS = 168;
export const MAX_BUCKETS = 10_000;

export interface QueryRequest {
  location: Location;
  pollutants: Pollutant[];
  window: TimeWindow;
  horizonSteps: number;
}

export const queryRequestSchema = z
  .object({
    location: z.object({
      lat: z.number().finite().min(-90).max(90),
      lon: z.number().finite().min(-180).max(180),
    }),
    pollutants: z.array(z.enum(POLLUTANTS)).min(1),
    window: z.object({ start: z.number().int(), end: z.number().int() }),
    horizonSteps: z.number().int().min(1).max(MAX_HORIZON_STEPS),
  })
  .refine((request) => request.window.end > request.window.start, {
    message: "window.end must be after window.start",
    path: ["window", "end"],
  });

export interface QueryIssue {
  pollutant: Pollutant;
  stage: "classify" | "forecast";
  kind: string;
  message: string;
}

export interface PollutantReport {
  pollutant: Pollutant;
  current: { timestamp: number; value: number; category: Category | null } | null;
  forecastCategories: { timestamp: number; category: Category }[] | null;
}

export interface QueryResult {
  location: Location;
  locationKey: string;
  window: TimeWindow;
  category: Category | null;
  categoryInfo: CategoryInfo | null;
  pollutants: PollutantReport[];
  jointSeries: JointSeries[];
  forecast: ForecastResult[];
  alerts: AlertEvent[];
  issues: QueryIssue[];
}

export interface QueryServiceDeps {
  repository: MeasurementRepository;
  /** Joint series are computed through this cache when given */
  cache?: ReadThroughCache<JointSeries>;
  alerts?: AlertTracker;
  alignment?: Partial<AlignmentOptions>;
  forecasting?: Partial<ForecastOptions>;
  breakpoints?: BreakpointTable;
}

/**
 * Parse an untrusted query, throwing QueryError with the first problem.
 */
export function parseQueryRequest(input: unknown): QueryRequest {
  const parsed = queryRequestSchema.safeParse(input);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue ? issue.path.join(".") : "query";
    throw new QueryError("invalid_query", `${field}: ${issue?.message ?? "invalid"}`);
  }
  return {
    ...parsed.data,
    pollutants: [...new Set(parsed.data.pollutants)],
  };
}

function latestSample(series: JointSeries): Exclude<JointSample, { status: "missing" }> | undefined {
  for (let i = series.samples.length - 1; i >= 0; i--) {
    const sample = series.samples[i];
    if (sample.status !== "missing") return sample;
  }
  return undefined;
}

export function createQueryService(deps: QueryServiceDeps) {
  const alignment: AlignmentOptions = { ...DEFAULT_ALIGNMENT, ...deps.alignment };
  const breakpoints = validateBreakpoints(deps.breakpoints ?? DEFAULT_BREAKPOINTS);
  const tracker = deps.alerts ?? new AlertTracker();
  const bucketMs = alignment.bucketMinutes * MS_PER_MIN;

  // Widen the window to whole buckets so edge buckets see all their readings
  function fetchWindow(window: TimeWindow): TimeWindow {
    return {
      start: bucketStart(window.start, alignment.bucketMinutes),
      end: bucketStart(window.end - 1, alignment.bucketMinutes) + bucketMs,
    };
  }

  function computeSeries(request: QueryRequest, pollutant: Pollutant): JointSeries {
    const range = fetchWindow(request.window);
    return align(
      request.location,
      pollutant,
      request.window,
      deps.repository.series("GROUND", pollutant, range),
      deps.repository.series("SATELLITE", pollutant, range),
      alignment
    );
  }

  return {
    /**
     * Normalize raw source records into the repository. Cached series are
     * dropped since they may now be incomplete.
     */
    ingest(records: readonly unknown[], source: SourceKind): IngestReport {
      const report = deps.repository.ingest(records, source);
      deps.cache?.clear();
      return report;
    },

    /**
     * Harmonize, classify, forecast and evaluate alerts for each requested
     * pollutant at one location. Per-pollutant classification and forecast
     * failures are reported in `issues`; anything else propagates.
     */
    async query(input: QueryRequest): Promise<QueryResult> {
      const request = parseQueryRequest(input);
      const range = fetchWindow(request.window);
      const buckets = (range.end - range.start) / bucketMs;
      if (buckets > MAX_BUCKETS) {
        throw new QueryError(
          "invalid_query",
          `window spans ${buckets} buckets, at most ${MAX_BUCKETS} allowed`
        );
      }

      const key = locationKey(request.location);
      const result: QueryResult = {
        location: request.location,
        locationKey: key,
        window: request.window,
        category: null,
        categoryInfo: null,
        pollutants: [],
        jointSeries: [],
        forecast: [],
        alerts: [],
        issues: [],
      };

      for (const pollutant of request.pollutants) {
        // Callers get their own copy; the cached series stays untouched
        const series = deps.cache
          ? structuredClone(
              await deps.cache.getOrCompute(
                seriesCacheKey(request.location, pollutant, request.window),
                () => computeSeries(request, pollutant)
              )
            )
          : computeSeries(request, pollutant);
        result.jointSeries.push(series);

        const report: PollutantReport = { pollutant, current: null, forecastCategories: null };
        result.pollutants.push(report);

        const latest = latestSample(series);
        if (!latest) {
          result.issues.push({
            pollutant,
            stage: "classify",
            kind: "no_data",
            message: `no ${pollutant} readings for this location and window`,
          });
        } else {
          report.current = { timestamp: latest.timestamp, value: latest.value, category: null };
          try {
            report.current.category = classify(pollutant, latest.value, breakpoints);
          } catch (error) {
            if (!(error instanceof ClassificationError)) throw error;
            result.issues.push({ pollutant, stage: "classify", kind: error.kind, message: error.message });
          }
        }

        try {
          const projection = forecast(series, request.horizonSteps, deps.forecasting);
          result.forecast.push(projection);
          if (breakpoints[pollutant]) {
            report.forecastCategories = projection.horizon.map((step) => ({
              timestamp: step.timestamp,
              category: classify(pollutant, step.pointEstimate, breakpoints),
            }));
          }
        } catch (error) {
          if (!(error instanceof ForecastError)) throw error;
          result.issues.push({ pollutant, stage: "forecast", kind: error.kind, message: error.message });
        }

        const current = report.current;
        result.alerts.push(
          ...tracker.record({
            pollutant,
            locationKey: key,
            current:
              current && current.category
                ? { category: current.category, observedAt: current.timestamp }
                : null,
            forecast: report.forecastCategories ?? [],
          })
        );
      }

      result.category = overallCategory(
        result.pollutants.flatMap((report) =>
          report.current?.category ? [report.current.category] : []
        )
      );
      result.categoryInfo = result.category ? describeCategory(result.category) : null;

      if (result.issues.length > 0) {
        console.warn(
          `Query at ${key} degraded:`,
          result.issues.map((issue) => `${issue.pollutant}/${issue.stage}/${issue.kind}`).join(", ")
        );
      }

      return result;
    },
  };
}

export type QueryService = ReturnType<typeof createQueryService>;
