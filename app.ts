import { Hono } from "hono";
import { logger } from "hono/logger";
import type { AppConfig } from "./config";
import { createCorsMiddleware } from "./middleware/cors-middleware";
import { createIngestRoutes } from "./routes/ingest-routes";
import { createLocationRoutes } from "./routes/location-routes";
import { createQueryRoutes } from "./routes/query-routes";
import { TtlCache } from "./services/cache-service";
import { MeasurementRepository } from "./services/measurement-repository";
import { createQueryService, type QueryService } from "./services/query-service";
import { loadSampleMeasurements } from "./services/sample-service";
import type { JointSeries } from "./types/air-quality";

export interface AppContext {
  app: Hono;
  service: QueryService;
  repository: MeasurementRepository;
}

/**
 * Wire repository, cache and query service from configuration and mount the
 * routes. `requestLogging` is off in tests to keep output quiet.
 */
export function createApp(
  config: AppConfig,
  options: { requestLogging?: boolean; now?: () => number } = {}
): AppContext {
  const repository = new MeasurementRepository();
  const cache = new TtlCache<JointSeries>(config.CACHE_TTL_SECONDS * 1000, options.now);
  const service = createQueryService({
    repository,
    cache,
    alignment: {
      bucketMinutes: config.BUCKET_MINUTES,
      groundToleranceMinutes: config.GROUND_TOLERANCE_MINUTES,
      satelliteToleranceMinutes: config.SATELLITE_TOLERANCE_MINUTES,
      maxGroundDistanceKm: config.MAX_GROUND_DISTANCE_KM,
    },
    forecasting: { minHistory: config.MIN_HISTORY },
  });

  if (config.SAMPLE_MODE) {
    const sample = loadSampleMeasurements();
    repository.add(sample);
    console.log(`Sample mode: loaded ${sample.length} canned measurements`);
  }

  const app = new Hono();

  app.use("*", createCorsMiddleware(config.ALLOWED_ORIGINS));
  if (options.requestLogging ?? true) {
    app.use(logger());
  }

  // Routes
  app.route("/api/ingest", createIngestRoutes(service));
  app.route("/api", createQueryRoutes(service));
  app.route("/api", createLocationRoutes(repository, options.now));

  // Default route
  app.get("/", (c) => {
    return c.json({
      message: "Air quality harmonization API",
      sampleMode: config.SAMPLE_MODE,
      measurements: repository.size,
    });
  });

  return { app, service, repository };
}
