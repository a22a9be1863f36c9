import { Hono, type Context } from "hono";
import { isHarmonizationError } from "../services/errors";
import { parsePollutant } from "../services/normalizer-service";
import { parseQueryRequest, type QueryService } from "../services/query-service";
import { describeCategory } from "../services/classifier-service";
import { CATEGORIES } from "../types/air-quality";
import { parseInstant, parseNumber } from "./params";

const HOUR_MS = 60 * 60 * 1000;
const DEFAULT_HORIZON = 24;

function handleError(c: Context, error: unknown) {
  if (isHarmonizationError(error)) {
    return c.json(
      { error: "Invalid query", kind: error.kind, message: error.message },
      400
    );
  }
  console.error("Error running air quality query:", error);
  return c.json(
    {
      error: "Failed to run query",
      message: error instanceof Error ? error.message : String(error),
    },
    500
  );
}

export function createQueryRoutes(service: QueryService) {
  const app = new Hono();

  // Harmonized series, category, forecast and alerts for one location
  app.get("/query", async (c) => {
    try {
      const lat = c.req.query("lat");
      const lon = c.req.query("lon");
      const pollutants = (c.req.query("pollutants") || "pm25")
        .split(",")
        .filter(Boolean)
        .map(parsePollutant);

      const end = parseInstant(c.req.query("end")) ?? Date.now();
      const start = parseInstant(c.req.query("start")) ?? end - 24 * HOUR_MS;

      console.log(
        `API request received for air quality query at coordinates: ${lat}, ${lon}`
      );

      // Absent or empty coordinates stay undefined and fail validation
      const request = parseQueryRequest({
        location: { lat: parseNumber(lat), lon: parseNumber(lon) },
        pollutants,
        window: { start, end },
        horizonSteps: parseNumber(c.req.query("horizon")) ?? DEFAULT_HORIZON,
      });
      const result = await service.query(request);

      console.log(
        `Returning ${result.jointSeries.length} series, category=${result.category ?? "none"}, ${result.alerts.length} alerts`
      );

      return c.json(result);
    } catch (error) {
      return handleError(c, error);
    }
  });

  // Same as GET, with the request as a JSON body
  app.post("/query", async (c) => {
    try {
      const body: unknown = await c.req.json().catch(() => null);
      const result = await service.query(parseQueryRequest(body));
      return c.json(result);
    } catch (error) {
      return handleError(c, error);
    }
  });

  app.get("/categories", (c) => {
    return c.json(CATEGORIES.map(describeCategory));
  });

  return app;
}
