import { Hono } from "hono";
import { z } from "zod";
import type { MeasurementRepository } from "../services/measurement-repository";
import {
  buildStations,
  latestReadings,
  stationStats,
  stationsNear,
} from "../services/station-service";
import { parseInstant, parseNumber } from "./params";

const HOUR_MS = 60 * 60 * 1000;
const DEFAULT_RADIUS_KM = 10;
const DEFAULT_MAX_AGE_HOURS = 24;

const nearbySchema = z.object({
  lat: z.number().finite().min(-90).max(90),
  lon: z.number().finite().min(-180).max(180),
  radiusKm: z.number().finite().positive().max(500),
  maxAgeHours: z.number().finite().positive(),
});

const windowSchema = z
  .object({ start: z.number().finite(), end: z.number().finite() })
  .refine((window) => window.end > window.start, {
    message: "end must be after start",
    path: ["end"],
  });

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
}

export function createLocationRoutes(
  repository: MeasurementRepository,
  now: () => number = Date.now
) {
  const app = new Hono();

  // Ground stations near a coordinate that reported recently
  app.get("/locations", (c) => {
    const parsed = nearbySchema.safeParse({
      lat: parseNumber(c.req.query("lat")),
      lon: parseNumber(c.req.query("lon")),
      radiusKm: parseNumber(c.req.query("radius")) ?? DEFAULT_RADIUS_KM,
      maxAgeHours: parseNumber(c.req.query("maxAgeHours")) ?? DEFAULT_MAX_AGE_HOURS,
    });
    if (!parsed.success) {
      return c.json({ error: "Invalid request", message: describeIssues(parsed.error) }, 400);
    }

    const { lat, lon, radiusKm, maxAgeHours } = parsed.data;
    console.log(`Locations request received for coordinates: ${lat}, ${lon} (radius ${radiusKm} km)`);

    const locations = stationsNear(
      buildStations(repository.measurements("GROUND")),
      { lat, lon },
      radiusKm,
      now(),
      maxAgeHours * HOUR_MS
    );
    return c.json({ count: locations.length, locations });
  });

  app.get("/locations/stats", (c) => {
    return c.json(stationStats(buildStations(repository.measurements("GROUND"))));
  });

  // Newest reading per pollutant at one station, over the last day by default
  app.get("/locations/:id/latest", (c) => {
    const id = c.req.param("id");
    const end = parseInstant(c.req.query("end")) ?? now();
    const start = parseInstant(c.req.query("start")) ?? end - 24 * HOUR_MS;

    const window = windowSchema.safeParse({ start, end });
    if (!window.success) {
      return c.json({ error: "Invalid request", message: describeIssues(window.error) }, 400);
    }

    const latest = latestReadings(repository.measurements("GROUND"), id, window.data);
    if (!latest) {
      return c.json(
        { error: "Unknown location", message: `No ground station with id ${id}` },
        404
      );
    }
    return c.json(latest);
  });

  return app;
}
