import { Hono } from "hono";
import { z } from "zod";
import type { SourceKind } from "../types/air-quality";
import type { QueryService } from "../services/query-service";

const sources: Record<string, SourceKind> = {
  ground: "GROUND",
  satellite: "SATELLITE",
};

const ingestBodySchema = z.object({ records: z.array(z.unknown()) });

export function createIngestRoutes(service: QueryService) {
  const app = new Hono();

  // Normalize and store a batch of raw records from one source
  app.post("/:source", async (c) => {
    const source = sources[c.req.param("source")];
    if (!source) {
      return c.json(
        { error: "Unknown source", message: `expected one of: ${Object.keys(sources).join(", ")}` },
        404
      );
    }

    const payload: unknown = await c.req.json().catch(() => null);
    const body = ingestBodySchema.safeParse(payload);
    if (!body.success) {
      return c.json(
        { error: "Invalid request", message: "body must be { records: [...] }" },
        400
      );
    }

    console.log(`Ingest request received: ${body.data.records.length} ${source} records`);
    const report = service.ingest(body.data.records, source);
    return c.json(report);
  });

  return app;
}
