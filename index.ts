import { createServer } from "node:http";
import { createApp } from "./app";
import { loadConfig } from "./config";

const config = loadConfig();
const { app } = createApp(config);

console.log("Configuration loaded:", {
  PORT: config.PORT,
  BUCKET_MINUTES: config.BUCKET_MINUTES,
  MIN_HISTORY: config.MIN_HISTORY,
  SAMPLE_MODE: config.SAMPLE_MODE,
});

// Only start the server if this file is executed directly
if (require.main === module) {
  console.log(`Server is starting on port ${config.PORT}...`);

  const server = createServer(async (req, res) => {
    try {
      const url = new URL(
        req.url || "/",
        `http://${req.headers.host || "localhost"}`
      );

      // Convert Node's req/res to Fetch API Request/Response
      const method = req.method || "GET";
      const headers = new Headers();
      Object.entries(req.headers).forEach(([key, value]) => {
        if (value)
          headers.set(key, Array.isArray(value) ? value.join(", ") : value);
      });

      const requestInit: RequestInit & { duplex?: "half" } = { method, headers };

      // Add body for non-GET/HEAD requests
      if (!["GET", "HEAD", "OPTIONS"].includes(method)) {
        requestInit.body = new ReadableStream({
          start(controller) {
            req.on("data", (chunk: Buffer) => controller.enqueue(new Uint8Array(chunk)));
            req.on("end", () => controller.close());
            req.on("error", (err) => controller.error(err));
          },
        });
        requestInit.duplex = "half"; // Required for Node.js streams
      }

      const response = await app.fetch(new Request(url.toString(), requestInit));

      res.statusCode = response.status;
      response.headers.forEach((value, key) => {
        // Node sets transfer-encoding itself
        if (key.toLowerCase() !== "transfer-encoding") {
          res.setHeader(key, value);
        }
      });

      res.end(Buffer.from(await response.arrayBuffer()));
    } catch (error) {
      console.error("Server error:", error);
      if (!res.headersSent) {
        res.writeHead(500, { "Content-Type": "application/json" });
      }
      if (!res.writableEnded) {
        res.end(
          JSON.stringify({
            error: "Internal Server Error",
            message: error instanceof Error ? error.message : String(error),
          })
        );
      }
    }
  });

  server.listen(config.PORT, () => {
    console.log(`Server is running on http://localhost:${config.PORT}`);
  });
}

export default app;
