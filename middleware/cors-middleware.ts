import type { Context, Next } from "hono";

/**
 * CORS middleware for Hono that answers preflight requests and sets CORS
 * headers on every response. Listed origins are echoed back with
 * credentials allowed; any other origin gets the anonymous wildcard.
 */
export function createCorsMiddleware(allowedOrigins: readonly string[]) {
  return async (c: Context, next: Next) => {
    const origin = c.req.header("Origin");

    if (origin && allowedOrigins.includes(origin)) {
      c.header("Access-Control-Allow-Origin", origin);
      c.header("Access-Control-Allow-Credentials", "true");
      c.header("Vary", "Origin");
    } else {
      c.header("Access-Control-Allow-Origin", "*");
    }

    c.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    c.header(
      "Access-Control-Allow-Headers",
      "Content-Type, Authorization, Accept, X-Requested-With, Origin"
    );
    c.header("Access-Control-Max-Age", "86400"); // 24 hours

    if (c.req.method === "OPTIONS") {
      return c.body(null, 204);
    }

    await next();
  };
}
