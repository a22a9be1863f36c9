import * as dotenv from "dotenv";
import { resolve } from "node:path";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0", ""])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  BUCKET_MINUTES: z.coerce.number().int().positive().default(60),
  GROUND_TOLERANCE_MINUTES: z.coerce.number().positive().default(120),
  SATELLITE_TOLERANCE_MINUTES: z.coerce.number().positive().default(120),
  MAX_GROUND_DISTANCE_KM: z.coerce.number().positive().default(10),
  MIN_HISTORY: z.coerce.number().int().min(2).default(10),
  CACHE_TTL_SECONDS: z.coerce.number().min(0).default(300),
  SAMPLE_MODE: booleanFlag,
  ALLOWED_ORIGINS: z
    .string()
    .default("http://localhost:3000,http://localhost:3001")
    .transform((value) =>
      value
        .split(",")
        .map((origin) => origin.trim())
        .filter(Boolean)
    ),
});

export type AppConfig = z.infer<typeof envSchema>;

/**
 * Read configuration from an environment map. Throws with every invalid
 * variable listed.
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${problems}`);
  }
  return parsed.data;
}

/**
 * Load `.env` from the first place it is found, then parse process.env.
 */
export function loadConfig(): AppConfig {
  const envPaths = [".env", "../.env", resolve(process.cwd(), ".env"), resolve(__dirname, ".env")];

  let envLoaded = false;
  for (const path of envPaths) {
    const result = dotenv.config({ path });
    if (result.parsed) {
      console.log(`Environment variables loaded from: ${path}`);
      envLoaded = true;
      break;
    }
  }

  if (!envLoaded) {
    console.warn("No .env file found! Using environment variables from process.");
  }

  return parseConfig(process.env);
}
