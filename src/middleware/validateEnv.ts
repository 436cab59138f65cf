// src/middleware/validateEnv.ts
import { z } from "zod";

/**
 * Environment variable schema.
 * Database settings are optional: without them the service still starts and
 * the diagnostic report shows what is missing.
 */
const envSchema = z.object({
  // Server
  PORT: z.string().default("3000"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Database
  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_NAME: z.string().min(1).optional(),

  // CORS
  ALLOWED_ORIGINS: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

let validatedEnv: Env | null = null;

/**
 * Parse an environment source without touching the cached value.
 * Empty strings count as unset.
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): Env {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }

  const result = envSchema.safeParse(cleaned);

  if (!result.success) {
    console.error("Environment validation failed:");
    for (const error of result.error.errors) {
      console.error(`  - ${error.path.join(".")}: ${error.message}`);
    }
    throw new Error("Invalid environment configuration. See errors above.");
  }

  return result.data;
}

/**
 * Validates process.env at startup and caches the result.
 * Logs warnings for settings the store needs.
 */
export function validateEnvironment(): Env {
  if (validatedEnv) return validatedEnv;

  validatedEnv = parseEnvironment(process.env);

  const warnings: string[] = [];

  if (!validatedEnv.DATABASE_URL) {
    warnings.push("DATABASE_URL is not set - store operations will fail");
  }

  if (!validatedEnv.DATABASE_NAME) {
    warnings.push("DATABASE_NAME is not set - the driver default database will be used");
  }

  if (warnings.length > 0) {
    console.warn("\nEnvironment warnings:");
    warnings.forEach((w) => console.warn(`  - ${w}`));
    console.warn("");
  }

  console.log("Environment validation passed");
  return validatedEnv;
}

/**
 * Split ALLOWED_ORIGINS into a list; undefined means every origin is allowed.
 */
export function allowedOrigins(env: Env): string[] | undefined {
  if (!env.ALLOWED_ORIGINS) return undefined;
  return env.ALLOWED_ORIGINS.split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export default validateEnvironment;
