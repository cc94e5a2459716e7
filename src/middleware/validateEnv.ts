// src/middleware/validateEnv.ts
import { z } from "zod";

const numberList = z
  .string()
  .transform((s) => s.split(",").map((p) => Number(p.trim())))
  .pipe(z.array(z.number().nonnegative()).min(1));

/**
 * Environment variable validation schema.
 * Everything has a default so a bare checkout starts.
 */
const envSchema = z.object({
  // Server
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // CORS
  ALLOWED_ORIGINS: z.string().optional(),

  // Data files
  FOOD_CATALOG_PATH: z.string().min(1).default("data/foods.csv"),
  MEAL_LOG_PATH: z.string().min(1).default("nutrition_log.csv"),

  // Suggestion search
  SUGGEST_TRIALS: z.coerce.number().int().positive().default(2000),
  SUGGEST_MAX_TRIALS: z.coerce.number().int().positive().default(20000),
  SUGGEST_MAX_ITEMS: z.coerce.number().int().min(2).default(3),
  SUGGEST_PORTION_SIZES: numberList.default("0.5,1,1.5"),
  SUGGEST_TIME_BUDGET_MS: z.coerce.number().int().positive().optional(),

  // Rate limiting (suggestions only)
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(30),

  // Session defaults
  DEFAULT_CALORIES_TARGET: z.coerce.number().positive().default(2500),
  DEFAULT_PROTEIN_TARGET: z.coerce.number().positive().default(150),
  DEFAULT_CARBS_TARGET: z.coerce.number().positive().default(200),
  DEFAULT_FAT_TARGET: z.coerce.number().positive().default(70),
  SESSION_IDLE_TTL_MS: z.coerce.number().int().positive().default(24 * 60 * 60 * 1000),
  MAX_SESSIONS: z.coerce.number().int().positive().default(10000),
});

export type Env = z.infer<typeof envSchema>;

let validatedEnv: Env | null = null;

/**
 * Parses environment variables without caching. Throws if any value is invalid.
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

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
 * Validates environment variables at startup.
 * Throws an error if variables are invalid.
 * Logs warnings for settings that are likely mistakes.
 */
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): Env {
  if (validatedEnv) return validatedEnv;

  validatedEnv = parseEnvironment(source);

  const warnings: string[] = [];

  if (validatedEnv.SUGGEST_TRIALS > validatedEnv.SUGGEST_MAX_TRIALS) {
    warnings.push("SUGGEST_TRIALS exceeds SUGGEST_MAX_TRIALS - default requests will be rejected");
  }

  if (validatedEnv.NODE_ENV === "production" && !validatedEnv.ALLOWED_ORIGINS) {
    warnings.push("ALLOWED_ORIGINS is not set - only localhost origins are allowed");
  }

  if (warnings.length > 0) {
    console.warn("\nEnvironment warnings:");
    warnings.forEach((w) => console.warn(`  - ${w}`));
    console.warn("");
  }

  console.log("Environment validation passed");
  return validatedEnv;
}
