/**
 * @stockbook/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Money
  DEFAULT_CURRENCY: z.string().min(1).default("CLP"),
  DEFAULT_DECIMALS: z.coerce.number().int().min(0).max(6).default(0),

  // Conversation
  MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),
  MIN_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.6),

  // Storage: in-memory when DATA_FILE is unset
  DATA_FILE: z.string().min(1).optional(),
  CATALOG_SEED_FILE: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
