/**
 * @exposure/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("127.0.0.1"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Disclosure server
  API_BASE_URL: z.string().url().default("http://localhost:8080"),
  API_TIMEOUT_MS: z.coerce.number().int().min(100).default(30000),
  API_RETRIES: z.coerce.number().int().min(0).max(10).default(3),

  // Persistence
  DATA_DIR: z.string().min(1).default("./data"),

  // Scheduling (0 disables periodic reconciliation)
  RECONCILE_INTERVAL_MS: z.coerce.number().int().min(0).default(3600000),

  // Protocol
  WINDOW_SECONDS: z.coerce.number().int().min(1).default(900),
  LOOKBACK_WINDOWS: z.coerce.number().int().min(1).default(1344),
  KEY_WINDOW_COUNT: z.coerce.number().int().min(1).default(96),
  REPORT_KEY_COUNT: z.coerce.number().int().min(1).default(3),
  NO_OWN_KEYS_POLICY: z.enum(["fail", "skip"]).default("fail"),
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
