/**
 * @btc-lens/server: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 * Read once at startup; never reloaded.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const booleanFlag = (fallback: "true" | "false") =>
  z
    .enum(["true", "false"])
    .default(fallback)
    .transform((v) => v === "true");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Bitcoin node
  BITCOIN_RPC_URL: z.string().url().default("http://127.0.0.1:8332"),
  BITCOIN_RPC_USER: z.string().default(""),
  BITCOIN_RPC_PASSWORD: z.string().default(""),
  BITCOIN_RPC_TIMEOUT_MS: z.coerce.number().int().min(100).default(30000),

  // Lookups
  LATEST_BLOCKS_FETCH_MODE: z.enum(["sequential", "parallel"]).default("sequential"),
  VERIFY_TXID: booleanFlag("true"),

  // Observability
  METRICS_ENABLED: booleanFlag("true"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
