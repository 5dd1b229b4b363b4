/**
 * @kakeibo/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { resolve } from "node:path";
import { z } from "zod";
import { InMemoryGateway, JsonFileGateway } from "@kakeibo/store";
import type { PersistenceGateway } from "@kakeibo/store";

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

  // Storage
  DATA_DIR: z.string().min(1).default("./data"),
  STORAGE: z.enum(["file", "memory"]).default("file"),
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

/**
 * The persistence gateway selected by STORAGE. File storage resolves
 * DATA_DIR against the working directory.
 */
export function createGateway(config: AppConfig): PersistenceGateway {
  if (config.STORAGE === "memory") {
    return new InMemoryGateway();
  }
  return new JsonFileGateway({ directory: resolve(config.DATA_DIR) });
}
