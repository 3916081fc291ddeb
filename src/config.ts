/**
 * Configuration — environment variables → CatalogCoreConfig
 * Validated with zod; anything unset falls back to the DEFAULT_* values.
 */

import { z } from "zod";
import type { CatalogCoreConfig } from "./types.js";
import { DEFAULT_CACHE, DEFAULT_CLIENT, DEFAULT_CONFIG, DEFAULT_SCORING } from "./types.js";

const EnvSchema = z.object({
  TMDB_API_KEY: z.string().min(1),
  CATALOG_BASE_URL: z.string().url().default(DEFAULT_CLIENT.baseUrl),
  CATALOG_IMAGE_BASE_URL: z.string().url().default(DEFAULT_CLIENT.imageBaseUrl),
  CATALOG_CACHE_PATH: z.string().min(1).default(DEFAULT_CONFIG.cachePath),
  CATALOG_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_CLIENT.requestTimeoutMs),
  CATALOG_SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_CLIENT.searchTimeoutMs),
  CATALOG_MAX_RETRIES: z.coerce.number().int().min(0).default(DEFAULT_CLIENT.maxRetries),
  CATALOG_RETRY_BASE_MS: z.coerce.number().int().positive().default(DEFAULT_CLIENT.retryBaseDelayMs),
  CATALOG_RETRY_MAX_MS: z.coerce.number().int().positive().default(DEFAULT_CLIENT.retryMaxDelayMs),
  CATALOG_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(DEFAULT_CACHE.maxEntries),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const issue = parsed.error.issues
      .map((item) => `${item.path.join(".")}: ${item.message}`)
      .join(", ");
    throw new Error(`Invalid env: ${issue}`);
  }
  if (parsed.data.CATALOG_RETRY_MAX_MS < parsed.data.CATALOG_RETRY_BASE_MS) {
    throw new Error("CATALOG_RETRY_MAX_MS must not be lower than CATALOG_RETRY_BASE_MS.");
  }
  return parsed.data;
}

export function configFromEnv(env: Env): CatalogCoreConfig {
  return {
    client: {
      ...DEFAULT_CLIENT,
      apiKey: env.TMDB_API_KEY,
      baseUrl: env.CATALOG_BASE_URL,
      imageBaseUrl: env.CATALOG_IMAGE_BASE_URL,
      requestTimeoutMs: env.CATALOG_REQUEST_TIMEOUT_MS,
      searchTimeoutMs: env.CATALOG_SEARCH_TIMEOUT_MS,
      maxRetries: env.CATALOG_MAX_RETRIES,
      retryBaseDelayMs: env.CATALOG_RETRY_BASE_MS,
      retryMaxDelayMs: env.CATALOG_RETRY_MAX_MS,
    },
    cache: { ...DEFAULT_CACHE, maxEntries: env.CATALOG_CACHE_MAX_ENTRIES },
    scoring: DEFAULT_SCORING,
    cachePath: env.CATALOG_CACHE_PATH,
    logLevel: env.LOG_LEVEL,
  };
}
