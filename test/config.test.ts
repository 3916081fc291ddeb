import test from "node:test";
import assert from "node:assert/strict";
import { configFromEnv, loadEnv } from "../src/config.js";
import { resolveConfig } from "../src/index.js";
import { DEFAULT_CACHE, DEFAULT_CLIENT, DEFAULT_SCORING } from "../src/types.js";

test("defaults apply when only the key is set", () => {
  const env = loadEnv({ TMDB_API_KEY: "test-key" });
  assert.equal(env.CATALOG_BASE_URL, "https://api.themoviedb.org/3");
  assert.equal(env.CATALOG_MAX_RETRIES, 3);
  assert.equal(env.CATALOG_CACHE_PATH, "./.catalog-cache/catalog.json");
  assert.equal(env.LOG_LEVEL, "info");
});

test("numeric settings are coerced from strings", () => {
  const env = loadEnv({
    TMDB_API_KEY: "test-key",
    CATALOG_MAX_RETRIES: "0",
    CATALOG_SEARCH_TIMEOUT_MS: "2500",
    CATALOG_CACHE_MAX_ENTRIES: "50",
  });
  assert.equal(env.CATALOG_MAX_RETRIES, 0);
  assert.equal(env.CATALOG_SEARCH_TIMEOUT_MS, 2500);
  assert.equal(env.CATALOG_CACHE_MAX_ENTRIES, 50);
});

test("invalid env is reported by variable", () => {
  assert.throws(() => loadEnv({}), /Invalid env: TMDB_API_KEY: Required/);
  assert.throws(() => loadEnv({ TMDB_API_KEY: "test-key", LOG_LEVEL: "loud" }), /Invalid env: LOG_LEVEL/);
  assert.throws(() => loadEnv({ TMDB_API_KEY: "test-key", CATALOG_BASE_URL: "not a url" }), /CATALOG_BASE_URL/);
});

test("the retry cap may not undercut the base delay", () => {
  assert.throws(
    () => loadEnv({ TMDB_API_KEY: "test-key", CATALOG_RETRY_BASE_MS: "5000", CATALOG_RETRY_MAX_MS: "1000" }),
    { message: "CATALOG_RETRY_MAX_MS must not be lower than CATALOG_RETRY_BASE_MS." },
  );
});

test("env maps onto the component configs", () => {
  const config = configFromEnv(
    loadEnv({
      TMDB_API_KEY: "test-key",
      CATALOG_BASE_URL: "http://localhost:9000/3",
      CATALOG_CACHE_PATH: "/tmp/catalog.json",
      CATALOG_RETRY_BASE_MS: "200",
      LOG_LEVEL: "warn",
    }),
  );

  assert.deepEqual(config.client, {
    ...DEFAULT_CLIENT,
    apiKey: "test-key",
    baseUrl: "http://localhost:9000/3",
    retryBaseDelayMs: 200,
  });
  assert.deepEqual(config.cache, DEFAULT_CACHE);
  assert.deepEqual(config.scoring, DEFAULT_SCORING);
  assert.equal(config.cachePath, "/tmp/catalog.json");
  assert.equal(config.logLevel, "warn");
});

test("partial options are merged over the defaults", () => {
  const config = resolveConfig({ client: { apiKey: "test-key" }, cache: { maxEntries: 10 } });
  assert.equal(config.client.apiKey, "test-key");
  assert.equal(config.client.maxRetries, 3);
  assert.equal(config.cache.maxEntries, 10);
  assert.equal(config.cache.defaultTtlMs, DEFAULT_CACHE.defaultTtlMs);
});
