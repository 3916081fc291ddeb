/**
 * Catalog Core — Main Entry
 * Wires transport → client → coalescers → service, the offline cache and the
 * preference engine. Each component is built once here and handed out; there
 * are no module-level singletons.
 */

import type {
  CacheConfig,
  CatalogCategory,
  CatalogCoreConfig,
  CatalogItem,
  ClientConfig,
  Clock,
  Logger,
  ScoringConfig,
  Sleep,
  SwipeSignal,
} from "./types.js";
import { DEFAULT_CONFIG } from "./types.js";
import { CatalogClient, type RequestOptions } from "./layers/catalog-client.js";
import { CatalogService, type DataSource } from "./layers/catalog-service.js";
import { FileCacheStore, type CacheStore } from "./layers/cache-store.js";
import { FetchTransport, type Transport } from "./layers/fetch-transport.js";
import { OfflineCatalogCache } from "./layers/offline-cache.js";
import { PreferenceEngine } from "./layers/preference-engine.js";
import { createLogger } from "./utils/logger.js";

export * from "./types.js";
export * from "./layers/transport-error.js";
export { loadEnv, configFromEnv, type Env } from "./config.js";
export { createLogger } from "./utils/logger.js";
export { FetchTransport, classifyNetworkError } from "./layers/fetch-transport.js";
export type { Transport, TransportRequest, TransportResponse } from "./layers/fetch-transport.js";
export { buildRequest, imageUrl, type Endpoint } from "./layers/catalog-endpoint.js";
export { decodePage, decodeItem, decodeGenres, decodeVideos, decodeWatchProviders } from "./layers/catalog-decoder.js";
export {
  CatalogClient,
  type RequestOptions,
  type PageRangeOptions,
  type CatalogClientDeps,
} from "./layers/catalog-client.js";
export {
  isYouTube,
  officialTrailers,
  primaryTrailer,
  youtubeUrl,
  youtubeThumbnailUrl,
  allProviders,
} from "./layers/media.js";
export { SearchDebouncer, type SearchRunner, type DebounceOptions } from "./layers/search-debouncer.js";
export { RequestCoalescer, type Producer, type CoalesceOptions } from "./layers/request-coalescer.js";
export { FileCacheStore, MemoryCacheStore, type CacheStore } from "./layers/cache-store.js";
export { OfflineCatalogCache, type OfflineCacheDeps } from "./layers/offline-cache.js";
export { PreferenceEngine, signalFor, judgmentWeight } from "./layers/preference-engine.js";
export {
  CatalogService,
  searchIndexName,
  type PageResult,
  type ItemResult,
  type DataSource,
  type ListOptions,
} from "./layers/catalog-service.js";

export interface CatalogCoreOptions {
  client?: Partial<ClientConfig>;
  cache?: Partial<CacheConfig>;
  scoring?: Partial<ScoringConfig>;
  cachePath?: string;
  logLevel?: string;
}

export interface CatalogCoreDeps {
  transport?: Transport;
  store?: CacheStore;
  logger?: Logger;
  clock?: Clock;
  sleep?: Sleep;
  random?: () => number;
  signals?: readonly SwipeSignal[]; // previously saved judgments to replay
}

export interface DiscoverResult {
  items: CatalogItem[];
  source: DataSource;
}

export interface CatalogCore {
  config: CatalogCoreConfig;
  client: CatalogClient;
  cache: OfflineCatalogCache;
  preferences: PreferenceEngine;
  service: CatalogService;
  /** Category page minus already-judged items, best match first */
  discover(category: CatalogCategory, page?: number, opts?: RequestOptions): Promise<DiscoverResult>;
}

export function resolveConfig(options: CatalogCoreOptions = {}): CatalogCoreConfig {
  return {
    client: { ...DEFAULT_CONFIG.client, ...options.client },
    cache: { ...DEFAULT_CONFIG.cache, ...options.cache },
    scoring: { ...DEFAULT_CONFIG.scoring, ...options.scoring },
    cachePath: options.cachePath ?? DEFAULT_CONFIG.cachePath,
    logLevel: options.logLevel ?? DEFAULT_CONFIG.logLevel,
  };
}

export async function createCatalogCore(
  options: CatalogCoreOptions = {},
  deps: CatalogCoreDeps = {},
): Promise<CatalogCore> {
  const config = resolveConfig(options);
  const logger = deps.logger ?? createLogger(config.logLevel);
  const clock = deps.clock ?? Date.now;

  if (!config.client.apiKey) {
    logger.warn("[catalog-core] No API key configured, remote requests will be rejected");
  }

  const client = new CatalogClient(config.client, {
    transport: deps.transport ?? new FetchTransport(),
    logger,
    clock,
    sleep: deps.sleep,
    random: deps.random,
  });

  const cache = await OfflineCatalogCache.open(config.cache, {
    store: deps.store ?? new FileCacheStore(config.cachePath),
    logger,
    clock,
  });

  const preferences = deps.signals
    ? PreferenceEngine.fromSignals(deps.signals, { config: config.scoring, clock })
    : new PreferenceEngine({ config: config.scoring, clock });

  const service = new CatalogService({ client, cache, logger, clock, sleep: deps.sleep });

  const stats = cache.getStats();
  logger.info(
    `[catalog-core] Initialized. Cache: ${stats.validItems}/${stats.totalItems} valid, ` +
    `${preferences.signals().length} signals replayed`
  );

  return {
    config,
    client,
    cache,
    preferences,
    service,
    async discover(category, page = 1, opts = {}) {
      const result = await service.category(category, page, opts);
      const items = preferences.rank(preferences.filterJudged(result.page.items));
      return { items, source: result.source };
    },
  };
}
