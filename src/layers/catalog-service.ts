/**
 * Catalog Service — coalesced fetch → write-through cache → offline fallback
 *
 * List queries run through the page coalescer; a successful execution writes
 * page 1 into the category index (later pages item by item). When the network
 * fails with anything but a cancellation, cached data is served instead.
 * In cache-first mode a valid first page is answered from the offline cache
 * while a background refresh updates it.
 */

import type {
  CatalogCategory,
  CatalogItem,
  CatalogPage,
  CatalogQuery,
  Clock,
  Genre,
  Logger,
  RelatedKind,
  Sleep,
  TtlKind,
  Video,
  WatchProviderInfo,
} from "../types.js";
import { CACHE_TTL_MS, CATALOG_CATEGORIES, COALESCE_TTL_MS } from "../types.js";
import { mapWithConcurrency } from "../utils/async.js";
import type { CatalogClient, RequestOptions } from "./catalog-client.js";
import { primaryTrailer } from "./media.js";
import type { OfflineCatalogCache } from "./offline-cache.js";
import { RequestCoalescer } from "./request-coalescer.js";
import { SearchDebouncer } from "./search-debouncer.js";
import { toTransportError } from "./transport-error.js";

export type DataSource = "network" | "cache";

export interface PageResult {
  page: CatalogPage;
  source: DataSource;
}

export interface ItemResult {
  item: CatalogItem;
  source: DataSource;
}

export interface ListOptions extends RequestOptions {
  cacheFirst?: boolean;   // answer page 1 from a valid offline index, refresh behind
  forceRefresh?: boolean; // skip the memo and any cache-first answer
}

export interface CatalogServiceDeps {
  client: CatalogClient;
  cache: OfflineCatalogCache;
  logger: Logger;
  clock?: Clock;
  sleep?: Sleep;
  pages?: RequestCoalescer<string, CatalogPage>;
  details?: RequestCoalescer<number, CatalogItem>;
  videos?: RequestCoalescer<number, Video[]>;
  debounceMs?: number;
}

/** Index name under which a search is cached */
export function searchIndexName(text: string): string {
  return `search:${text.trim().toLowerCase()}`;
}

export class CatalogService {
  private client: CatalogClient;
  private cache: OfflineCatalogCache;
  private logger: Logger;
  readonly pages: RequestCoalescer<string, CatalogPage>;
  readonly details: RequestCoalescer<number, CatalogItem>;
  readonly videos: RequestCoalescer<number, Video[]>;
  readonly searches: SearchDebouncer;
  private refreshes = new Set<Promise<void>>();

  constructor(deps: CatalogServiceDeps) {
    this.client = deps.client;
    this.cache = deps.cache;
    this.logger = deps.logger;
    const clock = deps.clock;
    this.pages = deps.pages ?? new RequestCoalescer<string, CatalogPage>({ clock });
    this.details = deps.details ?? new RequestCoalescer<number, CatalogItem>({ clock });
    this.videos = deps.videos ?? new RequestCoalescer<number, Video[]>({ clock });
    this.searches = new SearchDebouncer((text, page, opts) => this.search(text, page, opts), {
      debounceMs: deps.debounceMs,
      sleep: deps.sleep,
    });
  }

  category(category: CatalogCategory, page = 1, opts: ListOptions = {}): Promise<PageResult> {
    return this.list(
      { kind: "category", category, page },
      `category_${category}_${page}`,
      category,
      category,
      opts,
    );
  }

  async search(text: string, page = 1, opts: ListOptions = {}): Promise<PageResult> {
    const trimmed = text.trim();
    if (trimmed === "") {
      return { page: await this.client.fetch({ kind: "search", text, page }, opts), source: "network" };
    }
    // only the memo key and index fold case; the remote query keeps it
    const normalized = trimmed.toLowerCase();
    return this.list(
      { kind: "search", text: trimmed, page },
      `search_${normalized}_${page}`,
      searchIndexName(normalized),
      "search",
      opts,
    );
  }

  /** Debounced search for as-you-type input; see {@link SearchDebouncer} */
  searchAsYouType(text: string, page = 1, opts: RequestOptions = {}): Promise<PageResult> {
    return this.searches.search(text, page, opts);
  }

  related(kind: RelatedKind, itemId: number, page = 1, opts: ListOptions = {}): Promise<PageResult> {
    return this.list(
      { kind, itemId, page },
      `${kind}_${itemId}_${page}`,
      `${kind}:${itemId}`,
      kind,
      opts,
    );
  }

  async item(id: number, opts: RequestOptions = {}): Promise<ItemResult> {
    try {
      const item = await this.details.coalesce(
        id,
        async (signal) => {
          const fetched = await this.client.fetchItem(id, { signal });
          await this.cache.put(fetched, CACHE_TTL_MS.details);
          return fetched;
        },
        { ttlMs: COALESCE_TTL_MS.details, signal: opts.signal },
      );
      return { item, source: "network" };
    } catch (err) {
      const error = toTransportError(err);
      const cached = error.kind === "cancelled" ? undefined : this.cache.get(id);
      if (!cached) throw error;
      this.logger.warn(`[catalog-service] details of ${id} failed (${error.kind}), serving cached item`);
      return { item: cached, source: "cache" };
    }
  }

  /** Details for many ids, at most `maxConcurrent` requests at a time */
  items(ids: readonly number[], opts: RequestOptions & { maxConcurrent?: number } = {}): Promise<ItemResult[]> {
    return mapWithConcurrency(ids, opts.maxConcurrent ?? 5, (id) => this.item(id, { signal: opts.signal }));
  }

  genres(opts: RequestOptions = {}): Promise<Genre[]> {
    return this.client.fetchGenres(opts);
  }

  // --- Trailers & providers ---

  /** Videos of an item; memoized for a day, never written to the offline cache */
  itemVideos(id: number, opts: RequestOptions = {}): Promise<Video[]> {
    return this.videos.coalesce(id, (signal) => this.client.fetchVideos(id, { signal }), {
      ttlMs: COALESCE_TTL_MS.videos,
      signal: opts.signal,
    });
  }

  async trailer(id: number, opts: RequestOptions = {}): Promise<Video | null> {
    return primaryTrailer(await this.itemVideos(id, opts));
  }

  watchProviders(id: number, region = "US", opts: RequestOptions = {}): Promise<WatchProviderInfo> {
    return this.client.fetchWatchProviders(id, region, opts);
  }

  // --- Warm-up ---

  /**
   * Fetch the first page of each category so the offline cache has something
   * to fall back to. Failures are logged, not thrown; resolves with the
   * number of categories that loaded.
   */
  async warmUp(categories: readonly CatalogCategory[] = CATALOG_CATEGORIES): Promise<number> {
    const results = await Promise.allSettled(categories.map((c) => this.category(c)));
    let loaded = 0;
    results.forEach((result, i) => {
      if (result.status === "fulfilled") loaded += 1;
      else this.logger.warn(`[catalog-service] warm-up of ${categories[i]} failed: ${toTransportError(result.reason).message}`);
    });
    this.logger.info(`[catalog-service] Warmed ${loaded}/${categories.length} categories`);
    return loaded;
  }

  /** Resolves once every background refresh started so far has finished */
  async settled(): Promise<void> {
    await Promise.all([...this.refreshes]);
  }

  // --- Internals ---

  private async list(
    query: CatalogQuery,
    key: string,
    index: string,
    kind: TtlKind,
    opts: ListOptions,
  ): Promise<PageResult> {
    const first = (query.page ?? 1) === 1;
    if (opts.forceRefresh) {
      this.pages.clearCache(key);
    } else if (opts.cacheFirst && first && this.cache.hasValid(index)) {
      const items = this.cache.getCategory(index);
      this.refresh(key, () => this.fetchPage(query, key, index, kind));
      return {
        page: { items, page: 1, totalPages: 1, totalResults: items.length },
        source: "cache",
      };
    }

    try {
      const page = await this.fetchPage(query, key, index, kind, opts.signal);
      return { page, source: "network" };
    } catch (err) {
      const error = toTransportError(err);
      // only page 1 is indexed, so later pages have nothing to fall back to
      if (error.kind === "cancelled" || !first) throw error;
      const items = this.cache.getCategory(index);
      if (items.length === 0) throw error;
      this.logger.warn(
        `[catalog-service] ${key} failed (${error.kind}), serving ${items.length} cached items`
      );
      return {
        page: { items, page: 1, totalPages: 1, totalResults: items.length },
        source: "cache",
      };
    }
  }

  private fetchPage(
    query: CatalogQuery,
    key: string,
    index: string,
    kind: TtlKind,
    signal?: AbortSignal,
  ): Promise<CatalogPage> {
    return this.pages.coalesce(
      key,
      async (inner) => {
        const fetched = await this.client.fetch(query, { signal: inner });
        await this.store(index, fetched, CACHE_TTL_MS[kind]);
        return fetched;
      },
      { ttlMs: COALESCE_TTL_MS[kind], signal },
    );
  }

  /** Run a refresh nobody waits on; its failure is logged */
  private refresh(key: string, task: () => Promise<CatalogPage>): void {
    const running: Promise<void> = task().then(
      () => undefined,
      (err: unknown) => {
        this.logger.warn(`[catalog-service] background refresh of ${key} failed: ${toTransportError(err).message}`);
      },
    );
    this.refreshes.add(running);
    void running.finally(() => this.refreshes.delete(running));
  }

  private async store(index: string, page: CatalogPage, ttlMs: number): Promise<void> {
    if (page.page === 1) {
      await this.cache.putCategory(index, page.items, ttlMs);
      return;
    }
    for (const item of page.items) await this.cache.put(item, ttlMs);
  }
}
