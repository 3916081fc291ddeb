/**
 * Remote Catalog Client
 * Typed requests against the metadata service with per-attempt timeout,
 * exponential backoff with jitter, and response decoding.
 * Never touches the offline cache; callers decide what to store.
 */

import type {
  CatalogCategory,
  CatalogItem,
  CatalogPage,
  CatalogQuery,
  ClientConfig,
  Clock,
  Genre,
  Logger,
  Sleep,
  Video,
  WatchProviderInfo,
} from "../types.js";
import { DEFAULT_CLIENT, EMPTY_PAGE } from "../types.js";
import { sleep as defaultSleep } from "../utils/async.js";
import { decodeGenres, decodeItem, decodePage, decodeVideos, decodeWatchProviders } from "./catalog-decoder.js";
import { buildRequest, type Endpoint, type EndpointRequest } from "./catalog-endpoint.js";
import type { Transport, TransportResponse } from "./fetch-transport.js";
import { officialTrailers, primaryTrailer } from "./media.js";
import { TransportError, faultForStatus, toTransportError } from "./transport-error.js";

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface PageRangeOptions extends RequestOptions {
  maxConcurrent?: number;
}

const BATCH_PAUSE_MS = 100;

export interface CatalogClientDeps {
  transport: Transport;
  logger: Logger;
  clock?: Clock;
  sleep?: Sleep;
  random?: () => number; // [0, 1)
}

export class CatalogClient {
  private config: ClientConfig;
  private transport: Transport;
  private logger: Logger;
  private clock: Clock;
  private sleep: Sleep;
  private random: () => number;

  constructor(config: Partial<ClientConfig>, deps: CatalogClientDeps) {
    this.config = { ...DEFAULT_CLIENT, ...config };
    this.transport = deps.transport;
    this.logger = deps.logger;
    this.clock = deps.clock ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  // --- Public API ---

  async fetch(query: CatalogQuery, opts: RequestOptions = {}): Promise<CatalogPage> {
    // whitespace-only search never reaches the network
    if (query.kind === "search" && query.text.trim() === "") {
      return { ...EMPTY_PAGE, items: [] };
    }
    const body = await this.request(query, opts.signal);
    return decodePage(body);
  }

  async fetchItem(id: number, opts: RequestOptions = {}): Promise<CatalogItem> {
    const body = await this.request({ kind: "details", itemId: id }, opts.signal);
    return decodeItem(body);
  }

  async fetchGenres(opts: RequestOptions = {}): Promise<Genre[]> {
    const body = await this.request({ kind: "genres" }, opts.signal);
    return decodeGenres(body);
  }

  async fetchVideos(id: number, opts: RequestOptions = {}): Promise<Video[]> {
    const body = await this.request({ kind: "videos", itemId: id }, opts.signal);
    return decodeVideos(body);
  }

  async fetchOfficialTrailers(id: number, opts: RequestOptions = {}): Promise<Video[]> {
    return officialTrailers(await this.fetchVideos(id, opts));
  }

  async fetchPrimaryTrailer(id: number, opts: RequestOptions = {}): Promise<Video | null> {
    return primaryTrailer(await this.fetchVideos(id, opts));
  }

  async fetchWatchProviders(id: number, region = "US", opts: RequestOptions = {}): Promise<WatchProviderInfo> {
    const body = await this.request({ kind: "watchProviders", itemId: id }, opts.signal);
    return decodeWatchProviders(body, region);
  }

  /**
   * Pages `first..last` of a category, `maxConcurrent` at a time with a short
   * pause between batches. Items come back in page order; any failed page
   * fails the whole call.
   */
  async fetchMultiplePages(
    category: CatalogCategory,
    first: number,
    last: number,
    opts: PageRangeOptions = {},
  ): Promise<CatalogItem[]> {
    const width = Math.max(1, opts.maxConcurrent ?? 3);
    const items: CatalogItem[] = [];
    for (let start = first; start <= last; start += width) {
      const end = Math.min(start + width - 1, last);
      const batch: Promise<CatalogPage>[] = [];
      for (let page = start; page <= end; page++) {
        batch.push(this.fetch({ kind: "category", category, page }, opts));
      }
      for (const page of await Promise.all(batch)) items.push(...page.items);
      if (end < last) await this.sleep(BATCH_PAUSE_MS, opts.signal);
    }
    return items;
  }

  /**
   * Backoff before retry number `attempt + 1`:
   * min(base·2^attempt + U(0, 0.5)·base·2^attempt, maxDelay),
   * raised to the server's Retry-After hint when one was given.
   */
  backoffDelay(attempt: number, error?: TransportError): number {
    const exponential = this.config.retryBaseDelayMs * Math.pow(2, attempt);
    const jitter = this.random() * 0.5 * exponential;
    let delay = exponential + jitter;
    if (error?.fault.kind === "rateLimited" && error.fault.retryAfterMs !== undefined) {
      delay = Math.max(delay, error.fault.retryAfterMs);
    }
    return Math.min(delay, this.config.retryMaxDelayMs);
  }

  // --- Retry loop ---

  private async request(endpoint: Endpoint, signal?: AbortSignal): Promise<string> {
    const req = buildRequest(endpoint, this.config, this.clock());

    for (let attempt = 0; ; attempt++) {
      if (signal?.aborted) throw TransportError.of("cancelled");
      try {
        return await this.attempt(req, signal);
      } catch (err) {
        const error = toTransportError(err);
        if (!error.retryable || attempt >= this.config.maxRetries) {
          if (error.kind !== "cancelled") {
            this.logger.warn(`[catalog-client] ${req.label} failed after ${attempt + 1} attempt(s): ${error.message}`);
          }
          throw error;
        }
        const delay = this.backoffDelay(attempt, error);
        this.logger.warn(
          `[catalog-client] Retry ${attempt + 1}/${this.config.maxRetries} for ${req.label} ` +
          `after ${Math.round(delay)}ms: ${error.message}`
        );
        await this.sleep(delay, signal);
      }
    }
  }

  /** One network attempt bounded by its own timeout */
  private async attempt(req: EndpointRequest, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    let onAbort: (() => void) | undefined;

    // settle the guard before aborting so the race reports why we stopped
    const guard = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(TransportError.of("timeout"));
        controller.abort();
      }, req.timeoutMs);
      onAbort = () => {
        reject(TransportError.of("cancelled"));
        controller.abort();
      };
      signal?.addEventListener("abort", onAbort, { once: true });
    });

    try {
      const resp: TransportResponse = await Promise.race([
        this.transport.send({
          url: req.url,
          method: "GET",
          headers: { Accept: "application/json" },
          timeoutMs: req.timeoutMs,
          signal: controller.signal,
        }),
        guard,
      ]);
      const fault = faultForStatus(resp.status, resp.headers, this.clock());
      if (fault) throw new TransportError(fault);
      return resp.body;
    } finally {
      clearTimeout(timer);
      if (onAbort) signal?.removeEventListener("abort", onAbort);
    }
  }
}
