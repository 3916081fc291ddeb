/**
 * Offline Catalog Cache
 * Items keyed by id plus named, ordered category indices, with per-entry
 * expiry. Every mutation writes the full state through to durable storage;
 * reads are pure lookups and never touch the store.
 */

import { z } from "zod";
import type { CacheConfig, CacheStats, CachedEntry, CatalogItem, Clock, Logger } from "../types.js";
import { DEFAULT_CACHE } from "../types.js";
import { SerialQueue } from "../utils/async.js";
import { CatalogItemSchema, freezeItem } from "./catalog-decoder.js";
import type { CacheStore } from "./cache-store.js";

const BLOB_VERSION = 1;

const BlobSchema = z.object({
  version: z.literal(BLOB_VERSION),
  entries: z.array(
    z.object({
      item: CatalogItemSchema,
      cachedAt: z.number(),
      expiresAt: z.number(),
    }),
  ),
  categories: z.array(
    z.object({
      name: z.string(),
      ids: z.array(z.number().int()),
    }),
  ),
});

export interface OfflineCacheDeps {
  store: CacheStore;
  logger: Logger;
  clock?: Clock;
}

export class OfflineCatalogCache {
  private entries = new Map<number, CachedEntry>();
  private categories = new Map<string, readonly number[]>();
  private writes = new SerialQueue();
  private store: CacheStore;
  private logger: Logger;
  private clock: Clock;
  private config: CacheConfig;

  constructor(config: Partial<CacheConfig>, deps: OfflineCacheDeps) {
    this.store = deps.store;
    this.logger = deps.logger;
    this.clock = deps.clock ?? Date.now;
    this.config = { ...DEFAULT_CACHE, ...config };
  }

  /** Construct and load persisted state */
  static async open(config: Partial<CacheConfig>, deps: OfflineCacheDeps): Promise<OfflineCatalogCache> {
    const cache = new OfflineCatalogCache(config, deps);
    await cache.load();
    return cache;
  }

  // --- Load ---

  /** Replace in-memory state with the persisted blob; missing or corrupt → empty */
  load(): Promise<void> {
    return this.writes.run(async () => {
      this.entries = new Map();
      this.categories = new Map();

      let blob: string | null;
      try {
        blob = await this.store.read();
      } catch (err) {
        this.logger.warn(`[offline-cache] Could not read cache, starting empty: ${err}`);
        return;
      }
      if (blob === null) return;

      const parsed = parseBlob(blob);
      if (!parsed) {
        this.logger.warn("[offline-cache] Cache blob is corrupt, starting empty");
        return;
      }

      const cutoff = this.clock() - this.config.maxDiskAgeMs;
      for (const e of parsed.entries) {
        if (e.cachedAt <= cutoff || e.expiresAt <= e.cachedAt) continue;
        this.entries.set(e.item.id, { item: freezeItem(e.item), cachedAt: e.cachedAt, expiresAt: e.expiresAt });
      }
      for (const c of parsed.categories) {
        const ids = c.ids.filter((id) => this.entries.has(id));
        if (ids.length > 0) this.categories.set(c.name, Object.freeze(ids));
      }

      this.logger.info(
        `[offline-cache] Loaded ${this.entries.size} items, ${this.categories.size} categories`
      );
    });
  }

  // --- Reads ---

  get(id: number): CatalogItem | undefined {
    const entry = this.entries.get(id);
    if (!entry || !this.isValid(entry, this.clock())) return undefined;
    return entry.item;
  }

  getCategory(name: string): CatalogItem[] {
    const ids = this.categories.get(name);
    if (!ids) return [];
    const now = this.clock();
    const items: CatalogItem[] = [];
    for (const id of ids) {
      const entry = this.entries.get(id);
      if (entry && this.isValid(entry, now)) items.push(entry.item);
    }
    return items;
  }

  /** True when more than half of the category's items are still valid */
  hasValid(name: string): boolean {
    const ids = this.categories.get(name);
    if (!ids || ids.length === 0) return false;
    const now = this.clock();
    const valid = ids.filter((id) => {
      const entry = this.entries.get(id);
      return entry !== undefined && this.isValid(entry, now);
    }).length;
    return valid > ids.length / 2;
  }

  getStats(): CacheStats {
    const now = this.clock();
    let validItems = 0;
    for (const entry of this.entries.values()) {
      if (this.isValid(entry, now)) validItems++;
    }
    const categoryCounts: Record<string, number> = {};
    for (const [name, ids] of this.categories) categoryCounts[name] = ids.length;

    return {
      totalItems: this.entries.size,
      validItems,
      expiredItems: this.entries.size - validItems,
      categoryCounts,
    };
  }

  // --- Mutations (each one persists) ---

  put(item: CatalogItem, ttlMs: number = this.config.defaultTtlMs): Promise<void> {
    assertTtl(ttlMs);
    const now = this.clock();
    this.entries.set(item.id, { item, cachedAt: now, expiresAt: now + ttlMs });
    this.trim();
    return this.persist();
  }

  /** Replace the named index wholesale and re-cache each item with `ttlMs` */
  putCategory(name: string, items: readonly CatalogItem[], ttlMs: number = this.config.defaultTtlMs): Promise<void> {
    assertTtl(ttlMs);
    const now = this.clock();
    const ids: number[] = [];
    const seen = new Set<number>();
    for (const item of items) {
      this.entries.set(item.id, { item, cachedAt: now, expiresAt: now + ttlMs });
      if (!seen.has(item.id)) {
        seen.add(item.id);
        ids.push(item.id);
      }
    }
    this.categories.set(name, Object.freeze(ids));
    this.trim();
    return this.persist();
  }

  /** Sweep entries with expiresAt <= now; returns how many were removed */
  async evictExpired(): Promise<number> {
    const now = this.clock();
    const removed = new Set<number>();
    for (const [id, entry] of this.entries) {
      if (!this.isValid(entry, now)) removed.add(id);
    }
    if (removed.size === 0) return 0;

    for (const id of removed) this.entries.delete(id);
    this.pruneIndices(removed);
    await this.persist();
    this.logger.info(`[offline-cache] Evicted ${removed.size} expired items`);
    return removed.size;
  }

  clear(): Promise<void> {
    this.entries.clear();
    this.categories.clear();
    return this.writes.run(async () => {
      try {
        await this.store.remove();
      } catch (err) {
        this.logger.warn(`[offline-cache] Failed to remove cache file: ${err}`);
      }
    });
  }

  /** Resolves when every queued write has landed */
  flush(): Promise<void> {
    return this.writes.idle();
  }

  // --- Internals ---

  private isValid(entry: CachedEntry, now: number): boolean {
    return now < entry.expiresAt;
  }

  /** Drop the oldest entries beyond maxEntries */
  private trim(): void {
    const excess = this.entries.size - this.config.maxEntries;
    if (excess <= 0) return;
    const oldest = [...this.entries.values()]
      .sort((a, b) => a.cachedAt - b.cachedAt)
      .slice(0, excess)
      .map((e) => e.item.id);
    const removed = new Set(oldest);
    for (const id of removed) this.entries.delete(id);
    this.pruneIndices(removed);
  }

  private pruneIndices(removed: ReadonlySet<number>): void {
    for (const [name, ids] of this.categories) {
      const kept = ids.filter((id) => !removed.has(id));
      if (kept.length === ids.length) continue;
      if (kept.length === 0) this.categories.delete(name);
      else this.categories.set(name, Object.freeze(kept));
    }
  }

  private serialize(): string {
    return JSON.stringify({
      version: BLOB_VERSION,
      entries: [...this.entries.values()],
      categories: [...this.categories].map(([name, ids]) => ({ name, ids })),
    });
  }

  private persist(): Promise<void> {
    // snapshot now so queued writes land in mutation order
    const blob = this.serialize();
    return this.writes.run(async () => {
      try {
        await this.store.write(blob);
      } catch (err) {
        this.logger.warn(`[offline-cache] Failed to persist cache: ${err}`);
      }
    });
  }
}

function parseBlob(blob: string): z.infer<typeof BlobSchema> | null {
  let json: unknown;
  try {
    json = JSON.parse(blob);
  } catch {
    return null;
  }
  const parsed = BlobSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

function assertTtl(ttlMs: number): void {
  if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
    throw new RangeError(`TTL must be a positive number of milliseconds, got ${ttlMs}`);
  }
}
