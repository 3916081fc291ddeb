/**
 * Request Coalescer
 * Concurrent calls sharing a key run the producer once and all receive the
 * same result or error. Successful results are memoized for a short TTL.
 * Generic over key/value; knows nothing about the catalog.
 */

import type { Clock } from "../types.js";
import { TransportError } from "./transport-error.js";

export type Producer<V> = (signal: AbortSignal) => Promise<V>;

export interface CoalesceOptions {
  ttlMs?: number;       // memo window for this call; 0 disables memoization
  signal?: AbortSignal; // this caller's cancellation only
}

interface PendingRequest<V> {
  promise: Promise<V>;
  controller: AbortController;
  waiters: number;
}

interface CachedResult<V> {
  value: V;
  expiresAt: number;
}

export class RequestCoalescer<K, V> {
  private pending = new Map<K, PendingRequest<V>>();
  private cache = new Map<K, CachedResult<V>>();
  private defaultTtlMs: number;
  private clock: Clock;

  constructor(opts: { defaultTtlMs?: number; clock?: Clock } = {}) {
    this.defaultTtlMs = opts.defaultTtlMs ?? 60_000;
    this.clock = opts.clock ?? Date.now;
  }

  coalesce(key: K, producer: Producer<V>, opts: CoalesceOptions = {}): Promise<V> {
    const cached = this.cache.get(key);
    if (cached) {
      if (this.clock() < cached.expiresAt) return Promise.resolve(cached.value);
      this.cache.delete(key);
    }

    const existing = this.pending.get(key);
    if (existing) return this.join(key, existing, opts.signal);

    if (opts.signal?.aborted) return Promise.reject(TransportError.of("cancelled"));

    const controller = new AbortController();
    const ttlMs = opts.ttlMs ?? this.defaultTtlMs;
    const request: PendingRequest<V> = {
      promise: this.execute(key, producer, controller, ttlMs),
      controller,
      waiters: 0,
    };
    this.pending.set(key, request);
    return this.join(key, request, opts.signal);
  }

  private async execute(key: K, producer: Producer<V>, controller: AbortController, ttlMs: number): Promise<V> {
    let value: V;
    try {
      // the pending entry must be registered before a synchronous throw can settle it
      await Promise.resolve();
      value = await producer(controller.signal);
    } catch (err) {
      this.settle(key, controller);
      throw err;
    }
    // pending marker goes first so a caller arriving now re-executes
    // instead of joining a finished request
    this.settle(key, controller);
    if (ttlMs > 0 && !controller.signal.aborted) {
      // sweep on write so keys that are never asked for again do not pile up
      this.clearExpired();
      this.cache.set(key, { value, expiresAt: this.clock() + ttlMs });
    }
    return value;
  }

  private settle(key: K, controller: AbortController): void {
    if (this.pending.get(key)?.controller === controller) this.pending.delete(key);
  }

  private join(key: K, request: PendingRequest<V>, signal?: AbortSignal): Promise<V> {
    request.waiters += 1;
    if (!signal) return request.promise;
    if (signal.aborted) {
      this.leave(key, request);
      return Promise.reject(TransportError.of("cancelled"));
    }

    return new Promise<V>((resolve, reject) => {
      const onAbort = () => {
        this.leave(key, request);
        reject(TransportError.of("cancelled"));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      request.promise.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(err);
        },
      );
    });
  }

  /** A waiter gave up; abort the shared work only when nobody is left */
  private leave(key: K, request: PendingRequest<V>): void {
    request.waiters -= 1;
    if (request.waiters > 0) return;
    this.settle(key, request.controller);
    request.controller.abort();
  }

  // --- Invalidation ---

  clearCache(key: K): void {
    this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  clearExpired(): void {
    const now = this.clock();
    for (const [key, entry] of this.cache) {
      if (now >= entry.expiresAt) this.cache.delete(key);
    }
  }

  /** Abort the shared request for `key`; every waiter receives the producer's rejection */
  cancel(key: K): void {
    const request = this.pending.get(key);
    if (!request) return;
    this.pending.delete(key);
    request.controller.abort();
  }

  cancelAll(): void {
    for (const key of [...this.pending.keys()]) this.cancel(key);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  get cacheCount(): number {
    return this.cache.size;
  }
}
