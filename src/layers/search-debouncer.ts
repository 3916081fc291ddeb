/**
 * Search Debouncer
 * Typing fires a search per keystroke; only the last one, after a quiet
 * period, reaches the service. The previous pending search is cancelled
 * and the last first page is reused when the same text comes back.
 */

import type { Sleep } from "../types.js";
import { sleep as defaultSleep } from "../utils/async.js";
import type { RequestOptions } from "./catalog-client.js";
import type { PageResult } from "./catalog-service.js";
import { TransportError } from "./transport-error.js";

export type SearchRunner = (text: string, page: number, opts: RequestOptions) => Promise<PageResult>;

export interface DebounceOptions {
  debounceMs?: number;
  sleep?: Sleep;
}

function normalize(text: string): string {
  return text.trim().toLowerCase();
}

export class SearchDebouncer {
  private run: SearchRunner;
  private debounceMs: number;
  private sleep: Sleep;
  private pending: AbortController | null = null;
  private last: { query: string; result: PageResult } | null = null;

  constructor(run: SearchRunner, opts: DebounceOptions = {}) {
    this.run = run;
    this.debounceMs = opts.debounceMs ?? 300;
    this.sleep = opts.sleep ?? defaultSleep;
  }

  /**
   * Resolves with the search result once nothing newer arrived during the
   * quiet period. A superseded call rejects with a `cancelled` TransportError.
   */
  async search(text: string, page = 1, opts: RequestOptions = {}): Promise<PageResult> {
    this.cancel();
    const query = normalize(text);
    if (page === 1 && this.last !== null && this.last.query === query) {
      return this.last.result;
    }

    const controller = new AbortController();
    this.pending = controller;
    const onAbort = () => controller.abort();
    if (opts.signal?.aborted) controller.abort();
    opts.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      await this.sleep(this.debounceMs, controller.signal);
      const result = await this.run(text, page, { signal: controller.signal });
      if (controller.signal.aborted) throw TransportError.of("cancelled");
      // a cache fallback is not remembered, so retyping the text retries the network
      if (page === 1 && result.source === "network") this.last = { query, result };
      return result;
    } finally {
      opts.signal?.removeEventListener("abort", onAbort);
      if (this.pending === controller) this.pending = null;
    }
  }

  /** Abort the search waiting out its quiet period or in flight */
  cancel(): void {
    this.pending?.abort();
    this.pending = null;
  }

  clear(): void {
    this.last = null;
  }

  get isPending(): boolean {
    return this.pending !== null;
  }
}
