import type { CatalogItem } from "../src/types.js";
import type { Transport, TransportRequest, TransportResponse } from "../src/layers/fetch-transport.js";
import { TransportError } from "../src/layers/transport-error.js";
import { createLogger } from "../src/utils/logger.js";

export const silentLogger = createLogger("silent");

export function makeItem(id: number, overrides: Partial<CatalogItem> = {}): CatalogItem {
  return Object.freeze({
    id,
    title: `Movie ${id}`,
    overview: "",
    releaseDate: "2020-01-01",
    rating: 7,
    popularity: 10,
    genreIds: [18],
    posterPath: `/p${id}.jpg`,
    backdropPath: null,
    ...overrides,
  });
}

/** Wire shape of one movie as the metadata service returns it */
export function rawMovie(id: number, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    title: `Movie ${id}`,
    overview: "",
    release_date: "2020-01-01",
    vote_average: 7,
    popularity: 10,
    genre_ids: [18],
    poster_path: `/p${id}.jpg`,
    backdrop_path: null,
    ...overrides,
  };
}

export function json(status: number, body: unknown, headers: Record<string, string> = {}): TransportResponse {
  return { status, headers, body: JSON.stringify(body) };
}

export function pageResponse(ids: number[], page = 1, totalPages = 1): TransportResponse {
  return json(200, {
    page,
    results: ids.map((id) => rawMovie(id)),
    total_pages: totalPages,
    total_results: ids.length,
  });
}

type Step = TransportResponse | TransportError | ((req: TransportRequest) => Promise<TransportResponse>);

/** Plays back scripted steps in order, then repeats `fallback` */
export class ScriptedTransport implements Transport {
  calls: TransportRequest[] = [];
  private steps: Step[];
  fallback: Step | undefined;

  constructor(steps: Step[] = [], fallback?: Step) {
    this.steps = [...steps];
    this.fallback = fallback;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    this.calls.push(request);
    const step = this.steps.shift() ?? this.fallback;
    if (step === undefined) throw new Error(`No scripted response for ${request.url}`);
    if (step instanceof TransportError) throw step;
    if (typeof step === "function") return step(request);
    return step;
  }
}

/** Never answers; rejects as cancelled once the request signal aborts */
export function hang(request: TransportRequest): Promise<TransportResponse> {
  return new Promise<TransportResponse>((_, reject) => {
    request.signal?.addEventListener("abort", () => reject(TransportError.of("cancelled")), { once: true });
  });
}

interface Sleeper {
  due: number;
  wake: () => void;
}

/** Time moves only on `tick`; `sleep` resolves once a tick reaches its due time */
export class ManualClock {
  now: number;
  private sleepers: Sleeper[] = [];

  constructor(start = 1_700_000_000_000) {
    this.now = start;
  }

  tick(ms: number): void {
    this.now += ms;
    const due = this.sleepers.filter((s) => s.due <= this.now);
    this.sleepers = this.sleepers.filter((s) => s.due > this.now);
    for (const s of due) s.wake();
  }

  read = (): number => this.now;

  sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(TransportError.of("cancelled"));
        return;
      }
      const sleeper: Sleeper = {
        due: this.now + ms,
        wake: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };
      const onAbort = () => {
        this.sleepers = this.sleepers.filter((s) => s !== sleeper);
        reject(TransportError.of("cancelled"));
      };
      this.sleepers.push(sleeper);
      signal?.addEventListener("abort", onAbort, { once: true });
    });

  get sleeping(): number {
    return this.sleepers.length;
  }
}

export function recordingSleep(): { delays: number[]; sleep: (ms: number) => Promise<void> } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

export function rawVideo(id: string, overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id,
    key: `key-${id}`,
    name: `Video ${id}`,
    site: "YouTube",
    type: "Trailer",
    official: true,
    published_at: "2024-03-01T12:00:00.000Z",
    ...overrides,
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
