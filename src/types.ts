/**
 * Catalog Core — Type Definitions
 * Catalog items, cache entries, judgment signals and component configs
 */

// --- Catalog ---

export interface CatalogItem {
  readonly id: number;
  readonly title: string;
  readonly overview: string;
  readonly releaseDate: string | null; // YYYY-MM-DD
  readonly rating: number; // 0-10
  readonly popularity: number;
  readonly genreIds: readonly number[];
  readonly posterPath: string | null;
  readonly backdropPath: string | null;
}

export interface CatalogPage {
  items: CatalogItem[];
  page: number;
  totalPages: number;
  totalResults: number;
}

export interface Genre {
  id: number;
  name: string;
}

export type CatalogCategory =
  | "trending"
  | "popular"
  | "topRated"
  | "nowPlaying"
  | "upcoming"
  | "recent";

export const CATALOG_CATEGORIES: readonly CatalogCategory[] = [
  "trending",
  "popular",
  "topRated",
  "nowPlaying",
  "upcoming",
  "recent",
];

export type RelatedKind = "similar" | "recommendations";

export type CatalogQuery =
  | { kind: "category"; category: CatalogCategory; page?: number }
  | { kind: "search"; text: string; page?: number }
  | { kind: RelatedKind; itemId: number; page?: number };

export interface Video {
  id: string;
  key: string; // site-specific video key
  name: string;
  site: string; // "YouTube", "Vimeo", ...
  type: string; // "Trailer", "Teaser", "Clip", ...
  official: boolean;
  publishedAt: string | null;
}

export interface WatchProvider {
  providerId: number;
  providerName: string;
  logoPath: string | null;
  displayPriority: number;
}

/** Where an item can be watched in one region */
export interface WatchProviderInfo {
  streaming: WatchProvider[];
  rent: WatchProvider[];
  buy: WatchProvider[];
  free: WatchProvider[]; // includes free-with-ads
  link: string | null;
}

export const EMPTY_PAGE: Readonly<CatalogPage> = Object.freeze({
  items: [],
  page: 1,
  totalPages: 0,
  totalResults: 0,
});

// --- Offline Cache ---

export interface CachedEntry {
  item: CatalogItem;
  cachedAt: number;
  expiresAt: number; // always > cachedAt
}

export interface CacheStats {
  totalItems: number;
  validItems: number;
  expiredItems: number;
  categoryCounts: Record<string, number>;
}

// --- Preference Scoring ---

export type Judgment = "liked" | "superLiked" | "skipped";

export interface SwipeSignal {
  readonly itemId: number;
  readonly judgment: Judgment;
  readonly genreIds: readonly number[];
  readonly rating: number;
  readonly timestamp: number;
}

export interface PreferenceProfile {
  genreWeights: ReadonlyMap<number, number>;
  preferredRating: number;
}

// --- Ambient ---

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
}

export type Clock = () => number;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

// --- Config ---

export interface ClientConfig {
  baseUrl: string;
  imageBaseUrl: string;
  apiKey: string;
  requestTimeoutMs: number;
  searchTimeoutMs: number;
  maxRetries: number;    // retries after the first attempt
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
}

export const DEFAULT_CLIENT: ClientConfig = {
  baseUrl: "https://api.themoviedb.org/3",
  imageBaseUrl: "https://image.tmdb.org/t/p",
  apiKey: "",
  requestTimeoutMs: 30_000,
  searchTimeoutMs: 10_000,
  maxRetries: 3,
  retryBaseDelayMs: 1_000,
  retryMaxDelayMs: 30_000,
};

export interface CacheConfig {
  maxEntries: number;
  maxDiskAgeMs: number;
  defaultTtlMs: number;
}

export const DEFAULT_CACHE: CacheConfig = {
  maxEntries: 500,
  maxDiskAgeMs: 7 * 86_400_000,
  defaultTtlMs: 86_400_000,
};

export interface ScoringConfig {
  retentionMs: number;      // rolling signal window
  smoothing: number;        // weight of the newest rating in preferredRating
  initialPreferredRating: number;
  genreWeight: number;      // dominant term
  ratingWeight: number;
  highRatingThreshold: number;
  highRatingBoost: number;
  recentReleaseDays: number;
  recencyBoost: number;
}

export const DEFAULT_SCORING: ScoringConfig = {
  retentionMs: 30 * 86_400_000,
  smoothing: 0.1,
  initialPreferredRating: 7.0,
  genreWeight: 1.0,
  ratingWeight: 0.3,
  highRatingThreshold: 8.0,
  highRatingBoost: 0.1,
  recentReleaseDays: 365,
  recencyBoost: 0.1,
};

export type TtlKind = CatalogCategory | RelatedKind | "search" | "details";

/** Offline cache TTLs keyed by index kind */
export const CACHE_TTL_MS: Record<TtlKind, number> = {
  trending: 3_600_000,
  nowPlaying: 3_600_000,
  popular: 86_400_000,
  topRated: 86_400_000,
  upcoming: 43_200_000,
  recent: 21_600_000,
  search: 1_800_000,
  similar: 7_200_000,
  recommendations: 7_200_000,
  details: 86_400_000,
};

/** Coalescer memo TTLs: short, only to absorb duplicate requests */
export const COALESCE_TTL_MS: Record<TtlKind | "videos", number> = {
  trending: 300_000,
  popular: 600_000,
  topRated: 3_600_000,
  nowPlaying: 600_000,
  upcoming: 3_600_000,
  recent: 1_800_000,
  search: 120_000,
  similar: 600_000,
  recommendations: 600_000,
  details: 86_400_000,
  videos: 86_400_000,
};

export interface CatalogCoreConfig {
  client: ClientConfig;
  cache: CacheConfig;
  scoring: ScoringConfig;
  cachePath: string;
  logLevel: string;
}

export const DEFAULT_CONFIG: CatalogCoreConfig = {
  client: DEFAULT_CLIENT,
  cache: DEFAULT_CACHE,
  scoring: DEFAULT_SCORING,
  cachePath: "./.catalog-cache/catalog.json",
  logLevel: "info",
};
