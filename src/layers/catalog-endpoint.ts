/**
 * Catalog endpoints: query → request URL + per-request timeout
 */

import type { CatalogCategory, CatalogQuery, ClientConfig } from "../types.js";

export type Endpoint =
  | CatalogQuery
  | { kind: "details"; itemId: number }
  | { kind: "videos"; itemId: number }
  | { kind: "watchProviders"; itemId: number }
  | { kind: "genres" };

export interface EndpointRequest {
  url: string;
  timeoutMs: number;
  label: string; // for logs, never contains the api key
}

const CATEGORY_PATHS: Record<CatalogCategory, string> = {
  trending: "/trending/movie/day",
  popular: "/movie/popular",
  topRated: "/movie/top_rated",
  nowPlaying: "/movie/now_playing",
  upcoming: "/movie/upcoming",
  recent: "/discover/movie",
};

const RECENT_WINDOW_MONTHS = 6;
const RECENT_MIN_VOTES = 50;

function formatDate(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

function pathOf(endpoint: Endpoint): string {
  switch (endpoint.kind) {
    case "category":
      return CATEGORY_PATHS[endpoint.category];
    case "search":
      return "/search/movie";
    case "similar":
      return `/movie/${endpoint.itemId}/similar`;
    case "recommendations":
      return `/movie/${endpoint.itemId}/recommendations`;
    case "details":
      return `/movie/${endpoint.itemId}`;
    case "videos":
      return `/movie/${endpoint.itemId}/videos`;
    case "watchProviders":
      return `/movie/${endpoint.itemId}/watch/providers`;
    case "genres":
      return "/genre/movie/list";
  }
}

function paramsOf(endpoint: Endpoint, now: number): Record<string, string> {
  switch (endpoint.kind) {
    case "category": {
      const page = String(endpoint.page ?? 1);
      if (endpoint.category !== "recent") return { page };
      // last six months, popular first, with enough votes to be meaningful
      const from = new Date(now);
      from.setUTCMonth(from.getUTCMonth() - RECENT_WINDOW_MONTHS);
      return {
        page,
        sort_by: "popularity.desc",
        include_adult: "false",
        include_video: "true",
        "primary_release_date.gte": formatDate(from.getTime()),
        "primary_release_date.lte": formatDate(now),
        "vote_count.gte": String(RECENT_MIN_VOTES),
      };
    }
    case "search":
      return { query: endpoint.text.trim(), page: String(endpoint.page ?? 1), include_adult: "false" };
    case "similar":
    case "recommendations":
      return { page: String(endpoint.page ?? 1) };
    case "details":
    case "videos":
    case "watchProviders":
    case "genres":
      return {};
  }
}

export function describeEndpoint(endpoint: Endpoint): string {
  switch (endpoint.kind) {
    case "category":
      return `${endpoint.category} page ${endpoint.page ?? 1}`;
    case "search":
      return `search "${endpoint.text.trim()}" page ${endpoint.page ?? 1}`;
    case "similar":
    case "recommendations":
      return `${endpoint.kind} of ${endpoint.itemId} page ${endpoint.page ?? 1}`;
    case "details":
      return `details of ${endpoint.itemId}`;
    case "videos":
      return `videos of ${endpoint.itemId}`;
    case "watchProviders":
      return `watch providers of ${endpoint.itemId}`;
    case "genres":
      return "genres";
  }
}

export function buildRequest(endpoint: Endpoint, config: ClientConfig, now: number = Date.now()): EndpointRequest {
  const url = new URL(config.baseUrl.replace(/\/+$/, "") + pathOf(endpoint));
  url.searchParams.set("api_key", config.apiKey);
  for (const [key, value] of Object.entries(paramsOf(endpoint, now))) {
    url.searchParams.set(key, value);
  }
  return {
    url: url.toString(),
    timeoutMs: endpoint.kind === "search" ? config.searchTimeoutMs : config.requestTimeoutMs,
    label: describeEndpoint(endpoint),
  };
}

/** Full image URL for a poster/backdrop path, e.g. size "w500" or "original" */
export function imageUrl(path: string | null, size: string, config: Pick<ClientConfig, "imageBaseUrl">): string | null {
  if (!path) return null;
  return `${config.imageBaseUrl.replace(/\/+$/, "")}/${size}${path}`;
}
