/**
 * Response decoding: remote JSON → frozen CatalogItem / CatalogPage
 * Absent optional fields fall back to neutral values; missing id/title fail.
 */

import { z } from "zod";
import type { CatalogItem, CatalogPage, Genre, Video, WatchProvider, WatchProviderInfo } from "../types.js";
import { TransportError } from "./transport-error.js";

const GenreSchema = z.object({
  id: z.number().int(),
  name: z.string(),
});

const ItemSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  overview: z.string().nullish(),
  release_date: z.string().nullish(),
  vote_average: z.number().nullish(),
  popularity: z.number().nullish(),
  genre_ids: z.array(z.number().int()).nullish(),
  // details endpoint returns genre objects instead of ids
  genres: z.array(GenreSchema).nullish(),
  poster_path: z.string().nullish(),
  backdrop_path: z.string().nullish(),
});

const PageSchema = z.object({
  page: z.number().int(),
  results: z.array(ItemSchema),
  total_pages: z.number().int(),
  total_results: z.number().int(),
});

const GenreListSchema = z.object({
  genres: z.array(GenreSchema),
});

const VideoSchema = z.object({
  id: z.string(),
  key: z.string(),
  name: z.string(),
  site: z.string(),
  type: z.string(),
  official: z.boolean().nullish(),
  published_at: z.string().nullish(),
});

const VideoListSchema = z.object({
  id: z.number().int(),
  results: z.array(VideoSchema),
});

const ProviderSchema = z.object({
  provider_id: z.number().int(),
  provider_name: z.string(),
  logo_path: z.string().nullish(),
  display_priority: z.number().int().nullish(),
});

const ProviderListSchema = z.array(ProviderSchema).nullish();

const RegionProvidersSchema = z.object({
  link: z.string().nullish(),
  flatrate: ProviderListSchema,
  rent: ProviderListSchema,
  buy: ProviderListSchema,
  ads: ProviderListSchema,
  free: ProviderListSchema,
});

const WatchProvidersSchema = z.object({
  id: z.number().int(),
  results: z.record(RegionProvidersSchema),
});

type RawItem = z.infer<typeof ItemSchema>;
type RawProvider = z.infer<typeof ProviderSchema>;

export function toCatalogItem(raw: RawItem): CatalogItem {
  const genreIds = raw.genre_ids ?? raw.genres?.map((g) => g.id) ?? [];
  const rating = Math.min(10, Math.max(0, raw.vote_average ?? 0));
  return Object.freeze({
    id: raw.id,
    title: raw.title,
    overview: raw.overview ?? "",
    releaseDate: raw.release_date ? raw.release_date : null,
    rating,
    popularity: raw.popularity ?? 0,
    genreIds: Object.freeze([...new Set(genreIds)]),
    posterPath: raw.poster_path ?? null,
    backdropPath: raw.backdrop_path ?? null,
  });
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    throw TransportError.of("decodingError", err);
  }
}

function decodeWith<S extends z.ZodTypeAny>(schema: S, body: string): z.infer<S> {
  const parsed = schema.safeParse(parseJson(body));
  if (!parsed.success) {
    const issue = parsed.error.issues.map((item) => `${item.path.join(".")}: ${item.message}`).join(", ");
    throw new TransportError({ kind: "decodingError" }, `Failed to decode response: ${issue}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function decodePage(body: string): CatalogPage {
  const raw = decodeWith(PageSchema, body);
  return {
    items: raw.results.map(toCatalogItem),
    page: raw.page,
    totalPages: raw.total_pages,
    totalResults: raw.total_results,
  };
}

export function decodeItem(body: string): CatalogItem {
  return toCatalogItem(decodeWith(ItemSchema, body));
}

export function decodeGenres(body: string): Genre[] {
  return decodeWith(GenreListSchema, body).genres;
}

export function decodeVideos(body: string): Video[] {
  return decodeWith(VideoListSchema, body).results.map((raw) => ({
    id: raw.id,
    key: raw.key,
    name: raw.name,
    site: raw.site,
    type: raw.type,
    official: raw.official ?? false,
    publishedAt: raw.published_at ?? null,
  }));
}

function toProvider(raw: RawProvider): WatchProvider {
  return {
    providerId: raw.provider_id,
    providerName: raw.provider_name,
    logoPath: raw.logo_path ?? null,
    displayPriority: raw.display_priority ?? Number.MAX_SAFE_INTEGER,
  };
}

/** Providers for one region (ISO 3166-1 code); empty when the region is not listed */
export function decodeWatchProviders(body: string, region: string): WatchProviderInfo {
  const entry = decodeWith(WatchProvidersSchema, body).results[region.toUpperCase()];
  if (!entry) return { streaming: [], rent: [], buy: [], free: [], link: null };
  return {
    streaming: (entry.flatrate ?? []).map(toProvider),
    rent: (entry.rent ?? []).map(toProvider),
    buy: (entry.buy ?? []).map(toProvider),
    free: [...(entry.free ?? []), ...(entry.ads ?? [])].map(toProvider),
    link: entry.link ?? null,
  };
}

/** Shape used by the offline cache blob (camelCase, already decoded) */
export const CatalogItemSchema = z.object({
  id: z.number().int(),
  title: z.string(),
  overview: z.string(),
  releaseDate: z.string().nullable(),
  rating: z.number(),
  popularity: z.number(),
  genreIds: z.array(z.number().int()),
  posterPath: z.string().nullable(),
  backdropPath: z.string().nullable(),
});

export function freezeItem(item: z.infer<typeof CatalogItemSchema>): CatalogItem {
  return Object.freeze({ ...item, genreIds: Object.freeze([...item.genreIds]) });
}
