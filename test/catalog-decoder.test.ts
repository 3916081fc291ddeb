import test from "node:test";
import assert from "node:assert/strict";
import {
  decodeGenres,
  decodeItem,
  decodePage,
  decodeVideos,
  decodeWatchProviders,
} from "../src/layers/catalog-decoder.js";
import { TransportError } from "../src/layers/transport-error.js";
import { makeItem, rawMovie, rawVideo } from "./helpers.js";

function isDecodingError(err: unknown): boolean {
  return err instanceof TransportError && err.kind === "decodingError";
}

test("decodes a page of items into the catalog shape", () => {
  const page = decodePage(
    JSON.stringify({ page: 2, results: [rawMovie(1), rawMovie(2)], total_pages: 9, total_results: 170 }),
  );
  assert.equal(page.page, 2);
  assert.equal(page.totalPages, 9);
  assert.equal(page.totalResults, 170);
  assert.deepEqual(page.items, [makeItem(1), makeItem(2)]);
  assert.ok(Object.isFrozen(page.items[0]));
});

test("absent optional fields fall back to neutral values", () => {
  const item = decodeItem(JSON.stringify({ id: 5, title: "Bare" }));
  assert.deepEqual(item, {
    id: 5,
    title: "Bare",
    overview: "",
    releaseDate: null,
    rating: 0,
    popularity: 0,
    genreIds: [],
    posterPath: null,
    backdropPath: null,
  });
});

test("empty release date becomes null", () => {
  assert.equal(decodeItem(JSON.stringify(rawMovie(3, { release_date: "" }))).releaseDate, null);
});

test("genre ids are deduplicated, and genre objects are accepted", () => {
  assert.deepEqual(decodeItem(JSON.stringify(rawMovie(1, { genre_ids: [28, 12, 28] }))).genreIds, [28, 12]);

  const details = rawMovie(1, {
    genre_ids: undefined,
    genres: [
      { id: 878, name: "Science Fiction" },
      { id: 12, name: "Adventure" },
    ],
  });
  assert.deepEqual(decodeItem(JSON.stringify(details)).genreIds, [878, 12]);
});

test("rating is clamped to 0..10", () => {
  assert.equal(decodeItem(JSON.stringify(rawMovie(1, { vote_average: 11.5 }))).rating, 10);
  assert.equal(decodeItem(JSON.stringify(rawMovie(1, { vote_average: -1 }))).rating, 0);
});

test("malformed bodies raise decodingError", () => {
  assert.throws(() => decodePage("<html>"), isDecodingError);
  assert.throws(() => decodeItem(JSON.stringify({ id: 1 })), isDecodingError);
  assert.throws(() => decodePage(JSON.stringify({ page: 1, results: "nope" })), isDecodingError);
});

test("decodes the genre list", () => {
  const genres = decodeGenres(JSON.stringify({ genres: [{ id: 18, name: "Drama" }] }));
  assert.deepEqual(genres, [{ id: 18, name: "Drama" }]);
});

test("decodes videos, defaulting official and published date", () => {
  const body = JSON.stringify({
    id: 42,
    results: [rawVideo("a"), rawVideo("b", { site: "Vimeo", type: "Teaser", official: undefined, published_at: null })],
  });
  assert.deepEqual(decodeVideos(body), [
    {
      id: "a",
      key: "key-a",
      name: "Video a",
      site: "YouTube",
      type: "Trailer",
      official: true,
      publishedAt: "2024-03-01T12:00:00.000Z",
    },
    { id: "b", key: "key-b", name: "Video b", site: "Vimeo", type: "Teaser", official: false, publishedAt: null },
  ]);
  assert.throws(() => decodeVideos(JSON.stringify({ id: 42, results: [{ id: "c" }] })), isDecodingError);
});

function rawProvider(id: number, priority?: number): Record<string, unknown> {
  return { provider_id: id, provider_name: `Provider ${id}`, logo_path: `/l${id}.png`, display_priority: priority };
}

test("watch providers are read for one region, ads counting as free", () => {
  const body = JSON.stringify({
    id: 42,
    results: {
      US: {
        link: "https://example.test/watch/42",
        flatrate: [rawProvider(8, 1)],
        rent: [rawProvider(2, 4)],
        ads: [rawProvider(300)],
        free: [rawProvider(73, 9)],
      },
      DE: { flatrate: [rawProvider(9, 2)] },
    },
  });

  const us = decodeWatchProviders(body, "us");
  assert.deepEqual(us.streaming, [{ providerId: 8, providerName: "Provider 8", logoPath: "/l8.png", displayPriority: 1 }]);
  assert.deepEqual(us.rent.map((p) => p.providerId), [2]);
  assert.deepEqual(us.buy, []);
  assert.deepEqual(us.free.map((p) => p.providerId), [73, 300]);
  assert.equal(us.free[1].displayPriority, Number.MAX_SAFE_INTEGER);
  assert.equal(us.link, "https://example.test/watch/42");

  assert.equal(decodeWatchProviders(body, "DE").link, null);
  assert.deepEqual(decodeWatchProviders(body, "FR"), { streaming: [], rent: [], buy: [], free: [], link: null });
});
