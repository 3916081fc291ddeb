import test from "node:test";
import assert from "node:assert/strict";
import {
  allProviders,
  officialTrailers,
  primaryTrailer,
  youtubeThumbnailUrl,
  youtubeUrl,
} from "../src/layers/media.js";
import type { Video, WatchProvider } from "../src/types.js";

function video(id: string, overrides: Partial<Video> = {}): Video {
  return {
    id,
    key: `key-${id}`,
    name: `Video ${id}`,
    site: "YouTube",
    type: "Trailer",
    official: true,
    publishedAt: null,
    ...overrides,
  };
}

function provider(id: number, displayPriority: number): WatchProvider {
  return { providerId: id, providerName: `Provider ${id}`, logoPath: null, displayPriority };
}

test("official trailers are official YouTube trailers only", () => {
  const videos = [
    video("teaser", { type: "Teaser" }),
    video("vimeo", { site: "Vimeo" }),
    video("fan", { official: false }),
    video("one"),
    video("two", { site: "youtube", type: "trailer" }),
  ];
  assert.deepEqual(officialTrailers(videos).map((v) => v.id), ["one", "two"]);
});

test("primary trailer prefers an official one, then any YouTube trailer", () => {
  assert.equal(primaryTrailer([video("fan", { official: false }), video("real")])?.id, "real");
  assert.equal(primaryTrailer([video("clip", { type: "Clip" }), video("fan", { official: false })])?.id, "fan");
  assert.equal(primaryTrailer([video("vimeo", { site: "Vimeo" })]), null);
  assert.equal(primaryTrailer([]), null);
});

test("YouTube links and thumbnails", () => {
  assert.equal(youtubeUrl(video("a", { key: "abc123" })), "https://www.youtube.com/watch?v=abc123");
  assert.equal(youtubeThumbnailUrl(video("a", { key: "abc123" })), "https://img.youtube.com/vi/abc123/hqdefault.jpg");
  assert.equal(youtubeUrl(video("v", { site: "Vimeo" })), null);
  assert.equal(youtubeThumbnailUrl(video("v", { site: "Vimeo" })), null);
});

test("allProviders lists each provider once by display priority", () => {
  const providers = allProviders({
    streaming: [provider(8, 3)],
    rent: [provider(2, 1), provider(8, 3)],
    buy: [provider(2, 1), provider(10, 2)],
    free: [],
    link: null,
  });
  assert.deepEqual(providers.map((p) => p.providerId), [2, 10, 8]);
});
