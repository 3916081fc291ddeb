/**
 * Trailers & watch providers
 * Picks playable trailers out of an item's video list and flattens provider
 * offers for display.
 */

import type { Video, WatchProvider, WatchProviderInfo } from "../types.js";

export function isYouTube(video: Video): boolean {
  return video.site.toLowerCase() === "youtube";
}

function isTrailer(video: Video): boolean {
  return video.type.toLowerCase() === "trailer";
}

/** Official YouTube trailers, in the service's order */
export function officialTrailers(videos: readonly Video[]): Video[] {
  return videos.filter((v) => v.official && isTrailer(v) && isYouTube(v));
}

/** First official trailer, else the first unofficial YouTube trailer */
export function primaryTrailer(videos: readonly Video[]): Video | null {
  return officialTrailers(videos).at(0) ?? videos.find((v) => isYouTube(v) && isTrailer(v)) ?? null;
}

export function youtubeUrl(video: Video): string | null {
  return isYouTube(video) ? `https://www.youtube.com/watch?v=${encodeURIComponent(video.key)}` : null;
}

export function youtubeThumbnailUrl(video: Video): string | null {
  return isYouTube(video) ? `https://img.youtube.com/vi/${encodeURIComponent(video.key)}/hqdefault.jpg` : null;
}

// --- Providers ---

/** Every provider once, lowest display priority first */
export function allProviders(info: WatchProviderInfo): WatchProvider[] {
  const seen = new Set<number>();
  const result: WatchProvider[] = [];
  for (const provider of [...info.streaming, ...info.rent, ...info.buy, ...info.free]) {
    if (seen.has(provider.providerId)) continue;
    seen.add(provider.providerId);
    result.push(provider);
  }
  return result.sort((a, b) => a.displayPriority - b.displayPriority);
}
