/**
 * Preference Scoring Engine
 * Learns genre affinity and a preferred rating from swipe judgments and
 * ranks catalog items with a transparent linear score.
 * The profile is derived state: replaying the retained signals rebuilds it.
 */

import type { CatalogItem, Clock, Judgment, PreferenceProfile, ScoringConfig, SwipeSignal } from "../types.js";
import { DEFAULT_SCORING } from "../types.js";

const JUDGMENT_WEIGHT: Record<Judgment, number> = {
  superLiked: 2.0,
  liked: 1.0,
  skipped: -0.5,
};

const DAY_MS = 86_400_000;

export function judgmentWeight(judgment: Judgment): number {
  return JUDGMENT_WEIGHT[judgment];
}

/** Build a signal from the item as it looks right now */
export function signalFor(item: CatalogItem, judgment: Judgment, timestamp: number = Date.now()): SwipeSignal {
  return Object.freeze({
    itemId: item.id,
    judgment,
    genreIds: item.genreIds,
    rating: item.rating,
    timestamp,
  });
}

export class PreferenceEngine {
  private config: ScoringConfig;
  private clock: Clock;
  private window: SwipeSignal[] = [];
  private judged = new Set<number>();
  private genreWeights = new Map<number, number>();
  private preferredRating: number;

  constructor(opts: { config?: Partial<ScoringConfig>; clock?: Clock } = {}) {
    this.config = { ...DEFAULT_SCORING, ...opts.config };
    this.clock = opts.clock ?? Date.now;
    this.preferredRating = this.config.initialPreferredRating;
  }

  /** Rebuild an engine from a previously saved signal list */
  static fromSignals(
    signals: readonly SwipeSignal[],
    opts: { config?: Partial<ScoringConfig>; clock?: Clock } = {},
  ): PreferenceEngine {
    const engine = new PreferenceEngine(opts);
    const cutoff = engine.clock() - engine.config.retentionMs;
    engine.window = [...signals]
      .filter((s) => s.timestamp >= cutoff)
      .sort((a, b) => a.timestamp - b.timestamp);
    engine.replay();
    return engine;
  }

  // --- Learning ---

  /**
   * Add a judgment. The window stays ordered by timestamp, so a signal that
   * arrives late is slotted into place and the profile replayed; replaying
   * `signals()` therefore always rebuilds the live profile.
   */
  record(signal: SwipeSignal): void {
    const dropped = this.dropStale();
    if (signal.timestamp < this.clock() - this.config.retentionMs) {
      if (dropped > 0) this.replay();
      return;
    }

    const last = this.window[this.window.length - 1];
    if (last === undefined || last.timestamp <= signal.timestamp) {
      this.window.push(signal);
      if (dropped > 0) this.replay();
      else this.apply(signal);
      return;
    }

    const at = this.window.findIndex((s) => s.timestamp > signal.timestamp);
    this.window.splice(at, 0, signal);
    this.replay();
  }

  private apply(signal: SwipeSignal): void {
    const weight = judgmentWeight(signal.judgment);
    for (const genreId of new Set(signal.genreIds)) {
      this.genreWeights.set(genreId, (this.genreWeights.get(genreId) ?? 0) + weight);
    }
    if (signal.judgment === "liked" || signal.judgment === "superLiked") {
      const alpha = this.config.smoothing;
      this.preferredRating = this.preferredRating * (1 - alpha) + signal.rating * alpha;
    }
    this.judged.add(signal.itemId);
  }

  private replay(): void {
    this.genreWeights = new Map();
    this.judged = new Set();
    this.preferredRating = this.config.initialPreferredRating;
    for (const signal of this.window) this.apply(signal);
  }

  /** Drop signals older than the retention window; returns how many went */
  private dropStale(): number {
    const cutoff = this.clock() - this.config.retentionMs;
    const before = this.window.length;
    this.window = this.window.filter((s) => s.timestamp >= cutoff);
    return before - this.window.length;
  }

  // --- Scoring ---

  /** Average learned weight over the item's genres; 0 for unknown or no genres */
  genreAffinity(item: CatalogItem): number {
    if (item.genreIds.length === 0) return 0;
    const total = item.genreIds.reduce((sum, id) => sum + (this.genreWeights.get(id) ?? 0), 0);
    return total / item.genreIds.length;
  }

  score(item: CatalogItem): number {
    const c = this.config;
    let score = c.genreWeight * this.genreAffinity(item);

    const ratingProximity = Math.max(0, 10 - Math.abs(item.rating - this.preferredRating)) / 10;
    score += c.ratingWeight * ratingProximity;

    if (item.rating >= c.highRatingThreshold) score += c.highRatingBoost;
    if (this.isRecent(item)) score += c.recencyBoost;

    return score;
  }

  private isRecent(item: CatalogItem): boolean {
    if (!item.releaseDate) return false;
    const released = Date.parse(item.releaseDate);
    if (Number.isNaN(released)) return false;
    const age = this.clock() - released;
    return age >= 0 && age <= this.config.recentReleaseDays * DAY_MS;
  }

  /** Highest score first; equal scores keep their input order */
  rank(items: readonly CatalogItem[]): CatalogItem[] {
    return items
      .map((item, index) => ({ item, index, score: this.score(item) }))
      .sort((a, b) => b.score - a.score || a.index - b.index)
      .map((s) => s.item);
  }

  /** Remove every item already judged in the retained window, whatever the judgment */
  filterJudged(items: readonly CatalogItem[]): CatalogItem[] {
    return items.filter((item) => !this.judged.has(item.id));
  }

  // --- Introspection ---

  profile(): PreferenceProfile {
    return {
      genreWeights: new Map(this.genreWeights),
      preferredRating: this.preferredRating,
    };
  }

  topGenres(limit = 5): number[] {
    return [...this.genreWeights.entries()]
      .sort((a, b) => b[1] - a[1])
      .slice(0, limit)
      .map(([id]) => id);
  }

  preferredRatingRange(): [number, number] {
    return [Math.max(0, this.preferredRating - 2), Math.min(10, this.preferredRating + 1)];
  }

  /** Retained signals, oldest first; persist these to restore the profile later */
  signals(): readonly SwipeSignal[] {
    return [...this.window];
  }

  reset(): void {
    this.window = [];
    this.replay();
  }
}
