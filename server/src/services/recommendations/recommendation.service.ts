/**
 * Recommendation Service
 *
 * One generation cycle:
 *   fingerprint + radius + weather (parallel)
 *     -> prompt -> generated descriptors -> assembled categories -> feed
 *
 * Cycles are numbered per user. A cycle publishes its feed only if it is still
 * the latest one started for that user; a superseded cycle's result goes back
 * to its caller marked stale and is never published.
 *
 * Feeds and cycle numbers are held per user in memory, capped at
 * maxTrackedUsers; the least recently active user is evicted first.
 */

import { logger } from '../../lib/logger/structured-logger.js';
import { DEFAULT_SEARCH_RADIUS_MILES, MAX_TRACKED_USERS } from '../../config/index.js';
import type { CategoryDescriptor, GeoPoint, Place, RecommendationFeed, UserFingerprint } from './types.js';
import { buildCategoryPrompt } from './prompt/category-prompt.builder.js';
import type { CategoryAssembler } from './assembly/category-assembler.js';
import type { SearchArea } from './places/place-search.adapter.js';
import { createScoringSnapshot } from './ranking/place-scorer.js';
import type { PreferenceStore } from './preferences/preference-store.js';
import type { WeatherProvider } from './weather/weather.service.js';

export interface FingerprintSource {
  read(userId: string, requestId?: string): Promise<UserFingerprint | null>;
}

export interface CategoryGenerator {
  generate(prompt: string, requestId?: string): Promise<CategoryDescriptor[]>;
}

export interface MorePlacesSearcher {
  fetchMore(category: Place['category'], existing: readonly Place[], area: SearchArea, requestId?: string): Promise<Place[]>;
}

export interface RecommendationServiceDeps {
  fingerprints: FingerprintSource;
  preferences: PreferenceStore;
  weather: WeatherProvider;
  generator: CategoryGenerator;
  assembler: Pick<CategoryAssembler, 'assemble'>;
  morePlaces: MorePlacesSearcher;
  clock?: () => Date;
  maxTrackedUsers?: number;
}

export interface GenerationResult {
  feed: RecommendationFeed;
  /** False when a newer cycle for the same user started before this one finished */
  published: boolean;
}

/** Set as most recent, evicting the oldest entry once the map is full. */
function rememberBounded<V>(map: Map<string, V>, key: string, value: V, maxEntries: number): void {
  map.delete(key);
  if (map.size >= maxEntries) {
    const oldest = map.keys().next().value;
    if (oldest !== undefined) map.delete(oldest);
  }
  map.set(key, value);
}

export class RecommendationService {
  private readonly latestCycle = new Map<string, number>();
  private readonly feeds = new Map<string, RecommendationFeed>();
  private readonly clock: () => Date;
  private readonly maxTrackedUsers: number;

  constructor(private readonly deps: RecommendationServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.maxTrackedUsers = Math.max(1, deps.maxTrackedUsers ?? MAX_TRACKED_USERS);
  }

  async generate(userId: string, location: GeoPoint, requestId?: string): Promise<GenerationResult> {
    const cycle = (this.latestCycle.get(userId) ?? 0) + 1;
    rememberBounded(this.latestCycle, userId, cycle, this.maxTrackedUsers);
    const startTime = Date.now();

    logger.info({ requestId, userId, cycle, event: 'recommendation_cycle_started' }, '[RECOMMENDATIONS] Cycle started');

    const [fingerprint, radiusMiles, weather] = await Promise.all([
      this.deps.fingerprints.read(userId, requestId),
      this.radiusFor(userId, requestId),
      this.deps.weather.describe(location, requestId)
    ]);

    // Scoring reads this copy, not the live fingerprint
    const snapshot = createScoringSnapshot(fingerprint);
    const prompt = buildCategoryPrompt({ fingerprint, location, now: this.clock(), weather });
    const descriptors = await this.deps.generator.generate(prompt, requestId);

    const area: SearchArea = { origin: location, radiusMiles };
    const assembled = await this.deps.assembler.assemble({ descriptors, area, snapshot, requestId });

    const feed: RecommendationFeed = {
      cycle,
      generatedAt: this.clock().toISOString(),
      ...assembled
    };

    const published = this.latestCycle.get(userId) === cycle;
    if (published) {
      rememberBounded(this.feeds, userId, feed, this.maxTrackedUsers);
    }

    logger.info({
      requestId,
      userId,
      cycle,
      event: published ? 'recommendation_cycle_published' : 'recommendation_cycle_superseded',
      source: feed.source,
      categories: feed.categories.length,
      generated: descriptors.length,
      hasFingerprint: fingerprint !== null,
      radiusMiles,
      durationMs: Date.now() - startTime
    }, published ? '[RECOMMENDATIONS] Cycle published' : '[RECOMMENDATIONS] Newer cycle started, result discarded');

    return { feed, published };
  }

  getLatest(userId: string): RecommendationFeed | null {
    return this.feeds.get(userId) ?? null;
  }

  /**
   * More places for one category of the user's published feed.
   * Returns null when the category is not in that feed. New places are
   * appended to the stored category so the next call skips them.
   */
  async fetchMorePlaces(userId: string, categoryId: string, location: GeoPoint, requestId?: string): Promise<Place[] | null> {
    const feed = this.feeds.get(userId);
    const category = feed?.categories.find(c => c.id === categoryId);
    if (!feed || !category) {
      return null;
    }

    const radiusMiles = await this.radiusFor(userId, requestId);
    const places = await this.deps.morePlaces.fetchMore(
      category.category,
      category.places,
      { origin: location, radiusMiles },
      requestId
    );

    // Only touch the feed if no cycle replaced it meanwhile
    if (places.length > 0 && this.feeds.get(userId) === feed) {
      rememberBounded(this.feeds, userId, {
        ...feed,
        categories: feed.categories.map(c =>
          c.id === categoryId ? { ...c, places: [...c.places, ...places] } : c
        )
      }, this.maxTrackedUsers);
    }

    logger.info({
      requestId,
      userId,
      categoryId,
      event: 'more_places_fetched',
      count: places.length
    }, '[RECOMMENDATIONS] Fetched more places');

    return places;
  }

  private async radiusFor(userId: string, requestId?: string): Promise<number> {
    try {
      return await this.deps.preferences.getRadiusMiles(userId);
    } catch (error) {
      logger.warn({
        requestId,
        userId,
        event: 'radius_read_failed',
        error: error instanceof Error ? error.message : String(error)
      }, '[RECOMMENDATIONS] Radius lookup failed, using default');
      return DEFAULT_SEARCH_RADIUS_MILES;
    }
  }
}
