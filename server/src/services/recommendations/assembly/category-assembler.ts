/**
 * Category Assembler
 *
 * descriptors -> concurrent place search -> score/rank -> drop empties
 *   -> (< MIN_CATEGORY_COUNT survivors) replace them with the fixed templates
 *   -> (still nothing) demo categories
 *   -> order by confidence -> shuffle places within each category
 *
 * Output invariant: every returned category has at least one place.
 */

import { logger } from '../../../lib/logger/structured-logger.js';
import { MIN_CATEGORY_COUNT } from '../../../config/index.js';
import type { AssembledCategories, CategoryDescriptor, FeedSource, Place } from '../types.js';
import type { SearchArea } from '../places/place-search.adapter.js';
import { rankPlaces, type ScoringSnapshot } from '../ranking/place-scorer.js';
import { demoCategories, fallbackDescriptors } from './fallback-catalog.js';

export interface PlaceSearcher {
  search(query: string, area: SearchArea, requestId?: string): Promise<Place[]>;
}

export interface AssembleInput {
  descriptors: readonly CategoryDescriptor[];
  area: SearchArea;
  snapshot: ScoringSnapshot;
  requestId?: string;
}

/** Fisher-Yates over a copy. */
export function shufflePlaces(places: readonly Place[], random: () => number): Place[] {
  const shuffled = [...places];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

export class CategoryAssembler {
  constructor(
    private readonly searcher: PlaceSearcher,
    private readonly random: () => number = Math.random
  ) { }

  async assemble(input: AssembleInput): Promise<AssembledCategories> {
    const { area, snapshot, requestId } = input;

    const survivors = (await this.populate(input.descriptors, input)).filter(d => d.places.length > 0);
    let source: FeedSource = 'personalized';
    let categories = survivors;

    if (survivors.length < MIN_CATEGORY_COUNT) {
      // Survivors are dropped: the feed never exceeds the template set
      const templates = (await this.populate(fallbackDescriptors(), input)).filter(d => d.places.length > 0);
      categories = templates;
      source = 'fallback';

      logger.info({
        requestId,
        event: 'categories_fallback_applied',
        survivors: survivors.length,
        templatesWithPlaces: templates.length
      }, '[CATEGORIES] Too few categories with places, using fallback templates');
    }

    if (categories.length === 0) {
      categories = demoCategories(area.origin, area.radiusMiles, this.random);
      source = 'demo';

      logger.warn({
        requestId,
        event: 'categories_demo_applied',
        count: categories.length
      }, '[CATEGORIES] No searchable categories, serving demo set');
    }

    const ordered = [...categories]
      .sort((a, b) => b.confidence - a.confidence)
      .map(descriptor => ({ ...descriptor, places: shufflePlaces(descriptor.places, this.random) }));

    logger.info({
      requestId,
      event: 'categories_assembled',
      source,
      categories: ordered.length,
      places: ordered.reduce((sum, d) => sum + d.places.length, 0),
      likeRatio: snapshot.likeRatio
    }, '[CATEGORIES] Categories assembled');

    return { source, categories: ordered };
  }

  private populate(descriptors: readonly CategoryDescriptor[], input: AssembleInput): Promise<CategoryDescriptor[]> {
    return Promise.all(descriptors.map(async descriptor => {
      const places = await this.searchSafely(descriptor, input);
      const ranked = rankPlaces(places, input.area.origin, input.snapshot);
      return { ...descriptor, places: ranked.map(scored => scored.place) };
    }));
  }

  private async searchSafely(descriptor: CategoryDescriptor, input: AssembleInput): Promise<Place[]> {
    try {
      return await this.searcher.search(descriptor.searchQuery, input.area, input.requestId);
    } catch (error) {
      logger.warn({
        requestId: input.requestId,
        event: 'category_search_failed',
        categoryId: descriptor.id,
        error: error instanceof Error ? error.message : String(error)
      }, '[CATEGORIES] Search threw, treating category as empty');
      return [];
    }
  }
}
