/**
 * Place Search Adapter
 *
 * Category search query -> text search -> Place[] -> radius filter.
 * Never throws: every upstream failure becomes an empty list, and the
 * assembler drops empty categories.
 */

import { logger } from '../../../lib/logger/structured-logger.js';
import { METERS_PER_MILE, MORE_PLACES_PAGE_SIZE } from '../../../config/index.js';
import type { GeoPoint, Place, PlaceCategory } from '../types.js';
import { distanceFromUser, filterPlacesWithinRadius } from '../geo/distance-calculator.js';
import type { PlacesSearchClient } from './google-places.client.js';
import { mapGooglePlaceToPlace } from './result-mapper.js';

export interface SearchArea {
  origin: GeoPoint;
  radiusMiles: number;
}

export function milesToMeters(miles: number): number {
  return Math.trunc(miles * METERS_PER_MILE);
}

/** Wider queries per category kind, used to page in more places. */
const BROADER_QUERIES: Record<PlaceCategory, readonly string[]> = {
  restaurants: [
    'restaurant dining food near',
    'eatery bistro grill near',
    'cuisine kitchen dining near',
    'food restaurant meal near'
  ],
  cafes: [
    'cafe coffee shop near',
    'coffee espresso latte near',
    'coffeehouse brew near',
    'cafe breakfast pastry near'
  ],
  bars: [
    'bar pub drinks near',
    'cocktail lounge bar near',
    'brewery taproom near',
    'nightlife bar drinks near'
  ],
  venues: [
    'entertainment venue near',
    'event space venue near',
    'theater concert venue near',
    'music venue entertainment near'
  ],
  shopping: [
    'shop store retail near',
    'boutique shopping store near',
    'market shopping retail near',
    'store shopping boutique near'
  ]
};

export function broaderQueriesFor(category: PlaceCategory): readonly string[] {
  return BROADER_QUERIES[category];
}

export class PlaceSearchAdapter {
  constructor(private readonly client: PlacesSearchClient) { }

  /**
   * Places for one query that really lie inside the search area.
   */
  async search(query: string, area: SearchArea, requestId?: string): Promise<Place[]> {
    const outcome = await this.client.searchText({
      query,
      location: area.origin,
      radiusMeters: milesToMeters(area.radiusMiles),
      requestId
    });

    if (!outcome.ok) {
      logger.warn({
        requestId,
        event: 'place_search_failed',
        query,
        reason: outcome.reason,
        status: outcome.status
      }, '[PLACES] Search failed, treating as no results');
      return [];
    }

    const converted: Place[] = [];
    for (const raw of outcome.results) {
      const place = mapGooglePlaceToPlace(raw);
      if (place) converted.push(place);
    }

    const inRadius = filterPlacesWithinRadius(converted, area.origin, area.radiusMiles);

    logger.debug({
      requestId,
      event: 'place_search_filtered',
      query,
      raw: outcome.results.length,
      converted: converted.length,
      inRadius: inRadius.length,
      radiusMiles: area.radiusMiles
    }, '[PLACES] Search results filtered by radius');

    return inRadius;
  }

  /**
   * Additional places for a category already on screen: broader queries,
   * minus anything the category already shows, nearest first.
   */
  async fetchMore(
    category: PlaceCategory,
    existing: readonly Place[],
    area: SearchArea,
    requestId?: string
  ): Promise<Place[]> {
    const batches = await Promise.all(
      broaderQueriesFor(category).map(query => this.search(query, area, requestId))
    );

    const seen = new Set<string>();
    for (const place of existing) {
      if (place.googlePlaceId) seen.add(place.googlePlaceId);
    }

    const fresh: Place[] = [];
    for (const place of batches.flat()) {
      if (!place.googlePlaceId) {
        fresh.push(place);
        continue;
      }
      if (seen.has(place.googlePlaceId)) continue;
      seen.add(place.googlePlaceId);
      fresh.push(place);
    }

    const byDistance = (place: Place) => distanceFromUser(place, area.origin) ?? Number.MAX_VALUE;
    return fresh
      .sort((a, b) => byDistance(a) - byDistance(b))
      .slice(0, MORE_PLACES_PAGE_SIZE);
  }
}
