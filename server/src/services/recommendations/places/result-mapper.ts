/**
 * Google Places Result Mapper
 * Maps Places API (New) search results to the internal Place shape
 *
 * New API result structure:
 * {
 *   id: "ChIJ...",
 *   displayName: { text: "...", languageCode: "..." },
 *   formattedAddress: "...",
 *   location: { latitude: ..., longitude: ... },
 *   rating: ...,
 *   userRatingCount: ...,
 *   priceLevel: "PRICE_LEVEL_...",
 *   currentOpeningHours: { openNow: true/false },
 *   photos: [{ name: "places/.../photos/..." }],
 *   types: [...]
 * }
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { Place, PlaceCategory, PriceRange } from '../types.js';
import { defaultImageForCategory, deriveDescriptiveTags } from './place-tags.js';

const googlePlaceSchema = z.object({
  id: z.string().min(1),
  displayName: z.object({ text: z.string().min(1) }),
  formattedAddress: z.string().optional(),
  location: z.object({
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180)
  }),
  rating: z.number().optional(),
  userRatingCount: z.number().int().nonnegative().optional(),
  priceLevel: z.string().optional(),
  currentOpeningHours: z.object({ openNow: z.boolean().optional() }).optional(),
  photos: z.array(z.object({ name: z.string() })).optional(),
  types: z.array(z.string()).optional()
});


/**
 * Category from Google place types; venues without a recognizable type count as restaurants.
 */
export function categoryFromTypes(types: readonly string[] | undefined): PlaceCategory {
  const typeList = (types ?? []).map(t => t.toLowerCase());
  const has = (...candidates: string[]) => candidates.some(c => typeList.includes(c));

  if (has('restaurant', 'food', 'meal_takeaway')) return 'restaurants';
  if (has('cafe', 'bakery', 'coffee_shop')) return 'cafes';
  if (has('bar', 'night_club', 'liquor_store', 'pub')) return 'bars';
  if (has('shopping_mall', 'store', 'clothing_store')) return 'shopping';
  if (has('tourist_attraction', 'amusement_park', 'museum')) return 'venues';
  return 'restaurants';
}

const PRICE_LEVEL_MAP: Record<string, PriceRange> = {
  'PRICE_LEVEL_FREE': '$',
  'PRICE_LEVEL_INEXPENSIVE': '$',
  'PRICE_LEVEL_MODERATE': '$$',
  'PRICE_LEVEL_EXPENSIVE': '$$$',
  'PRICE_LEVEL_VERY_EXPENSIVE': '$$$$'
};

/** Unknown or missing price levels read as the middle tier. */
export function parsePriceLevel(priceLevel: string | undefined): PriceRange {
  if (!priceLevel) return '$$';
  return PRICE_LEVEL_MAP[priceLevel] ?? '$$';
}

function clampRating(rating: number | undefined): number {
  if (rating === undefined || Number.isNaN(rating)) return 0;
  return Math.min(5, Math.max(0, rating));
}

/**
 * Convert one raw search result. Returns null when required fields
 * (id, display name, geometry) are missing or malformed.
 */
export function mapGooglePlaceToPlace(raw: unknown): Place | null {
  const parsed = googlePlaceSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const place = parsed.data;
  // Resource names look like "places/ChIJxxx"; keep the bare id
  const googlePlaceId = place.id.split('/').pop() || place.id;
  const category = categoryFromTypes(place.types);
  const rating = clampRating(place.rating);
  const priceRange = parsePriceLevel(place.priceLevel);
  const address = place.formattedAddress ?? '';
  const firstPhoto = place.photos?.[0]?.name;

  return {
    id: randomUUID(),
    googlePlaceId,
    name: place.displayName.text,
    description: address,
    address,
    category,
    rating,
    reviewCount: place.userRatingCount ?? 0,
    priceRange,
    descriptiveTags: deriveDescriptiveTags(category, rating, priceRange),
    coordinates: {
      latitude: place.location.latitude,
      longitude: place.location.longitude
    },
    images: firstPhoto ? [firstPhoto] : [defaultImageForCategory(category)],
    isCurrentlyOpen: place.currentOpeningHours?.openNow ?? true,
    isDemo: false
  };
}
