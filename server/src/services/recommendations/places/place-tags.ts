import type { PlaceCategory, PriceRange } from '../types.js';

/**
 * Tags the scorer matches against the user's tag affinities.
 * Derived from category, rating and price so the same venue always carries the same tags.
 */
export function deriveDescriptiveTags(category: PlaceCategory, rating: number, priceRange: PriceRange): string[] {
  const tags: string[] = [category];

  if (rating >= 4.5) {
    tags.push('highly_rated');
  }

  if (priceRange === '$') {
    tags.push('budget_friendly');
  } else if (priceRange === '$$$$') {
    tags.push('luxury');
  }

  return tags;
}

const DEFAULT_IMAGES: Record<PlaceCategory, string> = {
  restaurants: 'https://images.unsplash.com/photo-1517248135467-4c7edcad34c4?w=800&h=600&fit=crop',
  cafes: 'https://images.unsplash.com/photo-1501339847302-ac426a4a7cbb?w=800&h=600&fit=crop',
  bars: 'https://images.unsplash.com/photo-1514933651103-005eec06c04b?w=800&h=600&fit=crop',
  venues: 'https://images.unsplash.com/photo-1492684223066-81342ee5ff30?w=800&h=600&fit=crop',
  shopping: 'https://images.unsplash.com/photo-1441986300917-64674bd600d8?w=800&h=600&fit=crop'
};

export function defaultImageForCategory(category: PlaceCategory): string {
  return DEFAULT_IMAGES[category];
}
