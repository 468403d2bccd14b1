/**
 * Non-personalized categories used when generation or search comes up short.
 */

import { randomUUID } from 'node:crypto';
import type { CategoryDescriptor, GeoPoint, Place, PlaceCategory, PriceRange } from '../types.js';
import { defaultImageForCategory, deriveDescriptiveTags } from '../places/place-tags.js';

type Template = Omit<CategoryDescriptor, 'places'>;

/** One template per category kind; searched and scored like generated categories. */
export const FALLBACK_TEMPLATES: readonly Template[] = [
  {
    id: 'top_restaurants',
    title: 'Top Restaurants',
    subtitle: 'Highly rated dining near you',
    reasoning: 'Based on high ratings and reviews',
    searchQuery: 'restaurant',
    category: 'restaurants',
    confidence: 0.85,
    personalizedEmoji: '🍽️',
    vibeDescription: 'Exceptional dining experiences'
  },
  {
    id: 'coffee_shops',
    title: 'Coffee & Cafes',
    subtitle: 'Perfect spots for coffee',
    reasoning: 'Great for coffee lovers',
    searchQuery: 'cafe',
    category: 'cafes',
    confidence: 0.9,
    personalizedEmoji: '☕',
    vibeDescription: 'Quality coffee experiences'
  },
  {
    id: 'bars_lounges',
    title: 'Bars & Lounges',
    subtitle: 'Perfect for drinks',
    reasoning: 'Great for evening entertainment',
    searchQuery: 'bar',
    category: 'bars',
    confidence: 0.8,
    personalizedEmoji: '🍸',
    vibeDescription: 'Quality nightlife venues'
  },
  {
    id: 'entertainment',
    title: 'Entertainment',
    subtitle: 'Fun activities & venues',
    reasoning: 'For fun and entertainment',
    searchQuery: 'entertainment',
    category: 'venues',
    confidence: 0.75,
    personalizedEmoji: '🎭',
    vibeDescription: 'Live entertainment venues'
  },
  {
    id: 'shopping',
    title: 'Shopping',
    subtitle: 'Stores & boutiques',
    reasoning: 'Shopping experiences',
    searchQuery: 'store',
    category: 'shopping',
    confidence: 0.7,
    personalizedEmoji: '🛍️',
    vibeDescription: 'Local shopping destinations'
  }
];

export function fallbackDescriptors(): CategoryDescriptor[] {
  return FALLBACK_TEMPLATES.map(template => ({ ...template, places: [] }));
}

interface DemoSeed {
  descriptor: Template;
  place: {
    name: string;
    description: string;
    rating: number;
    priceRange: PriceRange;
  };
}

const DEMO_SEEDS: readonly DemoSeed[] = [
  {
    descriptor: {
      id: 'demo_restaurants',
      title: 'Recommended Restaurants',
      subtitle: 'Great dining options nearby',
      reasoning: 'Sample recommendations',
      searchQuery: 'restaurant',
      category: 'restaurants',
      confidence: 0.8,
      personalizedEmoji: '🍽️',
      vibeDescription: 'Great local dining'
    },
    place: { name: 'Great Local Restaurant', description: 'Delicious food and great atmosphere', rating: 4.5, priceRange: '$$' }
  },
  {
    descriptor: {
      id: 'demo_cafes',
      title: 'Coffee & Cafes',
      subtitle: 'Perfect for coffee lovers',
      reasoning: 'Sample recommendations',
      searchQuery: 'cafe',
      category: 'cafes',
      confidence: 0.8,
      personalizedEmoji: '☕',
      vibeDescription: 'Cozy coffee spots'
    },
    place: { name: 'Amazing Coffee Shop', description: 'Perfect coffee and cozy vibes', rating: 4.3, priceRange: '$' }
  },
  {
    descriptor: {
      id: 'demo_bars',
      title: 'Bars & Nightlife',
      subtitle: 'Great for evening drinks',
      reasoning: 'Sample recommendations',
      searchQuery: 'bar',
      category: 'bars',
      confidence: 0.8,
      personalizedEmoji: '🍸',
      vibeDescription: 'Lively nightlife'
    },
    place: { name: 'Popular Bar & Lounge', description: 'Great drinks and atmosphere', rating: 4.2, priceRange: '$$' }
  }
];

const MILES_PER_DEGREE = 69.1;
const MAX_DEMO_OFFSET_DEGREES = 0.01;

/**
 * Offsets stay under half the radius per axis, so a demo place is always inside the search area.
 */
function demoOffsetDegrees(radiusMiles: number): number {
  return Math.min(MAX_DEMO_OFFSET_DEGREES, radiusMiles / MILES_PER_DEGREE / 2);
}

function createDemoPlace(
  seed: DemoSeed['place'],
  category: PlaceCategory,
  origin: GeoPoint,
  radiusMiles: number,
  random: () => number
): Place {
  const maxOffset = demoOffsetDegrees(radiusMiles);
  const offset = () => (random() * 2 - 1) * maxOffset;

  return {
    id: randomUUID(),
    // No googlePlaceId: synthesized, not a real venue
    name: seed.name,
    description: seed.description,
    address: 'Near your location',
    category,
    rating: seed.rating,
    reviewCount: 50 + Math.floor(random() * 451),
    priceRange: seed.priceRange,
    descriptiveTags: deriveDescriptiveTags(category, seed.rating, seed.priceRange),
    coordinates: {
      latitude: origin.lat + offset(),
      longitude: origin.lng + offset()
    },
    images: [defaultImageForCategory(category)],
    isCurrentlyOpen: true,
    isDemo: true
  };
}

/** Last resort: synthetic categories, one demo place each. */
export function demoCategories(origin: GeoPoint, radiusMiles: number, random: () => number): CategoryDescriptor[] {
  return DEMO_SEEDS.map(seed => ({
    ...seed.descriptor,
    places: [createDemoPlace(seed.place, seed.descriptor.category, origin, radiusMiles, random)]
  }));
}
