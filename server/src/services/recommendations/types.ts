/**
 * Recommendation pipeline domain types
 */

export const PLACE_CATEGORIES = ['restaurants', 'cafes', 'bars', 'venues', 'shopping'] as const;
export type PlaceCategory = typeof PLACE_CATEGORIES[number];

export const PRICE_RANGES = ['$', '$$', '$$$', '$$$$'] as const;
export type PriceRange = typeof PRICE_RANGES[number];

export const PLACE_INTERACTIONS = [
  'viewed',
  'liked',
  'disliked',
  'shared',
  'visited',
  'bookmarked',
  'called',
  'navigated',
  'reviewed',
  'photographed',
  'recommended'
] as const;
export type PlaceInteraction = typeof PLACE_INTERACTIONS[number];

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/** User position as sent by the client. */
export interface GeoPoint {
  lat: number;
  lng: number;
}

export interface Place {
  /** Local identity, regenerated on every search */
  id: string;
  /** External identity; absent for synthesized demo places */
  googlePlaceId?: string;
  name: string;
  description: string;
  address: string;
  category: PlaceCategory;
  /** Always within [0, 5] */
  rating: number;
  reviewCount: number;
  priceRange: PriceRange;
  descriptiveTags: string[];
  coordinates?: Coordinates;
  images: string[];
  isCurrentlyOpen: boolean;
  isDemo: boolean;
}

export interface CategoryDescriptor {
  id: string;
  title: string;
  subtitle: string;
  reasoning: string;
  searchQuery: string;
  category: PlaceCategory;
  /** 0..1, used to order categories */
  confidence: number;
  personalizedEmoji: string;
  vibeDescription: string;
  socialProofText?: string;
  psychologyHook?: string;
  places: Place[];
}

export interface OnboardingResponse {
  questionId: string;
  selectedOptions: string[];
}

export interface InteractionLogEntry {
  placeId: string;
  placeName: string;
  category: PlaceCategory;
  interaction: PlaceInteraction;
  timestamp: string;
  location: Coordinates;
  rating: number;
  priceRange: PriceRange;
}

export interface BehaviorCounters {
  totalPlaceViews: number;
  totalThumbsUp: number;
  totalThumbsDown: number;
}

export interface UserFingerprint {
  userId: string;
  likes: string[];
  dislikes: string[];
  likeCount: number;
  dislikeCount: number;
  tagAffinities: Record<string, number>;
  /** Most recent first */
  interactionLogs: InteractionLogEntry[];
  onboardingResponses: OnboardingResponse[];
  behavior: BehaviorCounters;
  lastInteractionTime?: string;
}

export type FeedSource = 'personalized' | 'fallback' | 'demo';

export interface AssembledCategories {
  source: FeedSource;
  categories: CategoryDescriptor[];
}

export interface RecommendationFeed extends AssembledCategories {
  cycle: number;
  generatedAt: string;
}

export function createEmptyFingerprint(userId: string): UserFingerprint {
  return {
    userId,
    likes: [],
    dislikes: [],
    likeCount: 0,
    dislikeCount: 0,
    tagAffinities: {},
    interactionLogs: [],
    onboardingResponses: [],
    behavior: { totalPlaceViews: 0, totalThumbsUp: 0, totalThumbsDown: 0 }
  };
}
