/**
 * Category Generation Prompt Builder
 *
 * Pure: same fingerprint, location, clock and weather give the same prompt.
 * The output contract (bare JSON array, fixed keys) must stay in sync with
 * category-descriptor.parser.ts.
 */

import { REQUESTED_CATEGORY_COUNT } from '../../../config/index.js';
import type { GeoPoint, UserFingerprint } from '../types.js';

export interface CategoryPromptInput {
  fingerprint: UserFingerprint | null;
  location: GeoPoint;
  now: Date;
  weather: string;
}

const RECENT_INTERACTION_WINDOW = 10;

export type TimeOfDay = 'Morning' | 'Afternoon' | 'Evening' | 'Night';

export function timeOfDay(now: Date): TimeOfDay {
  const hour = now.getHours();
  if (hour >= 5 && hour < 12) return 'Morning';
  if (hour >= 12 && hour < 17) return 'Afternoon';
  if (hour >= 17 && hour < 21) return 'Evening';
  return 'Night';
}

export function dayOfWeek(now: Date): string {
  return now.toLocaleDateString('en-US', { weekday: 'long' });
}

export function describeOnboarding(fingerprint: UserFingerprint | null): string {
  if (!fingerprint || fingerprint.onboardingResponses.length === 0) {
    return 'No onboarding preferences available';
  }

  return fingerprint.onboardingResponses
    .map(response => `${response.questionId}: ${response.selectedOptions.join(', ')}`)
    .join('\n');
}

export function describeInteractionPatterns(fingerprint: UserFingerprint | null): string {
  if (!fingerprint || fingerprint.interactionLogs.length === 0) {
    return 'No interaction history available';
  }

  const recentlyLiked = fingerprint.interactionLogs
    .slice(0, RECENT_INTERACTION_WINDOW)
    .filter(log => log.interaction === 'liked')
    .map(log => log.placeName);

  return recentlyLiked.length > 0
    ? `Recently liked: ${recentlyLiked.join(', ')}`
    : 'No recent interaction patterns';
}

// Two examples are enough to pin the shape; more made responses copy them verbatim
const FORMAT_EXAMPLE = `[
  {
    "id": "cozy_italian_hideaways",
    "title": "Cozy Italian Hideaways You'll Love",
    "subtitle": "Intimate pasta spots with that warm, authentic vibe",
    "reasoning": "You love cozy atmospheres and Italian food based on your recent likes",
    "searchQuery": "italian restaurant cozy intimate authentic pasta",
    "category": "restaurants",
    "confidence": 0.95,
    "personalizedEmoji": "🍝",
    "vibeDescription": "Warm, intimate Italian dining with authentic charm"
  },
  {
    "id": "artisanal_coffee_culture",
    "title": "Artisanal Coffee Culture Spots",
    "subtitle": "Third-wave coffee with laptop-friendly vibes",
    "reasoning": "Your morning routine shows you appreciate quality coffee experiences",
    "searchQuery": "specialty coffee third wave artisanal laptop friendly",
    "category": "cafes",
    "confidence": 0.92,
    "personalizedEmoji": "☕",
    "vibeDescription": "Serious coffee craft in welcoming, productive spaces"
  }
]`;

export function buildCategoryPrompt(input: CategoryPromptInput): string {
  const { fingerprint, location, now, weather } = input;
  const when = timeOfDay(now);

  const likes = fingerprint && fingerprint.likes.length > 0
    ? fingerprint.likes.join(', ')
    : 'general places';
  const dislikes = fingerprint && fingerprint.dislikes.length > 0
    ? fingerprint.dislikes.join(', ')
    : 'none specified';

  return `RESPOND WITH ONLY A VALID JSON ARRAY. NO MARKDOWN, NO CODE FENCES, NO TEXT BEFORE OR AFTER THE ARRAY.

Create exactly ${REQUESTED_CATEGORY_COUNT} highly personalized place categories for this user.

USER DATA:
Location: ${location.lat}, ${location.lng}
Time: ${when} - ${dayOfWeek(now)}
Likes: ${likes}
Dislikes: ${dislikes}
Preferences: ${describeOnboarding(fingerprint)}
Interaction Patterns: ${describeInteractionPatterns(fingerprint)}
Weather: ${weather}

CATEGORY REQUIREMENTS:
- Use very specific, personalized titles (not generic like "restaurants")
- Include vibe descriptors (cozy, trendy, intimate, energetic)
- Reference specific cuisines, atmospheres, or unique features
- Make reasoning personal, addressing the user as "you"
- Vary confidence (0 to 1) by how well the category matches the user
- Include categories that suit the current time and weather
- "searchQuery" is sent to a places search engine as free text
- "category" must be one of: restaurants, cafes, bars, venues, shopping

REQUIRED JSON FORMAT (one object per category, same keys):
${FORMAT_EXAMPLE}

The array must contain ${REQUESTED_CATEGORY_COUNT} objects. Output the array only.`;
}
