/**
 * Personalized Place Scorer
 *
 * score = distanceScore * tagBoost * likeRatioBoost
 *   distanceScore  = 1 / (miles + 0.2)^1.3
 *   tagBoost       = 1 + (sum of the user's affinity for each place tag) / 10
 *   likeRatioBoost = 0.8 + likeRatio * 0.4            (0.8 .. 1.2)
 *
 * Pure and deterministic: ties keep input order (Array.prototype.sort is stable).
 */

import type { GeoPoint, Place, UserFingerprint } from '../types.js';
import { distanceFromUser } from '../geo/distance-calculator.js';

/** Distance used for places without coordinates; ranks them last without dropping them. */
export const MISSING_DISTANCE_MILES = 9999;

/** Like ratio used when there is no fingerprint or no reactions yet. */
export const NEUTRAL_LIKE_RATIO = 0.5;

/**
 * The parts of a fingerprint the scorer reads, captured once per cycle
 * so a concurrent interaction write cannot change scores mid-ranking.
 */
export interface ScoringSnapshot {
  tagAffinities: Readonly<Record<string, number>>;
  likeRatio: number;
}

export interface ScoredPlace {
  place: Place;
  score: number;
}

export function createScoringSnapshot(fingerprint: UserFingerprint | null): ScoringSnapshot {
  if (!fingerprint) {
    return { tagAffinities: {}, likeRatio: NEUTRAL_LIKE_RATIO };
  }

  const likes = fingerprint.likeCount;
  const dislikes = fingerprint.dislikeCount;
  const likeRatio = likes + dislikes > 0
    ? likes / Math.max(1, likes + dislikes)
    : NEUTRAL_LIKE_RATIO;

  return { tagAffinities: { ...fingerprint.tagAffinities }, likeRatio };
}

export function distanceScore(distanceMiles: number): number {
  return 1 / Math.pow(distanceMiles + 0.2, 1.3);
}

export function tagBoost(tags: readonly string[], affinities: Readonly<Record<string, number>>): number {
  let total = 0;
  for (const tag of tags) {
    total += affinities[tag] ?? 0;
  }
  return 1 + total / 10.0;
}

export function likeRatioBoost(likeRatio: number): number {
  return 0.8 + likeRatio * 0.4;
}

export function scorePlace(place: Place, origin: GeoPoint, snapshot: ScoringSnapshot): number {
  const miles = distanceFromUser(place, origin) ?? MISSING_DISTANCE_MILES;
  return distanceScore(miles)
    * tagBoost(place.descriptiveTags, snapshot.tagAffinities)
    * likeRatioBoost(snapshot.likeRatio);
}

/**
 * Score every place once, then sort descending by score.
 */
export function rankPlaces(places: readonly Place[], origin: GeoPoint, snapshot: ScoringSnapshot): ScoredPlace[] {
  return places
    .map(place => ({ place, score: scorePlace(place, origin, snapshot) }))
    .sort((a, b) => b.score - a.score);
}
