/**
 * Fingerprint Store Interface - Storage Abstraction
 * Allows switching between InMemory and Redis implementations
 */

import type { BehaviorCounters, InteractionLogEntry, OnboardingResponse, UserFingerprint } from '../types.js';

/**
 * One interaction's worth of incremental changes.
 * Stores apply it as a unit: either every field lands or none does.
 */
export interface FingerprintUpdate {
  addLike?: string;
  removeLike?: string;
  addDislike?: string;
  removeDislike?: string;
  likeCountDelta: number;
  dislikeCountDelta: number;
  tagDeltas: Record<string, number>;
  behaviorDeltas: BehaviorCounters;
  log: InteractionLogEntry;
  /** ISO-8601; becomes lastInteractionTime */
  timestamp: string;
}

export interface FingerprintStore {
  /**
   * Current fingerprint, or null when the user has none yet
   */
  get(userId: string): Promise<UserFingerprint | null>;

  /**
   * Apply an interaction update atomically, creating the fingerprint if needed
   */
  applyUpdate(userId: string, update: FingerprintUpdate): Promise<void>;

  /**
   * Replace the user's onboarding answers
   */
  saveOnboarding(userId: string, responses: OnboardingResponse[]): Promise<void>;
}
