/**
 * In-Memory Fingerprint Store
 * Single-process storage; updates apply synchronously, so each one is atomic.
 */

import { logger } from '../../../lib/logger/structured-logger.js';
import { createEmptyFingerprint, type OnboardingResponse, type UserFingerprint } from '../types.js';
import type { FingerprintStore, FingerprintUpdate } from './fingerprint-store.interface.js';
import { applyFingerprintUpdate } from './fingerprint-update.js';

export class InMemoryFingerprintStore implements FingerprintStore {
  private fingerprints = new Map<string, UserFingerprint>();

  constructor() {
    logger.info({ msg: '[InMemoryFingerprintStore] Initialized' });
  }

  async get(userId: string): Promise<UserFingerprint | null> {
    const fingerprint = this.fingerprints.get(userId);
    return fingerprint ? structuredClone(fingerprint) : null;
  }

  async applyUpdate(userId: string, update: FingerprintUpdate): Promise<void> {
    const current = this.fingerprints.get(userId) ?? createEmptyFingerprint(userId);
    this.fingerprints.set(userId, applyFingerprintUpdate(current, update));
  }

  async saveOnboarding(userId: string, responses: OnboardingResponse[]): Promise<void> {
    const current = this.fingerprints.get(userId) ?? createEmptyFingerprint(userId);
    this.fingerprints.set(userId, { ...current, onboardingResponses: structuredClone(responses) });
  }

  /** Seed or overwrite a fingerprint wholesale. */
  put(fingerprint: UserFingerprint): void {
    this.fingerprints.set(fingerprint.userId, structuredClone(fingerprint));
  }
}
