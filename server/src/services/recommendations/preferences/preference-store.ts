/**
 * Preference Store
 * Per-user search radius in miles. Unset or non-positive values read as the default.
 */

import { DEFAULT_SEARCH_RADIUS_MILES } from '../../../config/index.js';
import type { RedisCommandRunner } from '../../../lib/redis/redis-command-runner.js';

export interface PreferenceStore {
  getRadiusMiles(userId: string): Promise<number>;
  setRadiusMiles(userId: string, radiusMiles: number): Promise<void>;
}

export function normalizeRadius(value: number | null | undefined): number {
  return value !== null && value !== undefined && Number.isFinite(value) && value > 0
    ? value
    : DEFAULT_SEARCH_RADIUS_MILES;
}

export class InMemoryPreferenceStore implements PreferenceStore {
  private radii = new Map<string, number>();

  async getRadiusMiles(userId: string): Promise<number> {
    return normalizeRadius(this.radii.get(userId));
  }

  async setRadiusMiles(userId: string, radiusMiles: number): Promise<void> {
    this.radii.set(userId, radiusMiles);
  }
}

const KEY_PREFIX = 'preferences:';

export class RedisPreferenceStore implements PreferenceStore {
  constructor(private readonly runner: RedisCommandRunner) { }

  private key(userId: string): string {
    return `${KEY_PREFIX}${userId}:selectedRadius`;
  }

  async getRadiusMiles(userId: string): Promise<number> {
    const [reply] = await this.runner.transaction([['GET', this.key(userId)]]);
    return normalizeRadius(typeof reply === 'string' ? Number.parseFloat(reply) : null);
  }

  async setRadiusMiles(userId: string, radiusMiles: number): Promise<void> {
    await this.runner.transaction([['SET', this.key(userId), radiusMiles]]);
  }
}
