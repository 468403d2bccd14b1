/**
 * Redis-backed Fingerprint Store
 *
 * Key layout per user (prefix `fingerprint:{userId}`):
 *   :meta        hash    likeCount, dislikeCount, behavior.*, lastInteractionTime
 *   :likes       zset    place names scored by first-like time (dedup + order)
 *   :dislikes    zset    same, for dislikes
 *   :tags        hash    tag -> affinity
 *   :logs        list    JSON log entries, newest first, capped
 *   :onboarding  string  JSON onboarding responses
 *
 * Every update is one MULTI/EXEC block, so a reader never sees half an interaction.
 */

import { z } from 'zod';
import { logger } from '../../../lib/logger/structured-logger.js';
import type { RedisCommand, RedisCommandRunner } from '../../../lib/redis/redis-command-runner.js';
import { toStringArray, toStringRecord } from '../../../lib/redis/redis-command-runner.js';
import { INTERACTION_LOG_LIMIT } from '../../../config/index.js';
import {
  PLACE_CATEGORIES,
  PLACE_INTERACTIONS,
  PRICE_RANGES,
  type InteractionLogEntry,
  type OnboardingResponse,
  type UserFingerprint
} from '../types.js';
import type { FingerprintStore, FingerprintUpdate } from './fingerprint-store.interface.js';

const KEY_PREFIX = 'fingerprint:';

const logEntrySchema = z.object({
  placeId: z.string(),
  placeName: z.string(),
  category: z.enum(PLACE_CATEGORIES),
  interaction: z.enum(PLACE_INTERACTIONS),
  timestamp: z.string(),
  location: z.object({ latitude: z.number(), longitude: z.number() }),
  rating: z.number(),
  priceRange: z.enum(PRICE_RANGES)
});

const onboardingSchema = z.array(z.object({
  questionId: z.string(),
  selectedOptions: z.array(z.string())
}));

function toInt(value: string | undefined): number {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

function parseLogEntry(raw: string): InteractionLogEntry | null {
  try {
    const parsed = logEntrySchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

function parseOnboarding(raw: unknown): OnboardingResponse[] {
  if (typeof raw !== 'string') return [];
  try {
    const parsed = onboardingSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : [];
  } catch {
    return [];
  }
}

export class RedisFingerprintStore implements FingerprintStore {
  constructor(private readonly runner: RedisCommandRunner) {
    logger.info({ msg: '[RedisFingerprintStore] Initialized with shared Redis client' });
  }

  private key(userId: string, part: 'meta' | 'likes' | 'dislikes' | 'tags' | 'logs' | 'onboarding'): string {
    return `${KEY_PREFIX}${userId}:${part}`;
  }

  async get(userId: string): Promise<UserFingerprint | null> {
    const [metaReply, likesReply, dislikesReply, tagsReply, logsReply, onboardingReply] = await this.runner.transaction([
      ['HGETALL', this.key(userId, 'meta')],
      ['ZRANGE', this.key(userId, 'likes'), 0, -1],
      ['ZRANGE', this.key(userId, 'dislikes'), 0, -1],
      ['HGETALL', this.key(userId, 'tags')],
      ['LRANGE', this.key(userId, 'logs'), 0, INTERACTION_LOG_LIMIT - 1],
      ['GET', this.key(userId, 'onboarding')]
    ]);

    const meta = toStringRecord(metaReply);
    const onboardingResponses = parseOnboarding(onboardingReply);

    if (Object.keys(meta).length === 0 && onboardingResponses.length === 0) {
      return null;
    }

    const tagAffinities: Record<string, number> = {};
    for (const [tag, value] of Object.entries(toStringRecord(tagsReply))) {
      tagAffinities[tag] = toInt(value);
    }

    const interactionLogs: InteractionLogEntry[] = [];
    for (const raw of toStringArray(logsReply)) {
      const entry = parseLogEntry(raw);
      if (entry) {
        interactionLogs.push(entry);
      } else {
        logger.warn({ userId, event: 'fingerprint_log_entry_invalid' }, '[RedisFingerprintStore] Skipping unreadable log entry');
      }
    }

    return {
      userId,
      likes: toStringArray(likesReply),
      dislikes: toStringArray(dislikesReply),
      likeCount: toInt(meta.likeCount),
      dislikeCount: toInt(meta.dislikeCount),
      tagAffinities,
      interactionLogs,
      onboardingResponses,
      behavior: {
        totalPlaceViews: toInt(meta['behavior.totalPlaceViews']),
        totalThumbsUp: toInt(meta['behavior.totalThumbsUp']),
        totalThumbsDown: toInt(meta['behavior.totalThumbsDown'])
      },
      lastInteractionTime: meta.lastInteractionTime
    };
  }

  async applyUpdate(userId: string, update: FingerprintUpdate): Promise<void> {
    const meta = this.key(userId, 'meta');
    const likes = this.key(userId, 'likes');
    const dislikes = this.key(userId, 'dislikes');
    const tags = this.key(userId, 'tags');
    const logs = this.key(userId, 'logs');
    const score = Date.parse(update.timestamp);

    const commands: RedisCommand[] = [];

    if (update.addLike !== undefined) commands.push(['ZADD', likes, 'NX', score, update.addLike]);
    if (update.removeLike !== undefined) commands.push(['ZREM', likes, update.removeLike]);
    if (update.addDislike !== undefined) commands.push(['ZADD', dislikes, 'NX', score, update.addDislike]);
    if (update.removeDislike !== undefined) commands.push(['ZREM', dislikes, update.removeDislike]);

    commands.push(
      ['HINCRBY', meta, 'likeCount', update.likeCountDelta],
      ['HINCRBY', meta, 'dislikeCount', update.dislikeCountDelta],
      ['HINCRBY', meta, 'behavior.totalPlaceViews', update.behaviorDeltas.totalPlaceViews],
      ['HINCRBY', meta, 'behavior.totalThumbsUp', update.behaviorDeltas.totalThumbsUp],
      ['HINCRBY', meta, 'behavior.totalThumbsDown', update.behaviorDeltas.totalThumbsDown],
      ['HSET', meta, 'lastInteractionTime', update.timestamp]
    );

    for (const [tag, delta] of Object.entries(update.tagDeltas)) {
      commands.push(['HINCRBY', tags, tag, delta]);
    }

    commands.push(
      ['LPUSH', logs, JSON.stringify(update.log)],
      ['LTRIM', logs, 0, INTERACTION_LOG_LIMIT - 1]
    );

    await this.runner.transaction(commands);

    logger.debug({
      userId,
      event: 'fingerprint_update_applied',
      interaction: update.log.interaction,
      commands: commands.length
    }, '[RedisFingerprintStore] Update applied');
  }

  async saveOnboarding(userId: string, responses: OnboardingResponse[]): Promise<void> {
    await this.runner.transaction([
      ['SET', this.key(userId, 'onboarding'), JSON.stringify(responses)]
    ]);
  }
}
