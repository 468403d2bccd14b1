/**
 * Redis Command Runner
 * Narrow seam over ioredis MULTI/EXEC so stores can be exercised
 * against an in-process fake.
 */

import type { Redis as RedisClient } from 'ioredis';

export type RedisArg = string | number;
export type RedisCommand = [name: string, ...args: RedisArg[]];

export interface RedisCommandRunner {
  /**
   * Run all commands in one MULTI/EXEC block.
   * Resolves to one reply per command, in order; rejects if any command failed.
   */
  transaction(commands: RedisCommand[]): Promise<unknown[]>;
}

export class IoRedisCommandRunner implements RedisCommandRunner {
  constructor(private readonly redis: RedisClient) { }

  async transaction(commands: RedisCommand[]): Promise<unknown[]> {
    const results = await this.redis.multi(commands).exec();
    if (!results) {
      throw new Error('Redis transaction aborted');
    }

    return results.map(([error, reply]) => {
      if (error) throw error;
      return reply;
    });
  }
}

/**
 * HGETALL replies arrive as an object from ioredis and as a flat
 * [field, value, ...] array from raw RESP; accept both.
 */
export function toStringRecord(reply: unknown): Record<string, string> {
  const record: Record<string, string> = {};

  if (Array.isArray(reply)) {
    for (let i = 0; i + 1 < reply.length; i += 2) {
      const field: unknown = reply[i];
      const value: unknown = reply[i + 1];
      if (typeof field === 'string' && typeof value === 'string') {
        record[field] = value;
      }
    }
    return record;
  }

  if (reply && typeof reply === 'object') {
    for (const [field, value] of Object.entries(reply)) {
      if (typeof value === 'string') record[field] = value;
    }
  }

  return record;
}

export function toStringArray(reply: unknown): string[] {
  if (!Array.isArray(reply)) return [];
  return reply.filter((item): item is string => typeof item === 'string');
}
