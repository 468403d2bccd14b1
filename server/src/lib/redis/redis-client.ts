/**
 * Shared Redis Client Factory
 * One ioredis connection reused by the fingerprint and preference stores.
 */

import { Redis, type Redis as RedisClient } from 'ioredis';
import { logger } from '../logger/structured-logger.js';

let redisClientInstance: RedisClient | null = null;

export interface RedisClientOptions {
  url: string;
  maxRetriesPerRequest?: number;
  connectTimeout?: number;
  commandTimeout?: number;
}

function redactUrl(url: string): string {
  return url.replace(/:[^:@]+@/, ':****@');
}

/**
 * Connect (once) and return the shared client, or null when Redis is unreachable.
 */
export async function getRedisClient(options: RedisClientOptions): Promise<RedisClient | null> {
  if (redisClientInstance) {
    return redisClientInstance;
  }

  const {
    url,
    maxRetriesPerRequest = 2,
    connectTimeout = 2000,
    commandTimeout = 2000
  } = options;

  // rediss:// endpoints (managed Redis) use self-signed certificates
  const useTls = url.startsWith('rediss://');

  const redis = new Redis(url, {
    maxRetriesPerRequest,
    connectTimeout,
    commandTimeout,
    retryStrategy: (times: number) => {
      if (times > maxRetriesPerRequest) return null;
      return Math.min(times * 100, 500);
    },
    lazyConnect: true,
    enableOfflineQueue: false,
    enableReadyCheck: true,
    ...(useTls && { tls: { rejectUnauthorized: false } })
  });

  redis.on('error', (err: Error) => {
    logger.warn({ event: 'redis_error', error: err.message }, '[Redis] Connection error');
  });

  try {
    await redis.connect();
    const pong = await redis.ping();
    if (pong !== 'PONG') {
      throw new Error(`Unexpected PING reply: ${pong}`);
    }
  } catch (error) {
    logger.warn({
      event: 'redis_connection_failed',
      redisUrl: redactUrl(url),
      useTls,
      error: error instanceof Error ? error.message : String(error)
    }, '[Redis] Failed to connect, using in-memory stores');
    redis.disconnect();
    return null;
  }

  logger.info({ event: 'redis_connected', redisUrl: redactUrl(url), useTls }, '[Redis] Shared client connected');
  redisClientInstance = redis;
  return redis;
}

/**
 * Close the Redis connection (for graceful shutdown)
 */
export async function closeRedisClient(): Promise<void> {
  if (redisClientInstance) {
    await redisClientInstance.quit();
    logger.info({ event: 'redis_closed' }, '[Redis] Client connection closed');
    redisClientInstance = null;
  }
}
