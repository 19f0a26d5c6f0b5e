/**
 * Redis connection for the bot
 *
 * Persistence is optional: without REDIS_URL, or when the first connection
 * attempt fails, the bot runs in degraded mode (links are not checked or
 * stored) instead of refusing to start.
 */

import { Redis } from 'ioredis';
import { createLogger, createRedisOptions, parseRedisUrl } from '@repost-guard/common-types';
import { RedisKeyValueStore } from './storage/RedisKeyValueStore.js';

const logger = createLogger('Redis');

/**
 * Connect to Redis and wrap the connection in a KeyValueStore
 *
 * @param url REDIS_URL, or undefined when not configured
 * @returns The store, or null for degraded mode
 */
export async function createRedisStore(url: string | undefined): Promise<RedisKeyValueStore | null> {
  if (url === undefined) {
    logger.warn({}, '[Redis] REDIS_URL not set - running without storage (degraded mode)');
    return null;
  }

  const options = createRedisOptions(parseRedisUrl(url));
  logger.info(
    {
      host: options.host,
      port: options.port,
      hasPassword: options.password !== undefined,
      connectTimeout: options.connectTimeout,
      commandTimeout: options.commandTimeout,
    },
    '[Redis] Redis config:'
  );

  const redis = new Redis(options);

  redis.on('error', (error: unknown) => {
    logger.error({ err: error }, '[Redis] Redis client error');
  });

  redis.on('ready', () => {
    logger.info('[Redis] Redis client ready');
  });

  try {
    await redis.connect();
    await redis.ping();
  } catch (error) {
    logger.warn(
      { err: error },
      '[Redis] Could not reach Redis - running without storage (degraded mode)'
    );
    redis.disconnect();
    return null;
  }

  return new RedisKeyValueStore(redis);
}
