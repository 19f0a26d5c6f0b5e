/**
 * RedisKeyValueStore
 * KeyValueStore over an ioredis connection. Command failures propagate.
 */

import type { Redis } from 'ioredis';
import { createLogger } from '@repost-guard/common-types';
import type { KeyValueStore } from './KeyValueStore.js';

const logger = createLogger('RedisKeyValueStore');

export class RedisKeyValueStore implements KeyValueStore {
  constructor(private redis: Redis) {}

  async getField(key: string, field: string): Promise<string | null> {
    return this.redis.hget(key, field);
  }

  async setField(key: string, field: string, value: string): Promise<void> {
    await this.redis.hset(key, field, value);
  }

  async deleteFields(key: string, fields: readonly string[]): Promise<number> {
    if (fields.length === 0) {
      return 0;
    }
    return this.redis.hdel(key, ...fields);
  }

  async getAllFields(key: string): Promise<Record<string, string>> {
    return this.redis.hgetall(key);
  }

  async countFields(key: string): Promise<number> {
    return this.redis.hlen(key);
  }

  async increment(key: string): Promise<number> {
    return this.redis.incr(key);
  }

  async set(key: string, value: string): Promise<void> {
    await this.redis.set(key, value);
  }

  /**
   * Health check
   */
  async ping(): Promise<boolean> {
    try {
      const reply = await this.redis.ping();
      return reply === 'PONG';
    } catch (error) {
      logger.error({ err: error }, '[RedisKeyValueStore] Health check failed');
      return false;
    }
  }

  /**
   * Graceful shutdown
   */
  async close(): Promise<void> {
    logger.info('[RedisKeyValueStore] Closing Redis connection...');
    await this.redis.quit();
    logger.info('[RedisKeyValueStore] Redis connection closed');
  }
}
