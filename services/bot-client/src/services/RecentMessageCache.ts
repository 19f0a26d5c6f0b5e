/**
 * Recent Message Cache
 *
 * The Bot API cannot fetch a message by id, so messages the bot has seen are
 * kept here for a while. Inline-control callbacks read the links of the
 * message they refer to from this cache.
 */

import { LRUCache } from 'lru-cache';
import { MESSAGE_CACHE } from '@repost-guard/common-types';
import type { InboundMessage } from '../types/messages.js';

interface RecentMessageCacheOptions {
  /** Maximum number of cached messages */
  maxSize?: number;
  /** Entry lifetime in milliseconds */
  ttl?: number;
}

export class RecentMessageCache {
  private cache: LRUCache<string, InboundMessage>;

  constructor(options: RecentMessageCacheOptions = {}) {
    this.cache = new LRUCache<string, InboundMessage>({
      max: options.maxSize ?? MESSAGE_CACHE.MAX_SIZE,
      ttl: options.ttl ?? MESSAGE_CACHE.TTL_MS,
      updateAgeOnGet: false, // TTL is from set time, not access time
    });
  }

  private static key(chatId: number, messageId: number): string {
    return `${chatId}:${messageId}`;
  }

  /**
   * Remember a message. The reply chain is not kept; replied messages are
   * remembered on their own.
   */
  remember(message: InboundMessage): void {
    const { replyTo, ...rest } = message;
    this.cache.set(RecentMessageCache.key(message.chatId, message.messageId), rest);
    if (replyTo !== undefined) {
      this.remember(replyTo);
    }
  }

  get(chatId: number, messageId: number): InboundMessage | null {
    return this.cache.get(RecentMessageCache.key(chatId, messageId)) ?? null;
  }
}
