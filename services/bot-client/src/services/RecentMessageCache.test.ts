/**
 * RecentMessageCache Tests
 */

import { describe, it, expect } from 'vitest';
import { RecentMessageCache } from './RecentMessageCache.js';
import { createLinkMessage, createMockInboundMessage } from '../test/mocks/Telegram.mock.js';

describe('RecentMessageCache', () => {
  it('should return a remembered message', () => {
    const cache = new RecentMessageCache();
    const message = createLinkMessage('https://a.com', { messageId: 7 });

    cache.remember(message);

    expect(cache.get(message.chatId, 7)).toEqual(message);
  });

  it('should return null for unknown messages', () => {
    const cache = new RecentMessageCache();

    expect(cache.get(-1001, 7)).toBeNull();
  });

  it('should key by chat as well as message id', () => {
    const cache = new RecentMessageCache();
    cache.remember(createMockInboundMessage({ chatId: -1, messageId: 7 }));

    expect(cache.get(-2, 7)).toBeNull();
  });

  it('should remember the replied message separately and drop the chain', () => {
    const cache = new RecentMessageCache();
    const original = createLinkMessage('https://a.com', { messageId: 1 });
    const reply = createMockInboundMessage({ messageId: 2, text: 'like', replyTo: original });

    cache.remember(reply);

    expect(cache.get(reply.chatId, 1)).toEqual(original);
    expect(cache.get(reply.chatId, 2)?.replyTo).toBeUndefined();
  });

  it('should evict the least recently used entry past its size', () => {
    const cache = new RecentMessageCache({ maxSize: 2 });

    cache.remember(createMockInboundMessage({ messageId: 1 }));
    cache.remember(createMockInboundMessage({ messageId: 2 }));
    cache.remember(createMockInboundMessage({ messageId: 3 }));

    expect(cache.get(-1001234567890, 1)).toBeNull();
    expect(cache.get(-1001234567890, 2)).not.toBeNull();
    expect(cache.get(-1001234567890, 3)).not.toBeNull();
  });
});
