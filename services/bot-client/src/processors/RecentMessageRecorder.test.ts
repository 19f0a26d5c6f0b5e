import { describe, it, expect } from 'vitest';
import { RecentMessageRecorder } from './RecentMessageRecorder.js';
import { RecentMessageCache } from '../services/RecentMessageCache.js';
import { createLinkMessage } from '../test/mocks/Telegram.mock.js';

describe('RecentMessageRecorder', () => {
  it('should remember the message and continue the chain', async () => {
    const cache = new RecentMessageCache();
    const recorder = new RecentMessageRecorder(cache);
    const message = createLinkMessage('https://a.com', { messageId: 12 });

    await expect(recorder.process(message)).resolves.toBe(false);
    expect(cache.get(message.chatId, 12)).toEqual(message);
  });
});
