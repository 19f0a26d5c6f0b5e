/**
 * Link Moderation Processor Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { LinkModerationProcessor } from './LinkModerationProcessor.js';
import type { ModerationEngine } from '../services/ModerationEngine.js';
import { createLinkMessage } from '../test/mocks/Telegram.mock.js';

describe('LinkModerationProcessor', () => {
  it('should hand the message to the engine and stop the chain', async () => {
    const mockEngine = {
      handle: vi.fn().mockResolvedValue({ kind: 'stored', links: ['https://a.com'], sweep: null }),
    };
    const processor = new LinkModerationProcessor(mockEngine as unknown as ModerationEngine);
    const message = createLinkMessage('https://a.com');

    await expect(processor.process(message)).resolves.toBe(true);
    expect(mockEngine.handle).toHaveBeenCalledWith(message);
  });

  it('should let engine failures reach the message handler', async () => {
    const mockEngine = { handle: vi.fn().mockRejectedValue(new Error('Connection lost')) };
    const processor = new LinkModerationProcessor(mockEngine as unknown as ModerationEngine);

    await expect(processor.process(createLinkMessage('https://a.com'))).rejects.toThrow(
      'Connection lost'
    );
  });
});
