/**
 * Recent Message Recorder
 *
 * Remembers every message that passed the filters so a later inline-control
 * callback can re-read its links. Never stops the chain.
 */

import type { InboundMessage } from '../types/messages.js';
import type { RecentMessageCache } from '../services/RecentMessageCache.js';
import type { IMessageProcessor } from './IMessageProcessor.js';

export class RecentMessageRecorder implements IMessageProcessor {
  constructor(private readonly cache: RecentMessageCache) {}

  process(message: InboundMessage): Promise<boolean> {
    this.cache.remember(message);
    return Promise.resolve(false);
  }
}
