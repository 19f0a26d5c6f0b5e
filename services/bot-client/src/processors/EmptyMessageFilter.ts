/**
 * Empty Message Filter
 *
 * Filters out messages with neither text nor caption (stickers, bare media,
 * service messages). Nothing in them can carry a link or a vote.
 */

import { createLogger } from '@repost-guard/common-types';
import type { InboundMessage } from '../types/messages.js';
import type { IMessageProcessor } from './IMessageProcessor.js';

const logger = createLogger('EmptyMessageFilter');

export class EmptyMessageFilter implements IMessageProcessor {
  process(message: InboundMessage): Promise<boolean> {
    const body = message.text ?? message.caption ?? '';

    if (body.trim().length === 0) {
      logger.debug({ messageId: message.messageId }, '[EmptyMessageFilter] Ignoring empty message');
      return Promise.resolve(true); // Stop processing
    }

    return Promise.resolve(false); // Continue to next processor
  }
}
