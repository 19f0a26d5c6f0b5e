/**
 * Sender Filter
 *
 * Filters out messages without a human sender: bot accounts (the bot itself
 * included), channel posts, and messages sent on behalf of a chat.
 * First processor in the chain.
 */

import { createLogger } from '@repost-guard/common-types';
import type { InboundMessage } from '../types/messages.js';
import type { IMessageProcessor } from './IMessageProcessor.js';

const logger = createLogger('SenderFilter');

export class SenderFilter implements IMessageProcessor {
  process(message: InboundMessage): Promise<boolean> {
    if (message.sender === undefined || message.senderChatId !== undefined) {
      logger.debug(
        { chatId: message.chatId, senderChatId: message.senderChatId },
        '[SenderFilter] Ignoring message sent on behalf of a chat'
      );
      return Promise.resolve(true); // Stop processing
    }

    if (message.sender.isBot) {
      logger.debug({ authorId: message.sender.id }, '[SenderFilter] Ignoring bot message');
      return Promise.resolve(true); // Stop processing
    }

    return Promise.resolve(false); // Continue to next processor
  }
}
