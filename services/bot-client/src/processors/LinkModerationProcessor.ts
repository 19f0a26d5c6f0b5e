/**
 * Link Moderation Processor
 *
 * Last processor in the chain: hands the message to the moderation engine.
 */

import { createLogger } from '@repost-guard/common-types';
import type { InboundMessage } from '../types/messages.js';
import type { ModerationEngine } from '../services/ModerationEngine.js';
import type { IMessageProcessor } from './IMessageProcessor.js';

const logger = createLogger('LinkModerationProcessor');

export class LinkModerationProcessor implements IMessageProcessor {
  constructor(private readonly engine: ModerationEngine) {}

  async process(message: InboundMessage): Promise<boolean> {
    const outcome = await this.engine.handle(message);

    logger.debug(
      { chatId: message.chatId, messageId: message.messageId, outcome: outcome.kind },
      '[LinkModerationProcessor] Message moderated'
    );

    return true;
  }
}
