/**
 * Callback Query Handler
 *
 * Handles presses of the like button attached under new links. The button
 * data names the message whose links the vote applies to; that message is
 * read back through the transport and every link on it gets the vote.
 */

import { createLogger } from '@repost-guard/common-types';
import type { ChatTransport } from '../types/transport.js';
import type { InlineControlEvent } from '../types/messages.js';
import { voterFromUser } from '../types/links.js';
import type { ReactionAggregator } from '../services/ReactionAggregator.js';
import { ReactionCustomIds, getCommandFromCustomId } from '../utils/customIds.js';
import { extractLinks } from '../utils/linkExtractor.js';
import { CALLBACK_TEXTS } from '../utils/messageTemplates.js';

const logger = createLogger('CallbackQueryHandler');

export class CallbackQueryHandler {
  constructor(
    private readonly transport: ChatTransport,
    private readonly reactions: ReactionAggregator | null
  ) {}

  async handle(event: InlineControlEvent): Promise<void> {
    let answer: string;
    try {
      answer = await this.vote(event);
    } catch (error) {
      logger.error(
        { err: error, chatId: event.chatId, data: event.data },
        '[CallbackQueryHandler] Failed to record vote'
      );
      answer = CALLBACK_TEXTS.failed;
    }

    try {
      await this.transport.answerCallback(event.callbackId, answer);
    } catch (error) {
      logger.warn(
        { err: error, callbackId: event.callbackId },
        '[CallbackQueryHandler] Failed to answer callback query'
      );
    }
  }

  /**
   * Record the vote and return the text to answer the press with
   */
  private async vote(event: InlineControlEvent): Promise<string> {
    const parsed = ReactionCustomIds.parse(event.data);
    if (parsed === null) {
      logger.warn(
        { data: event.data, command: getCommandFromCustomId(event.data) },
        '[CallbackQueryHandler] Unknown callback data'
      );
      return CALLBACK_TEXTS.unknown;
    }

    if (this.reactions === null) {
      return CALLBACK_TEXTS.degraded;
    }

    const message = await this.transport.getMessage(event.chatId, parsed.messageId);
    if (message === null) {
      logger.info(
        { chatId: event.chatId, messageId: parsed.messageId },
        '[CallbackQueryHandler] Voted message is no longer known'
      );
      return CALLBACK_TEXTS.messageUnavailable;
    }

    const links = extractLinks(message);
    if (links.length === 0) {
      return CALLBACK_TEXTS.noLinks;
    }

    const recorded = await this.reactions.reactToAll(
      event.chatId,
      links,
      parsed.kind,
      voterFromUser(event.from)
    );
    return recorded ? CALLBACK_TEXTS.voteCounted : CALLBACK_TEXTS.notTracked;
  }
}
