/**
 * Moderation Engine
 *
 * Per-message state machine: Received → Extracted → NoLinks | DuplicateFound | AllNew.
 *
 * - NoLinks: a reply whose text is a vote word records a reaction on the
 *   replied message's links.
 * - DuplicateFound: the first extracted URL that is already stored wins. The
 *   repost is deleted and a warning pointing at the original is posted, then
 *   removed after a delay.
 * - AllNew: every URL is stored with this message as origin, the sweep counter
 *   advances, and in groups a like button is offered.
 *
 * Without storage the engine only extracts links; nothing is checked or stored.
 */

import { createLogger } from '@repost-guard/common-types';
import type { ChatTransport } from '../types/transport.js';
import type { InboundMessage } from '../types/messages.js';
import { createLinkRecord, voterFromUser, type ReactionKind } from '../types/links.js';
import type { LinkStore } from './LinkStore.js';
import type { RetentionSweeper, SweepResult } from './RetentionSweeper.js';
import type { ReactionAggregator } from './ReactionAggregator.js';
import type { MessageCleanupScheduler } from './MessageCleanupScheduler.js';
import { extractLinks } from '../utils/linkExtractor.js';
import { parseReactionIntent } from '../utils/reactionIntent.js';
import { buildMessageLink } from '../utils/messageLinks.js';
import { ReactionCustomIds } from '../utils/customIds.js';
import {
  LIKE_BUTTON_LABEL,
  LIKE_PROMPT,
  PERMISSION_WARNING,
  VOTE_CONFIRMED,
  formatDuplicateWarning,
} from '../utils/messageTemplates.js';

const logger = createLogger('ModerationEngine');

/**
 * Persistent collaborators; null when the bot runs without storage
 */
export interface ModerationStorage {
  linkStore: LinkStore;
  sweeper: RetentionSweeper;
  reactions: ReactionAggregator;
}

export interface ModerationSettings {
  warningDeleteDelayMs: number;
  reactionConfirmDeleteDelayMs: number;
  /** Offer a like button under new links in group chats */
  solicitReactions: boolean;
}

export type ModerationOutcome =
  | { kind: 'no_links' }
  | { kind: 'reaction'; reaction: ReactionKind; recorded: boolean }
  | { kind: 'stateless'; links: string[] }
  | { kind: 'duplicate'; url: string; originMessageId: number; warningMessageId: number }
  | { kind: 'duplicate_undeletable'; url: string; reason: 'permission_denied' | 'not_found' }
  | { kind: 'stored'; links: string[]; sweep: SweepResult | null };

export class ModerationEngine {
  constructor(
    private transport: ChatTransport,
    private storage: ModerationStorage | null,
    private cleanup: MessageCleanupScheduler,
    private settings: ModerationSettings,
    private now: () => number = Date.now
  ) {}

  async handle(message: InboundMessage): Promise<ModerationOutcome> {
    const links = extractLinks(message);

    if (links.length === 0) {
      return this.handleNoLinks(message);
    }

    if (this.storage === null) {
      logger.debug(
        { chatId: message.chatId, links: links.length },
        '[ModerationEngine] No storage, skipping duplicate check'
      );
      return { kind: 'stateless', links };
    }

    for (const url of links) {
      const existing = await this.storage.linkStore.get(message.chatId, url);
      if (existing !== null) {
        return this.handleDuplicate(message, url, existing.originMessageId);
      }
    }

    return this.handleAllNew(message, links, this.storage);
  }

  private async handleNoLinks(message: InboundMessage): Promise<ModerationOutcome> {
    const reaction = parseReactionIntent(message.text);
    if (reaction === null || message.replyTo === undefined || message.sender === undefined) {
      return { kind: 'no_links' };
    }

    if (this.storage === null) {
      logger.debug({ chatId: message.chatId }, '[ModerationEngine] No storage, ignoring vote');
      return { kind: 'no_links' };
    }

    const repliedLinks = extractLinks(message.replyTo);
    if (repliedLinks.length === 0) {
      return { kind: 'reaction', reaction, recorded: false };
    }

    const recorded = await this.storage.reactions.reactToAll(
      message.chatId,
      repliedLinks,
      reaction,
      voterFromUser(message.sender)
    );

    if (recorded) {
      const confirmationId = await this.transport.reply(
        message.chatId,
        message.messageId,
        VOTE_CONFIRMED
      );
      const delayMs = this.settings.reactionConfirmDeleteDelayMs;
      this.cleanup.schedule(message.chatId, confirmationId, delayMs);
      this.cleanup.schedule(message.chatId, message.messageId, delayMs);
    }

    return { kind: 'reaction', reaction, recorded };
  }

  private async handleDuplicate(
    message: InboundMessage,
    url: string,
    originMessageId: number
  ): Promise<ModerationOutcome> {
    const { chatId, messageId } = message;
    const result = await this.transport.deleteMessage(chatId, messageId);

    if (result === 'permission_denied') {
      logger.warn({ chatId, messageId }, '[ModerationEngine] No rights to delete duplicate');
      await this.transport.reply(chatId, messageId, PERMISSION_WARNING);
      return { kind: 'duplicate_undeletable', url, reason: result };
    }

    if (result === 'not_found') {
      logger.info({ chatId, messageId }, '[ModerationEngine] Duplicate was already deleted');
      return { kind: 'duplicate_undeletable', url, reason: result };
    }

    const originLink = buildMessageLink(chatId, originMessageId, message.chatUsername);
    const warningMessageId = await this.transport.sendMessage(
      chatId,
      formatDuplicateWarning(url, originLink),
      { linkPreviewDisabled: true }
    );
    this.cleanup.schedule(chatId, warningMessageId, this.settings.warningDeleteDelayMs);

    logger.info(
      { chatId, messageId, originMessageId, url },
      '[ModerationEngine] Removed duplicate link'
    );
    return { kind: 'duplicate', url, originMessageId, warningMessageId };
  }

  private async handleAllNew(
    message: InboundMessage,
    links: string[],
    storage: ModerationStorage
  ): Promise<ModerationOutcome> {
    const { chatId, messageId } = message;
    const now = this.now();

    for (const url of links) {
      await storage.linkStore.put(chatId, url, createLinkRecord(url, messageId, now));
    }
    logger.info({ chatId, messageId, links: links.length }, '[ModerationEngine] Stored links');

    const sweep = await storage.sweeper.maybeSweep(chatId);

    if (this.settings.solicitReactions && message.chatType !== 'private') {
      await this.transport.reply(chatId, messageId, LIKE_PROMPT, {
        inlineControls: [
          { label: LIKE_BUTTON_LABEL, data: ReactionCustomIds.vote('like', messageId) },
        ],
      });
    }

    return { kind: 'stored', links, sweep };
  }
}
