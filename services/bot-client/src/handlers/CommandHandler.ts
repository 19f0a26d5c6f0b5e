/**
 * Command Handler
 *
 * Routes the bot's chat commands:
 *
 * - /start (private chats) and /help: what the bot does
 * - /status: links stored for the chat, retention window, backend
 * - /stats: votes per link
 *
 * Without storage /status and /stats answer with a degraded-mode notice.
 */

import { createLogger, type RetentionBasis } from '@repost-guard/common-types';
import type { ChatTransport } from '../types/transport.js';
import type { InboundMessage } from '../types/messages.js';
import type { LinkStore } from '../services/LinkStore.js';
import type { ReactionAggregator } from '../services/ReactionAggregator.js';
import { DEGRADED_NOTICE, formatHelp, formatStatus } from '../utils/messageTemplates.js';
import { splitMessage } from '../utils/messageChunks.js';

const logger = createLogger('CommandHandler');

export const COMMAND_NAMES = ['start', 'help', 'status', 'stats'] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export interface CommandStorage {
  linkStore: LinkStore;
  reactions: ReactionAggregator;
  /** Shown by /status */
  backendName: string;
}

export interface CommandSettings {
  retentionDays: number;
  retentionBasis: RetentionBasis;
}

/**
 * Command Handler - answers chat commands
 */
export class CommandHandler {
  constructor(
    private readonly transport: ChatTransport,
    private readonly storage: CommandStorage | null,
    private readonly settings: CommandSettings
  ) {}

  /**
   * Run a command for the message that invoked it. Failures are logged.
   */
  async handleCommand(command: CommandName, message: InboundMessage): Promise<void> {
    try {
      const text = await this.render(command, message);
      if (text === null) {
        return;
      }
      // /stats grows with the chat; long answers go out in several messages
      const chunks = splitMessage(text);
      for (const chunk of chunks) {
        await this.transport.sendMessage(message.chatId, chunk);
      }
      logger.debug(
        { command, chatId: message.chatId, messages: chunks.length },
        '[CommandHandler] Answered command'
      );
    } catch (error) {
      logger.error(
        { err: error, command, chatId: message.chatId },
        '[CommandHandler] Failed to answer command'
      );
    }
  }

  private async render(command: CommandName, message: InboundMessage): Promise<string | null> {
    switch (command) {
      case 'start':
        return message.chatType === 'private' ? formatHelp(this.settings.retentionDays) : null;
      case 'help':
        return formatHelp(this.settings.retentionDays);
      case 'status':
        if (this.storage === null) {
          return DEGRADED_NOTICE;
        }
        return formatStatus({
          linkCount: await this.storage.linkStore.count(message.chatId),
          retentionDays: this.settings.retentionDays,
          retentionBasis: this.settings.retentionBasis,
          backend: this.storage.backendName,
        });
      case 'stats':
        if (this.storage === null) {
          return DEGRADED_NOTICE;
        }
        return this.storage.reactions.summarize(message.chatId);
    }
  }
}
