/**
 * Telegram Transport
 *
 * ChatTransport over grammY's Api. Messages are sent with HTML parse mode.
 * Delete failures the moderation flow reacts to are mapped to results:
 *
 * - 403, or 400 "not enough rights" / "can't be deleted" → permission_denied
 * - 400 "message to delete not found" → not_found
 *
 * Everything else is rethrown.
 */

import { GrammyError, InlineKeyboard, type Api } from 'grammy';
import { createLogger } from '@repost-guard/common-types';
import type {
  ChatTransport,
  DeleteResult,
  InlineControl,
  ReplyOptions,
  SendOptions,
} from '../types/transport.js';
import type { InboundMessage } from '../types/messages.js';
import type { RecentMessageCache } from './RecentMessageCache.js';

const logger = createLogger('TelegramTransport');

const PERMISSION_DESCRIPTIONS = ['not enough rights', "can't be deleted"];
const NOT_FOUND_DESCRIPTIONS = ['message to delete not found', 'message not found'];

/**
 * Classify a deleteMessage failure, or null when it is not one the caller handles
 */
export function classifyDeleteError(error: unknown): Exclude<DeleteResult, 'deleted'> | null {
  if (!(error instanceof GrammyError)) {
    return null;
  }

  const description = error.description.toLowerCase();
  if (error.error_code === 403) {
    return 'permission_denied';
  }
  if (error.error_code === 400) {
    if (PERMISSION_DESCRIPTIONS.some(text => description.includes(text))) {
      return 'permission_denied';
    }
    if (NOT_FOUND_DESCRIPTIONS.some(text => description.includes(text))) {
      return 'not_found';
    }
  }
  return null;
}

function buildKeyboard(controls: readonly InlineControl[]): InlineKeyboard {
  const keyboard = new InlineKeyboard();
  for (const control of controls) {
    keyboard.text(control.label, control.data);
  }
  return keyboard;
}

export class TelegramTransport implements ChatTransport {
  constructor(
    private api: Api,
    private recentMessages: RecentMessageCache
  ) {}

  async deleteMessage(chatId: number, messageId: number): Promise<DeleteResult> {
    try {
      await this.api.deleteMessage(chatId, messageId);
      return 'deleted';
    } catch (error) {
      const result = classifyDeleteError(error);
      if (result === null) {
        throw error;
      }
      logger.debug({ chatId, messageId, result }, '[TelegramTransport] Delete refused');
      return result;
    }
  }

  async sendMessage(chatId: number, text: string, options: SendOptions = {}): Promise<number> {
    const sent = await this.api.sendMessage(chatId, text, {
      parse_mode: 'HTML',
      link_preview_options: { is_disabled: options.linkPreviewDisabled ?? false },
    });
    return sent.message_id;
  }

  async reply(
    chatId: number,
    toMessageId: number,
    text: string,
    options: ReplyOptions = {}
  ): Promise<number> {
    const controls = options.inlineControls ?? [];
    const sent = await this.api.sendMessage(chatId, text, {
      parse_mode: 'HTML',
      reply_parameters: { message_id: toMessageId, allow_sending_without_reply: true },
      reply_markup: controls.length > 0 ? buildKeyboard(controls) : undefined,
    });
    return sent.message_id;
  }

  async answerCallback(callbackId: string, text: string): Promise<void> {
    await this.api.answerCallbackQuery(callbackId, { text });
  }

  getMessage(chatId: number, messageId: number): Promise<InboundMessage | null> {
    return Promise.resolve(this.recentMessages.get(chatId, messageId));
  }
}
