/**
 * ChatTransport
 *
 * The narrow slice of the chat platform the moderation code talks to.
 */

import type { InboundMessage } from './messages.js';

export type DeleteResult = 'deleted' | 'permission_denied' | 'not_found';

export interface InlineControl {
  label: string;
  data: string;
}

export interface SendOptions {
  linkPreviewDisabled?: boolean;
}

export interface ReplyOptions {
  inlineControls?: InlineControl[];
}

export interface ChatTransport {
  /**
   * Delete a message. Missing rights and already-gone messages are reported
   * as results; any other failure throws.
   */
  deleteMessage(chatId: number, messageId: number): Promise<DeleteResult>;

  /** Send an HTML message, returning its id */
  sendMessage(chatId: number, text: string, options?: SendOptions): Promise<number>;

  /** Reply to a message, returning the reply's id */
  reply(chatId: number, toMessageId: number, text: string, options?: ReplyOptions): Promise<number>;

  answerCallback(callbackId: string, text: string): Promise<void>;

  /** Look up a message seen earlier, or null when it is unknown */
  getMessage(chatId: number, messageId: number): Promise<InboundMessage | null>;
}
