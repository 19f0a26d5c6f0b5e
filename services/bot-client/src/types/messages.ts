/**
 * Inbound message model
 *
 * Transport-neutral view of a chat message. The Telegram adapter builds these
 * from grammY updates; everything past the adapter only sees this shape.
 */

export type ChatType = 'private' | 'group' | 'supergroup' | 'channel';

export interface ChatUser {
  id: number;
  isBot: boolean;
  username?: string;
  firstName?: string;
}

/**
 * Rich-text annotation over a range of the message text.
 * Offsets and lengths are UTF-16 code units.
 */
export type TextSpan =
  | { kind: 'url'; offset: number; length: number }
  | { kind: 'text_link'; offset: number; length: number; url: string }
  | { kind: 'other'; offset: number; length: number };

export interface InboundMessage {
  chatId: number;
  chatType: ChatType;
  /** Public @username of the chat, when it has one */
  chatUsername?: string;
  messageId: number;
  /** Absent for channel posts */
  sender?: ChatUser;
  /** Set when the message was sent on behalf of a chat (anonymous admin, linked channel) */
  senderChatId?: number;
  text?: string;
  caption?: string;
  /** Annotations over `text`, or over `caption` when there is no text */
  spans: TextSpan[];
  replyTo?: InboundMessage;
}

/**
 * A press of an inline control (button) attached to one of the bot's messages
 */
export interface InlineControlEvent {
  callbackId: string;
  data: string;
  chatId: number;
  from: ChatUser;
  /** The bot message carrying the control */
  messageId: number;
}
