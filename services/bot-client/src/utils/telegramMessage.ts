/**
 * Telegram update adapters
 *
 * Convert grammY's Bot API objects into the transport-neutral message model.
 */

import type { CallbackQuery, Chat, Message, MessageEntity, User } from 'grammy/types';
import type { ChatUser, InboundMessage, InlineControlEvent, TextSpan } from '../types/messages.js';

type MessageWithoutReply = Omit<Message, 'reply_to_message'>;

export function toChatUser(user: User): ChatUser {
  return {
    id: user.id,
    isBot: user.is_bot,
    username: user.username,
    firstName: user.first_name,
  };
}

function toTextSpan(entity: MessageEntity): TextSpan {
  switch (entity.type) {
    case 'url':
      return { kind: 'url', offset: entity.offset, length: entity.length };
    case 'text_link':
      return { kind: 'text_link', offset: entity.offset, length: entity.length, url: entity.url };
    default:
      return { kind: 'other', offset: entity.offset, length: entity.length };
  }
}

/**
 * The chat's public @username. A private chat's username is the other user's,
 * and no message link can be built from it.
 */
function publicUsernameOf(chat: Chat): string | undefined {
  return chat.type === 'supergroup' || chat.type === 'channel' ? chat.username : undefined;
}

function convert(message: MessageWithoutReply): InboundMessage {
  const { chat } = message;
  // Entities annotate the text when there is one, the caption otherwise
  const entities = message.text !== undefined ? message.entities : message.caption_entities;

  return {
    chatId: chat.id,
    chatType: chat.type,
    chatUsername: publicUsernameOf(chat),
    messageId: message.message_id,
    sender: message.from !== undefined ? toChatUser(message.from) : undefined,
    senderChatId: message.sender_chat?.id,
    text: message.text,
    caption: message.caption,
    spans: (entities ?? []).map(toTextSpan),
  };
}

export function toInboundMessage(message: Message): InboundMessage {
  const inbound = convert(message);
  if (message.reply_to_message !== undefined) {
    inbound.replyTo = convert(message.reply_to_message);
  }
  return inbound;
}

/**
 * The inline-control press carried by a callback query, or null when the
 * query has no data or no originating message
 */
export function toControlEvent(query: CallbackQuery): InlineControlEvent | null {
  if (query.data === undefined || query.message === undefined) {
    return null;
  }
  return {
    callbackId: query.id,
    data: query.data,
    chatId: query.message.chat.id,
    from: toChatUser(query.from),
    messageId: query.message.message_id,
  };
}

/**
 * The message the pressed prompt was replying to, when Telegram included it
 */
export function repliedMessageOf(query: CallbackQuery): InboundMessage | null {
  const prompt = query.message;
  if (prompt === undefined || !('reply_to_message' in prompt)) {
    return null;
  }
  const replied = prompt.reply_to_message;
  return replied !== undefined ? convert(replied) : null;
}
