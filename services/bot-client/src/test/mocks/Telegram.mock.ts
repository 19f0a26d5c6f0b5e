/**
 * Chat model mock factories
 *
 * Sensible defaults plus Partial<T> overrides. IDs are fixed; pass explicit
 * ones when a test needs to tell messages apart.
 */

import type { ChatUser, InboundMessage, InlineControlEvent } from '../../types/messages.js';

export const TEST_CHAT_ID = -1001234567890;
export const TEST_USER_ID = 4242;

export function createMockUser(overrides: Partial<ChatUser> = {}): ChatUser {
  return {
    id: TEST_USER_ID,
    isBot: false,
    username: 'alice',
    firstName: 'Alice',
    ...overrides,
  };
}

export function createMockInboundMessage(overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    chatId: TEST_CHAT_ID,
    chatType: 'supergroup',
    messageId: 100,
    sender: createMockUser(),
    text: 'hello',
    spans: [],
    ...overrides,
  };
}

/**
 * A message whose text is exactly one URL, annotated as such
 */
export function createLinkMessage(
  url: string,
  overrides: Partial<InboundMessage> = {}
): InboundMessage {
  return createMockInboundMessage({
    text: url,
    spans: [{ kind: 'url', offset: 0, length: url.length }],
    ...overrides,
  });
}

export function createMockControlEvent(
  overrides: Partial<InlineControlEvent> = {}
): InlineControlEvent {
  return {
    callbackId: 'cb-1',
    data: 'like::100',
    chatId: TEST_CHAT_ID,
    from: createMockUser(),
    messageId: 101,
    ...overrides,
  };
}
