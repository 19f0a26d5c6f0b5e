/**
 * Tests for the grammY wiring
 *
 * Updates are fed through bot.handleUpdate with a fixed botInfo, so no call
 * reaches Telegram.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Bot } from 'grammy';
import type { Update, UserFromGetMe } from 'grammy/types';
import type { MessageHandler } from './handlers/MessageHandler.js';
import type { CommandHandler } from './handlers/CommandHandler.js';
import type { CallbackQueryHandler } from './handlers/CallbackQueryHandler.js';
import { RecentMessageCache } from './services/RecentMessageCache.js';

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

vi.mock('@repost-guard/common-types', async importOriginal => {
  const actual = await importOriginal<typeof import('@repost-guard/common-types')>();
  return {
    ...actual,
    createLogger: () => mockLogger,
  };
});

import { chatSequenceKey, registerHandlers } from './bot.js';

const BOT_INFO = {
  id: 777,
  is_bot: true,
  first_name: 'Repost Guard',
  username: 'repost_guard_bot',
  can_join_groups: true,
  can_read_all_group_messages: true,
  supports_inline_queries: false,
  can_connect_to_business: false,
  has_main_web_app: false,
} as unknown as UserFromGetMe;

const CHAT = { id: -1001234567890, type: 'supergroup', title: 'Links' };
const ALICE = { id: 4242, is_bot: false, first_name: 'Alice', username: 'alice' };

function update(body: Record<string, unknown>): Update {
  return { update_id: 1, ...body } as unknown as Update;
}

describe('bot wiring', () => {
  let bot: Bot;
  let messageHandler: { handleMessage: ReturnType<typeof vi.fn> };
  let commandHandler: { handleCommand: ReturnType<typeof vi.fn> };
  let callbackHandler: { handle: ReturnType<typeof vi.fn> };
  let recentMessages: RecentMessageCache;

  beforeEach(() => {
    vi.clearAllMocks();
    bot = new Bot('test-token', { botInfo: BOT_INFO });
    messageHandler = { handleMessage: vi.fn().mockResolvedValue(undefined) };
    commandHandler = { handleCommand: vi.fn().mockResolvedValue(undefined) };
    callbackHandler = { handle: vi.fn().mockResolvedValue(undefined) };
    recentMessages = new RecentMessageCache();

    registerHandlers(bot, {
      messageHandler: messageHandler as unknown as MessageHandler,
      commandHandler: commandHandler as unknown as CommandHandler,
      callbackHandler: callbackHandler as unknown as CallbackQueryHandler,
      recentMessages,
    });
  });

  it('should pass text messages to the message handler', async () => {
    await bot.handleUpdate(
      update({
        message: {
          message_id: 100,
          date: 0,
          chat: CHAT,
          from: ALICE,
          text: 'see https://example.com',
          entities: [{ type: 'url', offset: 4, length: 19 }],
        },
      })
    );

    expect(messageHandler.handleMessage).toHaveBeenCalledWith({
      chatId: -1001234567890,
      chatType: 'supergroup',
      chatUsername: undefined,
      messageId: 100,
      sender: { id: 4242, isBot: false, username: 'alice', firstName: 'Alice' },
      senderChatId: undefined,
      text: 'see https://example.com',
      caption: undefined,
      spans: [{ kind: 'url', offset: 4, length: 19 }],
    });
  });

  it('should pass captioned media to the message handler', async () => {
    await bot.handleUpdate(
      update({
        message: {
          message_id: 101,
          date: 0,
          chat: CHAT,
          from: ALICE,
          photo: [{ file_id: 'f', file_unique_id: 'u', width: 1, height: 1 }],
          caption: 'https://example.com/pic',
        },
      })
    );

    expect(messageHandler.handleMessage).toHaveBeenCalledWith(
      expect.objectContaining({ messageId: 101, caption: 'https://example.com/pic' })
    );
  });

  it('should route commands to the command handler only', async () => {
    await bot.handleUpdate(
      update({
        message: {
          message_id: 102,
          date: 0,
          chat: CHAT,
          from: ALICE,
          text: '/status@repost_guard_bot',
          entities: [{ type: 'bot_command', offset: 0, length: 24 }],
        },
      })
    );

    expect(commandHandler.handleCommand).toHaveBeenCalledWith(
      'status',
      expect.objectContaining({ messageId: 102, chatId: -1001234567890 })
    );
    expect(messageHandler.handleMessage).not.toHaveBeenCalled();
  });

  it('should pass unknown commands on as ordinary messages', async () => {
    await bot.handleUpdate(
      update({
        message: {
          message_id: 103,
          date: 0,
          chat: CHAT,
          from: ALICE,
          text: '/other',
          entities: [{ type: 'bot_command', offset: 0, length: 6 }],
        },
      })
    );

    expect(commandHandler.handleCommand).not.toHaveBeenCalled();
    expect(messageHandler.handleMessage).toHaveBeenCalledOnce();
  });

  it('should remember the replied message and pass the press on', async () => {
    await bot.handleUpdate(
      update({
        callback_query: {
          id: 'cb-1',
          from: ALICE,
          chat_instance: 'ci',
          data: 'like::100',
          message: {
            message_id: 200,
            date: 0,
            chat: CHAT,
            from: BOT_INFO,
            text: 'Rate this link:',
            reply_to_message: {
              message_id: 100,
              date: 0,
              chat: CHAT,
              from: ALICE,
              text: 'https://example.com',
            },
          },
        },
      })
    );

    expect(recentMessages.get(-1001234567890, 100)).toMatchObject({
      messageId: 100,
      text: 'https://example.com',
    });
    expect(callbackHandler.handle).toHaveBeenCalledWith({
      callbackId: 'cb-1',
      data: 'like::100',
      chatId: -1001234567890,
      from: { id: 4242, isBot: false, username: 'alice', firstName: 'Alice' },
      messageId: 200,
    });
  });

  it('should log errors that escape a handler', async () => {
    const error = new Error('boom');
    messageHandler.handleMessage.mockRejectedValue(error);

    await bot.handleUpdate(
      update({
        update_id: 55,
        message: { message_id: 104, date: 0, chat: CHAT, from: ALICE, text: 'hi' },
      })
    );

    expect(mockLogger.error).toHaveBeenCalledWith(
      { err: error, updateId: 55 },
      '[Bot] Unhandled error while processing update'
    );
  });

  describe('chatSequenceKey', () => {
    it('should key updates by chat id', async () => {
      let key: string | undefined;
      const probe = new Bot('test-token', { botInfo: BOT_INFO });
      probe.on('message', ctx => {
        key = chatSequenceKey(ctx);
      });

      await probe.handleUpdate(
        update({ message: { message_id: 1, date: 0, chat: CHAT, from: ALICE, text: 'x' } })
      );

      expect(key).toBe('-1001234567890');
    });
  });
});
