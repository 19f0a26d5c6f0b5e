/**
 * grammY wiring
 *
 * Translates Telegram updates into the bot's own message and control types
 * and hands them to the handlers. Updates of one chat are processed in order
 * (sequentialize), different chats in parallel under the runner.
 */

import { Bot, type Context } from 'grammy';
import { sequentialize } from '@grammyjs/runner';
import { apiThrottler } from '@grammyjs/transformer-throttler';
import { createLogger } from '@repost-guard/common-types';
import type { MessageHandler } from './handlers/MessageHandler.js';
import { COMMAND_NAMES, type CommandHandler } from './handlers/CommandHandler.js';
import type { CallbackQueryHandler } from './handlers/CallbackQueryHandler.js';
import type { RecentMessageCache } from './services/RecentMessageCache.js';
import { repliedMessageOf, toControlEvent, toInboundMessage } from './utils/telegramMessage.js';

const logger = createLogger('Bot');

export interface BotHandlers {
  messageHandler: MessageHandler;
  commandHandler: CommandHandler;
  callbackHandler: CallbackQueryHandler;
  recentMessages: RecentMessageCache;
}

/**
 * Key updates by chat so one chat's updates never overlap
 */
export function chatSequenceKey(ctx: Context): string | undefined {
  return ctx.chat?.id.toString();
}

/**
 * Create the bot with outgoing API calls throttled to Telegram's limits
 */
export function createBot(token: string): Bot {
  const bot = new Bot(token);
  bot.api.config.use(apiThrottler());
  return bot;
}

/**
 * Register update handlers on the bot
 */
export function registerHandlers(bot: Bot, handlers: BotHandlers): void {
  const { messageHandler, commandHandler, callbackHandler, recentMessages } = handlers;

  bot.use(sequentialize(chatSequenceKey));

  for (const name of COMMAND_NAMES) {
    bot.command(name, async ctx => {
      await commandHandler.handleCommand(name, toInboundMessage(ctx.msg));
    });
  }

  bot.on(['message:text', 'message:caption'], async ctx => {
    await messageHandler.handleMessage(toInboundMessage(ctx.message));
  });

  bot.on('callback_query:data', async ctx => {
    // The prompt replies to the link message; seed the cache so the vote can read it
    const replied = repliedMessageOf(ctx.callbackQuery);
    if (replied !== null) {
      recentMessages.remember(replied);
    }

    const event = toControlEvent(ctx.callbackQuery);
    if (event === null) {
      await ctx.answerCallbackQuery();
      return;
    }
    await callbackHandler.handle(event);
  });

  bot.catch(error => {
    logger.error(
      { err: error.error, updateId: error.ctx.update.update_id },
      '[Bot] Unhandled error while processing update'
    );
  });
}
