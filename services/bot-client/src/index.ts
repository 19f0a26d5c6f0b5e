import type http from 'node:http';
import { run } from '@grammyjs/runner';
import { createLogger, getConfig, SECOND_MS, type EnvConfig } from '@repost-guard/common-types';
import { createBot, registerHandlers } from './bot.js';
import { createRedisStore } from './redis.js';
import { startHealthServer, validateBotToken } from './startup.js';
import type { KeyValueStore } from './storage/KeyValueStore.js';
import { MessageHandler } from './handlers/MessageHandler.js';
import { CommandHandler, type CommandStorage } from './handlers/CommandHandler.js';
import { CallbackQueryHandler } from './handlers/CallbackQueryHandler.js';
import { LinkStore } from './services/LinkStore.js';
import { RetentionSweeper } from './services/RetentionSweeper.js';
import { ReactionAggregator } from './services/ReactionAggregator.js';
import { MessageCleanupScheduler } from './services/MessageCleanupScheduler.js';
import { ModerationEngine, type ModerationStorage } from './services/ModerationEngine.js';
import { RecentMessageCache } from './services/RecentMessageCache.js';
import { TelegramTransport } from './services/TelegramTransport.js';

// Processors
import { SenderFilter } from './processors/SenderFilter.js';
import { RecentMessageRecorder } from './processors/RecentMessageRecorder.js';
import { EmptyMessageFilter } from './processors/EmptyMessageFilter.js';
import { LinkModerationProcessor } from './processors/LinkModerationProcessor.js';

// Initialize logger
const logger = createLogger('bot-client');

/**
 * Services returned by the composition root
 */
interface Services {
  messageHandler: MessageHandler;
  commandHandler: CommandHandler;
  callbackHandler: CallbackQueryHandler;
  recentMessages: RecentMessageCache;
  cleanup: MessageCleanupScheduler;
}

/**
 * Composition Root
 *
 * This is where all dependencies are instantiated and wired together.
 * Full dependency injection - no service creates its own dependencies.
 * A null store wires the degraded (stateless) variants.
 */
function createServices(
  config: EnvConfig,
  transport: TelegramTransport,
  recentMessages: RecentMessageCache,
  store: KeyValueStore | null
): Services {
  const cleanup = new MessageCleanupScheduler(transport);

  let moderationStorage: ModerationStorage | null = null;
  let commandStorage: CommandStorage | null = null;
  if (store !== null) {
    const linkStore = new LinkStore(store);
    const sweeper = new RetentionSweeper(linkStore, {
      sweepThreshold: config.SWEEP_THRESHOLD,
      retentionDays: config.RETENTION_DAYS,
      basis: config.RETENTION_BASIS,
    });
    const reactions = new ReactionAggregator(linkStore);
    moderationStorage = { linkStore, sweeper, reactions };
    commandStorage = { linkStore, reactions, backendName: 'Redis' };
  }

  const engine = new ModerationEngine(transport, moderationStorage, cleanup, {
    warningDeleteDelayMs: config.WARNING_DELETE_DELAY_SECONDS * SECOND_MS,
    reactionConfirmDeleteDelayMs: config.REACTION_CONFIRM_DELETE_DELAY_SECONDS * SECOND_MS,
    solicitReactions: config.SOLICIT_REACTIONS,
  });

  // Create processor chain (order matters!)
  const processors = [
    new SenderFilter(),
    new RecentMessageRecorder(recentMessages),
    new EmptyMessageFilter(),
    new LinkModerationProcessor(engine),
  ];

  return {
    messageHandler: new MessageHandler(processors),
    commandHandler: new CommandHandler(transport, commandStorage, {
      retentionDays: config.RETENTION_DAYS,
      retentionBasis: config.RETENTION_BASIS,
    }),
    callbackHandler: new CallbackQueryHandler(transport, moderationStorage?.reactions ?? null),
    recentMessages,
    cleanup,
  };
}

async function main(): Promise<void> {
  logger.info('[Bot] Starting Repost Guard bot client...');

  const config = getConfig();
  const token = validateBotToken(config);

  logger.info(
    {
      storage: config.REDIS_URL !== undefined ? 'redis' : 'disabled',
      warningDeleteDelaySeconds: config.WARNING_DELETE_DELAY_SECONDS,
      sweepThreshold: config.SWEEP_THRESHOLD,
      retentionDays: config.RETENTION_DAYS,
      retentionBasis: config.RETENTION_BASIS,
    },
    '[Bot] Configuration:'
  );

  const store = await createRedisStore(config.REDIS_URL);

  const bot = createBot(token);
  const recentMessages = new RecentMessageCache();
  const transport = new TelegramTransport(bot.api, recentMessages);

  logger.info('[Bot] Initializing services with dependency injection...');
  const services = createServices(config, transport, recentMessages, store);
  registerHandlers(bot, services);
  logger.info('[Bot] All services initialized');

  await bot.init();
  logger.info(`[Bot] Logged in as @${bot.botInfo.username}`);

  let healthServer: http.Server | null = null;
  if (config.ENABLE_HEALTH_SERVER) {
    healthServer = startHealthServer(config.PORT, store !== null ? () => store.ping() : null);
  }

  const runner = run(bot);
  logger.info('[Bot] Polling for updates');

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, '[Bot] Shutting down...');

    try {
      if (runner.isRunning()) {
        await runner.stop();
      }
      services.cleanup.cancelAll();
      healthServer?.close();
      await store?.close();
      logger.info('[Bot] Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, '[Bot] Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

process.on('unhandledRejection', error => {
  logger.error({ err: error }, 'Unhandled rejection');
});

// Start the application
main().catch((error: unknown) => {
  logger.fatal({ err: error }, '[Bot] Fatal error during startup');
  process.exit(1);
});
