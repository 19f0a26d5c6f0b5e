/**
 * Startup Utilities
 *
 * Initialization and validation functions run during bot-client startup,
 * plus the optional liveness endpoint.
 */

import http from 'node:http';
import {
  createLogger,
  getConfig,
  HealthStatus,
  CONTENT_TYPES,
  type EnvConfig,
} from '@repost-guard/common-types';

const logger = createLogger('bot-client');

/**
 * Validate the Telegram bot token is configured
 * @returns The token
 * @throws Error if BOT_TOKEN is missing
 */
export function validateBotToken(config: EnvConfig = getConfig()): string {
  if (config.BOT_TOKEN === undefined || config.BOT_TOKEN.length === 0) {
    logger.fatal({}, 'BOT_TOKEN is required for bot-client');
    throw new Error('BOT_TOKEN environment variable is required');
  }
  return config.BOT_TOKEN;
}

export interface HealthResponse {
  status: HealthStatus;
  storage: boolean | 'disabled';
  timestamp: string;
}

/**
 * Build health check response
 * @param storageHealthy Whether the storage ping succeeded
 * @param storageDisabled Whether the bot runs without storage
 */
export function buildHealthResponse(
  storageHealthy: boolean,
  storageDisabled: boolean
): HealthResponse {
  return {
    status: storageHealthy && !storageDisabled ? HealthStatus.Healthy : HealthStatus.Degraded,
    storage: storageDisabled ? 'disabled' : storageHealthy,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Storage ping used by /health, or null when running without storage
 */
export type StorageHealthCheck = (() => Promise<boolean>) | null;

/**
 * Request listener of the liveness server
 *
 * - GET / → 200 "Bot is running"
 * - GET /health → JSON health; 503 when configured storage does not answer
 */
export function createHealthRequestListener(checkStorage: StorageHealthCheck): http.RequestListener {
  return (req, res) => {
    void (async () => {
      if (req.url === '/') {
        res.writeHead(200, { 'Content-Type': CONTENT_TYPES.TEXT });
        res.end('Bot is running');
      } else if (req.url === '/health') {
        try {
          const storageDisabled = checkStorage === null;
          const storageHealthy = storageDisabled ? false : await checkStorage();

          const health = buildHealthResponse(storageHealthy, storageDisabled);
          const status = storageDisabled || storageHealthy ? 200 : 503;

          res.writeHead(status, { 'Content-Type': CONTENT_TYPES.JSON });
          res.end(JSON.stringify(health));
        } catch (error) {
          logger.error({ err: error }, '[Bot] Health check failed');
          res.writeHead(500, { 'Content-Type': CONTENT_TYPES.JSON });
          res.end(JSON.stringify({ status: HealthStatus.Degraded, error: String(error) }));
        }
      } else {
        res.writeHead(404);
        res.end('Not Found');
      }
    })();
  };
}

/**
 * Start the liveness server
 */
export function startHealthServer(port: number, checkStorage: StorageHealthCheck): http.Server {
  const server = http.createServer(createHealthRequestListener(checkStorage));

  server.listen(port, () => {
    logger.info(`[Bot] Health check server listening on port ${port}`);
  });

  return server;
}
