// Export config (runtime environment variables)
export * from './config/index.js';

// Export constants (compile-time constants)
export * from './constants/index.js';

// Export utilities
export { createLogger } from './utils/logger.js';
export { sanitizeLogMessage, sanitizeObject } from './utils/logSanitizer.js';
export {
  parseRedisUrl,
  createRedisOptions,
  redisRetryStrategy,
  type RedisConnectionConfig,
} from './utils/redis.js';
