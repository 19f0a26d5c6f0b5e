/**
 * Constants Barrel Export
 *
 * Re-exports all domain-separated constants from a single entry point.
 */

// Timing constants
export { SECOND_MS, DAY_MS, REDIS_CONNECTION, RETRY_CONFIG } from './timing.js';

// Moderation constants
export { MODERATION_DEFAULTS, RetentionBasis, MESSAGE_CACHE } from './moderation.js';

// Storage key layout
export {
  REDIS_KEY_PREFIXES,
  REDIS_KEY_SUFFIXES,
  linkHashKey,
  sweepCounterKey,
} from './storage.js';

// Telegram limits
export { TELEGRAM_LIMITS } from './telegram.js';

// Service constants
export { SERVICE_DEFAULTS, HealthStatus, CONTENT_TYPES } from './service.js';
