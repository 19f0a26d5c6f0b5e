/**
 * Timing Constants
 *
 * Redis connection timeouts and retry configuration, plus millisecond helpers.
 */

/** One second in milliseconds */
export const SECOND_MS = 1000;

/** One day in milliseconds */
export const DAY_MS = 24 * 60 * 60 * SECOND_MS;

/**
 * Redis connection timeouts
 */
export const REDIS_CONNECTION = {
  /** Time to establish a connection (20 seconds) */
  CONNECT_TIMEOUT: 20000,
  /** Per-command timeout (15 seconds) */
  COMMAND_TIMEOUT: 15000,
  /** Delay before the first TCP keepalive probe (30 seconds) */
  KEEPALIVE: 30000,
} as const;

/**
 * Retry configuration for transient errors
 */
export const RETRY_CONFIG = {
  /** Maximum Redis retry attempts before giving up */
  REDIS_MAX_RETRIES: 10,
  /** Base delay multiplier for Redis retries (milliseconds) */
  REDIS_RETRY_MULTIPLIER: 100,
  /** Maximum delay for Redis retries (3 seconds) */
  REDIS_MAX_DELAY: 3000,
  /** Max retries per Redis request */
  REDIS_RETRIES_PER_REQUEST: 3,
} as const;
