/**
 * Moderation Constants
 *
 * Defaults for duplicate-link moderation. Every value here can be overridden
 * through the environment (see config/config.ts).
 */

export const MODERATION_DEFAULTS = {
  /** Processed messages between two retention sweeps of a chat */
  SWEEP_THRESHOLD: 365,
  /** Link records older than this are removed by a sweep */
  RETENTION_DAYS: 365,
  /** Lifetime of a duplicate warning before the bot removes it (15 minutes) */
  WARNING_DELETE_DELAY_SECONDS: 900,
  /** Lifetime of a vote confirmation reply */
  REACTION_CONFIRM_DELETE_DELAY_SECONDS: 10,
} as const;

/**
 * Which timestamp of a link record the retention window is measured from
 */
export enum RetentionBasis {
  CreatedAt = 'createdAt',
  LastSeenAt = 'lastSeenAt',
}

/**
 * Recently seen messages kept so inline-control callbacks can re-read links
 */
export const MESSAGE_CACHE = {
  /** Maximum cached messages across all chats */
  MAX_SIZE: 10000,
  /** Entry lifetime (48 hours, Telegram's own delete window) */
  TTL_MS: 48 * 60 * 60 * 1000,
} as const;
