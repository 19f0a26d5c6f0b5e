/**
 * Telegram Constants
 *
 * Bot API limits.
 */

export const TELEGRAM_LIMITS = {
  /** Maximum length of a message text */
  MESSAGE_LENGTH: 4096,
} as const;
