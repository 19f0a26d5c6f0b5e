/**
 * Storage Key Layout
 *
 * Every chat owns one Redis hash of link records (field = normalized URL) and a
 * counter of processed messages since the last retention sweep.
 */

export const REDIS_KEY_PREFIXES = {
  /** Hash of link records for a chat: chat:{chatId} */
  CHAT: 'chat:',
} as const;

export const REDIS_KEY_SUFFIXES = {
  /** Sweep counter for a chat: chat:{chatId}:counter */
  SWEEP_COUNTER: ':counter',
} as const;

/**
 * Key of the hash holding a chat's link records
 */
export function linkHashKey(chatId: number): string {
  return `${REDIS_KEY_PREFIXES.CHAT}${chatId}`;
}

/**
 * Key of a chat's messages-since-sweep counter
 */
export function sweepCounterKey(chatId: number): string {
  return `${REDIS_KEY_PREFIXES.CHAT}${chatId}${REDIS_KEY_SUFFIXES.SWEEP_COUNTER}`;
}
