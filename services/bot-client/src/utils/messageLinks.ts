/**
 * Deep links to chat messages
 */

const TELEGRAM_BASE_URL = 'https://t.me';
const SUPERGROUP_ID_PREFIX = '-100';

/**
 * The id Telegram uses in private `t.me/c/` links: supergroup and channel ids
 * lose their -100 prefix, anything else is used as its absolute value
 */
export function internalChatId(chatId: number): string {
  const raw = String(chatId);
  if (raw.startsWith(SUPERGROUP_ID_PREFIX)) {
    return raw.slice(SUPERGROUP_ID_PREFIX.length);
  }
  return String(Math.abs(chatId));
}

/**
 * Link that opens `messageId` in its chat. Public chats get the
 * `t.me/<username>/<id>` form, which works for non-members too.
 */
export function buildMessageLink(chatId: number, messageId: number, chatUsername?: string): string {
  if (chatUsername !== undefined && chatUsername.length > 0) {
    return `${TELEGRAM_BASE_URL}/${chatUsername}/${messageId}`;
  }
  return `${TELEGRAM_BASE_URL}/c/${internalChatId(chatId)}/${messageId}`;
}
