/**
 * Inline control data
 *
 * Telegram callback data is limited to 64 bytes. Controls use `::` between
 * segments: `{reactionKind}::{messageId}`, where messageId names the message
 * whose links the vote applies to.
 */

import { REACTION_KINDS, type ReactionKind } from '../types/links.js';

/** Delimiter used between callback data segments */
export const CUSTOM_ID_DELIMITER = '::';

interface ReactionParseResult {
  kind: ReactionKind;
  messageId: number;
}

function isReactionKind(value: string): value is ReactionKind {
  return REACTION_KINDS.some(kind => kind === value);
}

export const ReactionCustomIds = {
  /** Build vote button data, e.g. `like::1234` */
  vote: (kind: ReactionKind, messageId: number) =>
    `${kind}${CUSTOM_ID_DELIMITER}${messageId}` as const,

  parse: (data: string): ReactionParseResult | null => {
    const parts = data.split(CUSTOM_ID_DELIMITER);
    if (parts.length !== 2) {
      return null;
    }

    const [kind, rawId] = parts;
    if (!isReactionKind(kind) || !/^\d+$/.test(rawId)) {
      return null;
    }

    return { kind, messageId: parseInt(rawId, 10) };
  },
};

/**
 * Get the leading segment of callback data, or null when it has no delimiter
 */
export function getCommandFromCustomId(data: string): string | null {
  const delimiterIndex = data.indexOf(CUSTOM_ID_DELIMITER);
  if (delimiterIndex === -1) {
    return null;
  }
  return data.substring(0, delimiterIndex);
}
