/**
 * Message splitting
 *
 * Telegram rejects texts longer than TELEGRAM_LIMITS.MESSAGE_LENGTH. Long
 * replies are split on the widest boundary that fits: blank lines first
 * (one link block of /stats each), then lines, then the `, ` between voter
 * names. Only a single name longer than the limit is cut mid-text.
 *
 * Each line of the bot's HTML closes its own tags, so splitting on these
 * boundaries never separates an opening tag from its closing one.
 */

import { TELEGRAM_LIMITS } from '@repost-guard/common-types';

const SEPARATORS = ['\n\n', '\n', ', '] as const;

function splitAtBoundary(content: string, maxLength: number, level: number): string[] {
  if (content.length <= maxLength) {
    return [content];
  }

  if (level >= SEPARATORS.length) {
    const pieces: string[] = [];
    for (let i = 0; i < content.length; i += maxLength) {
      pieces.push(content.slice(i, i + maxLength));
    }
    return pieces;
  }

  const separator = SEPARATORS[level];
  const chunks: string[] = [];
  let currentChunk = '';

  for (const part of content.split(separator)) {
    if (part.length > maxLength) {
      if (currentChunk !== '') {
        chunks.push(currentChunk);
        currentChunk = '';
      }
      chunks.push(...splitAtBoundary(part, maxLength, level + 1));
      continue;
    }

    const candidate = currentChunk === '' ? part : currentChunk + separator + part;
    if (candidate.length > maxLength) {
      chunks.push(currentChunk);
      currentChunk = part;
    } else {
      currentChunk = candidate;
    }
  }

  if (currentChunk !== '') {
    chunks.push(currentChunk);
  }
  return chunks;
}

/**
 * Split a message into chunks that each fit in one Telegram message
 */
export function splitMessage(
  content: string,
  maxLength: number = TELEGRAM_LIMITS.MESSAGE_LENGTH
): string[] {
  if (content.length === 0) {
    return [];
  }
  return splitAtBoundary(content, maxLength, 0);
}
