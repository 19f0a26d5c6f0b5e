/**
 * Reaction intent
 *
 * Replies made of a single vote word count as a reaction to the replied
 * message's links.
 */

import type { ReactionKind } from '../types/links.js';

const INTENT_WORDS: ReadonlyMap<string, ReactionKind> = new Map([
  ['like', 'like'],
  ['нравится', 'like'],
  ['+1', 'like'],
  ['👍', 'thumbs_up'],
]);

/**
 * The reaction kind a reply text expresses, or null when it is not a vote
 */
export function parseReactionIntent(text: string | undefined): ReactionKind | null {
  if (text === undefined) {
    return null;
  }
  return INTENT_WORDS.get(text.trim().toLowerCase()) ?? null;
}
