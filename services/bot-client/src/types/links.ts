/**
 * Link record model
 */

import type { ChatUser } from './messages.js';

export const REACTION_KINDS = ['like', 'thumbs_up'] as const;

export type ReactionKind = (typeof REACTION_KINDS)[number];

/** userId (as string) → display name, null when the user has none */
export type ReactionVoters = Record<string, string | null>;

export type LinkReactions = Partial<Record<ReactionKind, ReactionVoters>>;

/**
 * Stored metadata for one normalized URL within one chat
 */
export interface LinkRecord {
  normalizedUrl: string;
  originMessageId: number;
  /** Epoch milliseconds */
  createdAt: number;
  /** Epoch milliseconds; refreshed when a reaction is written */
  lastSeenAt: number;
  reactions: LinkReactions;
}

export interface Voter {
  userId: number;
  displayName: string | null;
}

export function createLinkRecord(
  normalizedUrl: string,
  originMessageId: number,
  now: number
): LinkRecord {
  return {
    normalizedUrl,
    originMessageId,
    createdAt: now,
    lastSeenAt: now,
    reactions: {},
  };
}

/**
 * Name shown for a voter in summaries: @username, else first name
 */
export function voterFromUser(user: ChatUser): Voter {
  if (user.username !== undefined && user.username.length > 0) {
    return { userId: user.id, displayName: `@${user.username}` };
  }
  return { userId: user.id, displayName: user.firstName ?? null };
}
