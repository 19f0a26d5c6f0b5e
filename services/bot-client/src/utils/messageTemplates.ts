/**
 * User-facing message texts
 *
 * Everything here is sent with HTML parse mode, so interpolated values go
 * through escapeHtml.
 */

import { RetentionBasis } from '@repost-guard/common-types';
import type { ReactionKind, ReactionVoters } from '../types/links.js';

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
}

export const REACTION_LABELS: Record<ReactionKind, string> = {
  like: '❤️ Like',
  thumbs_up: '👍 Thumbs up',
};

export const LIKE_BUTTON_LABEL = '👍 Like';
export const LIKE_PROMPT = 'Rate this link:';
export const PERMISSION_WARNING =
  "⚠️ I can't delete messages here! Please check my administrator rights.";
export const VOTE_CONFIRMED = '✅ Your vote has been counted!';

export const CALLBACK_TEXTS = {
  voteCounted: VOTE_CONFIRMED,
  noLinks: '❌ No links found',
  messageUnavailable: '❌ That message is no longer available',
  notTracked: 'ℹ️ These links are no longer tracked',
  degraded: 'ℹ️ Voting needs persistent storage, which is not connected',
  unknown: '❓ Unknown action',
  failed: '❌ Something went wrong',
} as const;

export const DEGRADED_NOTICE =
  'ℹ️ No persistent storage is connected. Duplicate detection, voting and statistics are ' +
  'disabled until the bot runs with storage again.';

export function formatDuplicateWarning(normalizedUrl: string, originLink: string): string {
  return (
    '👮 <b>Duplicate link detected!</b>\n\n' +
    'This link was already posted in this chat:\n' +
    `<code>${escapeHtml(normalizedUrl)}</code>\n\n` +
    `<a href="${escapeHtml(originLink)}">→ Go to the original</a>`
  );
}

export function formatHelp(retentionDays: number): string {
  return (
    '🛡️ <b>I keep links in this chat unique.</b>\n\n' +
    'Add me to a group as an administrator allowed to delete messages. ' +
    'When someone posts a link that is already in the chat history, I delete the repost ' +
    'and point to the original.\n\n' +
    `Links are remembered for ${retentionDays} days, across restarts.\n\n` +
    'Reply to a message with a link using <i>like</i> or 👍 to vote for it.\n\n' +
    '/status - storage status\n' +
    '/stats - votes per link'
  );
}

export interface StatusDetails {
  linkCount: number;
  retentionDays: number;
  retentionBasis: RetentionBasis;
  backend: string;
}

export function formatStatus(details: StatusDetails): string {
  const measuredFrom =
    details.retentionBasis === RetentionBasis.LastSeenAt ? 'last activity' : 'first post';
  return (
    '📊 <b>Storage status</b>\n\n' +
    `• Links stored: <b>${details.linkCount}</b>\n` +
    `• Backend: ${escapeHtml(details.backend)}\n` +
    `• Retention: ${details.retentionDays} days from ${measuredFrom}`
  );
}

export const STATS_TEXTS = {
  header: '📊 <b>Link votes</b>',
  noLinks: 'No links have been stored in this chat yet.',
  noReactions: 'Nobody has voted for the links in this chat yet.',
} as const;

/**
 * Voter list for one reaction kind: display names, or `id<N>` for users without one
 */
export function formatVoters(voters: ReactionVoters): string {
  return Object.entries(voters)
    .map(([userId, displayName]) => escapeHtml(displayName ?? `id${userId}`))
    .join(', ');
}

export interface LinkReactionSummary {
  url: string;
  reactions: [ReactionKind, ReactionVoters][];
}

export function formatReactionSummary(links: readonly LinkReactionSummary[]): string {
  const blocks = links.map(link => {
    const lines = link.reactions.map(
      ([kind, voters]) =>
        `${REACTION_LABELS[kind]} (${Object.keys(voters).length}): ${formatVoters(voters)}`
    );
    return [`🔗 <code>${escapeHtml(link.url)}</code>`, ...lines].join('\n');
  });
  return [STATS_TEXTS.header, ...blocks].join('\n\n');
}
