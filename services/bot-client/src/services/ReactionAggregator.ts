/**
 * Reaction Aggregator
 * Records per-user votes on stored links and renders the per-chat summary.
 */

import { createLogger } from '@repost-guard/common-types';
import type { LinkStore } from './LinkStore.js';
import { REACTION_KINDS, type ReactionKind, type ReactionVoters, type Voter } from '../types/links.js';
import {
  STATS_TEXTS,
  formatReactionSummary,
  type LinkReactionSummary,
} from '../utils/messageTemplates.js';

const logger = createLogger('ReactionAggregator');

export class ReactionAggregator {
  constructor(private linkStore: LinkStore) {}

  /**
   * @returns Whether the link existed
   */
  async react(chatId: number, url: string, kind: ReactionKind, voter: Voter): Promise<boolean> {
    return this.linkStore.addReaction(chatId, url, kind, voter);
  }

  /**
   * Vote for every link of a message
   * @returns true when at least one of the links was stored
   */
  async reactToAll(
    chatId: number,
    urls: readonly string[],
    kind: ReactionKind,
    voter: Voter
  ): Promise<boolean> {
    let recorded = 0;
    for (const url of urls) {
      if (await this.react(chatId, url, kind, voter)) {
        recorded++;
      }
    }

    logger.debug(
      { chatId, kind, userId: voter.userId, links: urls.length, recorded },
      '[ReactionAggregator] Recorded votes'
    );
    return recorded > 0;
  }

  /**
   * HTML report of the chat's votes, oldest link first. Links without votes
   * are left out.
   */
  async summarize(chatId: number): Promise<string> {
    const entries = await this.linkStore.listAll(chatId);
    if (entries.length === 0) {
      return STATS_TEXTS.noLinks;
    }

    const summaries: LinkReactionSummary[] = entries
      .sort(([, a], [, b]) => a.createdAt - b.createdAt)
      .map(([url, record]) => ({
        url,
        reactions: REACTION_KINDS.flatMap((kind): [ReactionKind, ReactionVoters][] => {
          const voters = record.reactions[kind];
          return voters !== undefined && Object.keys(voters).length > 0 ? [[kind, voters]] : [];
        }),
      }))
      .filter(summary => summary.reactions.length > 0);

    if (summaries.length === 0) {
      return STATS_TEXTS.noReactions;
    }

    return formatReactionSummary(summaries);
  }
}
