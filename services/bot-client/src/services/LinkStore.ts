/**
 * LinkStore
 *
 * Per-chat mapping from normalized URL to LinkRecord, persisted as JSON in the
 * chat's hash. Every mutation is written through immediately; store errors
 * propagate to the caller.
 *
 * addReaction is a read-modify-write of one field. Two reactions to the same
 * URL racing across processes can lose one of the updates; within a process
 * updates for a chat are handled one at a time (see bot.ts).
 */

import { z } from 'zod';
import { createLogger, linkHashKey, sweepCounterKey } from '@repost-guard/common-types';
import type { KeyValueStore } from '../storage/KeyValueStore.js';
import type { LinkRecord, ReactionKind, ReactionVoters, Voter } from '../types/links.js';

const logger = createLogger('LinkStore');

const VotersSchema = z.record(z.string(), z.string().nullable());

const LinkRecordSchema = z.object({
  normalizedUrl: z.string(),
  originMessageId: z.number().int(),
  createdAt: z.number(),
  lastSeenAt: z.number(),
  reactions: z
    .object({
      like: VotersSchema.optional(),
      thumbs_up: VotersSchema.optional(),
    })
    .default({}),
});

/**
 * Layout written by earlier deployments: `{ message_id, timestamp, likes }`
 */
const LegacyLinkRecordSchema = z.object({
  message_id: z.number().int(),
  timestamp: z.string(),
  likes: VotersSchema.optional(),
});

/**
 * Legacy likes hold bare usernames; current records store the `@` mention
 */
function mentionVoters(voters: ReactionVoters): ReactionVoters {
  return Object.fromEntries(
    Object.entries(voters).map(([userId, name]) => [userId, name !== null ? `@${name}` : null])
  );
}

/**
 * Decode a stored value, or null when it is not a valid record
 */
export function decodeLinkRecord(url: string, raw: string): LinkRecord | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  const current = LinkRecordSchema.safeParse(parsed);
  if (current.success) {
    return current.data;
  }

  const legacy = LegacyLinkRecordSchema.safeParse(parsed);
  if (legacy.success) {
    const timestamp = Date.parse(legacy.data.timestamp);
    if (Number.isNaN(timestamp)) {
      return null;
    }
    return {
      normalizedUrl: url,
      originMessageId: legacy.data.message_id,
      createdAt: timestamp,
      lastSeenAt: timestamp,
      reactions: legacy.data.likes !== undefined ? { like: mentionVoters(legacy.data.likes) } : {},
    };
  }

  return null;
}

export class LinkStore {
  constructor(
    private store: KeyValueStore,
    private now: () => number = Date.now
  ) {}

  async get(chatId: number, url: string): Promise<LinkRecord | null> {
    const raw = await this.store.getField(linkHashKey(chatId), url);
    if (raw === null) {
      return null;
    }

    const record = decodeLinkRecord(url, raw);
    if (record === null) {
      logger.warn({ chatId, url }, '[LinkStore] Ignoring malformed link record');
    }
    return record;
  }

  /**
   * Upsert the record for a URL
   */
  async put(chatId: number, url: string, record: LinkRecord): Promise<void> {
    await this.store.setField(linkHashKey(chatId), url, JSON.stringify(record));
  }

  /**
   * Every decodable record of the chat, in no particular order
   */
  async listAll(chatId: number): Promise<[string, LinkRecord][]> {
    const fields = await this.store.getAllFields(linkHashKey(chatId));
    const entries: [string, LinkRecord][] = [];

    for (const [url, raw] of Object.entries(fields)) {
      const record = decodeLinkRecord(url, raw);
      if (record === null) {
        logger.warn({ chatId, url }, '[LinkStore] Skipping malformed link record');
        continue;
      }
      entries.push([url, record]);
    }

    return entries;
  }

  /**
   * Remove several URLs in one call
   * @returns How many records were removed
   */
  async deleteMany(chatId: number, urls: ReadonlySet<string>): Promise<number> {
    if (urls.size === 0) {
      return 0;
    }
    return this.store.deleteFields(linkHashKey(chatId), [...urls]);
  }

  /**
   * Record a vote on a stored link. Voting again replaces the user's entry.
   * @returns false when the URL has no record
   */
  async addReaction(
    chatId: number,
    url: string,
    kind: ReactionKind,
    voter: Voter
  ): Promise<boolean> {
    const record = await this.get(chatId, url);
    if (record === null) {
      return false;
    }

    record.reactions[kind] = {
      ...record.reactions[kind],
      [String(voter.userId)]: voter.displayName,
    };
    record.lastSeenAt = this.now();

    await this.put(chatId, url, record);
    return true;
  }

  async count(chatId: number): Promise<number> {
    return this.store.countFields(linkHashKey(chatId));
  }

  async incrementSweepCounter(chatId: number): Promise<number> {
    return this.store.increment(sweepCounterKey(chatId));
  }

  async resetSweepCounter(chatId: number): Promise<void> {
    await this.store.set(sweepCounterKey(chatId), '0');
  }
}
