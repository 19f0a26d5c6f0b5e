/**
 * Retention Sweeper
 *
 * Amortized expiry of link records. Each chat keeps a persisted counter of
 * processed messages; once it reaches the threshold the counter is reset and
 * every record of the chat is checked against the retention window. Expired
 * URLs are removed in a single batched delete.
 */

import { createLogger, DAY_MS, RetentionBasis } from '@repost-guard/common-types';
import type { LinkStore } from './LinkStore.js';

const logger = createLogger('RetentionSweeper');

export interface RetentionPolicy {
  /** Processed messages between two sweeps of a chat */
  sweepThreshold: number;
  retentionDays: number;
  basis: RetentionBasis;
}

export interface SweepResult {
  /** Records decoded and checked */
  scanned: number;
  /** Records older than the retention window */
  expired: number;
  /** Records actually removed */
  deleted: number;
}

export class RetentionSweeper {
  constructor(
    private linkStore: LinkStore,
    private policy: RetentionPolicy,
    private now: () => number = Date.now
  ) {}

  /**
   * Count one processed message and sweep when the threshold is reached
   * @returns The sweep result, or null when no sweep ran
   */
  async maybeSweep(chatId: number): Promise<SweepResult | null> {
    const count = await this.linkStore.incrementSweepCounter(chatId);
    if (count < this.policy.sweepThreshold) {
      return null;
    }

    await this.linkStore.resetSweepCounter(chatId);
    logger.info({ chatId, count }, '[RetentionSweeper] Sweep threshold reached');
    return this.sweep(chatId);
  }

  /**
   * Remove every record of the chat older than the retention window
   */
  async sweep(chatId: number): Promise<SweepResult> {
    const entries = await this.linkStore.listAll(chatId);
    const maxAgeMs = this.policy.retentionDays * DAY_MS;
    const now = this.now();

    const expired = new Set<string>();
    for (const [url, record] of entries) {
      const since =
        this.policy.basis === RetentionBasis.LastSeenAt ? record.lastSeenAt : record.createdAt;
      if (now - since > maxAgeMs) {
        expired.add(url);
      }
    }

    const deleted = await this.linkStore.deleteMany(chatId, expired);
    const result: SweepResult = { scanned: entries.length, expired: expired.size, deleted };

    if (deleted > 0) {
      logger.info({ chatId, ...result }, '[RetentionSweeper] Removed expired links');
    } else {
      logger.debug({ chatId, ...result }, '[RetentionSweeper] No expired links');
    }

    return result;
  }
}
