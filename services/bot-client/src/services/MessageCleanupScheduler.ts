/**
 * Message Cleanup Scheduler
 *
 * Deletes bot messages (duplicate warnings, vote confirmations) after a delay.
 * Jobs are fire-and-forget: a message that is already gone counts as cleaned
 * up, and failures are logged rather than thrown. cancelAll() is used during
 * graceful shutdown; individual jobs can be cancelled but never need to be.
 */

import { createLogger } from '@repost-guard/common-types';
import type { ChatTransport } from '../types/transport.js';

const logger = createLogger('MessageCleanupScheduler');

export interface ScheduledCleanup {
  cancel(): void;
}

export class MessageCleanupScheduler {
  private readonly timers = new Set<ReturnType<typeof setTimeout>>();

  constructor(private transport: ChatTransport) {}

  /** Jobs scheduled and not yet run or cancelled */
  get pendingCount(): number {
    return this.timers.size;
  }

  schedule(chatId: number, messageId: number, delayMs: number): ScheduledCleanup {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      void this.runCleanup(chatId, messageId);
    }, delayMs);
    this.timers.add(timer);

    logger.debug({ chatId, messageId, delayMs }, '[MessageCleanupScheduler] Scheduled deletion');

    return {
      cancel: () => {
        if (this.timers.delete(timer)) {
          clearTimeout(timer);
        }
      },
    };
  }

  /**
   * Drop every pending job
   * Called during graceful shutdown
   */
  cancelAll(): void {
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    if (this.timers.size > 0) {
      logger.info(
        { cancelled: this.timers.size },
        '[MessageCleanupScheduler] Cancelled pending deletions'
      );
    }
    this.timers.clear();
  }

  private async runCleanup(chatId: number, messageId: number): Promise<void> {
    try {
      const result = await this.transport.deleteMessage(chatId, messageId);
      switch (result) {
        case 'deleted':
          logger.debug({ chatId, messageId }, '[MessageCleanupScheduler] Deleted message');
          break;
        case 'not_found':
          logger.debug({ chatId, messageId }, '[MessageCleanupScheduler] Message already gone');
          break;
        case 'permission_denied':
          logger.warn({ chatId, messageId }, '[MessageCleanupScheduler] No rights to delete message');
          break;
      }
    } catch (error) {
      logger.error(
        { err: error, chatId, messageId },
        '[MessageCleanupScheduler] Failed to delete message'
      );
    }
  }
}
