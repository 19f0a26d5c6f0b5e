/**
 * MessageCleanupScheduler Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { MessageCleanupScheduler } from './MessageCleanupScheduler.js';
import { FakeChatTransport } from '../test/FakeChatTransport.js';

// Mock the logger using vi.hoisted to ensure proper initialization order
const { mockWarn, mockError } = vi.hoisted(() => ({
  mockWarn: vi.fn(),
  mockError: vi.fn(),
}));

vi.mock('@repost-guard/common-types', async importOriginal => {
  const actual = await importOriginal<typeof import('@repost-guard/common-types')>();
  return {
    ...actual,
    createLogger: () => ({
      debug: vi.fn(),
      info: vi.fn(),
      warn: mockWarn,
      error: mockError,
    }),
  };
});

describe('MessageCleanupScheduler', () => {
  let transport: FakeChatTransport;
  let scheduler: MessageCleanupScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.clearAllMocks();
    transport = new FakeChatTransport();
    scheduler = new MessageCleanupScheduler(transport);
  });

  afterEach(() => {
    scheduler.cancelAll();
    vi.useRealTimers();
  });

  it('should delete the message once the delay has passed', async () => {
    scheduler.schedule(-1001, 55, 900_000);

    await vi.advanceTimersByTimeAsync(899_999);
    expect(transport.deleteMessage).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(transport.deleteMessage).toHaveBeenCalledWith(-1001, 55);
    expect(scheduler.pendingCount).toBe(0);
  });

  it('should track pending jobs', () => {
    scheduler.schedule(-1001, 1, 1000);
    scheduler.schedule(-1001, 2, 2000);

    expect(scheduler.pendingCount).toBe(2);
  });

  it('should treat an already deleted message as done', async () => {
    transport.deleteResult = 'not_found';
    scheduler.schedule(-1001, 55, 10);

    await vi.advanceTimersByTimeAsync(10);

    expect(transport.deleteMessage).toHaveBeenCalledTimes(1);
    expect(mockWarn).not.toHaveBeenCalled();
    expect(mockError).not.toHaveBeenCalled();
  });

  it('should log missing rights without throwing', async () => {
    transport.deleteResult = 'permission_denied';
    scheduler.schedule(-1001, 55, 10);

    await vi.advanceTimersByTimeAsync(10);

    expect(mockWarn).toHaveBeenCalledWith(
      { chatId: -1001, messageId: 55 },
      '[MessageCleanupScheduler] No rights to delete message'
    );
  });

  it('should log transport failures without throwing', async () => {
    const failure = new Error('Network down');
    transport.deleteMessage.mockRejectedValueOnce(failure);
    scheduler.schedule(-1001, 55, 10);

    await vi.advanceTimersByTimeAsync(10);

    expect(mockError).toHaveBeenCalledWith(
      { err: failure, chatId: -1001, messageId: 55 },
      '[MessageCleanupScheduler] Failed to delete message'
    );
  });

  it('should not run a cancelled job', async () => {
    const job = scheduler.schedule(-1001, 55, 10);
    job.cancel();

    await vi.advanceTimersByTimeAsync(100);

    expect(transport.deleteMessage).not.toHaveBeenCalled();
    expect(scheduler.pendingCount).toBe(0);
  });

  it('should tolerate cancelling a job twice or after it ran', async () => {
    const job = scheduler.schedule(-1001, 55, 10);
    await vi.advanceTimersByTimeAsync(10);

    job.cancel();
    job.cancel();

    expect(transport.deleteMessage).toHaveBeenCalledTimes(1);
  });

  it('should drop every pending job on cancelAll', async () => {
    scheduler.schedule(-1001, 1, 1000);
    scheduler.schedule(-1002, 2, 2000);

    scheduler.cancelAll();
    await vi.advanceTimersByTimeAsync(5000);

    expect(transport.deleteMessage).not.toHaveBeenCalled();
    expect(scheduler.pendingCount).toBe(0);
  });
});
