/**
 * Test setup file - runs before all bot-client tests
 */

// Set minimal env vars BEFORE any imports
process.env.BOT_TOKEN = 'test-token';
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = 'silent';
delete process.env.REDIS_URL;
delete process.env.ENABLE_PRETTY_LOGS;

import { afterEach, vi } from 'vitest';

afterEach(() => {
  // Clear all mocks after each test to prevent test pollution
  vi.clearAllMocks();
  // Restore real timers so one test's fake clock never leaks into the next
  vi.useRealTimers();
});
