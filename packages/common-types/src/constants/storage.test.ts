import { describe, it, expect } from 'vitest';
import { linkHashKey, sweepCounterKey } from './storage.js';

describe('storage key layout', () => {
  it('should key link records by chat id', () => {
    expect(linkHashKey(-1001234567890)).toBe('chat:-1001234567890');
  });

  it('should keep the sweep counter beside the link hash', () => {
    expect(sweepCounterKey(-1001234567890)).toBe('chat:-1001234567890:counter');
  });
});
