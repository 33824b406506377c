import { describe, it, expect } from 'vitest';
import { InboundRateLimiter, limitsFromSettings } from '../middleware/rate-limit.js';
import { ManualClock } from '../../__tests__/fixtures.js';

const MINUTE = { limit: 2, windowMs: 60_000, per: 'minute' };
const HOUR = { limit: 3, windowMs: 3_600_000, per: 'hour' };

describe('InboundRateLimiter', () => {
  it('admits requests up to each limit', () => {
    const limiter = new InboundRateLimiter([MINUTE], new ManualClock());

    expect(limiter.consume('key-a')).toBeNull();
    expect(limiter.consume('key-a')).toBeNull();
    expect(limiter.consume('key-a')).toEqual({ limit: MINUTE, retryAfterMs: 60_000 });
  });

  it('keeps separate counts per key', () => {
    const limiter = new InboundRateLimiter([MINUTE], new ManualClock());

    limiter.consume('key-a');
    limiter.consume('key-a');

    expect(limiter.consume('key-b')).toBeNull();
  });

  it('opens a fresh window once the old one lapses', () => {
    const clock = new ManualClock();
    const limiter = new InboundRateLimiter([MINUTE], clock);

    limiter.consume('key-a');
    limiter.consume('key-a');
    clock.advance(60_000);

    expect(limiter.consume('key-a')).toBeNull();
  });

  it('does not count rejected requests', () => {
    const clock = new ManualClock();
    const limiter = new InboundRateLimiter([MINUTE, HOUR], clock);

    limiter.consume('key-a');
    limiter.consume('key-a');
    limiter.consume('key-a');
    clock.advance(60_000);
    limiter.consume('key-a');

    expect(limiter.consume('key-a')).toEqual({ limit: HOUR, retryAfterMs: 3_540_000 });
  });

  it('derives per-minute and per-hour limits from settings', () => {
    expect(limitsFromSettings({ enabled: true, requestsPerMinute: 100, requestsPerHour: 1000 })).toEqual([
      { limit: 100, windowMs: 60_000, per: 'minute' },
      { limit: 1000, windowMs: 3_600_000, per: 'hour' },
    ]);
  });
});
