import { describe, it, expect, beforeEach } from 'vitest';
import { DEFAULT_HEALTH_OPTIONS, HealthTracker } from '../tracker.js';
import { ManualClock, makeDescriptor, makeRegistry } from '../../__tests__/fixtures.js';

const START = 1_000_000;
const C = 'groq:c';

describe('HealthTracker', () => {
  let clock: ManualClock;
  let health: HealthTracker;

  beforeEach(() => {
    clock = new ManualClock(START);
    health = new HealthTracker(makeRegistry(makeDescriptor('groq', 'c')), clock);
  });

  it('starts healthy', () => {
    expect(health.getStatus(C)).toBe('healthy');
    expect(health.snapshot().get(C)).toEqual({
      backendId: C,
      status: 'healthy',
      consecutiveFailures: 0,
      consecutiveSuccesses: 0,
      backoffUntil: null,
      lastCheckedAt: null,
      lastError: null,
    });
  });

  it('degrades after three consecutive failures and recovers after two successes', () => {
    health.recordFailure(C, 'timeout');
    health.recordFailure(C, 'timeout');
    expect(health.getStatus(C)).toBe('healthy');

    health.recordFailure(C, 'timeout');
    expect(health.getStatus(C)).toBe('degraded');

    health.recordSuccess(C);
    expect(health.getStatus(C)).toBe('degraded');
    health.recordSuccess(C);
    expect(health.getStatus(C)).toBe('healthy');
  });

  it('becomes unavailable after five consecutive failures', () => {
    for (let i = 0; i < 5; i++) health.recordFailure(C, '503');
    expect(health.getStatus(C)).toBe('unavailable');
    expect(health.snapshot().get(C)?.lastError).toBe('503');
  });

  it('recovers from unavailable through degraded', () => {
    for (let i = 0; i < 5; i++) health.recordFailure(C, '503');

    health.recordSuccess(C, 'probe');
    expect(health.getStatus(C)).toBe('degraded');
    health.recordSuccess(C, 'probe');
    expect(health.getStatus(C)).toBe('healthy');
  });

  it('restarts the failure streak once it falls outside the tracking window', () => {
    health.recordFailure(C, 'timeout');
    health.recordFailure(C, 'timeout');
    clock.advance(DEFAULT_HEALTH_OPTIONS.failureWindowMs + 1);
    health.recordFailure(C, 'timeout');

    expect(health.getStatus(C)).toBe('healthy');
    expect(health.snapshot().get(C)?.consecutiveFailures).toBe(1);
  });

  it('resets the failure count on success', () => {
    health.recordFailure(C, 'timeout');
    health.recordFailure(C, 'timeout');
    health.recordSuccess(C);
    health.recordFailure(C, 'timeout');

    expect(health.getStatus(C)).toBe('healthy');
    expect(health.snapshot().get(C)?.consecutiveFailures).toBe(1);
  });

  it('keeps a healthy backend healthy on success', () => {
    health.recordSuccess(C);
    const entry = health.snapshot().get(C);
    expect(entry?.status).toBe('healthy');
    expect(entry?.lastCheckedAt).toBe(START);
  });

  it('sets an exponential re-eligibility backoff, capped', () => {
    health.recordFailure(C, 'timeout');
    expect(health.snapshot().get(C)?.backoffUntil).toBe(START + 2000);

    health.recordFailure(C, 'timeout');
    expect(health.snapshot().get(C)?.backoffUntil).toBe(START + 4000);

    expect(health.backoffMs(30)).toBe(DEFAULT_HEALTH_OPTIONS.backoffMaxMs);
  });

  it('clears backoff on success', () => {
    health.recordFailure(C, 'timeout');
    health.recordSuccess(C);
    expect(health.snapshot().get(C)?.backoffUntil).toBeNull();
  });

  it('does not count rate limiting as a failure', () => {
    health.recordFailure(C, 'timeout');
    clock.advance(10);
    health.recordRateLimited(C);

    const entry = health.snapshot().get(C);
    expect(entry?.consecutiveFailures).toBe(1);
    expect(entry?.status).toBe('healthy');
    expect(entry?.lastCheckedAt).toBe(START + 10);
  });

  it('honours custom thresholds', () => {
    const strict = new HealthTracker(makeRegistry(makeDescriptor('groq', 'c')), clock, {
      ...DEFAULT_HEALTH_OPTIONS,
      degradedAfter: 1,
      unavailableAfter: 2,
      recoverySuccesses: 1,
    });

    strict.recordFailure(C, 'x');
    expect(strict.getStatus(C)).toBe('degraded');
    strict.recordFailure(C, 'x');
    expect(strict.getStatus(C)).toBe('unavailable');
    strict.recordSuccess(C);
    expect(strict.getStatus(C)).toBe('degraded');
    strict.recordSuccess(C);
    expect(strict.getStatus(C)).toBe('healthy');
  });
});
