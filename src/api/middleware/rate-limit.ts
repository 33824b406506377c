/**
 * Per-key inbound request limits for /v1.
 * Each limit counts requests in a fixed window keyed by the bearer token.
 * Runs after auth, so only configured keys ever get an entry.
 */

import { createMiddleware } from 'hono/factory';
import { logger } from '../../shared/logger.js';
import { openAIError } from '../../shared/errors.js';
import { KeyedStore } from '../../shared/keyed-store.js';
import { systemClock } from '../../shared/clock.js';
import type { Clock } from '../../shared/clock.js';
import type { InboundRateLimitSettings } from '../../config/types.js';

export interface InboundLimit {
  limit: number;
  windowMs: number;
  /** Human unit for error messages, e.g. "minute". */
  per: string;
}

export interface LimitExceeded {
  limit: InboundLimit;
  retryAfterMs: number;
}

interface Window {
  start: number;
  count: number;
}

export function limitsFromSettings(settings: InboundRateLimitSettings): InboundLimit[] {
  return [
    { limit: settings.requestsPerMinute, windowMs: 60_000, per: 'minute' },
    { limit: settings.requestsPerHour, windowMs: 3_600_000, per: 'hour' },
  ];
}

export class InboundRateLimiter {
  /** One window per limit, in limit order; empty until a key's first request. */
  private readonly store = new KeyedStore<{ windows: readonly Window[] }>(() => ({ windows: [] }));

  constructor(
    private readonly limits: readonly InboundLimit[],
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Count one request for a key.
   * @returns null when admitted; otherwise the limit hit. Rejected requests are not counted.
   */
  consume(key: string): LimitExceeded | null {
    const now = this.clock.now();
    const previous = this.store.get(key).windows;
    const windows = this.limits.map((limit, i) => {
      const current = previous[i];
      return current && now - current.start < limit.windowMs ? current : { start: now, count: 0 };
    });

    for (const [i, limit] of this.limits.entries()) {
      const window = windows[i];
      if (window && window.count >= limit.limit) {
        this.store.update(key, () => ({ windows }));
        return { limit, retryAfterMs: window.start + limit.windowMs - now };
      }
    }

    this.store.update(key, () => ({ windows: windows.map((w) => ({ start: w.start, count: w.count + 1 })) }));
    return null;
  }
}

/** Hono middleware answering 429 in OpenAI error format when a key is over a limit. */
export function createRateLimitMiddleware(limiter: InboundRateLimiter) {
  return createMiddleware(async (c, next) => {
    const key = (c.req.header('authorization') ?? '').replace(/^Bearer /, '');
    const exceeded = limiter.consume(key);

    if (exceeded) {
      const { limit, retryAfterMs } = exceeded;
      logger.warn(
        { path: c.req.path, limit: limit.limit, per: limit.per, retryAfterMs },
        'Inbound rate limit exceeded',
      );
      c.header('Retry-After', String(Math.ceil(retryAfterMs / 1000)));
      return c.json(
        openAIError(
          `Rate limit exceeded: ${limit.limit} requests per ${limit.per}`,
          'rate_limit_error',
          'rate_limit_exceeded',
        ),
        429,
      );
    }

    await next();
  });
}
