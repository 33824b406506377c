/**
 * Rolling 429 hit-rate per backend over live traffic.
 * Warns once when a backend's share of rate-limited attempts reaches the
 * alert threshold, and again when it falls back below it.
 */

import { logger } from '../shared/logger.js';
import { KeyedStore } from '../shared/keyed-store.js';
import type { Clock } from '../shared/clock.js';
import type { AlertSettings } from '../config/types.js';

interface HitEntry {
  /** Attempt timestamps and whether each was rate limited, oldest first. */
  attempts: readonly { at: number; rateLimited: boolean }[];
  alerting: boolean;
}

export class HitRateMonitor {
  private readonly store = new KeyedStore<HitEntry>(() => ({ attempts: [], alerting: false }));

  constructor(
    private readonly clock: Clock,
    private readonly settings: AlertSettings,
  ) {}

  /**
   * Count one attempt.
   * @returns The hit rate over the window after this attempt.
   */
  record(backendId: string, rateLimited: boolean): number {
    const now = this.clock.now();
    let rate = 0;
    const previous = this.store.get(backendId).alerting;

    const next = this.store.update(backendId, (entry) => {
      const attempts = [
        ...entry.attempts.filter((a) => now - a.at < this.settings.windowMs),
        { at: now, rateLimited },
      ];
      rate = attempts.filter((a) => a.rateLimited).length / attempts.length;
      return { attempts, alerting: rate >= this.settings.rateLimitHitRate };
    });

    if (next.alerting && !previous) {
      logger.warn(
        { backend: backendId, hitRate: rate, attempts: next.attempts.length, windowMs: this.settings.windowMs },
        `Backend ${backendId} rate limit hit rate is ${(rate * 100).toFixed(1)}%`,
      );
    } else if (!next.alerting && previous) {
      logger.info(
        { backend: backendId, hitRate: rate },
        `Backend ${backendId} rate limit hit rate back to ${(rate * 100).toFixed(1)}%`,
      );
    }

    return rate;
  }

  /** Hit rate over the window as of now, without counting anything. */
  hitRate(backendId: string): number {
    const now = this.clock.now();
    const live = this.store.get(backendId).attempts.filter((a) => now - a.at < this.settings.windowMs);
    return live.length === 0 ? 0 : live.filter((a) => a.rateLimited).length / live.length;
  }

  isAlerting(backendId: string): boolean {
    return this.store.get(backendId).alerting;
  }
}
