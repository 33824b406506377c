/**
 * Per-backend health state machine fed by live traffic and active probes.
 *
 *   healthy --(degradedAfter failures)--> degraded --(unavailableAfter failures)--> unavailable
 *   unavailable --success--> degraded --(recoverySuccesses in a row)--> healthy
 *
 * Recovery always passes through degraded, so one lucky success cannot make
 * a flapping backend look healthy. Rate limiting and fatal (client-side)
 * errors are not health signals.
 */

import { logger } from '../shared/logger.js';
import { KeyedStore } from '../shared/keyed-store.js';
import type { Clock } from '../shared/clock.js';
import type { CapabilityRegistry } from '../registry/capability-registry.js';
import type {
  HealthEntry,
  HealthOptions,
  HealthSnapshot,
  HealthStatus,
  SignalSource,
} from './types.js';

export const DEFAULT_HEALTH_OPTIONS: HealthOptions = {
  degradedAfter: 3,
  unavailableAfter: 5,
  recoverySuccesses: 2,
  failureWindowMs: 300_000,
  backoffBaseMs: 1_000,
  backoffMaxMs: 300_000,
};

const SEVERITY: Record<HealthStatus, number> = {
  healthy: 0,
  degraded: 1,
  unavailable: 2,
};

export class HealthTracker {
  private readonly store = new KeyedStore<HealthEntry>(() => ({
    status: 'healthy',
    consecutiveFailures: 0,
    consecutiveSuccesses: 0,
    failureStreakStart: null,
    backoffUntil: null,
    lastCheckedAt: null,
    lastError: null,
  }));

  constructor(
    private readonly registry: CapabilityRegistry,
    private readonly clock: Clock,
    private readonly options: HealthOptions = DEFAULT_HEALTH_OPTIONS,
  ) {}

  getStatus(backendId: string): HealthStatus {
    return this.store.get(backendId).status;
  }

  /** Status implied by a failure count alone. */
  private statusForFailures(failures: number): HealthStatus {
    if (failures >= this.options.unavailableAfter) return 'unavailable';
    if (failures >= this.options.degradedAfter) return 'degraded';
    return 'healthy';
  }

  /** Re-eligibility backoff after `failures` consecutive failures. */
  backoffMs(failures: number): number {
    return Math.min(this.options.backoffBaseMs * 2 ** failures, this.options.backoffMaxMs);
  }

  /** Record a transient failure (timeout, 5xx, connection error). */
  recordFailure(backendId: string, reason: string, source: SignalSource = 'traffic'): void {
    const now = this.clock.now();
    const previous = this.store.get(backendId).status;

    const next = this.store.update(backendId, (entry) => {
      const streakExpired =
        entry.failureStreakStart === null ||
        now - entry.failureStreakStart > this.options.failureWindowMs;
      const failures = streakExpired ? 1 : entry.consecutiveFailures + 1;
      const implied = this.statusForFailures(failures);

      return {
        ...entry,
        // Failures only ever escalate the state.
        status: SEVERITY[implied] > SEVERITY[entry.status] ? implied : entry.status,
        consecutiveFailures: failures,
        consecutiveSuccesses: 0,
        failureStreakStart: streakExpired ? now : entry.failureStreakStart,
        backoffUntil: now + this.backoffMs(failures),
        lastCheckedAt: now,
        lastError: reason,
      };
    });

    if (next.status !== previous) {
      logger.warn(
        { backend: backendId, from: previous, to: next.status, failures: next.consecutiveFailures, source },
        `Backend ${backendId} ${previous} -> ${next.status} after ${next.consecutiveFailures} consecutive failure(s)`,
      );
    } else {
      logger.debug(
        { backend: backendId, failures: next.consecutiveFailures, backoffUntil: next.backoffUntil, source },
        `Backend ${backendId} failure ${next.consecutiveFailures}: ${reason}`,
      );
    }
  }

  /** Record a successful call or probe. */
  recordSuccess(backendId: string, source: SignalSource = 'traffic'): void {
    const now = this.clock.now();
    const previous = this.store.get(backendId).status;

    const next = this.store.update(backendId, (entry) => {
      const successes = entry.consecutiveSuccesses + 1;

      let status: HealthStatus = entry.status;
      if (entry.status === 'unavailable') {
        status = 'degraded';
      } else if (entry.status === 'degraded' && successes >= this.options.recoverySuccesses) {
        status = 'healthy';
      }

      return {
        ...entry,
        status,
        consecutiveFailures: 0,
        consecutiveSuccesses: status === 'healthy' ? 0 : successes,
        failureStreakStart: null,
        backoffUntil: null,
        lastCheckedAt: now,
        lastError: status === 'healthy' ? null : entry.lastError,
      };
    });

    if (next.status !== previous) {
      logger.info(
        { backend: backendId, from: previous, to: next.status, source },
        `Backend ${backendId} ${previous} -> ${next.status}`,
      );
    }
  }

  /** A rate-limit signal is not a health signal; only the check time moves. */
  recordRateLimited(backendId: string): void {
    const now = this.clock.now();
    this.store.update(backendId, (entry) => ({ ...entry, lastCheckedAt: now }));
  }

  /** Immutable copy of every registered backend's health. */
  snapshot(): HealthSnapshot {
    return this.store.snapshot(this.registry.ids(), (backendId, entry) => ({
      backendId,
      status: entry.status,
      consecutiveFailures: entry.consecutiveFailures,
      consecutiveSuccesses: entry.consecutiveSuccesses,
      backoffUntil: entry.backoffUntil,
      lastCheckedAt: entry.lastCheckedAt,
      lastError: entry.lastError,
    }));
  }
}
