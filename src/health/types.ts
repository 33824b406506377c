/**
 * Health tracking types.
 */

export type HealthStatus = 'healthy' | 'degraded' | 'unavailable';

/** Where a health signal came from. */
export type SignalSource = 'traffic' | 'probe';

/** Internal health entry for one backend. */
export interface HealthEntry {
  status: HealthStatus;
  consecutiveFailures: number;
  /** Consecutive successes since the last failure; drives recovery out of degraded. */
  consecutiveSuccesses: number;
  /** When the current failure streak started; streaks older than the tracking window restart. */
  failureStreakStart: number | null;
  /** Backend is excluded from ranking until this timestamp after a transient failure. */
  backoffUntil: number | null;
  lastCheckedAt: number | null;
  lastError: string | null;
}

/** Immutable point-in-time view of one backend's health. */
export interface HealthSnapshotEntry {
  backendId: string;
  status: HealthStatus;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  backoffUntil: number | null;
  lastCheckedAt: number | null;
  lastError: string | null;
}

export type HealthSnapshot = ReadonlyMap<string, Readonly<HealthSnapshotEntry>>;

/** Thresholds of the health state machine. */
export interface HealthOptions {
  /** Consecutive failures that flip healthy to degraded. */
  degradedAfter: number;
  /** Consecutive failures that flip to unavailable. */
  unavailableAfter: number;
  /** Consecutive successes needed to clear degraded. */
  recoverySuccesses: number;
  /** A failure streak older than this restarts from zero. */
  failureWindowMs: number;
  /** Re-eligibility backoff: base * 2^failures, capped at backoffMaxMs. */
  backoffBaseMs: number;
  backoffMaxMs: number;
}
