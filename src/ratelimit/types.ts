/**
 * Rate limit ledger types.
 * Defines the per-backend window counters and the snapshot the ranker reads.
 */

/** Internal ledger entry for one backend. */
export interface LedgerEntry {
  /** Start of the current counting window (ms); null until an attempt opens one. */
  windowStart: number | null;
  requestsConsumed: number;
  tokensConsumed: number;
  /** Backend is excluded from ranking until this timestamp (ms). Never moves backwards. */
  availableAfter: number;
  /** Human-readable reason for the last availability downgrade. */
  reason: string;
}

/** Immutable point-in-time view of one backend's rate-limit state. */
export interface RateLimitSnapshotEntry {
  backendId: string;
  /** Null when no attempt has been counted in a live window. */
  windowStart: number | null;
  windowMs: number;
  requestsConsumed: number;
  requestBudget: number;
  tokensConsumed: number;
  /** Null when the backend declares no token budget. */
  tokenBudget: number | null;
  availableAfter: number;
  /** True when availableAfter is still in the future. */
  coolingDown: boolean;
  reason: string;
}

export type RateLimitSnapshot = ReadonlyMap<string, Readonly<RateLimitSnapshotEntry>>;
