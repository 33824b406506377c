/**
 * Rolling recent-usage counters per backend.
 * Feeds the ranker's load-spreading bias; never gates eligibility.
 */

import { KeyedStore } from '../shared/keyed-store.js';
import type { Clock } from '../shared/clock.js';
import type { CapabilityRegistry } from '../registry/capability-registry.js';

interface UsageEntry {
  /** Attempt timestamps inside the window, oldest first. */
  attempts: readonly number[];
}

/** Immutable point-in-time view of one backend's recent usage. */
export interface UsageSnapshotEntry {
  backendId: string;
  /** Attempts in the last windowMs. */
  count: number;
  /**
   * Recency-weighted count: each attempt weighs 1 when it just happened and
   * decays linearly to 0 at the edge of the window.
   */
  weighted: number;
  lastAttemptAt: number | null;
}

export type UsageSnapshot = ReadonlyMap<string, Readonly<UsageSnapshotEntry>>;

export class UsageRecorder {
  private readonly store = new KeyedStore<UsageEntry>(() => ({ attempts: [] }));

  constructor(
    private readonly registry: CapabilityRegistry,
    private readonly clock: Clock,
    private readonly windowMs: number = 300_000,
  ) {}

  private live(attempts: readonly number[], now: number): number[] {
    return attempts.filter((at) => now - at < this.windowMs);
  }

  /** Count one attempt against a backend. */
  record(backendId: string): void {
    const now = this.clock.now();
    this.store.update(backendId, (entry) => ({
      attempts: [...this.live(entry.attempts, now), now],
    }));
  }

  count(backendId: string): number {
    return this.live(this.store.get(backendId).attempts, this.clock.now()).length;
  }

  /** Immutable copy of every registered backend's recent usage. */
  snapshot(): UsageSnapshot {
    const now = this.clock.now();
    return this.store.snapshot(this.registry.ids(), (backendId, entry) => {
      const attempts = this.live(entry.attempts, now);
      const weighted = attempts.reduce((sum, at) => sum + (1 - (now - at) / this.windowMs), 0);
      return {
        backendId,
        count: attempts.length,
        weighted,
        lastAttemptAt: attempts.at(-1) ?? null,
      };
    });
  }
}
