/**
 * Advisory rate-limit ledger with per-backend window counters.
 *
 * Counts requests and tokens against each backend's configured budget and
 * tracks an "available-after" timestamp set when a budget is spent locally
 * or when the upstream signals a hard limit. The upstream provider stays
 * authoritative: the ledger only keeps the router from making calls that
 * are bound to be rejected.
 */

import { logger } from '../shared/logger.js';
import { KeyedStore } from '../shared/keyed-store.js';
import type { Clock } from '../shared/clock.js';
import type { CapabilityRegistry } from '../registry/capability-registry.js';
import type { RateLimitInfo } from '../providers/types.js';
import type { RateBudget } from '../config/types.js';
import type { LedgerEntry, RateLimitSnapshot, RateLimitSnapshotEntry } from './types.js';

/** Which budget dimension, if any, the entry has used up. */
function budgetSpent(budget: Readonly<RateBudget>, entry: Readonly<LedgerEntry>): string | null {
  if (entry.requestsConsumed >= budget.requestsPerWindow) {
    return 'request budget spent';
  }
  if (budget.tokensPerWindow !== undefined && entry.tokensConsumed >= budget.tokensPerWindow) {
    return 'token budget spent';
  }
  return null;
}

export class RateLimitLedger {
  private readonly store: KeyedStore<LedgerEntry>;
  /** Upstream limits already reported as below budget, as `backend:dimension:limit`. */
  private readonly reportedLimits = new Set<string>();

  /**
   * @param defaultCooldownMs - Cooldown applied on a rate-limit signal without
   *   a retry-after hint. Typically from config.settings.cooldownDefaultMs.
   */
  constructor(
    private readonly registry: CapabilityRegistry,
    private readonly clock: Clock,
    private readonly defaultCooldownMs: number,
  ) {
    this.store = new KeyedStore<LedgerEntry>(() => ({
      windowStart: null,
      requestsConsumed: 0,
      tokensConsumed: 0,
      availableAfter: 0,
      reason: '',
    }));
  }

  /**
   * Entry as seen at `now`. An elapsed window is closed: counters drop to zero
   * and no window is open until the next attempt, so reads never depend on
   * when they happen.
   */
  private current(backendId: string, entry: Readonly<LedgerEntry>, now: number): LedgerEntry {
    const { windowMs } = this.registry.get(backendId).rateLimits;
    if (entry.windowStart !== null && now - entry.windowStart >= windowMs) {
      return { ...entry, windowStart: null, requestsConsumed: 0, tokensConsumed: 0 };
    }
    return { ...entry };
  }

  /** Whether the backend's available-after timestamp has passed. */
  isAvailable(backendId: string): boolean {
    return this.store.get(backendId).availableAfter <= this.clock.now();
  }

  /**
   * Count one upstream attempt and its tokens.
   * Spending the request or token budget immediately pushes available-after
   * to the end of the current window.
   */
  recordAttempt(backendId: string, tokensUsed: number = 0): void {
    const budget = this.registry.get(backendId).rateLimits;
    const now = this.clock.now();

    const next = this.store.update(backendId, (entry) => {
      const updated = this.current(backendId, entry, now);
      const windowStart = updated.windowStart ?? now;
      updated.windowStart = windowStart;
      updated.requestsConsumed += 1;
      updated.tokensConsumed += tokensUsed;

      const spent = budgetSpent(budget, updated);
      if (spent !== null) {
        updated.availableAfter = Math.max(updated.availableAfter, windowStart + budget.windowMs);
        updated.reason = spent;
      }
      return updated;
    });

    const spent = budgetSpent(budget, next);
    if (spent !== null) {
      logger.info(
        { backend: backendId, requests: next.requestsConsumed, tokens: next.tokensConsumed },
        `Backend ${backendId} ${spent}, unavailable until window reset`,
      );
    }
  }

  /**
   * Apply an upstream rate-limit signal.
   * @param retryAfterMs - Explicit cooldown from a retry-after hint, in ms.
   */
  markRateLimited(backendId: string, retryAfterMs?: number, reason?: string): void {
    const now = this.clock.now();
    const cooldownMs = retryAfterMs ?? this.defaultCooldownMs;

    const next = this.store.update(backendId, (entry) => {
      const updated = this.current(backendId, entry, now);
      updated.availableAfter = Math.max(updated.availableAfter, now + cooldownMs);
      updated.reason = reason ?? 'rate limited upstream';
      return updated;
    });

    logger.info(
      { backend: backendId, cooldownMs, availableAfter: next.availableAfter },
      `Backend ${backendId} rate limited, cooldown ${cooldownMs}ms`,
    );
  }

  /**
   * Apply quota reported in upstream response headers.
   * A depleted request or token quota is treated as a rate-limit signal
   * lasting until the reported reset, or the retry-after hint without one.
   */
  applyUpstreamQuota(backendId: string, info: RateLimitInfo): void {
    this.checkUpstreamLimits(backendId, info);

    const requestsExhausted = info.remainingRequests === 0;
    const tokensExhausted = info.remainingTokens === 0;
    if (!requestsExhausted && !tokensExhausted) return;

    let cooldownMs: number | undefined;
    if (requestsExhausted && tokensExhausted) {
      cooldownMs = Math.max(info.resetRequestsMs ?? 0, info.resetTokensMs ?? 0) || undefined;
    } else if (requestsExhausted) {
      cooldownMs = info.resetRequestsMs;
    } else {
      cooldownMs = info.resetTokensMs;
    }

    this.markRateLimited(
      backendId,
      cooldownMs ?? info.retryAfterMs,
      requestsExhausted ? 'upstream: remaining requests = 0' : 'upstream: remaining tokens = 0',
    );
  }

  /** Warn once per value when the upstream allows less than the configured budget. */
  private checkUpstreamLimits(backendId: string, info: RateLimitInfo): void {
    const budget = this.registry.get(backendId).rateLimits;
    const checks: [string, number | undefined, number | undefined][] = [
      ['requests', info.limitRequests, budget.requestsPerWindow],
      ['tokens', info.limitTokens, budget.tokensPerWindow],
    ];

    for (const [dimension, upstream, configured] of checks) {
      if (upstream === undefined || configured === undefined || upstream >= configured) continue;
      const key = `${backendId}:${dimension}:${upstream}`;
      if (this.reportedLimits.has(key)) continue;
      this.reportedLimits.add(key);
      logger.warn(
        { backend: backendId, dimension, upstreamLimit: upstream, configuredBudget: configured },
        `Backend ${backendId} upstream ${dimension} limit ${upstream} is below the configured budget ${configured}`,
      );
    }
  }

  /** Snapshot entry for a backend as of now, without mutating the ledger. */
  private view(backendId: string, entry: Readonly<LedgerEntry>, now: number): RateLimitSnapshotEntry {
    const budget = this.registry.get(backendId).rateLimits;
    const current = this.current(backendId, entry, now);
    return {
      backendId,
      windowStart: current.windowStart,
      windowMs: budget.windowMs,
      requestsConsumed: current.requestsConsumed,
      requestBudget: budget.requestsPerWindow,
      tokensConsumed: current.tokensConsumed,
      tokenBudget: budget.tokensPerWindow ?? null,
      availableAfter: current.availableAfter,
      coolingDown: current.availableAfter > now,
      reason: current.availableAfter > now ? current.reason : '',
    };
  }

  /** Immutable copy of every registered backend's state. */
  snapshot(): RateLimitSnapshot {
    const now = this.clock.now();
    return this.store.snapshot(this.registry.ids(), (id, entry) => this.view(id, entry, now));
  }
}
