/**
 * Applies invocation results to the shared backend state.
 * Both live traffic and health probes report through here, so a probe
 * result is recorded exactly like the same result from a real request.
 */

import type { RateLimitLedger } from '../ratelimit/ledger.js';
import type { HealthTracker } from '../health/tracker.js';
import type { SignalSource } from '../health/types.js';
import type { UsageRecorder } from '../usage/recorder.js';
import type { HitRateMonitor } from '../ratelimit/hit-rate.js';
import type { InvokeResult } from '../providers/types.js';

/** Receives the result of every attempt against a backend. */
export interface OutcomeSink {
  report(backendId: string, result: InvokeResult, source?: SignalSource): void;
}

export class FeedbackRecorder implements OutcomeSink {
  constructor(
    private readonly ledger: RateLimitLedger,
    private readonly health: HealthTracker,
    private readonly usage: UsageRecorder,
    private readonly alerts: HitRateMonitor,
  ) {}

  report(backendId: string, result: InvokeResult, source: SignalSource = 'traffic'): void {
    // Probes are synthetic and do not count toward load spreading.
    if (source === 'traffic') {
      this.usage.record(backendId);
      this.alerts.record(backendId, result.kind === 'rate_limited');
    }

    switch (result.kind) {
      case 'success':
        this.ledger.recordAttempt(backendId, result.usage?.total_tokens ?? 0);
        if (result.rateLimit) {
          this.ledger.applyUpstreamQuota(backendId, result.rateLimit);
        }
        this.health.recordSuccess(backendId, source);
        return;

      case 'rate_limited':
        this.ledger.recordAttempt(backendId);
        this.ledger.markRateLimited(backendId, result.retryAfterMs, result.reason);
        this.health.recordRateLimited(backendId);
        return;

      case 'transient':
        this.ledger.recordAttempt(backendId);
        this.health.recordFailure(backendId, result.reason, source);
        return;

      case 'fatal':
        // The request was at fault, not the backend.
        this.ledger.recordAttempt(backendId);
        return;
    }
  }
}
