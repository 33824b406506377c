/**
 * Background probe loop.
 * Periodically sends a minimal chat completion to every backend that is not
 * cooling down on a rate limit and records the result exactly like live
 * traffic, so unavailable backends can recover without user requests.
 */

import { logger } from '../shared/logger.js';
import type { ChatCompletionRequest } from '../shared/types.js';
import type { ProbeSettings } from '../config/types.js';
import type { CapabilityRegistry } from '../registry/capability-registry.js';
import type { RateLimitLedger } from '../ratelimit/ledger.js';
import type { BackendInvoker, InvokeResult } from '../providers/types.js';
import type { OutcomeSink } from '../routing/feedback.js';

export const PROBE_REQUEST: ChatCompletionRequest = {
  messages: [{ role: 'user', content: 'ping' }],
  max_tokens: 1,
  temperature: 0,
};

export interface ProbeResult {
  backendId: string;
  kind: InvokeResult['kind'] | 'skipped';
}

export interface HealthProberDeps {
  registry: CapabilityRegistry;
  ledger: RateLimitLedger;
  invoker: BackendInvoker;
  feedback: OutcomeSink;
}

export class HealthProber {
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<ProbeResult[]> | null = null;

  constructor(
    private readonly deps: HealthProberDeps,
    private readonly settings: ProbeSettings,
  ) {}

  get running(): boolean {
    return this.timer !== null;
  }

  /** Start the interval. No-op when disabled or already started. */
  start(): void {
    if (!this.settings.enabled || this.timer) return;

    this.timer = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        logger.error({ err: error }, 'Health probe cycle failed');
      });
    }, this.settings.intervalMs);
    // Probing alone must not keep the process alive.
    this.timer.unref();

    logger.info(
      { intervalMs: this.settings.intervalMs, backends: this.deps.registry.size },
      `Health probes every ${this.settings.intervalMs}ms`,
    );
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Probe every eligible backend once, concurrently.
   * Overlapping calls share the cycle already in flight.
   */
  runOnce(): Promise<ProbeResult[]> {
    if (!this.inFlight) {
      this.inFlight = this.cycle().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async cycle(): Promise<ProbeResult[]> {
    const results = await Promise.all(
      this.deps.registry.ids().map((backendId) => this.probe(backendId)),
    );

    const probed = results.filter((r) => r.kind !== 'skipped');
    logger.debug(
      {
        probed: probed.length,
        failed: probed.filter((r) => r.kind !== 'success').length,
        skipped: results.length - probed.length,
      },
      `Health probe cycle: ${probed.length} probed`,
    );
    return results;
  }

  private async probe(backendId: string): Promise<ProbeResult> {
    if (!this.deps.ledger.isAvailable(backendId)) {
      return { backendId, kind: 'skipped' };
    }

    let result: InvokeResult;
    try {
      result = await this.deps.invoker.invoke(
        backendId,
        PROBE_REQUEST,
        AbortSignal.timeout(this.settings.timeoutMs),
      );
    } catch (error: unknown) {
      result = {
        kind: 'transient',
        reason: error instanceof Error ? error.message : String(error),
      };
    }

    this.deps.feedback.report(backendId, result, 'probe');
    return { backendId, kind: result.kind };
  }
}
