/**
 * Model router: the single entry point the HTTP layer calls.
 * Runs classifier -> ranker -> orchestrator against point-in-time snapshots
 * of the shared backend state and returns a tagged outcome with the full
 * per-candidate trace. Routing failures are returned, never thrown.
 */

import { logger } from '../shared/logger.js';
import { systemClock } from '../shared/clock.js';
import type { Clock } from '../shared/clock.js';
import type { ChatCompletionRequest } from '../shared/types.js';
import type { Settings } from '../config/types.js';
import type { CapabilityRegistry } from '../registry/capability-registry.js';
import { RateLimitLedger } from '../ratelimit/ledger.js';
import type { RateLimitSnapshot } from '../ratelimit/types.js';
import { HealthTracker } from '../health/tracker.js';
import type { HealthSnapshot } from '../health/types.js';
import { UsageRecorder } from '../usage/recorder.js';
import type { UsageSnapshot } from '../usage/recorder.js';
import type { BackendInvoker } from '../providers/types.js';
import { resolveCategory } from './classifier.js';
import { findIneligible, rank } from './ranker.js';
import type { RankingState } from './ranker.js';
import { execute } from './orchestrator.js';
import { FeedbackRecorder } from './feedback.js';
import { HitRateMonitor } from '../ratelimit/hit-rate.js';
import type { RouteOutcome } from './types.js';

export interface ModelRouterDeps {
  registry: CapabilityRegistry;
  ledger: RateLimitLedger;
  health: HealthTracker;
  usage: UsageRecorder;
  alerts: HitRateMonitor;
  invoker: BackendInvoker;
  settings: Pick<Settings, 'classifier' | 'ranking' | 'usage' | 'requestTimeoutMs'>;
  clock?: Clock;
}

export interface RouteOptions {
  /** Caller-side cancellation, observed between candidates. */
  signal?: AbortSignal;
}

export class ModelRouter {
  readonly registry: CapabilityRegistry;
  readonly ledger: RateLimitLedger;
  readonly feedback: FeedbackRecorder;
  private readonly clock: Clock;

  constructor(private readonly deps: ModelRouterDeps) {
    this.registry = deps.registry;
    this.ledger = deps.ledger;
    this.clock = deps.clock ?? systemClock;
    this.feedback = new FeedbackRecorder(deps.ledger, deps.health, deps.usage, deps.alerts);
  }

  private rankingState(): RankingState {
    return {
      ledger: this.deps.ledger.snapshot(),
      health: this.deps.health.snapshot(),
      usage: this.deps.usage.snapshot(),
    };
  }

  /** Classify, rank and execute a request. */
  async routeAndExecute(
    request: ChatCompletionRequest,
    options: RouteOptions = {},
  ): Promise<RouteOutcome> {
    const { settings, invoker } = this.deps;
    const startedAt = this.clock.now();

    const classification = resolveCategory(request, settings.classifier);
    const state = this.rankingState();
    const now = this.clock.now();
    const candidates = rank(classification.category, this.registry, state, {
      weights: settings.ranking.weights,
      saturationCount: settings.usage.saturationCount,
      now,
    });

    logger.debug(
      {
        category: classification.category,
        rule: classification.rule,
        confidence: classification.confidence,
        candidates: candidates.map((c) => c.backendId),
      },
      `Routing ${classification.category} request across ${candidates.length} candidate(s)`,
    );

    if (candidates.length === 0) {
      const ineligible = findIneligible(this.registry, state, now);
      logger.warn(
        { category: classification.category, ineligible },
        `No eligible backend for category ${classification.category}`,
      );
      return {
        status: 'no_eligible_candidates',
        classification,
        candidates,
        ineligible,
        trace: [],
        latencyMs: this.clock.now() - startedAt,
      };
    }

    const outcome = await execute(
      candidates.map((c) => c.backendId),
      (backendId, signal) => invoker.invoke(backendId, request, signal),
      {
        timeoutMs: settings.requestTimeoutMs,
        feedback: this.feedback,
        clock: this.clock,
        ...(options.signal && { signal: options.signal }),
      },
    );

    return {
      ...outcome,
      classification,
      candidates,
      latencyMs: this.clock.now() - startedAt,
    };
  }

  getHealthSnapshot(): HealthSnapshot {
    return this.deps.health.snapshot();
  }

  getRateLimitSnapshot(): RateLimitSnapshot {
    return this.deps.ledger.snapshot();
  }

  getUsageSnapshot(): UsageSnapshot {
    return this.deps.usage.snapshot();
  }
}

/** Build the router and its state stores from validated settings. */
export function createModelRouter(
  registry: CapabilityRegistry,
  invoker: BackendInvoker,
  settings: Settings,
  clock: Clock = systemClock,
): ModelRouter {
  return new ModelRouter({
    registry,
    invoker,
    settings,
    clock,
    ledger: new RateLimitLedger(registry, clock, settings.cooldownDefaultMs),
    health: new HealthTracker(registry, clock, settings.health),
    usage: new UsageRecorder(registry, clock, settings.usage.windowMs),
    alerts: new HitRateMonitor(clock, settings.alerts),
  });
}
