/**
 * Fallback orchestrator.
 * Walks a ranked candidate list one backend at a time and returns the first
 * success. Each step is an explicit transition of the chain state machine
 * rather than an exception path:
 *
 *   pending -> trying(0) -> success | trying(1) | ... | exhausted
 *
 * rate_limited and transient results advance immediately with no delay;
 * fatal aborts the chain; caller cancellation is observed between
 * candidates. At most candidates.length attempts are made.
 */

import { logger } from '../shared/logger.js';
import { systemClock } from '../shared/clock.js';
import type { Clock } from '../shared/clock.js';
import type { InvokeResult } from '../providers/types.js';
import type { OutcomeSink } from './feedback.js';
import type { AttemptTrace, ChainEvent, ChainOutcome, ChainState } from './types.js';

/** Performs one attempt against a backend. */
export type InvokeFn = (backendId: string, signal: AbortSignal) => Promise<InvokeResult>;

export interface ExecuteOptions {
  /** Caller-side cancellation. */
  signal?: AbortSignal;
  /** Upper bound for a single attempt; an attempt exceeding it counts as transient. */
  timeoutMs: number;
  /** Receives every attempt result that should update backend state. */
  feedback?: OutcomeSink;
  clock?: Clock;
}

/** Pure transition function of the chain state machine. */
export function transition(state: ChainState, event: ChainEvent, length: number): ChainState {
  if (state.phase !== 'pending' && state.phase !== 'trying') return state;

  if (event.type === 'cancel') {
    return { phase: 'cancelled', index: state.phase === 'trying' ? state.index : 0 };
  }

  if (state.phase === 'pending') {
    if (event.type !== 'start') return state;
    return length > 0 ? { phase: 'trying', index: 0 } : { phase: 'exhausted' };
  }

  if (event.type !== 'result') return state;

  switch (event.kind) {
    case 'success':
      return { phase: 'success', index: state.index };
    case 'fatal':
      return { phase: 'fatal', index: state.index };
    case 'transient':
    case 'rate_limited':
      return state.index + 1 < length
        ? { phase: 'trying', index: state.index + 1 }
        : { phase: 'exhausted' };
  }
}

/**
 * Run one attempt, bounded by timeoutMs.
 * The attempt's signal fires only on timeout; caller cancellation is left to
 * the loop between candidates so an in-flight result is never lost. If the
 * invoker ignores the signal the timer still settles the attempt as
 * transient. A thrown invoker error, sync or async, is treated as transient.
 */
async function attempt(invoke: InvokeFn, backendId: string, timeoutMs: number): Promise<InvokeResult> {
  const timeout = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<InvokeResult>((resolve) => {
    timer = setTimeout(() => {
      timeout.abort(new DOMException('Attempt timed out', 'TimeoutError'));
      resolve({ kind: 'transient', reason: `timeout_${timeoutMs}ms` });
    }, timeoutMs);
  });

  const call = Promise.resolve()
    .then(() => invoke(backendId, timeout.signal))
    .catch(
      (error: unknown): InvokeResult => ({
        kind: 'transient',
        reason: error instanceof Error ? error.message : String(error),
      }),
    );

  try {
    return await Promise.race([call, expired]);
  } finally {
    clearTimeout(timer);
  }
}

/** Execute a candidate list, returning the first success or a typed failure. */
export async function execute(
  candidates: readonly string[],
  invoke: InvokeFn,
  options: ExecuteOptions,
): Promise<ChainOutcome> {
  const clock = options.clock ?? systemClock;
  const trace: AttemptTrace[] = [];
  let state = transition({ phase: 'pending' }, { type: 'start' }, candidates.length);

  while (state.phase === 'trying') {
    const index = state.index;
    const backendId = candidates[index];
    if (backendId === undefined) break;

    if (options.signal?.aborted) {
      state = transition(state, { type: 'cancel' }, candidates.length);
      break;
    }

    const startedAt = clock.now();
    const result = await attempt(invoke, backendId, options.timeoutMs);
    const latencyMs = clock.now() - startedAt;

    options.feedback?.report(backendId, result);
    trace.push({
      backendId,
      outcome: result.kind,
      ...(result.kind !== 'success' && { reason: result.reason }),
      ...(result.kind === 'rate_limited' &&
        result.retryAfterMs !== undefined && { retryAfterMs: result.retryAfterMs }),
      latencyMs,
    });

    // The caller left while this attempt was in flight; its result is recorded above.
    const failed = result.kind === 'transient' || result.kind === 'rate_limited';
    if (failed && options.signal?.aborted) {
      state = transition(state, { type: 'cancel' }, candidates.length);
      break;
    }

    state = transition(state, { type: 'result', kind: result.kind }, candidates.length);

    if (result.kind === 'success') {
      logger.info(
        { backend: backendId, latencyMs, attempts: trace.length },
        `Served by ${backendId} (${latencyMs}ms, ${trace.length} attempt(s))`,
      );
      return { status: 'success', backendId, payload: result.payload, usage: result.usage, trace };
    }

    if (result.kind === 'fatal') {
      logger.info(
        { backend: backendId, statusCode: result.statusCode, reason: result.reason },
        `Backend ${backendId} returned a fatal error, aborting chain`,
      );
      return {
        status: 'fatal',
        backendId,
        reason: result.reason,
        ...(result.statusCode !== undefined && { statusCode: result.statusCode }),
        trace,
      };
    }

    const next = state.phase === 'trying' ? candidates[state.index] : undefined;
    logger.info(
      { backend: backendId, outcome: result.kind, reason: result.reason, next: next ?? null },
      `Backend ${backendId} ${result.kind}: ${result.reason}${next ? ` -> next: ${next}` : ''}`,
    );
  }

  if (state.phase === 'cancelled') {
    logger.info({ attempts: trace.length }, `Request cancelled after ${trace.length} attempt(s)`);
    return { status: 'cancelled', trace };
  }

  if (candidates.length > 0) {
    logger.warn(
      { attempts: trace.length, failures: trace.map((t) => `${t.backendId}: ${t.reason ?? t.outcome}`) },
      `All ${trace.length} candidate(s) failed`,
    );
  }
  return { status: 'exhausted', trace };
}
