import { describe, it, expect } from 'vitest';
import { createModelRouter } from '../router.js';
import {
  fatal,
  makeDescriptor,
  makeRegistry,
  makeRequest,
  makeSettings,
  ManualClock,
  rateLimited,
  scriptedInvoker,
  success,
  transient,
} from '../../__tests__/fixtures.js';
import type { BackendInvoker, InvokeResult } from '../../providers/types.js';

const A = 'groq:llama-a';
const B = 'cerebras:llama-b';
const P = 'openrouter:big';

function setup(script: Record<string, InvokeResult | InvokeResult[]> = {}) {
  const clock = new ManualClock();
  const registry = makeRegistry(
    makeDescriptor('groq', 'llama-a', { priority: 1, benchmarks: { mmlu: 80 } }),
    makeDescriptor('cerebras', 'llama-b', { priority: 2, benchmarks: { mmlu: 70 } }),
    makeDescriptor('openrouter', 'big', { category: 'powerful', benchmarks: { mmlu: 90 } }),
  );
  const scripted = scriptedInvoker(script);
  const router = createModelRouter(registry, scripted.invoker, makeSettings(), clock);
  return { clock, router, ...scripted };
}

describe('ModelRouter.routeAndExecute', () => {
  it('falls back past a rate-limited backend and cools it down', async () => {
    const { router, calls, clock } = setup({ [A]: rateLimited(5000) });

    const outcome = await router.routeAndExecute(makeRequest());

    expect(outcome.status).toBe('success');
    if (outcome.status !== 'success') return;
    expect(outcome.backendId).toBe(B);
    expect(calls).toEqual([A, B]);
    expect(router.getRateLimitSnapshot().get(A)?.availableAfter).toBe(clock.now() + 5000);
    expect(router.getRateLimitSnapshot().get(A)?.coolingDown).toBe(true);
  });

  it('skips a cooling backend on the next request', async () => {
    const { router, calls } = setup({ [A]: rateLimited(5000) });

    await router.routeAndExecute(makeRequest());
    const second = await router.routeAndExecute(makeRequest());

    expect(second.candidates.map((c) => c.backendId)).toEqual([B]);
    expect(calls).toEqual([A, B, B]);
  });

  it('records exactly one usage entry and keeps the backend healthy on success', async () => {
    const { router } = setup();

    const outcome = await router.routeAndExecute(makeRequest());

    expect(outcome.status).toBe('success');
    expect(router.getUsageSnapshot().get(A)?.count).toBe(1);
    expect(router.getUsageSnapshot().get(B)?.count).toBe(0);
    expect(router.getHealthSnapshot().get(A)?.status).toBe('healthy');
    expect(router.getRateLimitSnapshot().get(A)?.requestsConsumed).toBe(1);
    expect(router.getRateLimitSnapshot().get(A)?.tokensConsumed).toBe(30);
  });

  it('returns identical snapshots when nothing happens in between', async () => {
    const { router } = setup();
    await router.routeAndExecute(makeRequest());

    expect(router.getHealthSnapshot()).toEqual(router.getHealthSnapshot());
    expect(router.getRateLimitSnapshot()).toEqual(router.getRateLimitSnapshot());
    expect(router.getUsageSnapshot()).toEqual(router.getUsageSnapshot());
  });

  it('carries the classification and latency on every outcome', async () => {
    const { router, clock } = setup();

    const outcome = await router.routeAndExecute(makeRequest());

    expect(outcome.classification).toMatchObject({ category: 'fast', rule: 'default' });
    expect(outcome.candidates.map((c) => c.backendId)).toEqual([A, B]);
    expect(outcome.latencyMs).toBe(0);
    expect(clock.now()).toBe(1_000_000);
  });

  it('honors an explicit category', async () => {
    const { router, calls } = setup();

    const outcome = await router.routeAndExecute({ ...makeRequest(), category: 'powerful' });

    expect(outcome.classification).toEqual(
      expect.objectContaining({ category: 'powerful', confidence: 1, rule: 'override' }),
    );
    expect(outcome.status).toBe('success');
    expect(calls).toEqual([P]);
  });

  it('is exhausted when every candidate fails transiently', async () => {
    const { router } = setup({ [A]: transient(), [B]: transient('timeout') });

    const outcome = await router.routeAndExecute(makeRequest());

    expect(outcome.status).toBe('exhausted');
    expect(outcome.trace.map((t) => t.backendId)).toEqual([A, B]);
    expect(router.getHealthSnapshot().get(A)?.consecutiveFailures).toBe(1);
  });

  it('does not penalize a backend for a fatal error', async () => {
    const { router, calls } = setup({ [A]: fatal(400) });

    const outcome = await router.routeAndExecute(makeRequest());

    expect(outcome.status).toBe('fatal');
    expect(calls).toEqual([A]);
    expect(router.getHealthSnapshot().get(A)).toMatchObject({ status: 'healthy', consecutiveFailures: 0 });
  });

  it('falls back to the other category when the requested one is ineligible', async () => {
    const { router, calls } = setup({ [A]: rateLimited(5000), [B]: rateLimited(5000) });

    await router.routeAndExecute(makeRequest());
    const outcome = await router.routeAndExecute(makeRequest());

    expect(outcome.status).toBe('success');
    expect(outcome.classification.category).toBe('fast');
    expect(outcome.candidates.map((c) => [c.backendId, c.category])).toEqual([[P, 'powerful']]);
    expect(calls).toEqual([A, B, P]);
  });

  it('reports why nothing was eligible', async () => {
    const clock = new ManualClock();
    const registry = makeRegistry(makeDescriptor('groq', 'llama-a'));
    const { invoker, calls } = scriptedInvoker({ [A]: transient() });
    const router = createModelRouter(registry, invoker, makeSettings(), clock);

    const first = await router.routeAndExecute(makeRequest());
    const second = await router.routeAndExecute(makeRequest());

    expect(first.status).toBe('exhausted');
    expect(second.status).toBe('no_eligible_candidates');
    if (second.status !== 'no_eligible_candidates') return;
    expect(second.trace).toEqual([]);
    expect(second.ineligible).toEqual([
      { backendId: A, category: 'fast', reason: 'backoff', until: clock.now() + 2000 },
    ]);
    expect(calls).toEqual([A]);
  });

  it('makes the backend eligible again once its backoff passes', async () => {
    const clock = new ManualClock();
    const registry = makeRegistry(makeDescriptor('groq', 'llama-a'));
    const { invoker } = scriptedInvoker({ [A]: [transient()] });
    const router = createModelRouter(registry, invoker, makeSettings(), clock);

    await router.routeAndExecute(makeRequest());
    clock.advance(2000);
    const outcome = await router.routeAndExecute(makeRequest());

    expect(outcome.status).toBe('success');
  });

  it('returns cancelled when the caller has already gone', async () => {
    const { router, calls } = setup();
    const controller = new AbortController();
    controller.abort();

    const outcome = await router.routeAndExecute(makeRequest(), { signal: controller.signal });

    expect(outcome.status).toBe('cancelled');
    expect(calls).toEqual([]);
  });

  it('cools a backend down even when the caller left during the call', async () => {
    const clock = new ManualClock();
    const registry = makeRegistry(makeDescriptor('groq', 'llama-a'), makeDescriptor('cerebras', 'llama-b'));
    const controller = new AbortController();
    const invoker: BackendInvoker = {
      invoke: async () => {
        controller.abort();
        return rateLimited(30_000);
      },
    };
    const router = createModelRouter(registry, invoker, makeSettings(), clock);

    const outcome = await router.routeAndExecute(makeRequest(), { signal: controller.signal });

    expect(outcome.status).toBe('cancelled');
    expect(outcome.trace).toHaveLength(1);
    expect(router.getRateLimitSnapshot().get(A)?.availableAfter).toBe(clock.now() + 30_000);
  });
});

describe('ModelRouter under concurrent requests', () => {
  function deferred() {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => {
      resolve = r;
    });
    return { promise, resolve };
  }

  function setupGated(answer: (id: string) => InvokeResult) {
    const clock = new ManualClock();
    const registry = makeRegistry(
      makeDescriptor('groq', 'llama-a', { priority: 1, benchmarks: { mmlu: 80 } }),
      makeDescriptor('cerebras', 'llama-b', { priority: 2, benchmarks: { mmlu: 70 } }),
    );
    const gates = new Map<string, ReturnType<typeof deferred>>([
      [A, deferred()],
      [B, deferred()],
    ]);
    const calls: string[] = [];
    const invoker: BackendInvoker = {
      invoke: async (id) => {
        calls.push(id);
        await gates.get(id)?.promise;
        return answer(id);
      },
    };
    const router = createModelRouter(registry, invoker, makeSettings(), clock);
    return { router, gates, calls };
  }

  it('counts every attempt from overlapping requests', async () => {
    const { router, gates, calls } = setupGated((id) => (id === A ? rateLimited(5000) : success(id)));

    const pending = Promise.all(Array.from({ length: 5 }, () => router.routeAndExecute(makeRequest())));
    gates.get(A)?.resolve();
    gates.get(B)?.resolve();
    const outcomes = await pending;

    expect(outcomes.map((o) => o.status)).toEqual(['success', 'success', 'success', 'success', 'success']);
    expect(outcomes.every((o) => o.candidates[0]?.backendId === A)).toBe(true);
    expect(calls.filter((id) => id === A)).toHaveLength(5);
    expect(calls.filter((id) => id === B)).toHaveLength(5);
    expect(router.getRateLimitSnapshot().get(A)?.requestsConsumed).toBe(5);
    expect(router.getRateLimitSnapshot().get(B)?.requestsConsumed).toBe(5);
    expect(router.getRateLimitSnapshot().get(B)?.tokensConsumed).toBe(150);
    expect(router.getUsageSnapshot().get(A)?.count).toBe(5);
    expect(router.getUsageSnapshot().get(B)?.count).toBe(5);
  });

  it('shows a cooldown from one request to a request ranked after it', async () => {
    const { router, gates, calls } = setupGated((id) => (id === A ? rateLimited(5000) : success(id)));
    gates.get(A)?.resolve();

    const first = router.routeAndExecute(makeRequest());
    // Wait until the first request has moved on to B and is parked there.
    while (!calls.includes(B)) {
      await new Promise<void>((resolve) => setImmediate(resolve));
    }
    const second = router.routeAndExecute(makeRequest());
    gates.get(B)?.resolve();
    const [one, two] = await Promise.all([first, second]);

    expect(one.candidates.map((c) => c.backendId)).toEqual([A, B]);
    expect(two.candidates.map((c) => c.backendId)).toEqual([B]);
    expect(calls).toEqual([A, B, B]);
    expect(two.status).toBe('success');
  });
});

