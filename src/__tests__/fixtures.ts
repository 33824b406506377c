/**
 * Shared test doubles and builders.
 */

import { vi } from 'vitest';
import { SettingsSchema } from '../config/schema.js';
import { backendId, CapabilityRegistry } from '../registry/capability-registry.js';
import type { BackendDescriptor } from '../registry/capability-registry.js';
import type { Clock } from '../shared/clock.js';
import type { Settings } from '../config/types.js';
import type { ChatCompletionRequest, ChatCompletionResponse, Usage } from '../shared/types.js';
import type { BackendInvoker, InvokeResult } from '../providers/types.js';

/** Clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(public current: number = 1_000_000) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

export function makeDescriptor(
  providerId: string,
  model: string,
  overrides: Partial<Omit<BackendDescriptor, 'id' | 'providerId' | 'model'>> = {},
): BackendDescriptor {
  return {
    id: backendId(providerId, model),
    providerId,
    model,
    category: 'fast',
    priority: 1,
    benchmarks: { mmlu: 70 },
    costPerMillionTokens: 0,
    rateLimits: { requestsPerWindow: 100, windowMs: 60_000 },
    ...overrides,
  };
}

export function makeRegistry(...descriptors: BackendDescriptor[]): CapabilityRegistry {
  return new CapabilityRegistry(descriptors);
}

/** Fully defaulted settings, with overrides merged into the raw document. */
export function makeSettings(overrides: Record<string, unknown> = {}): Settings {
  return SettingsSchema.parse({ apiKeys: ['test-key'], ...overrides });
}

export function makeRequest(content: string = 'Hello'): ChatCompletionRequest {
  return { messages: [{ role: 'user', content }] };
}

export const TEST_USAGE: Usage = { prompt_tokens: 10, completion_tokens: 20, total_tokens: 30 };

export function makeResponse(model: string, usage: Usage = TEST_USAGE): ChatCompletionResponse {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 1_700_000_000,
    model,
    choices: [
      {
        index: 0,
        message: { role: 'assistant', content: 'Test response' },
        finish_reason: 'stop',
      },
    ],
    usage,
  };
}

export function success(model: string = 'test-model', usage: Usage = TEST_USAGE): InvokeResult {
  return {
    kind: 'success',
    payload: makeResponse(model, usage),
    usage,
    rateLimit: null,
    latencyMs: 5,
  };
}

export const transient = (reason: string = '500: upstream error'): InvokeResult => ({
  kind: 'transient',
  reason,
});

export const rateLimited = (retryAfterMs?: number): InvokeResult => ({
  kind: 'rate_limited',
  reason: '429_rate_limited',
  ...(retryAfterMs !== undefined && { retryAfterMs }),
});

export const fatal = (statusCode: number = 400): InvokeResult => ({
  kind: 'fatal',
  reason: `${statusCode}: bad request`,
  statusCode,
});

/** Invoker answering from a per-backend script; unscripted backends succeed. */
export function scriptedInvoker(script: Record<string, InvokeResult | InvokeResult[]>) {
  const calls: string[] = [];
  const invoke = vi.fn(
    async (id: string, _request: ChatCompletionRequest, _signal: AbortSignal): Promise<InvokeResult> => {
      calls.push(id);
      const entry = script[id];
      if (entry === undefined) return success(id);
      if (!Array.isArray(entry)) return entry;
      return entry.shift() ?? success(id);
    },
  );
  const invoker: BackendInvoker = { invoke };
  return { invoker, invoke, calls };
}
