/**
 * HTTP backend invoker.
 * Resolves a backend id to its provider adapter and model, performs one
 * chat completion and classifies the result for the fallback orchestrator:
 *
 * - 2xx                         -> success
 * - 429                         -> rate_limited (retry-after honoured)
 * - 402                         -> rate_limited with a long cooldown (credits exhausted)
 * - 400, 401, 403, 404, 422     -> fatal (retrying elsewhere cannot help)
 * - 408, 409, 5xx, timeouts, network failures -> transient
 */

import { logger } from '../shared/logger.js';
import { ProviderError, ProviderRateLimitError } from '../shared/errors.js';
import { parseRetryAfter } from './utils.js';
import type { ChatCompletionRequest } from '../shared/types.js';
import type { CapabilityRegistry } from '../registry/capability-registry.js';
import type { BackendInvoker, InvokeResult, ProviderRegistry } from './types.js';

/** Cooldown applied when an upstream reports exhausted credits. */
export const PAYMENT_REQUIRED_COOLDOWN_MS = 300_000;

const FATAL_STATUSES = new Set([400, 401, 403, 404, 422]);

/** Map a thrown adapter error to an invocation result. */
export function classifyError(error: unknown): Exclude<InvokeResult, { kind: 'success' }> {
  if (error instanceof ProviderRateLimitError) {
    const retryAfterMs = parseRetryAfter(error.headers.get('retry-after'));
    return {
      kind: 'rate_limited',
      reason: '429_rate_limited',
      ...(retryAfterMs !== undefined && { retryAfterMs }),
    };
  }

  if (error instanceof ProviderError) {
    if (error.statusCode === 402) {
      return {
        kind: 'rate_limited',
        reason: '402 payment required (credits exhausted)',
        retryAfterMs: PAYMENT_REQUIRED_COOLDOWN_MS,
      };
    }
    if (FATAL_STATUSES.has(error.statusCode)) {
      return {
        kind: 'fatal',
        reason: `${error.statusCode}: ${error.responseBody || error.message}`,
        statusCode: error.statusCode,
      };
    }
    return { kind: 'transient', reason: `${error.statusCode}: ${error.message}` };
  }

  if (error instanceof Error && error.name === 'TimeoutError') {
    return { kind: 'transient', reason: 'timeout' };
  }

  if (error instanceof Error && error.name === 'AbortError') {
    return { kind: 'transient', reason: 'aborted' };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { kind: 'transient', reason: message };
}

export class HttpBackendInvoker implements BackendInvoker {
  constructor(
    private readonly capabilities: CapabilityRegistry,
    private readonly providers: ProviderRegistry,
  ) {}

  async invoke(
    backendId: string,
    request: ChatCompletionRequest,
    signal: AbortSignal,
  ): Promise<InvokeResult> {
    const descriptor = this.capabilities.get(backendId);
    const adapter = this.providers.get(descriptor.providerId);

    try {
      const response = await adapter.chatCompletion(descriptor.model, request, signal);
      return {
        kind: 'success',
        payload: response.body,
        usage: response.body.usage ?? null,
        rateLimit: response.rateLimit,
        latencyMs: response.latencyMs,
      };
    } catch (error: unknown) {
      const result = classifyError(error);
      logger.debug(
        { backend: backendId, kind: result.kind, reason: result.reason },
        `Backend ${backendId} invocation failed`,
      );
      return result;
    }
  }
}
