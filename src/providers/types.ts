/**
 * Provider adapter and backend invocation types.
 * Adapters speak HTTP to one upstream; the invoker turns an adapter call
 * into the normalized outcome the fallback orchestrator consumes.
 */

import type { ChatCompletionRequest, ChatCompletionResponse, Usage } from '../shared/types.js';

/** Normalized rate limit information from any provider's response headers. */
export interface RateLimitInfo {
  /** Maximum requests allowed in the rate limit window. */
  limitRequests?: number;
  /** Requests remaining in the current window. */
  remainingRequests?: number;
  /** Milliseconds until the request limit resets. */
  resetRequestsMs?: number;
  /** Maximum tokens allowed in the rate limit window. */
  limitTokens?: number;
  /** Tokens remaining in the current window. */
  remainingTokens?: number;
  /** Milliseconds until the token limit resets. */
  resetTokensMs?: number;
  /** Explicit retry-after from a 429 response, in milliseconds. */
  retryAfterMs?: number;
}

/** Normalized response from a provider's chat completion endpoint. */
export interface ProviderResponse {
  status: number;
  body: ChatCompletionResponse;
  /** Quota parsed from the response headers, if the upstream sent any. */
  rateLimit: RateLimitInfo | null;
  latencyMs: number;
}

/**
 * Uniform interface for all provider adapters.
 * The invoker works exclusively through this interface.
 */
export interface ProviderAdapter {
  /** Unique provider instance ID from config. */
  readonly id: string;
  /** Provider type discriminator (e.g. 'openrouter', 'groq'). */
  readonly providerType: string;
  readonly name: string;
  readonly baseUrl: string;
  /** Per-provider request timeout in ms; overrides the global timeout when set. */
  readonly timeout?: number;

  /**
   * Send a non-streaming chat completion request.
   * The provider timeout, when set, is applied on top of `signal`.
   * @throws ProviderRateLimitError on 429 responses.
   * @throws ProviderError on other non-OK responses, and with status 502
   *   when a 2xx body is not a chat completion.
   */
  chatCompletion(
    model: string,
    body: ChatCompletionRequest,
    signal?: AbortSignal,
  ): Promise<ProviderResponse>;
}

/** Registry of provider adapters, keyed by provider instance ID. */
export interface ProviderRegistry {
  /** @throws ConfigError if the provider ID is not registered. */
  get(providerId: string): ProviderAdapter;
  has(providerId: string): boolean;
  getAll(): ProviderAdapter[];
  readonly size: number;
}

/** Result of one backend invocation. */
export type InvokeResult =
  | {
      kind: 'success';
      payload: ChatCompletionResponse;
      usage: Usage | null;
      /** Quota reported by the upstream alongside the response, if any. */
      rateLimit: RateLimitInfo | null;
      latencyMs: number;
    }
  | { kind: 'transient'; reason: string }
  | { kind: 'rate_limited'; reason: string; retryAfterMs?: number }
  | { kind: 'fatal'; reason: string; statusCode?: number };

/**
 * Performs one call against one backend and classifies its result.
 * Implementations never throw for upstream failures: every failure is
 * reported as a transient, rate_limited or fatal result.
 */
export interface BackendInvoker {
  invoke(
    backendId: string,
    request: ChatCompletionRequest,
    signal: AbortSignal,
  ): Promise<InvokeResult>;
}
