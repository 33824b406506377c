/**
 * Shared HTTP plumbing for OpenAI-compatible upstreams.
 *
 * One call is one `POST {baseUrl}/chat/completions`. The provider's own
 * timeout is folded into the caller's signal, non-OK statuses become typed
 * errors the invoker classifies, and a 2xx body that is not a chat
 * completion is reported as a 502 so the router moves on to the next backend.
 */

import { z } from 'zod';
import { logger } from '../shared/logger.js';
import { ProviderError, ProviderRateLimitError } from '../shared/errors.js';
import type { ChatCompletionRequest, ChatCompletionResponse } from '../shared/types.js';
import type { ProviderAdapter, ProviderResponse, RateLimitInfo } from './types.js';

/** Router-only request fields that never go upstream. */
const ROUTER_FIELDS: readonly (keyof ChatCompletionRequest)[] = ['model', 'category'];

const CompletionBodySchema = z.looseObject({
  id: z.string(),
  object: z.literal('chat.completion'),
  created: z.number(),
  model: z.string(),
  choices: z
    .array(
      z.looseObject({
        index: z.number().int(),
        message: z.looseObject({
          role: z.literal('assistant'),
          content: z.string().nullable().default(null),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                type: z.literal('function'),
                function: z.object({ name: z.string(), arguments: z.string() }),
              }),
            )
            .optional(),
        }),
        finish_reason: z.string().nullable(),
      }),
    )
    .min(1),
  usage: z
    .looseObject({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
  system_fingerprint: z.string().optional(),
});

export interface AdapterOptions {
  id: string;
  type: string;
  name: string;
  apiKey: string;
  baseUrl: string;
  /** Provider timeout in ms; only ever tightens the caller's deadline. */
  timeout?: number;
}

export abstract class BaseAdapter implements ProviderAdapter {
  readonly id: string;
  readonly providerType: string;
  readonly name: string;
  readonly baseUrl: string;
  readonly timeout?: number;
  protected readonly apiKey: string;

  constructor(options: AdapterOptions) {
    this.id = options.id;
    this.providerType = options.type;
    this.name = options.name;
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    if (options.timeout !== undefined) this.timeout = options.timeout;
  }

  async chatCompletion(
    model: string,
    body: ChatCompletionRequest,
    signal?: AbortSignal,
  ): Promise<ProviderResponse> {
    const start = performance.now();
    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
        ...this.getExtraHeaders(),
      },
      body: JSON.stringify(this.prepareRequestBody(model, body)),
      signal: this.deadline(signal),
    });
    const latencyMs = Math.round(performance.now() - start);

    if (!response.ok) {
      throw await this.failure(response, model, latencyMs);
    }

    return {
      status: response.status,
      body: await this.readCompletion(response, model),
      rateLimit: this.parseRateLimitHeaders(response.headers),
      latencyMs,
    };
  }

  /** Caller signal combined with the provider timeout, when one is set. */
  protected deadline(signal?: AbortSignal): AbortSignal | undefined {
    if (this.timeout === undefined) return signal;
    const timeout = AbortSignal.timeout(this.timeout);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
  }

  private async failure(response: Response, model: string, latencyMs: number): Promise<ProviderError> {
    const text = await response.text();
    logger.warn(
      { provider: this.id, model, status: response.status, latencyMs },
      response.status === 429 ? 'Provider rate limited the request' : 'Provider returned an error status',
    );
    return response.status === 429
      ? new ProviderRateLimitError(this.id, model, response.headers, text)
      : new ProviderError(this.id, model, response.status, text);
  }

  private async readCompletion(response: Response, model: string): Promise<ChatCompletionResponse> {
    const raw: unknown = await response.json().catch(() => undefined);
    const parsed = CompletionBodySchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(
        { provider: this.id, model, issues: parsed.error.issues.length },
        'Provider returned a malformed chat completion',
      );
      throw new ProviderError(this.id, model, 502, z.prettifyError(parsed.error));
    }
    return parsed.data;
  }

  /** Drop router-only fields, pin the upstream model and force stream: false. */
  protected prepareRequestBody(model: string, body: ChatCompletionRequest): Record<string, unknown> {
    const prepared: Record<string, unknown> = { ...body };
    for (const field of ROUTER_FIELDS) {
      delete prepared[field];
    }
    return { ...prepared, model, stream: false };
  }

  getExtraHeaders(): Record<string, string> {
    return {};
  }

  abstract parseRateLimitHeaders(headers: Headers): RateLimitInfo | null;
}
