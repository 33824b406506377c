/**
 * Adapter for upstreams that follow the OpenAI chat completions API and its
 * x-ratelimit-* header family: OpenAI, Groq, Cerebras and any generic
 * OpenAI-compatible server.
 */

import { logger } from '../../shared/logger.js';
import { BaseAdapter } from '../base-adapter.js';
import { parseDurationToMs, parseIntHeader, parseRetryAfter } from '../utils.js';
import type { ChatCompletionRequest } from '../../shared/types.js';
import type { RateLimitInfo } from '../types.js';

export type OpenAICompatibleType = 'openai' | 'groq' | 'cerebras' | 'generic-openai';

export const DEFAULT_BASE_URLS: Record<Exclude<OpenAICompatibleType, 'generic-openai'>, string> = {
  openai: 'https://api.openai.com/v1',
  groq: 'https://api.groq.com/openai/v1',
  cerebras: 'https://api.cerebras.ai/v1',
};

/** Sampling parameters each upstream rejects. */
const UNSUPPORTED_PARAMS: Partial<Record<OpenAICompatibleType, readonly string[]>> = {
  cerebras: ['presence_penalty', 'frequency_penalty'],
};

export class OpenAICompatibleAdapter extends BaseAdapter {
  private readonly unsupportedParams: readonly string[];

  constructor(
    id: string,
    type: OpenAICompatibleType,
    name: string,
    apiKey: string,
    baseUrl: string,
    timeout?: number,
  ) {
    super({ id, type, name, apiKey, baseUrl, ...(timeout !== undefined && { timeout }) });
    this.unsupportedParams = UNSUPPORTED_PARAMS[type] ?? [];
  }

  protected override prepareRequestBody(
    model: string,
    body: ChatCompletionRequest,
  ): Record<string, unknown> {
    const prepared = super.prepareRequestBody(model, body);
    for (const param of this.unsupportedParams) {
      if (param in prepared) {
        logger.debug({ provider: this.id, model, param }, 'Stripping unsupported parameter');
        delete prepared[param];
      }
    }

    return prepared;
  }

  /**
   * Parse OpenAI-style rate limit headers.
   *
   *   x-ratelimit-limit-requests / x-ratelimit-remaining-requests
   *   x-ratelimit-reset-requests       -> duration string ("6m0s")
   *   x-ratelimit-limit-tokens / x-ratelimit-remaining-tokens
   *   x-ratelimit-reset-tokens         -> duration string
   *   retry-after                      -> seconds or HTTP date
   */
  override parseRateLimitHeaders(headers: Headers): RateLimitInfo | null {
    const resetReq = headers.get('x-ratelimit-reset-requests');
    const resetTok = headers.get('x-ratelimit-reset-tokens');

    const info: RateLimitInfo = {};

    const limitReq = parseIntHeader(headers.get('x-ratelimit-limit-requests'));
    if (limitReq !== undefined) info.limitRequests = limitReq;

    const remainingReq = parseIntHeader(headers.get('x-ratelimit-remaining-requests'));
    if (remainingReq !== undefined) info.remainingRequests = remainingReq;

    const resetReqMs = resetReq === null ? undefined : parseDurationToMs(resetReq);
    if (resetReqMs !== undefined) info.resetRequestsMs = resetReqMs;

    const limitTok = parseIntHeader(headers.get('x-ratelimit-limit-tokens'));
    if (limitTok !== undefined) info.limitTokens = limitTok;

    const remainingTok = parseIntHeader(headers.get('x-ratelimit-remaining-tokens'));
    if (remainingTok !== undefined) info.remainingTokens = remainingTok;

    const resetTokMs = resetTok === null ? undefined : parseDurationToMs(resetTok);
    if (resetTokMs !== undefined) info.resetTokensMs = resetTokMs;

    const retryAfterMs = parseRetryAfter(headers.get('retry-after'));
    if (retryAfterMs !== undefined) info.retryAfterMs = retryAfterMs;

    return Object.keys(info).length === 0 ? null : info;
  }
}
