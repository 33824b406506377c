/**
 * OpenRouter adapter.
 * Sends OpenRouter's application identification headers and parses its
 * X-RateLimit-* header format.
 */

import { BaseAdapter } from '../base-adapter.js';
import { parseIntHeader, parseRetryAfter } from '../utils.js';
import type { RateLimitInfo } from '../types.js';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export class OpenRouterAdapter extends BaseAdapter {
  constructor(id: string, name: string, apiKey: string, baseUrl?: string, timeout?: number) {
    super({
      id,
      type: 'openrouter',
      name,
      apiKey,
      baseUrl: baseUrl ?? OPENROUTER_BASE_URL,
      ...(timeout !== undefined && { timeout }),
    });
  }

  override getExtraHeaders(): Record<string, string> {
    return {
      'HTTP-Referer': 'switchyard',
      'X-Title': 'switchyard',
    };
  }

  /**
   * Parse OpenRouter rate limit headers.
   *
   *   X-RateLimit-Limit      -> max requests in window
   *   X-RateLimit-Remaining  -> requests remaining
   *   X-RateLimit-Reset      -> Unix timestamp in MILLISECONDS
   *   Retry-After            -> seconds (429 only)
   */
  override parseRateLimitHeaders(headers: Headers): RateLimitInfo | null {
    const limit = parseIntHeader(headers.get('x-ratelimit-limit'));
    const remaining = parseIntHeader(headers.get('x-ratelimit-remaining'));
    const reset = parseIntHeader(headers.get('x-ratelimit-reset'));
    const retryAfterMs = parseRetryAfter(headers.get('retry-after'));

    if (
      limit === undefined &&
      remaining === undefined &&
      reset === undefined &&
      retryAfterMs === undefined
    ) {
      return null;
    }

    const info: RateLimitInfo = {};
    if (limit !== undefined) info.limitRequests = limit;
    if (remaining !== undefined) info.remainingRequests = remaining;
    // Reset is absolute; convert to ms-from-now.
    if (reset !== undefined) info.resetRequestsMs = Math.max(0, reset - Date.now());
    if (retryAfterMs !== undefined) info.retryAfterMs = retryAfterMs;

    return info;
  }
}
