/**
 * Custom error classes for switchyard.
 * Routing failures are returned as typed outcomes, never thrown; these
 * classes cover configuration faults, invalid inbound requests and the
 * raw upstream failures that the invoker converts into outcomes.
 */

import type { OpenAIErrorResponse } from './types.js';

/** Error thrown when config validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** An inbound request body failed validation at the HTTP boundary. */
export class RequestValidationError extends Error {
  public readonly details: string;

  constructor(details: string) {
    super(`Invalid chat completion request: ${details}`);
    this.name = 'RequestValidationError';
    this.details = details;
  }

  toOpenAIError(): OpenAIErrorResponse {
    return openAIError(this.message, 'invalid_request_error', 'invalid_request');
  }
}

/** Generic upstream failure raised by a provider adapter. */
export class ProviderError extends Error {
  public readonly providerId: string;
  public readonly model: string;
  public readonly statusCode: number;
  public readonly responseBody: string;

  constructor(providerId: string, model: string, statusCode: number, responseBody: string) {
    super(`Provider ${providerId} returned ${statusCode} for model ${model}`);
    this.name = 'ProviderError';
    this.providerId = providerId;
    this.model = model;
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

/** Specifically a 429 rate limit error from a provider. */
export class ProviderRateLimitError extends ProviderError {
  public readonly headers: Headers;

  constructor(providerId: string, model: string, headers: Headers, responseBody: string = '') {
    super(providerId, model, 429, responseBody);
    this.name = 'ProviderRateLimitError';
    this.headers = headers;
  }
}

/** Build an OpenAI-format error body. */
export function openAIError(
  message: string,
  type: string,
  code: string | null,
): OpenAIErrorResponse {
  return {
    error: {
      message,
      type,
      param: null,
      code,
    },
  };
}
