import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  ProviderError,
  ProviderRateLimitError,
  RequestValidationError,
  openAIError,
} from '../errors.js';

describe('ConfigError', () => {
  it('creates an error with the correct name and message', () => {
    const err = new ConfigError('Bad config');
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(ConfigError);
    expect(err.name).toBe('ConfigError');
    expect(err.message).toBe('Bad config');
  });
});

describe('RequestValidationError', () => {
  it('keeps the validation details and prefixes the message', () => {
    const err = new RequestValidationError('messages must not be empty');
    expect(err.name).toBe('RequestValidationError');
    expect(err.details).toBe('messages must not be empty');
    expect(err.message).toBe('Invalid chat completion request: messages must not be empty');
  });

  it('produces an OpenAI-format invalid_request_error', () => {
    const body = new RequestValidationError('bad').toOpenAIError();
    expect(body).toEqual({
      error: {
        message: 'Invalid chat completion request: bad',
        type: 'invalid_request_error',
        param: null,
        code: 'invalid_request',
      },
    });
  });
});

describe('ProviderError', () => {
  it('creates an error with provider details', () => {
    const err = new ProviderError('groq', 'llama-3.1-8b', 500, '{"error":"internal"}');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('ProviderError');
    expect(err.providerId).toBe('groq');
    expect(err.model).toBe('llama-3.1-8b');
    expect(err.statusCode).toBe(500);
    expect(err.responseBody).toBe('{"error":"internal"}');
    expect(err.message).toBe('Provider groq returned 500 for model llama-3.1-8b');
  });
});

describe('ProviderRateLimitError', () => {
  it('creates a 429 error with headers', () => {
    const headers = new Headers({ 'retry-after': '60' });
    const err = new ProviderRateLimitError('openrouter', 'llama-3.1-8b', headers);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err.name).toBe('ProviderRateLimitError');
    expect(err.statusCode).toBe(429);
    expect(err.responseBody).toBe('');
    expect(err.headers.get('retry-after')).toBe('60');
  });
});

describe('openAIError', () => {
  it('builds the standard error envelope', () => {
    expect(openAIError('nope', 'server_error', null)).toEqual({
      error: { message: 'nope', type: 'server_error', param: null, code: null },
    });
  });
});
