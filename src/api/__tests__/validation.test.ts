import { describe, it, expect } from 'vitest';
import { parseChatCompletionRequest } from '../validation.js';
import { RequestValidationError } from '../../shared/errors.js';

function issues(body: unknown): string {
  try {
    parseChatCompletionRequest(body);
  } catch (error) {
    if (error instanceof RequestValidationError) return error.details;
    throw error;
  }
  throw new Error('expected validation to fail');
}

describe('parseChatCompletionRequest', () => {
  it('accepts a minimal body and defaults missing content to null', () => {
    expect(parseChatCompletionRequest({ messages: [{ role: 'assistant' }] })).toEqual({
      messages: [{ role: 'assistant', content: null }],
    });
  });

  it('keeps sampling parameters and the category override', () => {
    const request = parseChatCompletionRequest({
      model: 'auto',
      category: 'powerful',
      messages: [{ role: 'user', content: 'Hi' }],
      temperature: 0.7,
      max_tokens: 256,
      stop: ['\n'],
    });

    expect(request).toEqual({
      model: 'auto',
      category: 'powerful',
      messages: [{ role: 'user', content: 'Hi' }],
      temperature: 0.7,
      max_tokens: 256,
      stop: ['\n'],
    });
  });

  it('drops stream: false from the parsed request', () => {
    expect(parseChatCompletionRequest({ messages: [{ role: 'user', content: 'Hi' }], stream: false })).toEqual({
      messages: [{ role: 'user', content: 'Hi' }],
    });
  });

  it('rejects streaming', () => {
    expect(issues({ messages: [{ role: 'user', content: 'Hi' }], stream: true })).toContain(
      'Streaming responses are not supported',
    );
  });

  it('rejects an empty message list', () => {
    expect(issues({ messages: [] })).toContain('messages must not be empty');
  });

  it('rejects an unknown category and an unknown role', () => {
    expect(issues({ messages: [{ role: 'user', content: 'Hi' }], category: 'cheap' })).toContain('category');
    expect(issues({ messages: [{ role: 'robot', content: 'Hi' }] })).toContain('messages[0].role');
  });

  it('rejects out-of-range sampling parameters', () => {
    expect(issues({ messages: [{ role: 'user', content: 'Hi' }], temperature: 3 })).toContain('temperature');
    expect(issues({ messages: [{ role: 'user', content: 'Hi' }], max_tokens: 0 })).toContain('max_tokens');
  });

  it('rejects a non-object body', () => {
    expect(() => parseChatCompletionRequest('hello')).toThrow(RequestValidationError);
  });
});
