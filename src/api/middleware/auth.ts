/**
 * API key validation middleware for Hono.
 * Validates the Bearer token in the Authorization header against the
 * configured API keys and answers OpenAI-format 401 errors otherwise.
 */

import { createMiddleware } from 'hono/factory';
import { openAIError } from '../../shared/errors.js';

export function createAuthMiddleware(apiKeys: readonly string[]) {
  const keySet = new Set(apiKeys);

  return createMiddleware(async (c, next) => {
    const authorization = c.req.header('authorization');

    if (!authorization || !authorization.startsWith('Bearer ')) {
      return c.json(
        openAIError(
          'Missing or invalid API key. Provide a valid key in the Authorization header as Bearer <key>.',
          'invalid_request_error',
          'invalid_api_key',
        ),
        401,
      );
    }

    if (!keySet.has(authorization.slice('Bearer '.length))) {
      return c.json(
        openAIError('Invalid API key provided.', 'invalid_request_error', 'invalid_api_key'),
        401,
      );
    }

    await next();
  });
}
