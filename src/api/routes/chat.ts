/**
 * POST /v1/chat/completions handler.
 * Validates the body, routes it through the model router and maps the
 * tagged outcome onto an OpenAI-compatible response.
 */

import { Hono } from 'hono';
import { logger } from '../../shared/logger.js';
import { openAIError, RequestValidationError } from '../../shared/errors.js';
import { parseChatCompletionRequest } from '../validation.js';
import type { ModelRouter } from '../../routing/router.js';
import type { RouteOutcome } from '../../routing/types.js';
import type { RequestLogger } from '../../persistence/request-logger.js';
import type { OpenAIErrorResponse } from '../../shared/types.js';

/** Non-standard status for a request the client abandoned. */
export const CLIENT_CLOSED_REQUEST = 499;

type FailedOutcome = Exclude<RouteOutcome, { status: 'success' }>;

function describeTrace(outcome: RouteOutcome): string {
  return outcome.trace.map((t) => `${t.backendId} (${t.reason ?? t.outcome})`).join(', ');
}

/** HTTP status and OpenAI-format body for an unsuccessful outcome. */
export function failureResponse(outcome: FailedOutcome): {
  status: 400 | 499 | 502 | 503;
  body: OpenAIErrorResponse;
} {
  switch (outcome.status) {
    case 'exhausted':
      return {
        status: 502,
        body: openAIError(
          `All ${outcome.trace.length} candidate backend(s) failed: ${describeTrace(outcome)}`,
          'server_error',
          'all_backends_exhausted',
        ),
      };

    case 'no_eligible_candidates': {
      const excluded = outcome.ineligible.map((b) => `${b.backendId} (${b.reason})`).join(', ');
      return {
        status: 503,
        body: openAIError(
          `No eligible backend for category "${outcome.classification.category}"` +
            (excluded ? `; excluded: ${excluded}` : ''),
          'server_error',
          'no_eligible_backends',
        ),
      };
    }

    case 'fatal':
      return {
        status: 400,
        body: openAIError(
          `Backend ${outcome.backendId} rejected the request: ${outcome.reason}`,
          'invalid_request_error',
          'upstream_fatal_error',
        ),
      };

    case 'cancelled':
      return {
        status: CLIENT_CLOSED_REQUEST,
        body: openAIError('Request cancelled by client', 'invalid_request_error', 'request_cancelled'),
      };
  }
}

/**
 * Create chat completion routes with injected dependencies.
 * @param requestLogger - Optional request log; omitted when persistence is disabled.
 */
export function createChatRoutes(router: ModelRouter, requestLogger?: RequestLogger) {
  const app = new Hono();

  const record = (outcome: RouteOutcome, httpStatus: number) => {
    if (!requestLogger) return;
    // Fire-and-forget: never delay the response on the log write.
    setImmediate(() => {
      try {
        const usage = outcome.status === 'success' ? outcome.usage : null;
        requestLogger.logRequest({
          timestamp: Date.now(),
          category: outcome.classification.category,
          classificationRule: outcome.classification.rule,
          outcome: outcome.status,
          backendId:
            outcome.status === 'success' || outcome.status === 'fatal' ? outcome.backendId : null,
          httpStatus,
          promptTokens: usage?.prompt_tokens ?? 0,
          completionTokens: usage?.completion_tokens ?? 0,
          totalTokens: usage?.total_tokens ?? 0,
          latencyMs: outcome.latencyMs,
          attempts: outcome.trace.length,
          ...(outcome.status !== 'success' && { errorMessage: describeTrace(outcome) || outcome.status }),
        });
      } catch (error) {
        logger.error({ err: error }, 'Failed to log request');
      }
    });
  };

  app.post('/chat/completions', async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      throw new RequestValidationError('body must be valid JSON');
    }
    const request = parseChatCompletionRequest(body);

    // The request signal aborts when the client disconnects.
    const outcome = await router.routeAndExecute(request, { signal: c.req.raw.signal });

    c.header('X-Switchyard-Category', outcome.classification.category);
    c.header('X-Switchyard-Attempts', String(outcome.trace.length));

    if (outcome.status === 'success') {
      c.header('X-Switchyard-Backend', outcome.backendId);
      record(outcome, 200);
      return c.json(outcome.payload);
    }

    const { status, body: errorBody } = failureResponse(outcome);
    record(outcome, status);

    if (status === CLIENT_CLOSED_REQUEST) {
      return new Response(JSON.stringify(errorBody), {
        status,
        headers: { 'content-type': 'application/json' },
      });
    }
    return c.json(errorBody, status);
  });

  return app;
}
