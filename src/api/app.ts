/**
 * Hono application assembly.
 * /health is public; everything under /v1 requires a configured API key
 * and is subject to that key's request limits.
 */

import { Hono } from 'hono';
import { createAuthMiddleware } from './middleware/auth.js';
import { createRateLimitMiddleware } from './middleware/rate-limit.js';
import type { InboundRateLimiter } from './middleware/rate-limit.js';
import { errorHandler } from './middleware/error-handler.js';
import { createChatRoutes } from './routes/chat.js';
import { createModelsRoutes } from './routes/models.js';
import { createHealthRoutes } from './routes/health.js';
import { createStatusRoutes } from './routes/status.js';
import { createStatsRoutes } from './routes/stats.js';
import type { ModelRouter } from '../routing/router.js';
import type { RequestLogger } from '../persistence/request-logger.js';
import type { UsageAggregator } from '../persistence/aggregator.js';

export interface AppDeps {
  router: ModelRouter;
  apiKeys: readonly string[];
  requestLogger?: RequestLogger;
  /** Per-key request limits on /v1; omitted when disabled. */
  rateLimiter?: InboundRateLimiter;
  /** Stats routes are mounted only when persistence is available. */
  aggregator?: UsageAggregator;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.onError(errorHandler);

  app.route('/health', createHealthRoutes(deps.router));

  const v1 = new Hono();
  v1.use('*', createAuthMiddleware(deps.apiKeys));
  if (deps.rateLimiter) {
    v1.use('*', createRateLimitMiddleware(deps.rateLimiter));
  }

  v1.route('/', createChatRoutes(deps.router, deps.requestLogger));
  v1.route('/', createModelsRoutes(deps.router.registry));
  v1.route('/status', createStatusRoutes(deps.router));
  if (deps.aggregator) {
    v1.route('/stats', createStatsRoutes(deps.aggregator));
  }

  app.route('/v1', v1);

  return app;
}
