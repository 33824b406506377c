/**
 * Stats routes for querying usage aggregations.
 * Provides per-backend and per-category usage and recent request logs.
 */

import { Hono } from 'hono';
import type { UsageAggregator } from '../../persistence/aggregator.js';

const DEFAULT_REQUEST_LIMIT = 50;
const MAX_REQUEST_LIMIT = 500;

/** Parse the ?limit= query, falling back to the default on junk. */
export function parseLimit(value: string | undefined): number {
  const limit = value === undefined ? DEFAULT_REQUEST_LIMIT : Number.parseInt(value, 10);
  if (!Number.isFinite(limit) || limit < 1) return DEFAULT_REQUEST_LIMIT;
  return Math.min(limit, MAX_REQUEST_LIMIT);
}

export function createStatsRoutes(aggregator: UsageAggregator) {
  const app = new Hono();

  app.get('/backends', (c) => {
    return c.json({ backends: aggregator.getAllBackendUsage() });
  });

  // Backend ids contain a colon, so the param takes the rest of the path.
  app.get('/backends/:backendId{.+}', (c) => {
    const backendId = c.req.param('backendId');
    const usage = aggregator.getBackendUsage(backendId);

    if (usage === null) {
      return c.json({ error: 'No usage data for backend' }, 404);
    }

    return c.json(usage);
  });

  app.get('/categories', (c) => {
    return c.json({ categories: aggregator.getCategoryUsage() });
  });

  app.get('/requests', (c) => {
    return c.json({ requests: aggregator.getRecentRequests(parseLimit(c.req.query('limit'))) });
  });

  return app;
}
