/**
 * Live routing state: the health, rate-limit and usage snapshots.
 */

import { Hono } from 'hono';
import type { ModelRouter } from '../../routing/router.js';

export function createStatusRoutes(router: ModelRouter) {
  const app = new Hono();

  app.get('/health', (c) => {
    return c.json({ backends: Array.from(router.getHealthSnapshot().values()) });
  });

  app.get('/ratelimits', (c) => {
    return c.json({ backends: Array.from(router.getRateLimitSnapshot().values()) });
  });

  app.get('/usage', (c) => {
    return c.json({ backends: Array.from(router.getUsageSnapshot().values()) });
  });

  return app;
}
