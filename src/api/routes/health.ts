/**
 * GET /health handler.
 * Liveness plus a summary of backend health. No authentication required.
 */

import { Hono } from 'hono';
import type { ModelRouter } from '../../routing/router.js';
import type { HealthStatus } from '../../health/types.js';

export function createHealthRoutes(router: ModelRouter) {
  const app = new Hono();

  app.get('/', (c) => {
    const backends: Record<HealthStatus, number> = { healthy: 0, degraded: 0, unavailable: 0 };
    for (const entry of router.getHealthSnapshot().values()) {
      backends[entry.status] += 1;
    }

    return c.json({
      status: backends.healthy + backends.degraded > 0 ? 'ok' : 'degraded',
      version: '0.1.0',
      uptime: process.uptime(),
      backendCount: router.registry.size,
      backends,
    });
  });

  return app;
}
