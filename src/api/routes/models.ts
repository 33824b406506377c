/**
 * GET /v1/models handler.
 * Lists every registered backend in OpenAI list format.
 */

import { Hono } from 'hono';
import type { CapabilityRegistry } from '../../registry/capability-registry.js';
import type { ModelInfo, ModelsResponse } from '../../shared/types.js';

export function createModelsRoutes(registry: CapabilityRegistry) {
  const app = new Hono();

  app.get('/models', (c) => {
    const created = Math.floor(Date.now() / 1000);

    const data = registry.getAll().map<ModelInfo>((backend) => ({
      id: backend.id,
      object: 'model',
      created,
      owned_by: backend.providerId,
      category: backend.category,
    }));

    const body: ModelsResponse = { object: 'list', data };
    return c.json(body);
  });

  return app;
}
