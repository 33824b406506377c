/**
 * switchyard application entry point.
 * Bootstraps configuration, the capability and provider registries, the
 * model router and its probe loop, then serves the Hono application.
 */

import { serve } from '@hono/node-server';
import { logger } from './shared/logger.js';
import { loadConfig, resolveConfigPath } from './config/loader.js';
import { buildCapabilityRegistry } from './registry/capability-registry.js';
import { buildProviderRegistry } from './providers/registry.js';
import { HttpBackendInvoker } from './providers/invoker.js';
import { createModelRouter } from './routing/router.js';
import { HealthProber } from './health/prober.js';
import { initializeDatabase } from './persistence/db.js';
import { RequestLogger } from './persistence/request-logger.js';
import { UsageAggregator } from './persistence/aggregator.js';
import { createApp } from './api/app.js';
import { InboundRateLimiter, limitsFromSettings } from './api/middleware/rate-limit.js';

// --- Bootstrap ---

logger.info('switchyard v0.1.0 starting...');

const configPath = resolveConfigPath();
const config = loadConfig(configPath);

logger.level = config.settings.logLevel;

const registry = buildCapabilityRegistry(config.backends);
const providers = buildProviderRegistry(config.providers);
const invoker = new HttpBackendInvoker(registry, providers);
const router = createModelRouter(registry, invoker, config.settings);

const prober = new HealthProber(
  {
    registry,
    ledger: router.ledger,
    invoker,
    feedback: router.feedback,
  },
  config.settings.probe,
);

// --- Observability database ---

const db = initializeDatabase(config.settings.dbPath);
const requestLogger = new RequestLogger(db);
const aggregator = new UsageAggregator(db);

const app = createApp({
  router,
  apiKeys: config.settings.apiKeys,
  requestLogger,
  aggregator,
  ...(config.settings.inboundRateLimit.enabled && {
    rateLimiter: new InboundRateLimiter(limitsFromSettings(config.settings.inboundRateLimit)),
  }),
});

// --- Start server ---

const portOverride = process.env['PORT'] ? Number.parseInt(process.env['PORT'], 10) : NaN;
const port = Number.isInteger(portOverride) ? portOverride : config.settings.port;

const server = serve({ fetch: app.fetch, port }, (info) => {
  logger.info({ port: info.port }, `switchyard listening on port ${info.port}`);
  logger.info(
    {
      providers: providers.size,
      backends: registry.size,
      probes: config.settings.probe.enabled,
      dbPath: config.settings.dbPath,
    },
    'Ready',
  );
  prober.start();
});

// --- Graceful shutdown ---

const shutdown = () => {
  logger.info('Shutting down...');
  prober.stop();
  server.close(() => {
    db.close();
    logger.info('Server and database closed');
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});
