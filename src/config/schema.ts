/**
 * Zod schemas for YAML config file validation.
 * These schemas are the single source of truth for config structure.
 * TypeScript types are inferred from these schemas in types.ts.
 */

import { z } from 'zod';

export const DEFAULT_COMPLEXITY_KEYWORDS = [
  'reason',
  'analyze',
  'complex',
  'critical',
  'important',
  'detailed',
  'comprehensive',
  'strategic',
  'planning',
];

/** Schema for a backend's advisory rate budget. */
export const RateBudgetSchema = z.object({
  requestsPerWindow: z.number().int().positive(),
  tokensPerWindow: z.number().int().positive().optional(),
  windowMs: z.number().int().min(1000).default(60000),
});

/** Schema for a single upstream provider connection. */
export const ProviderSchema = z.object({
  id: z.string().min(1, { message: 'Provider id must not be empty' }),
  name: z.string().min(1, { message: 'Provider name must not be empty' }),
  type: z.enum(['openai', 'groq', 'cerebras', 'openrouter', 'generic-openai']),
  apiKey: z.string().min(1, { message: 'Provider apiKey must not be empty' }),
  baseUrl: z.url({ message: 'Provider baseUrl must be a valid URL' }).optional(),
  timeout: z.number().int().min(1000).optional(),
});

/** Schema for a backend descriptor: one (provider, model) pair. */
export const BackendSchema = z.object({
  provider: z.string().min(1, { message: 'Backend provider must not be empty' }),
  model: z.string().min(1, { message: 'Backend model must not be empty' }),
  category: z.enum(['fast', 'powerful']),
  priority: z.number().int().min(1).default(10),
  benchmarks: z
    .record(z.string(), z.number().min(0).max(100))
    .refine((scores) => Object.keys(scores).length > 0, {
      message: 'Backend must declare at least one benchmark score',
    }),
  costPerMillionTokens: z.number().min(0).default(0),
  rateLimits: RateBudgetSchema,
});

/** Weights of the candidate scoring formula. */
export const RankingWeightsSchema = z.object({
  benchmarkRank: z.number().min(0).default(0.3),
  benchmarkScore: z.number().min(0).default(0.2),
  rateLimitHeadroom: z.number().min(0).default(0.2),
  priority: z.number().min(0).default(0.1),
  recency: z.number().min(0).default(0.1),
  costEfficiency: z.number().min(0).default(0.1),
});

export const ProbeSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  intervalMs: z.number().int().min(1000).default(60000),
  timeoutMs: z.number().int().min(100).default(10000),
});

export const ClassifierSettingsSchema = z.object({
  highVolumeChars: z.number().int().positive().default(5000),
  longMessageChars: z.number().int().positive().default(2000),
  complexityKeywords: z.array(z.string().min(1)).min(1).default(DEFAULT_COMPLEXITY_KEYWORDS),
});

export const HealthSettingsSchema = z.object({
  degradedAfter: z.number().int().min(1).default(3),
  unavailableAfter: z.number().int().min(1).default(5),
  recoverySuccesses: z.number().int().min(1).default(2),
  failureWindowMs: z.number().int().min(1000).default(300000),
  backoffBaseMs: z.number().int().min(0).default(1000),
  backoffMaxMs: z.number().int().min(0).default(300000),
});

export const UsageSettingsSchema = z.object({
  windowMs: z.number().int().min(1000).default(300000),
  saturationCount: z.number().int().min(1).default(20),
});

export const AlertSettingsSchema = z.object({
  rateLimitHitRate: z.number().min(0).max(1).default(0.8),
  windowMs: z.number().int().min(1000).default(3600000),
});

/** Per-key limits on inbound `/v1` requests. */
export const InboundRateLimitSchema = z.object({
  enabled: z.boolean().default(true),
  requestsPerMinute: z.number().int().min(1).default(100),
  requestsPerHour: z.number().int().min(1).default(1000),
});

/** Schema for router settings. */
export const SettingsSchema = z.object({
  port: z.number().int().min(1).max(65535).default(3000),
  apiKeys: z
    .array(z.string().min(1, { message: 'API key must not be empty' }))
    .min(1, { message: 'At least one API key is required' }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  requestTimeoutMs: z.number().int().min(1000).default(30000),
  cooldownDefaultMs: z.number().int().min(1000).default(60000),
  dbPath: z.string().default('./data/switchyard.db'),
  probe: ProbeSettingsSchema.prefault({}),
  classifier: ClassifierSettingsSchema.prefault({}),
  ranking: z
    .object({ weights: RankingWeightsSchema.prefault({}) })
    .prefault({}),
  health: HealthSettingsSchema.prefault({}),
  usage: UsageSettingsSchema.prefault({}),
  alerts: AlertSettingsSchema.prefault({}),
  inboundRateLimit: InboundRateLimitSchema.prefault({}),
});

/** Top-level config schema with cross-reference validation. */
export const ConfigSchema = z
  .object({
    version: z.literal(1),
    settings: SettingsSchema,
    providers: z
      .array(ProviderSchema)
      .min(1, { message: 'At least one provider is required' }),
    backends: z
      .array(BackendSchema)
      .min(1, { message: 'At least one backend is required' }),
  })
  .refine(
    (config) => {
      const providerIds = new Set(config.providers.map((p) => p.id));
      return config.backends.every((backend) => providerIds.has(backend.provider));
    },
    {
      message: 'Backends reference a provider id that does not exist in the providers list',
    },
  )
  .refine(
    (config) => {
      const ids = config.backends.map((b) => `${b.provider}:${b.model}`);
      return new Set(ids).size === ids.length;
    },
    {
      message: 'Each provider+model pair may only be declared once in backends',
    },
  )
  .refine(
    (config) =>
      config.providers.every((p) => p.type !== 'generic-openai' || p.baseUrl !== undefined),
    {
      message: 'Providers of type generic-openai require a baseUrl',
    },
  )
  .refine(
    (config) => config.settings.health.unavailableAfter >= config.settings.health.degradedAfter,
    {
      message: 'settings.health.unavailableAfter must be >= settings.health.degradedAfter',
    },
  );
