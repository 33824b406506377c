/**
 * TypeScript types inferred from Zod schemas.
 * These types are the compile-time companions to the runtime validation schemas.
 */

import { z } from 'zod';
import {
  ConfigSchema,
  ProviderSchema,
  BackendSchema,
  SettingsSchema,
  RateBudgetSchema,
  RankingWeightsSchema,
  ProbeSettingsSchema,
  ClassifierSettingsSchema,
  HealthSettingsSchema,
  UsageSettingsSchema,
  AlertSettingsSchema,
  InboundRateLimitSchema,
} from './schema.js';

/** Fully validated router configuration. */
export type Config = z.infer<typeof ConfigSchema>;

/** A single upstream provider connection. */
export type ProviderConfig = z.infer<typeof ProviderSchema>;

/** A single backend (provider + model) declaration. */
export type BackendConfig = z.infer<typeof BackendSchema>;

/** Router-level settings. */
export type Settings = z.infer<typeof SettingsSchema>;

/** Advisory per-backend rate budget. */
export type RateBudget = z.infer<typeof RateBudgetSchema>;

/** Candidate scoring weights. */
export type RankingWeights = z.infer<typeof RankingWeightsSchema>;

export type ProbeSettings = z.infer<typeof ProbeSettingsSchema>;
export type ClassifierSettings = z.infer<typeof ClassifierSettingsSchema>;
export type HealthSettings = z.infer<typeof HealthSettingsSchema>;
export type UsageSettings = z.infer<typeof UsageSettingsSchema>;
export type AlertSettings = z.infer<typeof AlertSettingsSchema>;
export type InboundRateLimitSettings = z.infer<typeof InboundRateLimitSchema>;

export {
  ConfigSchema,
  ProviderSchema,
  BackendSchema,
  SettingsSchema,
  RateBudgetSchema,
  RankingWeightsSchema,
} from './schema.js';
