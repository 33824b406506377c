/**
 * Provider registry: maps provider IDs to adapter instances.
 * Built once at startup from validated config. Provides O(1) lookup.
 */

import { logger } from '../shared/logger.js';
import { ConfigError } from '../shared/errors.js';
import type { ProviderConfig } from '../config/types.js';
import type { ProviderAdapter, ProviderRegistry as IProviderRegistry } from './types.js';
import { OpenRouterAdapter } from './adapters/openrouter.js';
import { DEFAULT_BASE_URLS, OpenAICompatibleAdapter } from './adapters/openai-compatible.js';

/** Registry of provider adapters, keyed by provider ID. */
export class ProviderRegistry implements IProviderRegistry {
  private readonly adapters: Map<string, ProviderAdapter>;

  constructor(adapters: Map<string, ProviderAdapter>) {
    this.adapters = adapters;
  }

  /**
   * Get a provider adapter by ID.
   * @throws ConfigError if the provider ID is not registered.
   */
  get(providerId: string): ProviderAdapter {
    const adapter = this.adapters.get(providerId);
    if (!adapter) {
      const available = Array.from(this.adapters.keys()).join(', ');
      throw new ConfigError(
        `Provider '${providerId}' not found in registry. Available: ${available}`,
      );
    }
    return adapter;
  }

  has(providerId: string): boolean {
    return this.adapters.has(providerId);
  }

  getAll(): ProviderAdapter[] {
    return Array.from(this.adapters.values());
  }

  get size(): number {
    return this.adapters.size;
  }
}

/**
 * Create the correct adapter instance based on provider type.
 * @throws ConfigError if a generic-openai provider has no baseUrl.
 */
export function createAdapter(config: ProviderConfig): ProviderAdapter {
  switch (config.type) {
    case 'openrouter':
      return new OpenRouterAdapter(config.id, config.name, config.apiKey, config.baseUrl, config.timeout);
    case 'generic-openai':
      if (!config.baseUrl) {
        throw new ConfigError(`Provider '${config.id}' (generic-openai) requires a baseUrl`);
      }
      return new OpenAICompatibleAdapter(
        config.id,
        config.type,
        config.name,
        config.apiKey,
        config.baseUrl,
        config.timeout,
      );
    case 'openai':
    case 'groq':
    case 'cerebras':
      return new OpenAICompatibleAdapter(
        config.id,
        config.type,
        config.name,
        config.apiKey,
        config.baseUrl ?? DEFAULT_BASE_URLS[config.type],
        config.timeout,
      );
  }
}

/** Build a provider registry from validated config. */
export function buildProviderRegistry(providers: readonly ProviderConfig[]): ProviderRegistry {
  const adapters = new Map<string, ProviderAdapter>();

  for (const config of providers) {
    const adapter = createAdapter(config);
    adapters.set(config.id, adapter);

    logger.info(
      { provider: adapter.id, type: adapter.providerType, baseUrl: adapter.baseUrl },
      `Registered provider: ${adapter.name} (${adapter.providerType}) at ${adapter.baseUrl}`,
    );
  }

  return new ProviderRegistry(adapters);
}
