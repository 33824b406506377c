/**
 * Capability registry: the immutable catalogue of every backend the router
 * may send traffic to. Built once at startup from validated config.
 */

import { logger } from '../shared/logger.js';
import { ConfigError } from '../shared/errors.js';
import type { BackendConfig, RateBudget } from '../config/types.js';
import type { Category } from '../shared/types.js';

/** One (provider, model) pair and its static capabilities. */
export interface BackendDescriptor {
  /** Composite id `${providerId}:${model}`. */
  readonly id: string;
  readonly providerId: string;
  readonly model: string;
  readonly category: Category;
  /** 1 is the most preferred. */
  readonly priority: number;
  /** Named benchmark scores on a 0-100 scale. */
  readonly benchmarks: Readonly<Record<string, number>>;
  readonly costPerMillionTokens: number;
  readonly rateLimits: Readonly<RateBudget>;
}

/** Build the composite id of a provider+model pair. */
export function backendId(providerId: string, model: string): string {
  return `${providerId}:${model}`;
}

/** Mean of a backend's benchmark scores, 0-100. */
export function meanBenchmark(descriptor: BackendDescriptor): number {
  const scores = Object.values(descriptor.benchmarks);
  if (scores.length === 0) return 0;
  return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}

export class CapabilityRegistry {
  private readonly backends: ReadonlyMap<string, BackendDescriptor>;

  constructor(descriptors: readonly BackendDescriptor[]) {
    const map = new Map<string, BackendDescriptor>();
    for (const descriptor of descriptors) {
      if (map.has(descriptor.id)) {
        throw new ConfigError(`Backend '${descriptor.id}' is declared more than once`);
      }
      map.set(
        descriptor.id,
        Object.freeze({
          ...descriptor,
          benchmarks: Object.freeze({ ...descriptor.benchmarks }),
          rateLimits: Object.freeze({ ...descriptor.rateLimits }),
        }),
      );
    }
    this.backends = map;
  }

  /**
   * Get a backend descriptor by id.
   * @throws ConfigError if the id is not registered.
   */
  get(id: string): BackendDescriptor {
    const descriptor = this.backends.get(id);
    if (!descriptor) {
      const available = Array.from(this.backends.keys()).join(', ');
      throw new ConfigError(`Backend '${id}' not found in registry. Available: ${available}`);
    }
    return descriptor;
  }

  has(id: string): boolean {
    return this.backends.has(id);
  }

  /** All descriptors, in declaration order. */
  getAll(): BackendDescriptor[] {
    return Array.from(this.backends.values());
  }

  ids(): string[] {
    return Array.from(this.backends.keys());
  }

  byCategory(category: Category): BackendDescriptor[] {
    return this.getAll().filter((descriptor) => descriptor.category === category);
  }

  get size(): number {
    return this.backends.size;
  }
}

/** Build the capability registry from validated backend config. */
export function buildCapabilityRegistry(backends: readonly BackendConfig[]): CapabilityRegistry {
  const descriptors = backends.map<BackendDescriptor>((config) => ({
    id: backendId(config.provider, config.model),
    providerId: config.provider,
    model: config.model,
    category: config.category,
    priority: config.priority,
    benchmarks: config.benchmarks,
    costPerMillionTokens: config.costPerMillionTokens,
    rateLimits: config.rateLimits,
  }));

  const registry = new CapabilityRegistry(descriptors);

  logger.info(
    {
      backends: registry.size,
      fast: registry.byCategory('fast').length,
      powerful: registry.byCategory('powerful').length,
    },
    `Registered ${registry.size} backend(s)`,
  );

  return registry;
}
