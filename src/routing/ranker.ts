/**
 * Candidate ranker.
 * Filters the registry down to eligible backends for a category and orders
 * them by a weighted score. The ordered list is the fallback order.
 *
 * A backend is eligible when its category matches, its health is not
 * unavailable, its rate-limit available-after has passed and any transient
 * failure backoff has expired. When nothing in the requested category is
 * eligible, the other category is tried before giving up.
 */

import { meanBenchmark } from '../registry/capability-registry.js';
import type { BackendDescriptor, CapabilityRegistry } from '../registry/capability-registry.js';
import type { RankingWeights } from '../config/types.js';
import type { HealthSnapshot } from '../health/types.js';
import type { RateLimitSnapshot } from '../ratelimit/types.js';
import type { UsageSnapshot } from '../usage/recorder.js';
import type { Category } from '../shared/types.js';
import type { IneligibleBackend, IneligibleReason, ScoreBreakdown, ScoredCandidate } from './types.js';

export const DEFAULT_RANKING_WEIGHTS: RankingWeights = {
  benchmarkRank: 0.3,
  benchmarkScore: 0.2,
  rateLimitHeadroom: 0.2,
  priority: 0.1,
  recency: 0.1,
  costEfficiency: 0.1,
};

/** Point-in-time state the ranker scores against. */
export interface RankingState {
  ledger: RateLimitSnapshot;
  health: HealthSnapshot;
  usage: UsageSnapshot;
}

export interface RankOptions {
  weights?: RankingWeights;
  now: number;
  /** Weighted recent attempts at which the recency term bottoms out at 0. */
  saturationCount?: number;
  /** Retry with the other category when nothing in `category` is eligible. */
  crossCategory?: boolean;
}

const DEFAULT_SATURATION_COUNT = 20;

export function otherCategory(category: Category): Category {
  return category === 'fast' ? 'powerful' : 'fast';
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/** Why a backend cannot be tried right now, or null if it can. */
export function ineligibility(
  backendId: string,
  state: RankingState,
  now: number,
): { reason: IneligibleReason; until: number | null } | null {
  const health = state.health.get(backendId);
  if (health?.status === 'unavailable') {
    return { reason: 'unavailable', until: null };
  }

  const limits = state.ledger.get(backendId);
  if (limits && limits.availableAfter > now) {
    return { reason: 'rate_limited', until: limits.availableAfter };
  }

  if (health && health.backoffUntil !== null && health.backoffUntil > now) {
    return { reason: 'backoff', until: health.backoffUntil };
  }

  return null;
}

/** Every registered backend that is currently excluded, and why. */
export function findIneligible(
  registry: CapabilityRegistry,
  state: RankingState,
  now: number,
): IneligibleBackend[] {
  const excluded: IneligibleBackend[] = [];
  for (const descriptor of registry.getAll()) {
    const verdict = ineligibility(descriptor.id, state, now);
    if (verdict) {
      excluded.push({ backendId: descriptor.id, category: descriptor.category, ...verdict });
    }
  }
  return excluded;
}

/** 1 for the best mean benchmark in the group, 1/2 for the next distinct score, and so on. */
function benchmarkPositions(group: readonly BackendDescriptor[]): Map<string, number> {
  const distinct = [...new Set(group.map(meanBenchmark))].sort((a, b) => b - a);
  return new Map(group.map((d) => [d.id, distinct.indexOf(meanBenchmark(d)) + 1]));
}

/** Remaining fraction of the tightest budget dimension. */
function headroom(backendId: string, ledger: RateLimitSnapshot): number {
  const entry = ledger.get(backendId);
  if (!entry) return 1;

  let remaining = 1 - entry.requestsConsumed / entry.requestBudget;
  if (entry.tokenBudget !== null && entry.tokenBudget > 0) {
    remaining = Math.min(remaining, 1 - entry.tokensConsumed / entry.tokenBudget);
  }
  return clamp01(remaining);
}

function recency(backendId: string, usage: UsageSnapshot, saturationCount: number): number {
  const weighted = usage.get(backendId)?.weighted ?? 0;
  return 1 - Math.min(weighted / saturationCount, 1);
}

function costEfficiency(descriptor: BackendDescriptor, group: readonly BackendDescriptor[]): number {
  const costs = group.map((d) => d.costPerMillionTokens);
  const max = Math.max(...costs);
  const min = Math.min(...costs);
  if (max === min) return 1;
  return (max - descriptor.costPerMillionTokens) / (max - min);
}

export function weightedScore(breakdown: ScoreBreakdown, weights: RankingWeights): number {
  return (
    weights.benchmarkRank * breakdown.benchmarkRank +
    weights.benchmarkScore * breakdown.benchmarkScore +
    weights.rateLimitHeadroom * breakdown.rateLimitHeadroom +
    weights.priority * breakdown.priority +
    weights.recency * breakdown.recency +
    weights.costEfficiency * breakdown.costEfficiency
  );
}

/** Score and order the eligible backends of one category. */
function rankCategory(
  category: Category,
  registry: CapabilityRegistry,
  state: RankingState,
  weights: RankingWeights,
  now: number,
  saturationCount: number,
): ScoredCandidate[] {
  // Relative terms are computed against the whole category so a backend's
  // score does not jump when a sibling drops out of eligibility.
  const group = registry.byCategory(category);
  const positions = benchmarkPositions(group);

  const scored = group
    .filter((descriptor) => ineligibility(descriptor.id, state, now) === null)
    .map<ScoredCandidate>((descriptor) => {
      const breakdown: ScoreBreakdown = {
        benchmarkRank: 1 / (positions.get(descriptor.id) ?? group.length),
        benchmarkScore: clamp01(meanBenchmark(descriptor) / 100),
        rateLimitHeadroom: headroom(descriptor.id, state.ledger),
        priority: 1 / descriptor.priority,
        recency: recency(descriptor.id, state.usage, saturationCount),
        costEfficiency: costEfficiency(descriptor, group),
      };
      return {
        backendId: descriptor.id,
        category,
        score: weightedScore(breakdown, weights),
        breakdown,
      };
    });

  return scored.sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    const byPriority = registry.get(a.backendId).priority - registry.get(b.backendId).priority;
    if (byPriority !== 0) return byPriority;
    return a.backendId < b.backendId ? -1 : a.backendId > b.backendId ? 1 : 0;
  });
}

/**
 * Rank eligible backends for a category, best first.
 * Falls back to the other category when the requested one has no eligible
 * backend; returns an empty list when neither has.
 */
export function rank(
  category: Category,
  registry: CapabilityRegistry,
  state: RankingState,
  options: RankOptions,
): ScoredCandidate[] {
  const weights = options.weights ?? DEFAULT_RANKING_WEIGHTS;
  const saturationCount = options.saturationCount ?? DEFAULT_SATURATION_COUNT;

  const primary = rankCategory(category, registry, state, weights, options.now, saturationCount);
  if (primary.length > 0 || options.crossCategory === false) {
    return primary;
  }

  return rankCategory(otherCategory(category), registry, state, weights, options.now, saturationCount);
}
