/**
 * Routing types: classification, ranked candidates, the per-request chain
 * state machine and the outcomes returned to callers.
 */

import type { Category, ChatCompletionResponse, Usage } from '../shared/types.js';

/** Signals measured on the inbound request. */
export interface ClassificationFactors {
  totalLength: number;
  messageCount: number;
  hasSystemMessage: boolean;
  hasLongMessage: boolean;
  hasCodeBlock: boolean;
  hasComplexityKeywords: boolean;
}

/** Which classification rule fired. */
export type ClassificationRule = 'override' | 'token_intensive' | 'complexity' | 'default';

export interface TaskClassification {
  category: Category;
  /** 0-1 */
  confidence: number;
  rule: ClassificationRule;
  factors: ClassificationFactors;
}

/** Normalized [0,1] terms of a candidate's score, before weighting. */
export interface ScoreBreakdown {
  benchmarkRank: number;
  benchmarkScore: number;
  rateLimitHeadroom: number;
  priority: number;
  recency: number;
  costEfficiency: number;
}

export interface ScoredCandidate {
  backendId: string;
  category: Category;
  score: number;
  breakdown: ScoreBreakdown;
}

/** Why a backend was left out of the candidate list. */
export type IneligibleReason = 'unavailable' | 'rate_limited' | 'backoff';

export interface IneligibleBackend {
  backendId: string;
  category: Category;
  reason: IneligibleReason;
  /** When the backend becomes eligible again, if time-bound. */
  until: number | null;
}

/** Per-candidate record of what happened during execution. */
export interface AttemptTrace {
  backendId: string;
  outcome: 'success' | 'transient' | 'rate_limited' | 'fatal';
  reason?: string;
  retryAfterMs?: number;
  latencyMs: number;
}

/**
 * Per-request chain state:
 * pending -> trying(i) -> success | trying(i+1) | exhausted, plus fatal and cancelled exits.
 */
export type ChainState =
  | { phase: 'pending' }
  | { phase: 'trying'; index: number }
  | { phase: 'success'; index: number }
  | { phase: 'exhausted' }
  | { phase: 'fatal'; index: number }
  | { phase: 'cancelled'; index: number };

export type ChainEvent =
  | { type: 'start' }
  | { type: 'result'; kind: 'success' | 'transient' | 'rate_limited' | 'fatal' }
  | { type: 'cancel' };

/** Outcome of executing one candidate list. */
export type ChainOutcome =
  | {
      status: 'success';
      backendId: string;
      payload: ChatCompletionResponse;
      usage: Usage | null;
      trace: AttemptTrace[];
    }
  | { status: 'exhausted'; trace: AttemptTrace[] }
  | { status: 'fatal'; backendId: string; reason: string; statusCode?: number; trace: AttemptTrace[] }
  | { status: 'cancelled'; trace: AttemptTrace[] };

/** Context attached to every routed outcome. */
export interface RouteContext {
  classification: TaskClassification;
  /** The ranked list that was executed (empty when nothing was eligible). */
  candidates: ScoredCandidate[];
  latencyMs: number;
}

/** Tagged result of routeAndExecute. */
export type RouteOutcome =
  | (RouteContext & Extract<ChainOutcome, { status: 'success' }>)
  | (RouteContext & Extract<ChainOutcome, { status: 'exhausted' }>)
  | (RouteContext & Extract<ChainOutcome, { status: 'fatal' }>)
  | (RouteContext & Extract<ChainOutcome, { status: 'cancelled' }>)
  | (RouteContext & {
      status: 'no_eligible_candidates';
      ineligible: IneligibleBackend[];
      trace: AttemptTrace[];
    });
