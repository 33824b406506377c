import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { initializeDatabase } from '../db.js';
import { migrateSchema, SCHEMA_VERSION } from '../schema.js';
import { RequestLogger } from '../request-logger.js';
import type { RequestLogEntry } from '../request-logger.js';
import { UsageAggregator } from '../aggregator.js';

function entry(overrides: Partial<RequestLogEntry> = {}): RequestLogEntry {
  return {
    timestamp: 1_000,
    category: 'fast',
    classificationRule: 'default',
    outcome: 'success',
    backendId: 'groq:llama-a',
    httpStatus: 200,
    promptTokens: 10,
    completionTokens: 20,
    totalTokens: 30,
    latencyMs: 12.6,
    attempts: 1,
    ...overrides,
  };
}

describe('persistence', () => {
  let db: Database.Database;
  let requestLogger: RequestLogger;
  let aggregator: UsageAggregator;

  beforeEach(() => {
    db = initializeDatabase(':memory:');
    requestLogger = new RequestLogger(db);
    aggregator = new UsageAggregator(db);
  });

  afterEach(() => {
    db.close();
  });

  describe('migrateSchema', () => {
    it('sets user_version to the latest schema version', () => {
      expect(db.pragma('user_version', { simple: true })).toBe(SCHEMA_VERSION);
    });

    it('is a no-op on an up-to-date database', () => {
      requestLogger.logRequest(entry());
      migrateSchema(db);
      expect(aggregator.getRecentRequests()).toHaveLength(1);
    });
  });

  describe('RequestLogger', () => {
    it('stores a row with rounded latency and a null error message', () => {
      requestLogger.logRequest(entry());

      expect(aggregator.getRecentRequests()).toEqual([
        {
          id: 1,
          timestamp: 1_000,
          category: 'fast',
          classificationRule: 'default',
          outcome: 'success',
          backendId: 'groq:llama-a',
          httpStatus: 200,
          promptTokens: 10,
          completionTokens: 20,
          totalTokens: 30,
          latencyMs: 13,
          attempts: 1,
          errorMessage: null,
        },
      ]);
    });
  });

  describe('usage aggregates', () => {
    it('accumulates per-backend totals and successes', () => {
      requestLogger.logRequest(entry({ timestamp: 1_000 }));
      requestLogger.logRequest(
        entry({
          timestamp: 2_000,
          outcome: 'fatal',
          httpStatus: 400,
          promptTokens: 0,
          completionTokens: 0,
          totalTokens: 0,
          errorMessage: '400: bad request',
        }),
      );

      expect(aggregator.getBackendUsage('groq:llama-a')).toEqual({
        backendId: 'groq:llama-a',
        totalRequests: 2,
        successfulRequests: 1,
        totalTokens: 30,
        totalPromptTokens: 10,
        totalCompletionTokens: 20,
        lastRequestTimestamp: 2_000,
      });
    });

    it('skips the backend aggregate for requests without a backend', () => {
      requestLogger.logRequest(
        entry({ outcome: 'no_eligible_candidates', backendId: null, httpStatus: 503, totalTokens: 0, attempts: 0 }),
      );

      expect(aggregator.getAllBackendUsage()).toEqual([]);
      expect(aggregator.getCategoryUsage()).toEqual([
        { category: 'fast', totalRequests: 1, successfulRequests: 0, totalTokens: 0, lastRequestTimestamp: 1_000 },
      ]);
    });

    it('returns null for a backend with no requests', () => {
      expect(aggregator.getBackendUsage('cerebras:none')).toBeNull();
    });

    it('orders backends by most recent request', () => {
      requestLogger.logRequest(entry({ backendId: 'groq:llama-a', timestamp: 1_000 }));
      requestLogger.logRequest(entry({ backendId: 'cerebras:llama-b', timestamp: 3_000 }));

      expect(aggregator.getAllBackendUsage().map((u) => u.backendId)).toEqual([
        'cerebras:llama-b',
        'groq:llama-a',
      ]);
    });

    it('aggregates by category in name order', () => {
      requestLogger.logRequest(entry({ category: 'powerful', classificationRule: 'complexity' }));
      requestLogger.logRequest(entry({ category: 'fast' }));
      requestLogger.logRequest(entry({ category: 'fast', outcome: 'exhausted', backendId: null, totalTokens: 0 }));

      expect(aggregator.getCategoryUsage()).toEqual([
        { category: 'fast', totalRequests: 2, successfulRequests: 1, totalTokens: 30, lastRequestTimestamp: 1_000 },
        { category: 'powerful', totalRequests: 1, successfulRequests: 1, totalTokens: 30, lastRequestTimestamp: 1_000 },
      ]);
    });
  });

  describe('getRecentRequests', () => {
    it('returns newest first and honors the limit', () => {
      requestLogger.logRequest(entry({ timestamp: 1_000 }));
      requestLogger.logRequest(entry({ timestamp: 3_000 }));
      requestLogger.logRequest(entry({ timestamp: 2_000 }));

      expect(aggregator.getRecentRequests(2).map((r) => r.timestamp)).toEqual([3_000, 2_000]);
    });
  });
});
