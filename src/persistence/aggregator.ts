/**
 * Usage aggregator for reading materialized usage statistics.
 * Aggregates are maintained by triggers on request_logs, so reads are
 * single-table lookups.
 */

import type Database from 'better-sqlite3';

export interface BackendUsage {
  backendId: string;
  totalRequests: number;
  successfulRequests: number;
  totalTokens: number;
  totalPromptTokens: number;
  totalCompletionTokens: number;
  lastRequestTimestamp: number | null;
}

export interface CategoryUsage {
  category: string;
  totalRequests: number;
  successfulRequests: number;
  totalTokens: number;
  lastRequestTimestamp: number | null;
}

/** Raw request log row (for recent request display). */
export interface RequestLogRow {
  id: number;
  timestamp: number;
  category: string;
  classificationRule: string;
  outcome: string;
  backendId: string | null;
  httpStatus: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  latencyMs: number;
  attempts: number;
  errorMessage: string | null;
}

const BACKEND_COLUMNS = `
  backend_id as backendId,
  total_requests as totalRequests,
  successful_requests as successfulRequests,
  total_tokens as totalTokens,
  total_prompt_tokens as totalPromptTokens,
  total_completion_tokens as totalCompletionTokens,
  last_request_timestamp as lastRequestTimestamp
`;

export class UsageAggregator {
  private readonly allBackendsStmt: Database.Statement<[], BackendUsage>;
  private readonly backendStmt: Database.Statement<[string], BackendUsage>;
  private readonly categoriesStmt: Database.Statement<[], CategoryUsage>;
  private readonly recentStmt: Database.Statement<[number], RequestLogRow>;

  constructor(db: Database.Database) {
    this.allBackendsStmt = db.prepare<[], BackendUsage>(`
      SELECT ${BACKEND_COLUMNS}
      FROM usage_by_backend
      ORDER BY last_request_timestamp DESC
    `);

    this.backendStmt = db.prepare<[string], BackendUsage>(`
      SELECT ${BACKEND_COLUMNS}
      FROM usage_by_backend
      WHERE backend_id = ?
    `);

    this.categoriesStmt = db.prepare<[], CategoryUsage>(`
      SELECT
        category,
        total_requests as totalRequests,
        successful_requests as successfulRequests,
        total_tokens as totalTokens,
        last_request_timestamp as lastRequestTimestamp
      FROM usage_by_category
      ORDER BY category
    `);

    this.recentStmt = db.prepare<[number], RequestLogRow>(`
      SELECT
        id,
        timestamp,
        category,
        classification_rule as classificationRule,
        outcome,
        backend_id as backendId,
        http_status as httpStatus,
        prompt_tokens as promptTokens,
        completion_tokens as completionTokens,
        total_tokens as totalTokens,
        latency_ms as latencyMs,
        attempts,
        error_message as errorMessage
      FROM request_logs
      ORDER BY timestamp DESC, id DESC
      LIMIT ?
    `);
  }

  getAllBackendUsage(): BackendUsage[] {
    return this.allBackendsStmt.all();
  }

  getBackendUsage(backendId: string): BackendUsage | null {
    return this.backendStmt.get(backendId) ?? null;
  }

  getCategoryUsage(): CategoryUsage[] {
    return this.categoriesStmt.all();
  }

  /** Most recent requests first. */
  getRecentRequests(limit: number = 50): RequestLogRow[] {
    return this.recentStmt.all(limit);
  }
}
