/**
 * Request logger: one row per routed request.
 * Inserting a row fires the triggers that maintain the usage aggregates.
 */

import type Database from 'better-sqlite3';
import type { Category } from '../shared/types.js';
import type { ClassificationRule, RouteOutcome } from '../routing/types.js';

export type LoggedOutcome = RouteOutcome['status'];

export interface RequestLogEntry {
  timestamp: number;
  category: Category;
  classificationRule: ClassificationRule;
  outcome: LoggedOutcome;
  /** Backend that served the request or returned the fatal error. */
  backendId: string | null;
  httpStatus: number;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  latencyMs: number;
  attempts: number;
  errorMessage?: string;
}

type InsertParams = [
  number,
  string,
  string,
  string,
  string | null,
  number,
  number,
  number,
  number,
  number,
  number,
  string | null,
];

export class RequestLogger {
  private readonly insertStmt: Database.Statement<InsertParams>;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare<InsertParams>(`
      INSERT INTO request_logs (
        timestamp,
        category,
        classification_rule,
        outcome,
        backend_id,
        http_status,
        prompt_tokens,
        completion_tokens,
        total_tokens,
        latency_ms,
        attempts,
        error_message
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
  }

  logRequest(entry: RequestLogEntry): void {
    this.insertStmt.run(
      entry.timestamp,
      entry.category,
      entry.classificationRule,
      entry.outcome,
      entry.backendId,
      entry.httpStatus,
      entry.promptTokens,
      entry.completionTokens,
      entry.totalTokens,
      Math.round(entry.latencyMs),
      entry.attempts,
      entry.errorMessage ?? null,
    );
  }
}
