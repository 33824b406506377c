/**
 * Database schema migration system using PRAGMA user_version.
 * Each migration runs once, in order, inside a transaction.
 */

import type Database from 'better-sqlite3';
import { logger } from '../shared/logger.js';

const migrations: ReadonlyArray<(db: Database.Database) => void> = [
  // 1: request log plus trigger-maintained aggregates
  (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS request_logs (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp INTEGER NOT NULL,
        category TEXT NOT NULL,
        classification_rule TEXT NOT NULL,
        outcome TEXT NOT NULL,
        backend_id TEXT,
        http_status INTEGER NOT NULL,
        prompt_tokens INTEGER NOT NULL DEFAULT 0,
        completion_tokens INTEGER NOT NULL DEFAULT 0,
        total_tokens INTEGER NOT NULL DEFAULT 0,
        latency_ms INTEGER NOT NULL,
        attempts INTEGER NOT NULL,
        error_message TEXT
      );

      CREATE TABLE IF NOT EXISTS usage_by_backend (
        backend_id TEXT PRIMARY KEY,
        total_requests INTEGER NOT NULL DEFAULT 0,
        successful_requests INTEGER NOT NULL DEFAULT 0,
        total_tokens INTEGER NOT NULL DEFAULT 0,
        total_prompt_tokens INTEGER NOT NULL DEFAULT 0,
        total_completion_tokens INTEGER NOT NULL DEFAULT 0,
        last_request_timestamp INTEGER
      );

      CREATE TABLE IF NOT EXISTS usage_by_category (
        category TEXT PRIMARY KEY,
        total_requests INTEGER NOT NULL DEFAULT 0,
        successful_requests INTEGER NOT NULL DEFAULT 0,
        total_tokens INTEGER NOT NULL DEFAULT 0,
        last_request_timestamp INTEGER
      );

      CREATE INDEX IF NOT EXISTS idx_logs_timestamp ON request_logs(timestamp DESC);
      CREATE INDEX IF NOT EXISTS idx_logs_backend ON request_logs(backend_id);
      CREATE INDEX IF NOT EXISTS idx_logs_category ON request_logs(category);

      -- Only requests that ended on a backend count toward its usage.
      CREATE TRIGGER IF NOT EXISTS update_backend_usage
      AFTER INSERT ON request_logs
      WHEN NEW.backend_id IS NOT NULL
      BEGIN
        INSERT INTO usage_by_backend (
          backend_id,
          total_requests,
          successful_requests,
          total_tokens,
          total_prompt_tokens,
          total_completion_tokens,
          last_request_timestamp
        )
        VALUES (
          NEW.backend_id,
          1,
          CASE WHEN NEW.outcome = 'success' THEN 1 ELSE 0 END,
          NEW.total_tokens,
          NEW.prompt_tokens,
          NEW.completion_tokens,
          NEW.timestamp
        )
        ON CONFLICT(backend_id) DO UPDATE SET
          total_requests = total_requests + 1,
          successful_requests = successful_requests + CASE WHEN NEW.outcome = 'success' THEN 1 ELSE 0 END,
          total_tokens = total_tokens + NEW.total_tokens,
          total_prompt_tokens = total_prompt_tokens + NEW.prompt_tokens,
          total_completion_tokens = total_completion_tokens + NEW.completion_tokens,
          last_request_timestamp = MAX(last_request_timestamp, NEW.timestamp);
      END;

      CREATE TRIGGER IF NOT EXISTS update_category_usage
      AFTER INSERT ON request_logs
      BEGIN
        INSERT INTO usage_by_category (
          category,
          total_requests,
          successful_requests,
          total_tokens,
          last_request_timestamp
        )
        VALUES (
          NEW.category,
          1,
          CASE WHEN NEW.outcome = 'success' THEN 1 ELSE 0 END,
          NEW.total_tokens,
          NEW.timestamp
        )
        ON CONFLICT(category) DO UPDATE SET
          total_requests = total_requests + 1,
          successful_requests = successful_requests + CASE WHEN NEW.outcome = 'success' THEN 1 ELSE 0 END,
          total_tokens = total_tokens + NEW.total_tokens,
          last_request_timestamp = MAX(last_request_timestamp, NEW.timestamp);
      END;
    `);
  },
];

/** Latest schema version this build knows about. */
export const SCHEMA_VERSION = migrations.length;

function userVersion(db: Database.Database): number {
  const version: unknown = db.pragma('user_version', { simple: true });
  return typeof version === 'number' ? version : 0;
}

/** Run pending migrations to bring the database to SCHEMA_VERSION. */
export function migrateSchema(db: Database.Database): void {
  const currentVersion = userVersion(db);
  logger.debug({ currentVersion }, 'Database schema version check');

  for (let version = currentVersion; version < migrations.length; version++) {
    const migration = migrations[version];
    if (!migration) break;

    const targetVersion = version + 1;
    logger.info({ from: version, to: targetVersion }, 'Running database migration');
    db.transaction(() => {
      migration(db);
      db.pragma(`user_version = ${targetVersion}`);
    })();
  }
}
