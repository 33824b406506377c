/**
 * Database initialization for SQLite observability persistence.
 * Sets up connection with WAL mode and performance pragmas.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../shared/logger.js';
import { migrateSchema } from './schema.js';

const IN_MEMORY = ':memory:';

/**
 * Open the SQLite database and bring its schema up to date.
 * @param dbPath - Path to the database file, or ':memory:'.
 */
export function initializeDatabase(dbPath: string): Database.Database {
  if (dbPath !== IN_MEMORY) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  if (dbPath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('synchronous = NORMAL');
  db.pragma('cache_size = -64000');
  db.pragma('temp_store = MEMORY');

  migrateSchema(db);

  logger.info({ dbPath }, 'SQLite database initialized');

  return db;
}
