/**
 * SQLite connection management for run history.
 *
 * Each caller owns the connection it opens; there is no shared handle.
 * File databases use WAL mode, and the data directory is created on demand.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { migrate } from './migrations';

export const DEFAULT_DB_PATH = path.join(process.cwd(), 'data', 'runs.db');

export const IN_MEMORY_DB = ':memory:';

export interface OpenDbOptions {
  /** Apply pending migrations after opening (default: true) */
  migrate?: boolean;
}

/**
 * Open a run-history database.
 */
export function openDb(dbPath: string = DEFAULT_DB_PATH, options: OpenDbOptions = {}): Database.Database {
  if (dbPath !== IN_MEMORY_DB) {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);

  if (dbPath !== IN_MEMORY_DB) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  if (options.migrate ?? true) {
    migrate(db);
  }

  return db;
}
