/**
 * SQLite schema migration system.
 *
 * Migrations are numbered sequentially and tracked in a `schema_migrations` table.
 * Each migration runs inside a transaction. Once applied, a migration is never re-run.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up: string;
}

/**
 * All migrations in order. Append new migrations to the end.
 */
export const migrations: Migration[] = [
  {
    version: 1,
    name: 'run_history',
    up: `
      CREATE TABLE runs (
        id TEXT PRIMARY KEY,
        name TEXT,
        status TEXT NOT NULL CHECK (status IN ('completed', 'aborted', 'cancelled')),
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        seed INTEGER,
        match_count INTEGER NOT NULL DEFAULT 0,
        config TEXT NOT NULL,
        stats TEXT NOT NULL,
        error_code TEXT,
        error_message TEXT
      );

      CREATE TABLE run_matches (
        run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        match_index INTEGER NOT NULL,
        tick INTEGER NOT NULL,
        participant_a TEXT NOT NULL,
        participant_b TEXT NOT NULL,
        winner_id TEXT,
        is_draw INTEGER NOT NULL DEFAULT 0 CHECK (is_draw IN (0, 1)),
        pre_rating_a REAL NOT NULL,
        pre_rating_b REAL NOT NULL,
        delta_a REAL NOT NULL,
        delta_b REAL NOT NULL,
        PRIMARY KEY (run_id, match_index)
      );

      CREATE TABLE run_ratings (
        run_id TEXT NOT NULL REFERENCES runs(id) ON DELETE CASCADE,
        position INTEGER NOT NULL,
        participant_id TEXT NOT NULL,
        rating REAL NOT NULL,
        matches_played INTEGER NOT NULL,
        PRIMARY KEY (run_id, participant_id)
      );

      CREATE INDEX idx_runs_created ON runs(created_at);
      CREATE INDEX idx_run_matches_participant ON run_matches(run_id, participant_a, participant_b);
    `,
  },
  {
    version: 2,
    name: 'stored_rosters',
    up: `
      CREATE TABLE rosters (
        name TEXT PRIMARY KEY,
        updated_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE TABLE roster_participants (
        roster_name TEXT NOT NULL REFERENCES rosters(name) ON DELETE CASCADE,
        position INTEGER NOT NULL,
        participant_id TEXT NOT NULL,
        rating REAL NOT NULL,
        win_streak INTEGER NOT NULL DEFAULT 0,
        matches_played INTEGER NOT NULL DEFAULT 0,
        wins INTEGER NOT NULL DEFAULT 0,
        losses INTEGER NOT NULL DEFAULT 0,
        draws INTEGER NOT NULL DEFAULT 0,
        last_active_tick INTEGER NOT NULL DEFAULT 0,
        decayed_through_tick INTEGER NOT NULL DEFAULT 0,
        PRIMARY KEY (roster_name, participant_id)
      );
    `,
  },
];

/**
 * Ensure the schema_migrations tracking table exists.
 */
function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Get the current schema version (highest applied migration).
 */
export function getCurrentVersion(db: Database.Database): number {
  ensureMigrationsTable(db);
  const row = db.prepare('SELECT MAX(version) as version FROM schema_migrations').get() as
    | { version: number | null }
    | undefined;
  return row?.version ?? 0;
}

/**
 * Run all pending migrations. Each migration runs in its own transaction.
 * Returns the number of migrations applied.
 */
export function migrate(db: Database.Database): number {
  ensureMigrationsTable(db);

  const currentVersion = getCurrentVersion(db);
  const pending = migrations.filter((m) => m.version > currentVersion);

  if (pending.length === 0) return 0;

  const insertMigration = db.prepare(
    'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
  );

  for (const migration of pending) {
    const run = db.transaction(() => {
      db.exec(migration.up);
      insertMigration.run(migration.version, migration.name);
    });
    run();
  }

  return pending.length;
}
