/**
 * Database module - SQLite persistence for run history and rosters.
 */

export { openDb, DEFAULT_DB_PATH, IN_MEMORY_DB } from './connection';
export type { OpenDbOptions } from './connection';
export { migrate, getCurrentVersion, migrations } from './migrations';
export type { Migration } from './migrations';
export { RunStore } from './run-store';
export type { StoredRun, StoredRating, StoredMatch, RunListing } from './run-store';
