/**
 * Run history and roster persistence on SQLite.
 *
 * The engine returns serializable summaries; this store is where the CLI
 * keeps them between invocations. Rows read back are validated before
 * they are handed out.
 */

import type Database from 'better-sqlite3';
import { z } from 'zod';
import { Roster } from '../rating/roster';
import { SimulationConfigSchema, type SimulationConfig } from '../simulation/config';
import { RunStatsSchema } from '../simulation/summary';
import type { RunError, RunStats, RunStatus, RunSummary } from '../simulation/types';

const RunStatusSchema = z.enum(['completed', 'aborted', 'cancelled']);
const ErrorCodeSchema = z.enum(['INVALID_CONFIGURATION', 'INVALID_CONTEST', 'UNKNOWN_PARTICIPANT']);

/**
 * Final rating of one participant in a stored run.
 */
export interface StoredRating {
  participantId: string;
  rating: number;
  matchesPlayed: number;
}

export interface StoredRun {
  id: string;
  name: string | null;
  status: RunStatus;
  createdAt: string;
  config: SimulationConfig;
  stats: RunStats;
  finalRatings: StoredRating[];
  error?: RunError;
}

export interface RunListing {
  id: string;
  name: string | null;
  status: RunStatus;
  createdAt: string;
  matchCount: number;
}

export interface StoredMatch {
  index: number;
  tick: number;
  participantA: string;
  participantB: string;
  winnerId: string | null;
  isDraw: boolean;
  preRatingA: number;
  preRatingB: number;
  deltaA: number;
  deltaB: number;
}

interface RunRow {
  id: string;
  name: string | null;
  status: string;
  created_at: string;
  match_count: number;
  config: string;
  stats: string;
  error_code: string | null;
  error_message: string | null;
}

interface MatchRow {
  match_index: number;
  tick: number;
  participant_a: string;
  participant_b: string;
  winner_id: string | null;
  is_draw: number;
  pre_rating_a: number;
  pre_rating_b: number;
  delta_a: number;
  delta_b: number;
}

interface RosterParticipantRow {
  participant_id: string;
  rating: number;
  win_streak: number;
  matches_played: number;
  wins: number;
  losses: number;
  draws: number;
  last_active_tick: number;
  decayed_through_tick: number;
}

export class RunStore {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Persist a run summary. Re-saving an id replaces the earlier run.
   */
  saveRun(runId: string, summary: RunSummary, name?: string): void {
    const clearMatches = this.db.prepare('DELETE FROM run_matches WHERE run_id = ?');
    const clearRatings = this.db.prepare('DELETE FROM run_ratings WHERE run_id = ?');
    const clearRun = this.db.prepare('DELETE FROM runs WHERE id = ?');
    const insertRun = this.db.prepare(`
      INSERT INTO runs (id, name, status, seed, match_count, config, stats, error_code, error_message)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertMatch = this.db.prepare(`
      INSERT INTO run_matches (
        run_id, match_index, tick, participant_a, participant_b, winner_id, is_draw,
        pre_rating_a, pre_rating_b, delta_a, delta_b
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertRating = this.db.prepare(`
      INSERT INTO run_ratings (run_id, position, participant_id, rating, matches_played)
      VALUES (?, ?, ?, ?, ?)
    `);

    const save = this.db.transaction(() => {
      clearMatches.run(runId);
      clearRatings.run(runId);
      clearRun.run(runId);
      insertRun.run(
        runId,
        name ?? null,
        summary.status,
        summary.config.seed ?? null,
        summary.stats.matchCount,
        JSON.stringify(summary.config),
        JSON.stringify(summary.stats),
        summary.error?.code ?? null,
        summary.error?.message ?? null
      );

      for (const match of summary.matches) {
        insertMatch.run(
          runId,
          match.index,
          match.tick,
          match.a.participantId,
          match.b.participantId,
          match.winnerId,
          match.isDraw ? 1 : 0,
          match.a.preMatchRating,
          match.b.preMatchRating,
          match.a.delta,
          match.b.delta
        );
      }

      summary.finalRatings.forEach((snapshot, position) => {
        insertRating.run(runId, position, snapshot.id, snapshot.rating, snapshot.matchesPlayed);
      });
    });
    save();
  }

  getRun(runId: string): StoredRun | undefined {
    const row = this.db.prepare('SELECT * FROM runs WHERE id = ?').get(runId) as RunRow | undefined;
    if (!row) return undefined;

    const ratings = this.db
      .prepare(
        'SELECT participant_id, rating, matches_played FROM run_ratings WHERE run_id = ? ORDER BY position'
      )
      .all(runId) as Array<{ participant_id: string; rating: number; matches_played: number }>;

    const run: StoredRun = {
      id: row.id,
      name: row.name,
      status: RunStatusSchema.parse(row.status),
      createdAt: row.created_at,
      config: SimulationConfigSchema.parse(JSON.parse(row.config)),
      stats: RunStatsSchema.parse(JSON.parse(row.stats)),
      finalRatings: ratings.map((r) => ({
        participantId: r.participant_id,
        rating: r.rating,
        matchesPlayed: r.matches_played,
      })),
    };
    if (row.error_code !== null) {
      run.error = {
        code: ErrorCodeSchema.parse(row.error_code),
        message: row.error_message ?? '',
      };
    }
    return run;
  }

  /**
   * All stored runs, newest first.
   */
  listRuns(): RunListing[] {
    const rows = this.db
      .prepare('SELECT id, name, status, created_at, match_count FROM runs ORDER BY created_at DESC, rowid DESC')
      .all() as Array<Pick<RunRow, 'id' | 'name' | 'status' | 'created_at' | 'match_count'>>;

    return rows.map((row) => ({
      id: row.id,
      name: row.name,
      status: RunStatusSchema.parse(row.status),
      createdAt: row.created_at,
      matchCount: row.match_count,
    }));
  }

  getRunMatches(runId: string): StoredMatch[] {
    const rows = this.db
      .prepare('SELECT * FROM run_matches WHERE run_id = ? ORDER BY match_index')
      .all(runId) as MatchRow[];

    return rows.map((row) => ({
      index: row.match_index,
      tick: row.tick,
      participantA: row.participant_a,
      participantB: row.participant_b,
      winnerId: row.winner_id,
      isDraw: row.is_draw === 1,
      preRatingA: row.pre_rating_a,
      preRatingB: row.pre_rating_b,
      deltaA: row.delta_a,
      deltaB: row.delta_b,
    }));
  }

  /**
   * Returns true if a run was removed.
   */
  deleteRun(runId: string): boolean {
    return this.db.prepare('DELETE FROM runs WHERE id = ?').run(runId).changes > 0;
  }

  /**
   * Store a roster under `name`, replacing any previous version.
   */
  saveRoster(name: string, roster: Roster): void {
    const upsertRoster = this.db.prepare(`
      INSERT INTO rosters (name) VALUES (?)
      ON CONFLICT(name) DO UPDATE SET updated_at = datetime('now')
    `);
    const clearParticipants = this.db.prepare('DELETE FROM roster_participants WHERE roster_name = ?');
    const insertParticipant = this.db.prepare(`
      INSERT INTO roster_participants (
        roster_name, position, participant_id, rating, win_streak, matches_played,
        wins, losses, draws, last_active_tick, decayed_through_tick
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);

    const save = this.db.transaction(() => {
      upsertRoster.run(name);
      clearParticipants.run(name);
      roster.snapshots().forEach((p, position) => {
        insertParticipant.run(
          name,
          position,
          p.id,
          p.rating,
          p.winStreak,
          p.matchesPlayed,
          p.wins,
          p.losses,
          p.draws,
          p.lastActiveTick,
          p.decayedThroughTick
        );
      });
    });
    save();
  }

  /**
   * Load a stored roster, or null if none is stored under `name`.
   */
  loadRoster(name: string): Roster | null {
    const exists = this.db.prepare('SELECT name FROM rosters WHERE name = ?').get(name);
    if (!exists) return null;

    const rows = this.db
      .prepare('SELECT * FROM roster_participants WHERE roster_name = ? ORDER BY position')
      .all(name) as RosterParticipantRow[];

    return Roster.fromJSON(
      rows.map((row) => ({
        id: row.participant_id,
        rating: row.rating,
        winStreak: row.win_streak,
        matchesPlayed: row.matches_played,
        wins: row.wins,
        losses: row.losses,
        draws: row.draws,
        lastActiveTick: row.last_active_tick,
        decayedThroughTick: row.decayed_through_tick,
      }))
    );
  }

  listRosters(): string[] {
    const rows = this.db.prepare('SELECT name FROM rosters ORDER BY name').all() as Array<{ name: string }>;
    return rows.map((row) => row.name);
  }
}
