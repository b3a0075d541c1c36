/**
 * Core types for the rating engine.
 *
 * Participants are owned by a Roster and mutated only by the MatchEngine
 * and the decay step. Everything handed back to callers is a plain,
 * frozen record.
 */

/**
 * Unique identifier for a participant.
 * Integer ids from a roster description are normalized with String().
 */
export type ParticipantId = string;

/**
 * Actual score of one side of a contest: loss, draw, win.
 */
export type ActualScore = 0 | 0.5 | 1;

/**
 * Outcome of a contest from the perspective of one side.
 */
export type ContestOutcome = 'win' | 'draw' | 'loss';

/**
 * Read-only view of a participant's state.
 */
export interface ParticipantSnapshot {
  id: ParticipantId;
  rating: number;
  winStreak: number;
  matchesPlayed: number;
  wins: number;
  losses: number;
  draws: number;
  /** Tick of the last contest this participant played (0 if none) */
  lastActiveTick: number;
  /** Tick up to which inactivity decay has been charged */
  decayedThroughTick: number;
}

/**
 * One entry of a roster description: the engine's construction input.
 */
export interface RosterEntry {
  id: ParticipantId | number;
  /** Falls back to the configured base rating */
  initialRating?: number;
}

/**
 * Parameters for resolving a single contest.
 */
export interface ContestOptions {
  kFactor: number;
  /** Enables the win-streak bonus for the winner */
  arcadeMode: boolean;
  streakBonusFraction: number;
  /** Share of contests between equal ratings that end in a draw (0 disables draws) */
  drawRate: number;
}

/**
 * Where a contest sits in a batch.
 */
export interface ContestContext {
  /** 0-based position in the batch */
  index: number;
  /** Simulation tick the contest happens at */
  tick: number;
}

/**
 * One side of a resolved contest.
 */
export interface MatchSide {
  participantId: ParticipantId;
  preMatchRating: number;
  postMatchRating: number;
  expectedScore: number;
  actualScore: ActualScore;
  /** Delta before any streak bonus */
  baseDelta: number;
  /** Delta actually applied to the rating */
  delta: number;
  winStreakBefore: number;
}

/**
 * Result of a single contest, in pairing order.
 */
export interface MatchResult {
  index: number;
  tick: number;
  isDraw: boolean;
  winnerId: ParticipantId | null;
  loserId: ParticipantId | null;
  a: MatchSide;
  b: MatchSide;
}

/**
 * Leaderboard entry for display.
 */
export interface LeaderboardEntry {
  rank: number;
  participantId: ParticipantId;
  rating: number;
  matchesPlayed: number;
  wins: number;
  losses: number;
  draws: number;
  /** wins / matchesPlayed, 0 before the first match */
  winRate: number;
  winStreak: number;
}
