/**
 * Rating engine: Elo model, participants, roster and contest resolution.
 *
 * @module rating
 */

// Core types
export type {
  ParticipantId,
  ActualScore,
  ContestOutcome,
  ParticipantSnapshot,
  RosterEntry,
  ContestOptions,
  ContestContext,
  MatchSide,
  MatchResult,
  LeaderboardEntry,
} from './types';

// Elo model
export {
  expectedScore,
  ratingDelta,
  streakBonus,
  decay,
  actualScoreFor,
  drawProbability,
  DEFAULT_K_FACTOR,
  DEFAULT_BASE_RATING,
  DEFAULT_RATING_FLOOR,
  ELO_SCALE,
} from './elo';

// Errors
export {
  RatingError,
  InvalidConfigurationError,
  InvalidContestError,
  UnknownParticipantError,
  isRatingError,
} from './errors';
export type { RatingErrorCode } from './errors';

// Randomness
export { createRandomSource, mulberry32, nextIndex, pickDistinctPair } from './random';
export type { RandomSource } from './random';

// Entities
export type { ParticipantInit } from './participant';
export { Roster } from './roster';
export {
  ParticipantIdSchema,
  RosterEntrySchema,
  RosterDescriptionSchema,
  ParticipantRecordSchema,
  RosterRecordSchema,
  formatIssues,
} from './schemas';
export type { ParticipantRecord, ParsedRosterEntry } from './schemas';

// Contest resolution
export { MatchEngine } from './match-engine';

// Leaderboard
export {
  getLeaderboard,
  leaderboardFromSnapshots,
  rankSnapshots,
  DEFAULT_LEADERBOARD_SIZE,
} from './leaderboard';
