/**
 * Batch simulation types.
 *
 * A RunSummary holds no wall-clock data: two runs with the same roster,
 * configuration and seed serialize to the same bytes.
 */

import type { MatchResult, ParticipantSnapshot } from '../rating/types';
import type { RatingErrorCode } from '../rating/errors';
import type { RandomSource } from '../rating/random';
import type { SimulationConfig } from './config';

/**
 * How a batch ended.
 * - completed: every requested contest ran
 * - aborted: a contest was rejected; the summary holds the committed prefix
 * - cancelled: the abort signal fired at a contest boundary
 */
export type RunStatus = 'completed' | 'aborted' | 'cancelled';

/**
 * Aggregate statistics over a run.
 */
export interface RunStats {
  participantCount: number;
  /** Contests actually resolved */
  matchCount: number;
  drawCount: number;
  minRating: number;
  maxRating: number;
  meanRating: number;
  /** Total rating removed by inactivity decay */
  totalDecay: number;
}

/**
 * Error recorded on an aborted run.
 */
export interface RunError {
  code: RatingErrorCode;
  message: string;
}

/**
 * Result of a batch run.
 */
export interface RunSummary {
  status: RunStatus;
  config: SimulationConfig;
  /** Resolved contests in execution order */
  matches: MatchResult[];
  /** Participant state after the run, in roster order */
  finalRatings: ParticipantSnapshot[];
  stats: RunStats;
  error?: RunError;
}

/**
 * Progress report passed to the callback after each committed contest.
 */
export interface SimulationProgress {
  completed: number;
  total: number;
  tick: number;
  result: MatchResult;
  /** Rating removed by decay at this tick */
  decayApplied: number;
}

/**
 * Read-only observer invoked synchronously after each contest.
 */
export type ProgressCallback = (progress: Readonly<SimulationProgress>) => void;

export interface SimulatorOptions {
  /** Overrides the source derived from `config.seed` */
  random?: RandomSource;
}

export interface RunOptions {
  onProgress?: ProgressCallback;
  /** Checked between contests only */
  signal?: AbortSignal;
}
