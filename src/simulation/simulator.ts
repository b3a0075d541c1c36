/**
 * BatchSimulator - drives N sequential contests over a roster.
 *
 * Each contest picks two distinct participants uniformly at random,
 * resolves it through the MatchEngine on live ratings, then charges
 * inactivity decay to everyone who sat the contest out. Contest i+1
 * always sees the ratings left by contest i.
 */

import type { ContestOptions, MatchResult } from '../rating/types';
import type { Roster } from '../rating/roster';
import { MatchEngine } from '../rating/match-engine';
import { createRandomSource, pickDistinctPair, type RandomSource } from '../rating/random';
import { InvalidConfigurationError, isRatingError } from '../rating/errors';
import {
  resolveSimulationConfig,
  type SimulationConfig,
  type SimulationConfigInput,
} from './config';
import { buildRunSummary } from './summary';
import type { RunError, RunOptions, RunStatus, RunSummary, SimulatorOptions } from './types';

type ContestAttempt =
  | { ok: true; result: MatchResult }
  | { ok: false; error: RunError };

export class BatchSimulator {
  readonly config: SimulationConfig;
  private random: RandomSource;
  private engine: MatchEngine;

  /**
   * @throws InvalidConfigurationError before any contest runs
   */
  constructor(config: SimulationConfigInput, options: SimulatorOptions = {}) {
    this.config = resolveSimulationConfig(config);
    this.random = options.random ?? createRandomSource(this.config.seed);
    this.engine = new MatchEngine(this.random);
  }

  /**
   * Run the configured number of contests against `roster`, mutating it.
   *
   * A rejected contest stops the batch and the partial summary is
   * returned with status `aborted`. Errors thrown by `onProgress`
   * propagate.
   */
  run(roster: Roster, options: RunOptions = {}): RunSummary {
    if (roster.size < 2) {
      throw new InvalidConfigurationError(
        `Roster needs at least 2 participants, got ${roster.size}`
      );
    }

    const { onProgress, signal } = options;
    const total = this.config.matchCount;
    const contest: ContestOptions = {
      kFactor: this.config.kFactor,
      arcadeMode: this.config.arcadeMode,
      streakBonusFraction: this.config.streakBonusFraction,
      drawRate: this.config.drawRate,
    };
    const startTick = roster.currentTick();

    const matches: MatchResult[] = [];
    let totalDecay = 0;
    let status: RunStatus = 'completed';
    let error: RunError | undefined;

    for (let index = 0; index < total; index++) {
      if (signal?.aborted) {
        status = 'cancelled';
        break;
      }

      const tick = startTick + index + 1;
      const attempt = this.playContest(roster, contest, index, tick);
      if (!attempt.ok) {
        status = 'aborted';
        error = attempt.error;
        break;
      }

      matches.push(attempt.result);
      const decayApplied = this.applyDecay(roster, tick, attempt.result);
      totalDecay += decayApplied;

      onProgress?.(
        Object.freeze({
          completed: matches.length,
          total,
          tick,
          result: attempt.result,
          decayApplied,
        })
      );
    }

    return buildRunSummary({
      status,
      config: this.config,
      matches,
      finalRatings: roster.snapshots(),
      totalDecay,
      error,
    });
  }

  private playContest(
    roster: Roster,
    contest: ContestOptions,
    index: number,
    tick: number
  ): ContestAttempt {
    const ids = roster.ids();
    const [first, second] = pickDistinctPair(this.random, ids.length);

    try {
      const result = this.engine.resolve(
        roster.participant(ids[first]),
        roster.participant(ids[second]),
        contest,
        { index, tick }
      );
      return { ok: true, result };
    } catch (err) {
      if (!isRatingError(err)) throw err;
      return { ok: false, error: { code: err.code, message: err.message } };
    }
  }

  /**
   * Charge decay at `tick` to every participant outside the contest.
   * Returns the total rating removed.
   */
  private applyDecay(roster: Roster, tick: number, result: MatchResult): number {
    if (this.config.decayPerDay <= 0) return 0;

    let removed = 0;
    for (const participant of roster.entries()) {
      if (participant.id === result.a.participantId || participant.id === result.b.participantId) {
        continue;
      }
      removed += participant.applyDecay(tick, this.config.decayPerDay, this.config.ratingFloor);
    }
    return removed;
  }
}
