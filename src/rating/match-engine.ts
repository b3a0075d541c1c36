/**
 * MatchEngine - resolves one contest between two participants.
 *
 * The outcome is drawn from the injected random source with the win
 * probability the rating model predicts, then both sides are updated.
 * Every check runs before the first mutation, so a rejected contest
 * leaves both participants untouched.
 */

import type { Participant } from './participant';
import type { ContestContext, ContestOptions, ContestOutcome, MatchResult, MatchSide } from './types';
import type { RandomSource } from './random';
import {
  actualScoreFor,
  drawProbability,
  expectedScore,
  ratingDelta,
  streakBonus,
} from './elo';
import { InvalidConfigurationError, InvalidContestError } from './errors';

type Resolution = 'A_WINS' | 'B_WINS' | 'DRAW';

export class MatchEngine {
  private random: RandomSource;

  constructor(random: RandomSource) {
    this.random = random;
  }

  /**
   * Resolve a contest between `a` and `b` and commit the rating changes.
   * Consumes exactly one draw from the random source.
   */
  resolve(a: Participant, b: Participant, options: ContestOptions, context: ContestContext): MatchResult {
    this.validate(a, b, options);

    const expectedA = expectedScore(a.rating, b.rating);
    const expectedB = expectedScore(b.rating, a.rating);
    const resolution = this.drawResolution(expectedA, options.drawRate);

    const outcomeA: ContestOutcome = resolution === 'A_WINS' ? 'win' : resolution === 'B_WINS' ? 'loss' : 'draw';
    const outcomeB: ContestOutcome = resolution === 'A_WINS' ? 'loss' : resolution === 'B_WINS' ? 'win' : 'draw';
    const actualA = actualScoreFor(outcomeA);
    const actualB = actualScoreFor(outcomeB);

    const baseDeltaA = ratingDelta(options.kFactor, actualA, expectedA);
    const baseDeltaB = ratingDelta(options.kFactor, actualB, expectedB);

    let deltaA = baseDeltaA;
    let deltaB = baseDeltaB;
    // Loser (or B on a draw) takes the mirror of the other side's delta
    if (resolution === 'A_WINS') {
      deltaB = -baseDeltaA;
      if (options.arcadeMode) {
        deltaA = streakBonus(baseDeltaA, a.winStreak, options.streakBonusFraction);
      }
    } else if (resolution === 'B_WINS') {
      deltaA = -baseDeltaB;
      if (options.arcadeMode) {
        deltaB = streakBonus(baseDeltaB, b.winStreak, options.streakBonusFraction);
      }
    } else {
      deltaB = -baseDeltaA;
    }

    const postA = a.rating + deltaA;
    const postB = b.rating + deltaB;
    if (!Number.isFinite(postA) || !Number.isFinite(postB)) {
      throw new InvalidContestError(
        `Contest between ${a.id} and ${b.id} would produce a non-finite rating`
      );
    }

    const sideA: MatchSide = Object.freeze({
      participantId: a.id,
      preMatchRating: a.rating,
      postMatchRating: postA,
      expectedScore: expectedA,
      actualScore: actualA,
      baseDelta: outcomeA === 'win' ? baseDeltaA : deltaA,
      delta: deltaA,
      winStreakBefore: a.winStreak,
    });
    const sideB: MatchSide = Object.freeze({
      participantId: b.id,
      preMatchRating: b.rating,
      postMatchRating: postB,
      expectedScore: expectedB,
      actualScore: actualB,
      baseDelta: outcomeB === 'win' ? baseDeltaB : deltaB,
      delta: deltaB,
      winStreakBefore: b.winStreak,
    });

    // Commit
    this.commit(a, outcomeA, deltaA, context.tick);
    this.commit(b, outcomeB, deltaB, context.tick);

    return Object.freeze({
      index: context.index,
      tick: context.tick,
      isDraw: resolution === 'DRAW',
      winnerId: resolution === 'A_WINS' ? a.id : resolution === 'B_WINS' ? b.id : null,
      loserId: resolution === 'A_WINS' ? b.id : resolution === 'B_WINS' ? a.id : null,
      a: sideA,
      b: sideB,
    });
  }

  private validate(a: Participant, b: Participant, options: ContestOptions): void {
    if (a === b || a.id === b.id) {
      throw new InvalidContestError(`Participant ${a.id} cannot be paired against itself`);
    }
    if (!Number.isFinite(a.rating) || !Number.isFinite(b.rating)) {
      throw new InvalidContestError(
        `Non-finite rating in contest between ${a.id} (${a.rating}) and ${b.id} (${b.rating})`
      );
    }
    if (!Number.isFinite(options.kFactor) || options.kFactor < 0) {
      throw new InvalidConfigurationError(`kFactor must be >= 0, got ${options.kFactor}`);
    }
    if (!Number.isFinite(options.streakBonusFraction) || options.streakBonusFraction < 0) {
      throw new InvalidConfigurationError(
        `streakBonusFraction must be >= 0, got ${options.streakBonusFraction}`
      );
    }
    if (!Number.isFinite(options.drawRate) || options.drawRate < 0) {
      throw new InvalidConfigurationError(`drawRate must be >= 0, got ${options.drawRate}`);
    }
  }

  /**
   * A wins below `E - d/2`, draws up to `E + d/2`, B wins above.
   */
  private drawResolution(expectedA: number, drawRate: number): Resolution {
    const roll = this.random.next();
    const draw = drawProbability(drawRate, expectedA);
    const winThreshold = expectedA - draw / 2;

    if (roll < winThreshold) return 'A_WINS';
    if (roll < winThreshold + draw) return 'DRAW';
    return 'B_WINS';
  }

  private commit(participant: Participant, outcome: ContestOutcome, delta: number, tick: number): void {
    switch (outcome) {
      case 'win':
        participant.recordWin(delta, tick);
        break;
      case 'loss':
        participant.recordLoss(delta, tick);
        break;
      case 'draw':
        participant.recordDraw(delta, tick);
        break;
    }
  }
}
