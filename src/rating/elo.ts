/**
 * Elo rating model.
 *
 * Pure functions only: expected score, rating delta, the arcade streak
 * bonus and inactivity decay. Inputs are not validated here; the
 * configuration boundary rejects negative parameters before they reach
 * these functions.
 */

import type { ActualScore, ContestOutcome } from './types';

/**
 * Default K-factor for Elo calculations.
 * Higher values mean ratings change more per contest.
 */
export const DEFAULT_K_FACTOR = 32;

/**
 * Default starting rating for new participants.
 */
export const DEFAULT_BASE_RATING = 1000;

/**
 * Default lowest rating decay can push a participant to.
 */
export const DEFAULT_RATING_FLOOR = 0;

/**
 * Rating gap at which the stronger side is expected to score 10:1.
 */
export const ELO_SCALE = 400;

/**
 * Calculate expected score for a participant against an opponent.
 * Uses the standard logistic Elo expectation.
 *
 * @param ratingA - The participant's current rating
 * @param ratingB - The opponent's current rating
 * @returns Expected score in (0, 1); exactly 0.5 for equal ratings
 */
export function expectedScore(ratingA: number, ratingB: number): number {
  const exponent = (ratingB - ratingA) / ELO_SCALE;
  return 1 / (1 + Math.pow(10, exponent));
}

/**
 * Calculate the rating change for one side of a contest.
 *
 * @param kFactor - Sensitivity constant (>= 0)
 * @param actualScore - 1 for a win, 0.5 for a draw, 0 for a loss
 * @param expected - Expected score from {@link expectedScore}
 */
export function ratingDelta(kFactor: number, actualScore: number, expected: number): number {
  return kFactor * (actualScore - expected);
}

/**
 * Amplify a winner's positive delta by its current win streak.
 *
 * The streak is the count before this win is recorded. Negative or zero
 * deltas and a zero fraction pass through unchanged, so the sign never
 * flips.
 *
 * @param baseDelta - Zero-sum delta from {@link ratingDelta}
 * @param winStreak - Consecutive wins before this contest
 * @param bonusFraction - Extra share of the delta per streak step (0.1 = +10%)
 */
export function streakBonus(baseDelta: number, winStreak: number, bonusFraction: number): number {
  if (baseDelta <= 0 || bonusFraction <= 0 || winStreak <= 0) {
    return baseDelta;
  }
  return baseDelta + baseDelta * bonusFraction * winStreak;
}

/**
 * Apply inactivity decay to a rating.
 *
 * The result never drops below `floor`, and a rating already at or below
 * the floor is returned unchanged.
 *
 * @param rating - Current rating
 * @param daysInactive - Elapsed inactive ticks (or days)
 * @param decayPerDay - Rating lost per inactive tick (>= 0)
 * @param floor - Lowest rating decay may produce
 */
export function decay(
  rating: number,
  daysInactive: number,
  decayPerDay: number,
  floor: number = DEFAULT_RATING_FLOOR
): number {
  if (daysInactive <= 0 || decayPerDay <= 0 || rating <= floor) {
    return rating;
  }
  return Math.max(floor, rating - decayPerDay * daysInactive);
}

/**
 * Map an outcome to its actual score.
 */
export function actualScoreFor(outcome: ContestOutcome): ActualScore {
  switch (outcome) {
    case 'win':
      return 1;
    case 'draw':
      return 0.5;
    case 'loss':
      return 0;
  }
}

/**
 * Probability that a contest is drawn, given the configured draw rate and
 * the expected score of one side.
 *
 * Capped at twice the underdog's expectation so that win probability
 * `E - d/2` stays non-negative and the side's expected score remains `E`.
 */
export function drawProbability(drawRate: number, expected: number): number {
  if (drawRate <= 0) return 0;
  return Math.min(drawRate, 2 * Math.min(expected, 1 - expected));
}
