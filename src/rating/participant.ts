/**
 * Mutable participant entity.
 *
 * Instances live inside a Roster. State changes go through the record*
 * and applyDecay methods so the streak and counter invariants hold.
 */

import type { ParticipantId, ParticipantSnapshot } from './types';
import { DEFAULT_BASE_RATING, decay } from './elo';

export interface ParticipantInit {
  id: ParticipantId;
  rating?: number;
  winStreak?: number;
  matchesPlayed?: number;
  wins?: number;
  losses?: number;
  draws?: number;
  lastActiveTick?: number;
  decayedThroughTick?: number;
}

export class Participant {
  readonly id: ParticipantId;
  private _rating: number;
  private _winStreak: number;
  private _matchesPlayed: number;
  private _wins: number;
  private _losses: number;
  private _draws: number;
  private _lastActiveTick: number;
  private _decayedThroughTick: number;

  constructor(init: ParticipantInit) {
    this.id = init.id;
    this._rating = init.rating ?? DEFAULT_BASE_RATING;
    this._matchesPlayed = init.matchesPlayed ?? 0;
    // A participant without matches cannot be on a streak
    this._winStreak = this._matchesPlayed === 0 ? 0 : init.winStreak ?? 0;
    this._wins = init.wins ?? 0;
    this._losses = init.losses ?? 0;
    this._draws = init.draws ?? 0;
    this._lastActiveTick = init.lastActiveTick ?? 0;
    this._decayedThroughTick = init.decayedThroughTick ?? this._lastActiveTick;
  }

  get rating(): number {
    return this._rating;
  }

  get winStreak(): number {
    return this._winStreak;
  }

  get matchesPlayed(): number {
    return this._matchesPlayed;
  }

  get lastActiveTick(): number {
    return this._lastActiveTick;
  }

  get decayedThroughTick(): number {
    return this._decayedThroughTick;
  }

  /**
   * Ticks of inactivity not yet charged as decay.
   */
  idleTicks(tick: number): number {
    return Math.max(0, tick - Math.max(this._lastActiveTick, this._decayedThroughTick));
  }

  /** @internal Applied by MatchEngine only. */
  recordWin(delta: number, tick: number): void {
    this._rating += delta;
    this._winStreak++;
    this._wins++;
    this.markPlayed(tick);
  }

  /** @internal */
  recordLoss(delta: number, tick: number): void {
    this._rating += delta;
    this._winStreak = 0;
    this._losses++;
    this.markPlayed(tick);
  }

  /** @internal */
  recordDraw(delta: number, tick: number): void {
    this._rating += delta;
    this._winStreak = 0;
    this._draws++;
    this.markPlayed(tick);
  }

  /**
   * Charge decay for all idle ticks up to `tick`.
   * Returns the rating actually lost.
   *
   * @internal Applied by BatchSimulator only.
   */
  applyDecay(tick: number, decayPerDay: number, floor: number): number {
    const idle = this.idleTicks(tick);
    if (idle === 0) return 0;

    const before = this._rating;
    this._rating = decay(before, idle, decayPerDay, floor);
    this._decayedThroughTick = tick;
    return before - this._rating;
  }

  toSnapshot(): ParticipantSnapshot {
    return Object.freeze({
      id: this.id,
      rating: this._rating,
      winStreak: this._winStreak,
      matchesPlayed: this._matchesPlayed,
      wins: this._wins,
      losses: this._losses,
      draws: this._draws,
      lastActiveTick: this._lastActiveTick,
      decayedThroughTick: this._decayedThroughTick,
    });
  }

  private markPlayed(tick: number): void {
    this._matchesPlayed++;
    this._lastActiveTick = tick;
    this._decayedThroughTick = tick;
  }
}
