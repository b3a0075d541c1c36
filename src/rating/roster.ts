/**
 * Roster - the sole owner of Participant instances.
 *
 * Participants are kept in insertion order, which is also the order the
 * pairing policy indexes into. Callers read state through snapshots; only
 * the MatchEngine and BatchSimulator touch live participants.
 */

import type { ParticipantId, ParticipantSnapshot, RosterEntry } from './types';
import { Participant, type ParticipantInit } from './participant';
import { DEFAULT_BASE_RATING } from './elo';
import { InvalidConfigurationError, UnknownParticipantError } from './errors';
import {
  RosterDescriptionSchema,
  RosterRecordSchema,
  formatIssues,
  type ParticipantRecord,
} from './schemas';

export class Roster {
  private participants: Map<ParticipantId, Participant> = new Map();

  /**
   * Build a roster from `{id, initialRating}` pairs.
   * Entries without a rating start at `baseRating`.
   */
  static fromDescription(entries: RosterEntry[], baseRating: number = DEFAULT_BASE_RATING): Roster {
    const parsed = RosterDescriptionSchema.safeParse(entries);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new InvalidConfigurationError(`Invalid roster description: ${issues.join('; ')}`, issues);
    }

    const roster = new Roster();
    for (const entry of parsed.data) {
      roster.add({ id: entry.id, rating: entry.initialRating ?? baseRating });
    }
    return roster;
  }

  /**
   * Restore a roster serialized with {@link Roster.toJSON}.
   */
  static fromJSON(data: unknown): Roster {
    const parsed = RosterRecordSchema.safeParse(data);
    if (!parsed.success) {
      const issues = formatIssues(parsed.error);
      throw new InvalidConfigurationError(`Invalid roster data: ${issues.join('; ')}`, issues);
    }

    const roster = new Roster();
    for (const record of parsed.data) {
      roster.add(record);
    }
    return roster;
  }

  /**
   * Add a participant. Duplicate ids are rejected.
   */
  add(init: ParticipantInit): ParticipantSnapshot {
    if (this.participants.has(init.id)) {
      throw new InvalidConfigurationError(`Duplicate participant id: ${init.id}`);
    }
    if (init.rating !== undefined && !Number.isFinite(init.rating)) {
      throw new InvalidConfigurationError(`Rating for ${init.id} must be finite`);
    }

    // Late joiners start idle at the current tick, not at tick 0
    const participant = new Participant({
      ...init,
      lastActiveTick: init.lastActiveTick ?? this.currentTick(),
    });
    this.participants.set(participant.id, participant);
    return participant.toSnapshot();
  }

  has(id: ParticipantId): boolean {
    return this.participants.has(id);
  }

  get size(): number {
    return this.participants.size;
  }

  /**
   * Participant ids in insertion order.
   */
  ids(): ParticipantId[] {
    return Array.from(this.participants.keys());
  }

  /**
   * Live participant for engine use. Do not hold on to the reference.
   *
   * @internal Callers outside the engine read {@link snapshot} instead.
   */
  participant(id: ParticipantId): Participant {
    const participant = this.participants.get(id);
    if (!participant) {
      throw new UnknownParticipantError(id);
    }
    return participant;
  }

  /**
   * Frozen copy of one participant's state.
   */
  snapshot(id: ParticipantId): ParticipantSnapshot {
    return this.participant(id).toSnapshot();
  }

  /**
   * Frozen copies of every participant, in insertion order.
   */
  snapshots(): ParticipantSnapshot[] {
    return Array.from(this.participants.values(), (p) => p.toSnapshot());
  }

  /**
   * Iterate live participants. Used by the simulator for the decay pass.
   *
   * @internal
   */
  *entries(): IterableIterator<Participant> {
    yield* this.participants.values();
  }

  /**
   * Latest tick any participant was active at (0 for a fresh roster).
   */
  currentTick(): number {
    let tick = 0;
    for (const participant of this.participants.values()) {
      tick = Math.max(tick, participant.lastActiveTick, participant.decayedThroughTick);
    }
    return tick;
  }

  /**
   * Independent deep copy, for running experiments side by side.
   */
  clone(): Roster {
    const copy = new Roster();
    for (const snapshot of this.snapshots()) {
      copy.add({ ...snapshot });
    }
    return copy;
  }

  toJSON(): ParticipantRecord[] {
    return this.snapshots().map((snapshot) => ({ ...snapshot }));
  }
}
