/**
 * Tests for rating/participant.ts and rating/roster.ts.
 */

import { describe, it, expect } from 'vitest';
import { Participant } from '../participant';
import { Roster } from '../roster';
import { InvalidConfigurationError, UnknownParticipantError } from '../errors';

describe('Participant', () => {
  it('should start at the base rating with no history', () => {
    const p = new Participant({ id: 'alice' });
    expect(p.toSnapshot()).toEqual({
      id: 'alice',
      rating: 1000,
      winStreak: 0,
      matchesPlayed: 0,
      wins: 0,
      losses: 0,
      draws: 0,
      lastActiveTick: 0,
      decayedThroughTick: 0,
    });
  });

  it('should drop a streak when no matches were played', () => {
    const p = new Participant({ id: 'alice', winStreak: 4, matchesPlayed: 0 });
    expect(p.winStreak).toBe(0);
  });

  it('should record a win', () => {
    const p = new Participant({ id: 'alice' });
    p.recordWin(16, 3);
    expect(p.rating).toBe(1016);
    expect(p.winStreak).toBe(1);
    expect(p.matchesPlayed).toBe(1);
    expect(p.lastActiveTick).toBe(3);
    expect(p.decayedThroughTick).toBe(3);
    expect(p.toSnapshot().wins).toBe(1);
  });

  it('should reset the streak on a loss or draw', () => {
    const p = new Participant({ id: 'alice' });
    p.recordWin(16, 1);
    p.recordWin(15, 2);
    expect(p.winStreak).toBe(2);

    p.recordDraw(-1, 3);
    expect(p.winStreak).toBe(0);

    p.recordWin(16, 4);
    p.recordLoss(-20, 5);
    expect(p.winStreak).toBe(0);
    expect(p.toSnapshot()).toMatchObject({ wins: 3, losses: 1, draws: 1, matchesPlayed: 5 });
  });

  it('should charge decay only for ticks not yet charged', () => {
    const p = new Participant({ id: 'alice', lastActiveTick: 2 });

    expect(p.applyDecay(7, 2, 0)).toBe(10);
    expect(p.rating).toBe(990);
    expect(p.decayedThroughTick).toBe(7);

    expect(p.applyDecay(7, 2, 0)).toBe(0);
    expect(p.applyDecay(9, 2, 0)).toBe(4);
    expect(p.rating).toBe(986);
    expect(p.lastActiveTick).toBe(2);
  });

  it('should not decay below the floor', () => {
    const p = new Participant({ id: 'alice', rating: 1003 });
    expect(p.applyDecay(10, 1, 1000)).toBe(3);
    expect(p.rating).toBe(1000);
  });

  it('should return frozen snapshots', () => {
    const p = new Participant({ id: 'alice' });
    expect(Object.isFrozen(p.toSnapshot())).toBe(true);
  });
});

describe('Roster', () => {
  describe('fromDescription', () => {
    it('should keep insertion order and normalize ids', () => {
      const roster = Roster.fromDescription([{ id: 'a' }, { id: 2, initialRating: 1200 }]);
      expect(roster.ids()).toEqual(['a', '2']);
      expect(roster.snapshot('a').rating).toBe(1000);
      expect(roster.snapshot('2').rating).toBe(1200);
    });

    it('should use the given base rating for entries without one', () => {
      const roster = Roster.fromDescription([{ id: 'a' }], 1500);
      expect(roster.snapshot('a').rating).toBe(1500);
    });

    it('should reject ids that collide after normalization', () => {
      expect(() => Roster.fromDescription([{ id: '1' }, { id: 1 }])).toThrow('Duplicate participant id: 1');
    });

    it('should reject an empty id', () => {
      try {
        Roster.fromDescription([{ id: 'a' }, { id: '' }]);
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidConfigurationError);
        if (error instanceof InvalidConfigurationError) {
          expect(error.code).toBe('INVALID_CONFIGURATION');
          expect(error.issues).toHaveLength(1);
          expect(error.issues[0]).toMatch(/^1\.id: /);
        }
      }
    });

    it('should reject a non-finite initial rating', () => {
      expect(() => Roster.fromDescription([{ id: 'a', initialRating: Infinity }])).toThrow(
        InvalidConfigurationError
      );
    });
  });

  describe('add', () => {
    it('should return a snapshot of the new participant', () => {
      const roster = new Roster();
      const snapshot = roster.add({ id: 'a', rating: 1100 });
      expect(snapshot.rating).toBe(1100);
      expect(roster.has('a')).toBe(true);
      expect(roster.size).toBe(1);
    });

    it('should start late joiners at the current tick', () => {
      const roster = Roster.fromDescription([{ id: 'a' }, { id: 'b' }]);
      roster.participant('a').recordWin(16, 5);
      expect(roster.currentTick()).toBe(5);

      const snapshot = roster.add({ id: 'c' });
      expect(snapshot.lastActiveTick).toBe(5);
    });

    it('should reject a non-finite rating', () => {
      const roster = new Roster();
      expect(() => roster.add({ id: 'a', rating: NaN })).toThrow('Rating for a must be finite');
    });
  });

  it('should throw for an unknown participant', () => {
    const roster = new Roster();
    expect(() => roster.participant('ghost')).toThrow(UnknownParticipantError);
    expect(() => roster.snapshot('ghost')).toThrow('Participant not found: ghost');
  });

  it('should report tick 0 for a fresh roster', () => {
    expect(Roster.fromDescription([{ id: 'a' }, { id: 'b' }]).currentTick()).toBe(0);
  });

  it('should clone independently', () => {
    const roster = Roster.fromDescription([{ id: 'a' }, { id: 'b' }]);
    const copy = roster.clone();
    copy.participant('a').recordWin(16, 1);

    expect(copy.snapshot('a').rating).toBe(1016);
    expect(roster.snapshot('a').rating).toBe(1000);
  });

  it('should restore full state from toJSON output', () => {
    const roster = Roster.fromDescription([{ id: 'a' }, { id: 'b' }]);
    roster.participant('a').recordWin(16, 1);
    roster.participant('b').recordLoss(-16, 1);
    roster.participant('b').applyDecay(4, 1, 0);

    const restored = Roster.fromJSON(JSON.parse(JSON.stringify(roster.toJSON())));
    expect(restored.snapshots()).toEqual(roster.snapshots());
  });

  it('should reject counters that do not add up to matches played', () => {
    try {
      Roster.fromJSON([
        { id: 'a', rating: 1000, matchesPlayed: 0, wins: 5, losses: 2 },
        { id: 'b', rating: 1000, matchesPlayed: 1, wins: 1 },
      ]);
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (error instanceof InvalidConfigurationError) {
        expect(error.issues).toEqual([
          '0.matchesPlayed: wins + losses + draws (7) must equal matchesPlayed (0)',
        ]);
      }
    }
  });

  it('should reject a win streak longer than the win count', () => {
    try {
      Roster.fromJSON([{ id: 'b', rating: 1000, matchesPlayed: 1, losses: 1, winStreak: 9 }]);
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (error instanceof InvalidConfigurationError) {
        expect(error.issues).toEqual(['0.winStreak: winStreak (9) cannot exceed wins (0)']);
      }
    }
  });

  it('should report invalid serialized data with issue paths', () => {
    try {
      Roster.fromJSON([{ id: 'a' }]);
      expect.fail('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidConfigurationError);
      if (error instanceof InvalidConfigurationError) {
        expect(error.issues).toEqual(['0.rating: Required']);
      }
    }
  });
});
