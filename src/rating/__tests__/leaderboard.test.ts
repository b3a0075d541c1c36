/**
 * Tests for rating/leaderboard.ts.
 */

import { describe, it, expect } from 'vitest';
import { getLeaderboard, leaderboardFromSnapshots, rankSnapshots } from '../leaderboard';
import { Roster } from '../roster';

function buildRoster(): Roster {
  return Roster.fromJSON([
    { id: 'dave', rating: 900, matchesPlayed: 4, wins: 1, losses: 3 },
    { id: 'carol', rating: 1100, matchesPlayed: 2, wins: 2, winStreak: 2 },
    { id: 'bob', rating: 1100, matchesPlayed: 4, wins: 2, losses: 1, draws: 1 },
    { id: 'alice', rating: 1000 },
  ]);
}

describe('rankSnapshots', () => {
  it('should sort by rating and break ties by id', () => {
    const ranked = rankSnapshots(buildRoster().snapshots());
    expect(ranked.map((s) => s.id)).toEqual(['bob', 'carol', 'alice', 'dave']);
  });

  it('should not reorder the input', () => {
    const snapshots = buildRoster().snapshots();
    rankSnapshots(snapshots);
    expect(snapshots[0].id).toBe('dave');
  });
});

describe('getLeaderboard', () => {
  it('should return the top entries with ranks', () => {
    const board = getLeaderboard(buildRoster(), 2);
    expect(board).toEqual([
      {
        rank: 1,
        participantId: 'bob',
        rating: 1100,
        matchesPlayed: 4,
        wins: 2,
        losses: 1,
        draws: 1,
        winRate: 0.5,
        winStreak: 0,
      },
      {
        rank: 2,
        participantId: 'carol',
        rating: 1100,
        matchesPlayed: 2,
        wins: 2,
        losses: 0,
        draws: 0,
        winRate: 1,
        winStreak: 2,
      },
    ]);
  });

  it('should default to ten entries', () => {
    const roster = Roster.fromDescription(Array.from({ length: 12 }, (_, i) => ({ id: `p${i}` })));
    expect(getLeaderboard(roster)).toHaveLength(10);
  });

  it('should report a zero win rate for participants without matches', () => {
    const entry = getLeaderboard(buildRoster()).find((e) => e.participantId === 'alice');
    expect(entry?.winRate).toBe(0);
    expect(entry?.rank).toBe(3);
  });
});

describe('leaderboardFromSnapshots', () => {
  it('should return nothing for a non-positive count', () => {
    expect(leaderboardFromSnapshots(buildRoster().snapshots(), 0)).toEqual([]);
    expect(leaderboardFromSnapshots(buildRoster().snapshots(), -3)).toEqual([]);
  });
});
