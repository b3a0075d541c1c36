/**
 * Leaderboard queries over a roster.
 */

import type { LeaderboardEntry, ParticipantSnapshot } from './types';
import type { Roster } from './roster';

/**
 * Default number of entries returned by {@link getLeaderboard}.
 */
export const DEFAULT_LEADERBOARD_SIZE = 10;

/**
 * Sort snapshots by rating (descending), breaking ties by id.
 */
export function rankSnapshots(snapshots: ParticipantSnapshot[]): ParticipantSnapshot[] {
  return [...snapshots].sort((a, b) => {
    if (b.rating !== a.rating) return b.rating - a.rating;
    return a.id.localeCompare(b.id);
  });
}

/**
 * Build leaderboard entries from snapshots, best first.
 */
export function leaderboardFromSnapshots(
  snapshots: ParticipantSnapshot[],
  count: number = DEFAULT_LEADERBOARD_SIZE
): LeaderboardEntry[] {
  return rankSnapshots(snapshots)
    .slice(0, Math.max(0, count))
    .map((snapshot, index) => ({
      rank: index + 1,
      participantId: snapshot.id,
      rating: snapshot.rating,
      matchesPlayed: snapshot.matchesPlayed,
      wins: snapshot.wins,
      losses: snapshot.losses,
      draws: snapshot.draws,
      winRate: snapshot.matchesPlayed > 0 ? snapshot.wins / snapshot.matchesPlayed : 0,
      winStreak: snapshot.winStreak,
    }));
}

/**
 * Get the top `count` participants of a roster.
 */
export function getLeaderboard(
  roster: Roster,
  count: number = DEFAULT_LEADERBOARD_SIZE
): LeaderboardEntry[] {
  return leaderboardFromSnapshots(roster.snapshots(), count);
}
