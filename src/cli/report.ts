/**
 * Plain-text rendering of run results for the terminal.
 */

import type { LeaderboardEntry } from '../rating/types';
import { leaderboardFromSnapshots } from '../rating/leaderboard';
import type { RunSummary } from '../simulation/types';

/**
 * Render leaderboard entries as an aligned table.
 */
export function formatLeaderboard(entries: LeaderboardEntry[]): string {
  const idWidth = Math.max('Participant'.length, ...entries.map((e) => e.participantId.length));

  const header = [
    '#'.padStart(3),
    'Participant'.padEnd(idWidth),
    'Rating'.padStart(8),
    'W-L-D'.padStart(9),
    'Streak'.padStart(6),
  ].join('  ');

  const rows = entries.map((e) =>
    [
      String(e.rank).padStart(3),
      e.participantId.padEnd(idWidth),
      e.rating.toFixed(1).padStart(8),
      `${e.wins}-${e.losses}-${e.draws}`.padStart(9),
      String(e.winStreak).padStart(6),
    ].join('  ')
  );

  return [header, ...rows].join('\n');
}

/**
 * Summary block followed by the top `top` participants.
 */
export function formatRunReport(summary: RunSummary, top: number): string {
  const { stats } = summary;
  const lines = [
    `Simulated ${stats.matchCount} of ${summary.config.matchCount} matches (${summary.status})`,
    `Ratings: min ${stats.minRating.toFixed(1)}, mean ${stats.meanRating.toFixed(1)}, max ${stats.maxRating.toFixed(1)}`,
    `Draws: ${stats.drawCount}, decay removed: ${stats.totalDecay.toFixed(1)}`,
  ];
  if (summary.error) {
    lines.push(`Error: [${summary.error.code}] ${summary.error.message}`);
  }

  lines.push('', formatLeaderboard(leaderboardFromSnapshots(summary.finalRatings, top)));
  return lines.join('\n');
}
