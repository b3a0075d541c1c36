/**
 * Run summary construction and serialization.
 */

import { z } from 'zod';
import type { MatchResult, ParticipantSnapshot } from '../rating/types';
import type { SimulationConfig } from './config';
import type { RunError, RunStats, RunStatus, RunSummary } from './types';

export const RunStatsSchema = z.object({
  participantCount: z.number().int().min(0),
  matchCount: z.number().int().min(0),
  drawCount: z.number().int().min(0),
  minRating: z.number(),
  maxRating: z.number(),
  meanRating: z.number(),
  totalDecay: z.number(),
});

/**
 * Calculate aggregate statistics for a run.
 * An empty roster reports zeros for the rating figures.
 */
export function computeRunStats(
  finalRatings: ParticipantSnapshot[],
  matches: MatchResult[],
  totalDecay: number
): RunStats {
  const ratings = finalRatings.map((p) => p.rating);
  const total = ratings.reduce((sum, rating) => sum + rating, 0);

  return {
    participantCount: ratings.length,
    matchCount: matches.length,
    drawCount: matches.filter((m) => m.isDraw).length,
    minRating: ratings.length > 0 ? Math.min(...ratings) : 0,
    maxRating: ratings.length > 0 ? Math.max(...ratings) : 0,
    meanRating: ratings.length > 0 ? total / ratings.length : 0,
    totalDecay,
  };
}

export interface RunSummaryParts {
  status: RunStatus;
  config: SimulationConfig;
  matches: MatchResult[];
  finalRatings: ParticipantSnapshot[];
  totalDecay: number;
  error?: RunError;
}

export function buildRunSummary(parts: RunSummaryParts): RunSummary {
  const summary: RunSummary = {
    status: parts.status,
    config: parts.config,
    matches: parts.matches,
    finalRatings: parts.finalRatings,
    stats: computeRunStats(parts.finalRatings, parts.matches, parts.totalDecay),
  };
  if (parts.error) {
    summary.error = parts.error;
  }
  return summary;
}

/**
 * Render a summary as JSON. Key order is fixed by construction, so equal
 * summaries produce equal strings.
 */
export function serializeRunSummary(summary: RunSummary, indent: number = 2): string {
  return JSON.stringify(summary, null, indent);
}

