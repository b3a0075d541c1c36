/**
 * Zod schemas for roster data crossing the engine boundary.
 *
 * Roster descriptions and serialized rosters arrive from files, the
 * database or the command line; they are validated here before any
 * Participant is constructed.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Primitives
// ---------------------------------------------------------------------------

export const ParticipantIdSchema = z
  .union([z.string().min(1), z.number().int()])
  .transform((id) => String(id));

const FiniteRatingSchema = z.number().finite();
const CounterSchema = z.number().int().min(0);

// ---------------------------------------------------------------------------
// Roster description ({id, initialRating} pairs)
// ---------------------------------------------------------------------------

export const RosterEntrySchema = z.object({
  id: ParticipantIdSchema,
  initialRating: FiniteRatingSchema.optional(),
});
export type ParsedRosterEntry = z.infer<typeof RosterEntrySchema>;

export const RosterDescriptionSchema = z.array(RosterEntrySchema);

// ---------------------------------------------------------------------------
// Serialized roster (full participant state)
// ---------------------------------------------------------------------------

export const ParticipantRecordSchema = z.object({
  id: ParticipantIdSchema,
  rating: FiniteRatingSchema,
  winStreak: CounterSchema.default(0),
  matchesPlayed: CounterSchema.default(0),
  wins: CounterSchema.default(0),
  losses: CounterSchema.default(0),
  draws: CounterSchema.default(0),
  lastActiveTick: CounterSchema.default(0),
  decayedThroughTick: CounterSchema.optional(),
}).superRefine((record, ctx) => {
  if (record.wins + record.losses + record.draws !== record.matchesPlayed) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['matchesPlayed'],
      message: `wins + losses + draws (${record.wins + record.losses + record.draws}) must equal matchesPlayed (${record.matchesPlayed})`,
    });
  }
  if (record.winStreak > record.wins) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['winStreak'],
      message: `winStreak (${record.winStreak}) cannot exceed wins (${record.wins})`,
    });
  }
});
export type ParticipantRecord = z.infer<typeof ParticipantRecordSchema>;

export const RosterRecordSchema = z.array(ParticipantRecordSchema);

/**
 * Render zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
