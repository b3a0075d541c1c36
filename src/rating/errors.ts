/**
 * Error kinds raised by the rating engine.
 *
 * Every error carries a stable `code` so outer layers (CLI, run store)
 * can report it without matching on messages.
 */

export type RatingErrorCode =
  | 'INVALID_CONFIGURATION'
  | 'INVALID_CONTEST'
  | 'UNKNOWN_PARTICIPANT';

export class RatingError extends Error {
  readonly code: RatingErrorCode;

  constructor(code: RatingErrorCode, message: string) {
    super(message);
    this.name = 'RatingError';
    this.code = code;
  }
}

/**
 * Negative numeric parameter, undersized roster or duplicate id.
 */
export class InvalidConfigurationError extends RatingError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('INVALID_CONFIGURATION', message);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

/**
 * Self-pairing or a non-finite rating.
 */
export class InvalidContestError extends RatingError {
  constructor(message: string) {
    super('INVALID_CONTEST', message);
    this.name = 'InvalidContestError';
  }
}

export class UnknownParticipantError extends RatingError {
  readonly participantId: string;

  constructor(participantId: string) {
    super('UNKNOWN_PARTICIPANT', `Participant not found: ${participantId}`);
    this.name = 'UnknownParticipantError';
    this.participantId = participantId;
  }
}

export function isRatingError(value: unknown): value is RatingError {
  return value instanceof RatingError;
}
