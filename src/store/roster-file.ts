/**
 * Roster file storage.
 *
 * Rosters are stored as a JSON array of participant records (the output of
 * Roster.toJSON). Writes go to a temporary file first and are then renamed
 * over the target.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { Roster } from '../rating/roster';
import { DEFAULT_BASE_RATING } from '../rating/elo';

export const DEFAULT_ROSTER_PATH = path.join('data', 'players.json');

/**
 * Number of participants in a generated sample roster.
 */
export const SAMPLE_ROSTER_SIZE = 8;

/**
 * Create `player-1` .. `player-n`, all at `baseRating`.
 */
export function createSampleRoster(
  count: number = SAMPLE_ROSTER_SIZE,
  baseRating: number = DEFAULT_BASE_RATING
): Roster {
  return Roster.fromDescription(
    Array.from({ length: count }, (_, i) => ({ id: `player-${i + 1}`, initialRating: baseRating })),
    baseRating
  );
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Load a roster file. Returns null when the file does not exist.
 *
 * @throws Error naming the path when the file is unreadable or invalid
 */
export async function loadRosterFile(filePath: string): Promise<Roster | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw new Error(`Failed to read roster from ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error(`Failed to parse roster in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  try {
    return Roster.fromJSON(data);
  } catch (error) {
    throw new Error(`Invalid roster in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Save a roster, creating the parent directory if needed.
 */
export async function saveRosterFile(filePath: string, roster: Roster): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });

  const tmpPath = `${filePath}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(roster.toJSON(), null, 2) + '\n', 'utf-8');
  await fs.rename(tmpPath, filePath);
}
