/**
 * Simulation configuration: schema, defaults and environment overrides.
 */

import { z } from 'zod';
import {
  DEFAULT_BASE_RATING,
  DEFAULT_K_FACTOR,
  DEFAULT_RATING_FLOOR,
} from '../rating/elo';
import { InvalidConfigurationError } from '../rating/errors';
import { formatIssues } from '../rating/schemas';

export const SimulationConfigSchema = z.object({
  /** K-factor for Elo updates (higher = more volatile) */
  kFactor: z.number().finite().min(0).default(DEFAULT_K_FACTOR),
  /** Enables the win-streak bonus */
  arcadeMode: z.boolean().default(false),
  /** Extra share of a winner's gain per streak step (0.1 = +10%) */
  streakBonusFraction: z.number().finite().min(0).default(0),
  /** Rating lost per inactive tick */
  decayPerDay: z.number().finite().min(0).default(0),
  /** Number of contests in the batch */
  matchCount: z.number().int().min(0),
  /** Seed for reproducible runs; omitted means non-reproducible */
  seed: z.number().int().optional(),
  /** Draw share for evenly matched contests (0 disables draws) */
  drawRate: z.number().min(0).max(1).default(0),
  /** Lowest rating decay can push a participant to */
  ratingFloor: z.number().finite().default(DEFAULT_RATING_FLOOR),
  /** Starting rating for roster entries without one */
  baseRating: z.number().finite().default(DEFAULT_BASE_RATING),
});

export type SimulationConfigInput = z.input<typeof SimulationConfigSchema>;
export type SimulationConfig = z.output<typeof SimulationConfigSchema>;

/**
 * Validate a configuration record and fill in defaults.
 *
 * @throws InvalidConfigurationError listing every offending field
 */
export function resolveSimulationConfig(input: unknown): SimulationConfig {
  const parsed = SimulationConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new InvalidConfigurationError(
      `Invalid simulation configuration: ${issues.join('; ')}`,
      issues
    );
  }
  return parsed.data;
}

/**
 * Environment variables read by {@link configFromEnv}.
 */
export const ENV_KEYS = {
  kFactor: 'SIM_K_FACTOR',
  arcadeMode: 'SIM_ARCADE',
  streakBonusFraction: 'SIM_STREAK_BONUS',
  decayPerDay: 'SIM_DECAY_PER_DAY',
  matchCount: 'SIM_MATCHES',
  seed: 'SIM_SEED',
  drawRate: 'SIM_DRAW_RATE',
  ratingFloor: 'SIM_RATING_FLOOR',
  baseRating: 'SIM_BASE_RATING',
} as const;

type NumericKey = Exclude<keyof typeof ENV_KEYS, 'arcadeMode'>;

function readNumber(env: NodeJS.ProcessEnv, key: NumericKey): number | undefined {
  const raw = env[ENV_KEYS[key]];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (Number.isNaN(value)) {
    throw new InvalidConfigurationError(`${ENV_KEYS[key]} must be a number, got "${raw}"`);
  }
  return value;
}

/**
 * Read configuration overrides from the environment.
 * Unset variables are left out so schema defaults still apply.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<SimulationConfigInput> {
  const config: Partial<SimulationConfigInput> = {};

  const numericKeys: NumericKey[] = [
    'kFactor',
    'streakBonusFraction',
    'decayPerDay',
    'matchCount',
    'seed',
    'drawRate',
    'ratingFloor',
    'baseRating',
  ];
  for (const key of numericKeys) {
    const value = readNumber(env, key);
    if (value !== undefined) config[key] = value;
  }

  const arcade = env[ENV_KEYS.arcadeMode];
  if (arcade !== undefined && arcade.trim() !== '') {
    config.arcadeMode = arcade === 'true' || arcade === '1';
  }

  return config;
}
