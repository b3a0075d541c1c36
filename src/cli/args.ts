/**
 * Command-line argument parsing for the simulation runner.
 */

import { configFromEnv, type SimulationConfigInput } from '../simulation/config';
import { DEFAULT_ROSTER_PATH } from '../store/roster-file';
import { DEFAULT_LEADERBOARD_SIZE } from '../rating/leaderboard';

export interface CliArgs {
  playersFile: string;
  /** Create a sample roster file and exit */
  init: boolean;
  /** Print the run summary as JSON instead of a table */
  json: boolean;
  help: boolean;
  /** Leaderboard rows to print */
  top: number;
  /** Persist the run to this SQLite file */
  dbPath?: string;
  logDir?: string;
  /** Name stored with the run */
  name?: string;
  /** Only the settings given on the command line */
  config: Partial<SimulationConfigInput>;
}

/**
 * Contests per run when neither a flag nor SIM_MATCHES sets one.
 */
export const DEFAULT_MATCH_COUNT = 1000;

type NumericConfigKey = Exclude<keyof SimulationConfigInput, 'arcadeMode'>;

const NUMERIC_FLAGS = new Map<string, NumericConfigKey>([
  ['--matches', 'matchCount'],
  ['-m', 'matchCount'],
  ['--k', 'kFactor'],
  ['--streak-bonus', 'streakBonusFraction'],
  ['--decay-per-day', 'decayPerDay'],
  ['--seed', 'seed'],
  ['--draw-rate', 'drawRate'],
  ['--floor', 'ratingFloor'],
  ['--base-rating', 'baseRating'],
]);

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} expects a value`);
  }
  return value;
}

function toNumber(raw: string, flag: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw new Error(`${flag} expects a number, got "${raw}"`);
  }
  return value;
}

/**
 * Parse argv (without the node and script entries).
 *
 * @throws Error for a missing or non-numeric flag value, or an unknown flag
 */
export function parseArgs(args: string[]): CliArgs {
  const result: CliArgs = {
    playersFile: DEFAULT_ROSTER_PATH,
    init: false,
    json: false,
    help: false,
    top: DEFAULT_LEADERBOARD_SIZE,
    config: {},
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    const configKey = NUMERIC_FLAGS.get(arg);
    if (configKey !== undefined) {
      result.config[configKey] = toNumber(takeValue(args, ++i, arg), arg);
      continue;
    }

    switch (arg) {
      case '--players-file':
      case '-p':
        result.playersFile = takeValue(args, ++i, arg);
        break;
      case '--arcade':
        result.config.arcadeMode = true;
        break;
      case '--init':
        result.init = true;
        break;
      case '--json':
        result.json = true;
        break;
      case '--top':
        result.top = toNumber(takeValue(args, ++i, arg), arg);
        break;
      case '--db':
        result.dbPath = takeValue(args, ++i, arg);
        break;
      case '--log-dir':
        result.logDir = takeValue(args, ++i, arg);
        break;
      case '--name':
        result.name = takeValue(args, ++i, arg);
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return result;
}

/**
 * Merge defaults, environment overrides and command-line flags, in that
 * order of precedence (flags win).
 */
export function buildConfig(args: CliArgs, env: NodeJS.ProcessEnv = process.env): SimulationConfigInput {
  return {
    matchCount: DEFAULT_MATCH_COUNT,
    ...configFromEnv(env),
    ...args.config,
  };
}

export const HELP_TEXT = `
Simulate Elo-rated contests over a roster of players.

Usage:
  npx tsx scripts/run-simulation.ts [options]

Options:
  --players-file, -p FILE  Roster file (default: ${DEFAULT_ROSTER_PATH})
  --init                   Write an 8-player sample roster and exit
  --matches, -m N          Number of contests to simulate (default: ${DEFAULT_MATCH_COUNT})
  --k N                    Elo K-factor (default: 32)
  --arcade                 Enable the win-streak bonus
  --streak-bonus F         Bonus per streak step (e.g. 0.1 for 10 percent)
  --decay-per-day N        Rating lost per inactive tick
  --draw-rate F            Draw share for evenly matched contests (0-1)
  --floor N                Lowest rating decay can reach (default: 0)
  --base-rating N          Rating for new players (default: 1000)
  --seed N                 Random seed for a reproducible run
  --top N                  Leaderboard rows to print (default: ${DEFAULT_LEADERBOARD_SIZE})
  --json                   Print the full run summary as JSON
  --db FILE                Also store the run in a SQLite database
  --log-dir DIR            Directory for JSONL run logs (default: logs/runs)
  --name NAME              Name stored with the run
  --help, -h               Show this help message

Environment Variables:
  SIM_K_FACTOR, SIM_ARCADE, SIM_STREAK_BONUS, SIM_DECAY_PER_DAY, SIM_MATCHES,
  SIM_SEED, SIM_DRAW_RATE, SIM_RATING_FLOOR, SIM_BASE_RATING
  Command-line flags take precedence.
`;
