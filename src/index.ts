/**
 * Elo rating engine and batch contest simulator.
 */

export * from './rating';
export * from './simulation';
export * from './store';
export * from './db';
export * from './logging/run-logger';
export { parseArgs, buildConfig, HELP_TEXT, DEFAULT_MATCH_COUNT } from './cli/args';
export type { CliArgs } from './cli/args';
export { formatLeaderboard, formatRunReport } from './cli/report';
