/**
 * Run Logger - Structured logging for simulation runs.
 *
 * Writes JSONL logs to logs/runs/{runId}.jsonl. The engine itself never
 * logs; the CLI runs batches through {@link runWithLogging}.
 */

import { existsSync, mkdirSync, appendFileSync, readFileSync, readdirSync, statSync } from 'fs';
import { join, dirname, basename } from 'path';
import type { ProgressCallback, RunOptions, RunSummary } from '../simulation/types';
import type { BatchSimulator } from '../simulation/simulator';
import type { Roster } from '../rating/roster';

/**
 * Log event types for simulation runs.
 */
export type RunLogEvent =
  | { type: 'run_started'; runId: string; participantCount: number; matchCount: number; seed?: number }
  | { type: 'match_resolved'; index: number; tick: number; winnerId: string | null; loserId: string | null; isDraw: boolean; deltaA: number; deltaB: number }
  | { type: 'decay_applied'; tick: number; amount: number }
  | { type: 'run_completed'; runId: string; matchCount: number; meanRating: number }
  | { type: 'run_aborted'; runId: string; status: string; matchCount: number; error?: string }
  | { type: 'error'; error: string; context?: string; stack?: string }
  | { type: 'debug'; message: string; data?: unknown };

/**
 * Full log entry with metadata.
 */
export interface RunLogEntry {
  timestamp: string;
  runId: string;
  event: RunLogEvent;
}

function defaultLogsDir(): string {
  return join(process.cwd(), 'logs', 'runs');
}

/**
 * Logger for a single simulation run.
 */
export class RunLogger {
  private runId: string;
  private logPath: string;
  private enabled: boolean;

  constructor(runId: string, logsDir?: string) {
    this.runId = runId;
    const baseDir = logsDir || defaultLogsDir();
    this.logPath = join(baseDir, `${runId}.jsonl`);
    this.enabled = true;

    // Ensure logs directory exists
    const dir = dirname(this.logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * Logs an event to the run log file.
   */
  log(event: RunLogEvent): void {
    if (!this.enabled) return;

    const entry: RunLogEntry = {
      timestamp: new Date().toISOString(),
      runId: this.runId,
      event,
    };

    try {
      appendFileSync(this.logPath, JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error(`[RunLogger] Failed to write log: ${error}`);
    }
  }

  runStarted(participantCount: number, matchCount: number, seed?: number): void {
    this.log({ type: 'run_started', runId: this.runId, participantCount, matchCount, seed });
  }

  /**
   * Records the end of a run; non-completed runs are logged as aborted.
   */
  runFinished(summary: RunSummary): void {
    if (summary.status === 'completed') {
      this.log({
        type: 'run_completed',
        runId: this.runId,
        matchCount: summary.stats.matchCount,
        meanRating: summary.stats.meanRating,
      });
      return;
    }
    this.log({
      type: 'run_aborted',
      runId: this.runId,
      status: summary.status,
      matchCount: summary.stats.matchCount,
      error: summary.error?.message,
    });
  }

  error(error: string, context?: string, stack?: string): void {
    this.log({ type: 'error', error, context, stack });
  }

  debug(message: string, data?: unknown): void {
    this.log({ type: 'debug', message, data });
  }

  getLogPath(): string {
    return this.logPath;
  }

  /**
   * Disables logging (for tests or quiet runs).
   */
  disable(): void {
    this.enabled = false;
  }

  enable(): void {
    this.enabled = true;
  }
}

/**
 * Adapt a logger to the simulator's progress callback.
 * Every contest is logged; decay only when it removed rating.
 */
export function createLoggingProgress(logger: RunLogger, next?: ProgressCallback): ProgressCallback {
  return (progress) => {
    const { result } = progress;
    logger.log({
      type: 'match_resolved',
      index: result.index,
      tick: result.tick,
      winnerId: result.winnerId,
      loserId: result.loserId,
      isDraw: result.isDraw,
      deltaA: result.a.delta,
      deltaB: result.b.delta,
    });
    if (progress.decayApplied > 0) {
      logger.log({ type: 'decay_applied', tick: progress.tick, amount: progress.decayApplied });
    }
    next?.(progress);
  };
}

/**
 * Run a batch with every stage written to `logger`: start, resolved
 * configuration, each contest, and the outcome. A thrown error is logged
 * with its stack and rethrown.
 */
export function runWithLogging(
  simulator: BatchSimulator,
  roster: Roster,
  logger: RunLogger,
  options: RunOptions = {}
): RunSummary {
  logger.runStarted(roster.size, simulator.config.matchCount, simulator.config.seed);
  logger.debug('Resolved configuration', simulator.config);

  try {
    const summary = simulator.run(roster, {
      signal: options.signal,
      onProgress: createLoggingProgress(logger, options.onProgress),
    });
    logger.runFinished(summary);
    return summary;
  } catch (error) {
    if (error instanceof Error) {
      logger.error(error.message, 'run', error.stack);
    } else {
      logger.error(String(error), 'run');
    }
    throw error;
  }
}

/**
 * Reads all log entries from a run log file.
 */
export function readRunLogs(runId: string, logsDir?: string): RunLogEntry[] {
  const logPath = join(logsDir || defaultLogsDir(), `${runId}.jsonl`);

  if (!existsSync(logPath)) {
    return [];
  }

  const content = readFileSync(logPath, 'utf-8');
  const lines = content.trim().split('\n').filter(line => line.length > 0);

  return lines.map(line => {
    try {
      return JSON.parse(line) as RunLogEntry;
    } catch {
      return null;
    }
  }).filter((entry): entry is RunLogEntry => entry !== null);
}

/**
 * Reads the last N log entries from a run log file.
 */
export function readRecentRunLogs(runId: string, count: number = 50, logsDir?: string): RunLogEntry[] {
  return readRunLogs(runId, logsDir).slice(-count);
}

/**
 * Lists all available run log files.
 */
export function listRunLogs(logsDir?: string): { runId: string; path: string; size: number }[] {
  const baseDir = logsDir || defaultLogsDir();

  if (!existsSync(baseDir)) {
    return [];
  }

  const files = readdirSync(baseDir).filter(f => f.endsWith('.jsonl'));

  return files.map(f => {
    const fullPath = join(baseDir, f);
    return {
      runId: basename(f, '.jsonl'),
      path: fullPath,
      size: statSync(fullPath).size,
    };
  });
}

/**
 * Filters log entries by type.
 */
export function filterLogsByType(logs: RunLogEntry[], types: RunLogEvent['type'][]): RunLogEntry[] {
  return logs.filter(entry => types.includes(entry.event.type));
}

/**
 * Gets errors and aborts from a run log.
 */
export function getRunErrors(runId: string, logsDir?: string): RunLogEntry[] {
  return filterLogsByType(readRunLogs(runId, logsDir), ['error', 'run_aborted']);
}
