#!/usr/bin/env npx tsx
/**
 * Run a batch of Elo-rated contests over a stored roster.
 *
 * Usage:
 *   npx tsx scripts/run-simulation.ts --init                 # Write a sample roster
 *   npx tsx scripts/run-simulation.ts -m 500 --seed 42       # Reproducible run
 *   npx tsx scripts/run-simulation.ts --arcade --streak-bonus 0.1
 *   npx tsx scripts/run-simulation.ts --db data/runs.db      # Also store the run
 *
 * Settings can also come from SIM_* variables in the environment or .env.
 */

import 'dotenv/config';
import { buildConfig, HELP_TEXT, parseArgs } from '../src/cli/args';
import { formatRunReport } from '../src/cli/report';
import { createSampleRoster, loadRosterFile, saveRosterFile } from '../src/store/roster-file';
import { BatchSimulator } from '../src/simulation/simulator';
import { serializeRunSummary } from '../src/simulation/summary';
import { RunLogger, runWithLogging } from '../src/logging/run-logger';
import { openDb } from '../src/db/connection';
import { RunStore } from '../src/db/run-store';
import { isRatingError } from '../src/rating/errors';

async function main() {
  const args = parseArgs(process.argv.slice(2));

  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }

  const config = buildConfig(args);

  if (args.init) {
    const roster = createSampleRoster(undefined, config.baseRating);
    await saveRosterFile(args.playersFile, roster);
    console.log(`Wrote ${roster.size} players to ${args.playersFile}`);
    return;
  }

  const roster = await loadRosterFile(args.playersFile);
  if (!roster) {
    const sample = createSampleRoster(undefined, config.baseRating);
    await saveRosterFile(args.playersFile, sample);
    console.log(`No roster at ${args.playersFile}; wrote a ${sample.size}-player sample. Run again to simulate.`);
    return;
  }

  const simulator = new BatchSimulator(config);
  const runId = args.name ?? `run-${Date.now()}`;
  const logger = new RunLogger(runId, args.logDir);

  const summary = runWithLogging(simulator, roster, logger);

  try {
    await saveRosterFile(args.playersFile, roster);

    if (args.dbPath) {
      const db = openDb(args.dbPath);
      try {
        new RunStore(db).saveRun(runId, summary, args.name);
      } finally {
        db.close();
      }
    }
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error), 'persist');
    throw error;
  }

  if (args.json) {
    console.log(serializeRunSummary(summary));
  } else {
    console.log(formatRunReport(summary, args.top));
    console.log(`\nLog: ${logger.getLogPath()}`);
  }

  if (summary.status !== 'completed') {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  if (isRatingError(error)) {
    console.error(`Error [${error.code}]: ${error.message}`);
  } else {
    console.error('Error:', error instanceof Error ? error.message : error);
  }
  process.exitCode = 1;
});
