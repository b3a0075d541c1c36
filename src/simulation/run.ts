/**
 * Engine boundary: roster description + configuration in, RunSummary out.
 *
 * Callers (CLI, web layer) pass pre-parsed data; this module does no I/O.
 */

import type { RosterEntry } from '../rating/types';
import { Roster } from '../rating/roster';
import { resolveSimulationConfig, type SimulationConfigInput } from './config';
import { BatchSimulator } from './simulator';
import type { RunOptions, RunSummary, SimulatorOptions } from './types';

export type RunSimulationOptions = RunOptions & SimulatorOptions;

/**
 * Validate the configuration and roster, then run a full batch on a fresh
 * roster built from `description`.
 *
 * @throws InvalidConfigurationError for negative parameters, fewer than two
 *   participants, duplicate ids or non-finite initial ratings
 */
export function runSimulation(
  description: RosterEntry[],
  config: SimulationConfigInput,
  options: RunSimulationOptions = {}
): RunSummary {
  const resolved = resolveSimulationConfig(config);
  const roster = Roster.fromDescription(description, resolved.baseRating);
  const simulator = new BatchSimulator(resolved, { random: options.random });
  return simulator.run(roster, { onProgress: options.onProgress, signal: options.signal });
}
