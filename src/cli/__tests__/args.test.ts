/**
 * Tests for cli/args.ts.
 */

import { describe, it, expect } from 'vitest';
import { parseArgs, buildConfig, HELP_TEXT, DEFAULT_MATCH_COUNT } from '../args';

describe('parseArgs', () => {
  it('should return defaults for no arguments', () => {
    expect(parseArgs([])).toEqual({
      playersFile: 'data/players.json',
      init: false,
      json: false,
      help: false,
      top: 10,
      config: {},
    });
  });

  it('should collect simulation settings', () => {
    const args = parseArgs(['-m', '50', '--k', '24', '--arcade', '--streak-bonus', '0.1', '--seed', '7']);
    expect(args.config).toEqual({
      matchCount: 50,
      kFactor: 24,
      arcadeMode: true,
      streakBonusFraction: 0.1,
      seed: 7,
    });
  });

  it('should read the remaining config flags', () => {
    const args = parseArgs(['--decay-per-day', '2', '--draw-rate', '0.25', '--floor', '800', '--base-rating', '1200']);
    expect(args.config).toEqual({ decayPerDay: 2, drawRate: 0.25, ratingFloor: 800, baseRating: 1200 });
  });

  it('should read runner options', () => {
    const args = parseArgs([
      '-p', 'league.json', '--json', '--top', '3', '--db', 'runs.db', '--log-dir', 'out', '--name', 'nightly', '--init', '-h',
    ]);
    expect(args).toMatchObject({
      playersFile: 'league.json',
      json: true,
      top: 3,
      dbPath: 'runs.db',
      logDir: 'out',
      name: 'nightly',
      init: true,
      help: true,
    });
  });

  it('should accept negative numbers as values', () => {
    expect(parseArgs(['--k', '-1']).config.kFactor).toBe(-1);
  });

  it('should reject a flag without a value', () => {
    expect(() => parseArgs(['--matches'])).toThrow('--matches expects a value');
    expect(() => parseArgs(['--seed', '--json'])).toThrow('--seed expects a value');
  });

  it('should reject a non-numeric value', () => {
    expect(() => parseArgs(['--k', 'abc'])).toThrow('--k expects a number, got "abc"');
    expect(() => parseArgs(['--top', ''])).toThrow('--top expects a number, got ""');
  });

  it('should reject unknown options', () => {
    expect(() => parseArgs(['--bogus'])).toThrow('Unknown option: --bogus');
    expect(() => parseArgs(['constructor'])).toThrow('Unknown option: constructor');
  });
});

describe('buildConfig', () => {
  it('should fall back to the default match count', () => {
    expect(buildConfig(parseArgs([]), {})).toEqual({ matchCount: DEFAULT_MATCH_COUNT });
  });

  it('should let flags override the environment', () => {
    const config = buildConfig(parseArgs(['--k', '20']), { SIM_K_FACTOR: '24', SIM_MATCHES: '300' });
    expect(config).toEqual({ matchCount: 300, kFactor: 20 });
  });
});

describe('HELP_TEXT', () => {
  it('should document every flag', () => {
    for (const flag of ['--matches', '--k', '--arcade', '--streak-bonus', '--decay-per-day', '--draw-rate', '--seed', '--db']) {
      expect(HELP_TEXT).toContain(flag);
    }
  });
});
