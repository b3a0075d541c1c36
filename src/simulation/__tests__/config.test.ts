/**
 * Tests for simulation/config.ts: schema defaults and env overrides.
 */

import { describe, it, expect } from 'vitest';
import { resolveSimulationConfig, configFromEnv } from '../config';
import { InvalidConfigurationError } from '../../rating/errors';

function issuesOf(input: unknown): string[] {
  try {
    resolveSimulationConfig(input);
  } catch (error) {
    if (error instanceof InvalidConfigurationError) return error.issues;
    throw error;
  }
  return [];
}

describe('resolveSimulationConfig', () => {
  it('should fill in defaults', () => {
    expect(resolveSimulationConfig({ matchCount: 5 })).toEqual({
      kFactor: 32,
      arcadeMode: false,
      streakBonusFraction: 0,
      decayPerDay: 0,
      matchCount: 5,
      drawRate: 0,
      ratingFloor: 0,
      baseRating: 1000,
    });
  });

  it('should keep explicit values', () => {
    const config = resolveSimulationConfig({ matchCount: 1, kFactor: 24, arcadeMode: true, seed: 9 });
    expect(config.kFactor).toBe(24);
    expect(config.arcadeMode).toBe(true);
    expect(config.seed).toBe(9);
  });

  it('should reject a negative K-factor', () => {
    expect(() => resolveSimulationConfig({ kFactor: -1, matchCount: 1 })).toThrow(InvalidConfigurationError);
    const issues = issuesOf({ kFactor: -1, matchCount: 1 });
    expect(issues).toHaveLength(1);
    expect(issues[0].startsWith('kFactor:')).toBe(true);
  });

  it('should require a match count', () => {
    expect(issuesOf({})).toEqual(['matchCount: Required']);
  });

  it('should reject a fractional match count', () => {
    expect(issuesOf({ matchCount: 2.5 })[0]).toMatch(/^matchCount:/);
  });

  it('should reject a draw rate above 1', () => {
    expect(issuesOf({ matchCount: 1, drawRate: 1.5 })[0]).toMatch(/^drawRate:/);
  });

  it('should list every offending field', () => {
    const issues = issuesOf({ matchCount: -1, decayPerDay: -2, streakBonusFraction: -0.5 });
    expect(issues.map((issue) => issue.split(':')[0]).sort()).toEqual([
      'decayPerDay',
      'matchCount',
      'streakBonusFraction',
    ]);
  });

  it('should name the problems in the message', () => {
    expect(() => resolveSimulationConfig({ matchCount: -1 })).toThrow(/^Invalid simulation configuration: matchCount:/);
  });
});

describe('configFromEnv', () => {
  it('should read numeric and boolean variables', () => {
    expect(
      configFromEnv({ SIM_K_FACTOR: '24', SIM_ARCADE: 'true', SIM_SEED: '7', SIM_DRAW_RATE: '0.1' })
    ).toEqual({ kFactor: 24, arcadeMode: true, seed: 7, drawRate: 0.1 });
  });

  it('should skip unset and blank variables', () => {
    expect(configFromEnv({ SIM_MATCHES: '  ', SIM_ARCADE: '' })).toEqual({});
  });

  it('should accept 1 and reject other arcade values', () => {
    expect(configFromEnv({ SIM_ARCADE: '1' })).toEqual({ arcadeMode: true });
    expect(configFromEnv({ SIM_ARCADE: 'no' })).toEqual({ arcadeMode: false });
  });

  it('should throw on a non-numeric value', () => {
    expect(() => configFromEnv({ SIM_K_FACTOR: 'abc' })).toThrow('SIM_K_FACTOR must be a number, got "abc"');
  });
});
