/**
 * Simulation module exports.
 *
 * Provides seed-reproducible batch runs over a roster.
 */

export * from './types';
export * from './config';
export * from './summary';
export * from './simulator';
export * from './run';
