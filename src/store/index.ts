/**
 * Store module - roster files on disk.
 */

export * from './roster-file';
