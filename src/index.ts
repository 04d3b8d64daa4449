/**
 * TROTLINE
 *
 * Bayesian skill ratings for harness racing horses, drivers and trainers,
 * and morning-line odds built from them.
 */

export * from './config';
export * from './errors';
export * from './logger';
export * from './races';
export * from './ranking';
export * from './odds';
export * from './db';
