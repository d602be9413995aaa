/**
 * Main type exports for pid-loop-sim
 */

export * from './control.js';
export * from './plants.js';
export * from './simulation.js';
