/**
 * Simulation option types
 */

import type { Logger } from 'pino';

/**
 * Horizon of a closed-loop run on a uniform grid
 */
export interface HorizonOptions {
  /** Final time (s), default 10 */
  tEnd?: number;
  /** Number of grid points including t=0 and tEnd, default 500 */
  samples?: number;
}

/**
 * Options for a single forced-response integration
 */
export interface SimulateOptions {
  /** Initial state vector; zero when omitted */
  x0?: readonly number[];
  logger?: Logger;
}

/**
 * Options for step-response metric extraction
 */
export interface MetricOptions {
  /** Setpoint the output should track, default 1 */
  reference?: number;
  /** Settling band half-width as a fraction of the reference, default 0.02 */
  settlingTolerance?: number;
}

export interface ClosedLoopOptions extends HorizonOptions {
  /** Height of the reference (servo) or load (regulatory) step, default 1 */
  amplitude?: number;
  logger?: Logger;
}
