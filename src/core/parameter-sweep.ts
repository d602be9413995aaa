/**
 * Parameter Sweep
 *
 * Evaluates many gain sets against one plant. Each candidate is
 * simulated on its own; a candidate that fails (non-finite gains, an
 * improper loop, overflow) yields an Err in its slot and the sweep moves
 * on.
 */

import type { Logger } from 'pino';
import type { ControlSystemError } from '../api/errors.js';
import type { PerformanceMetrics, PidGains } from '../types/control.js';
import type { HorizonOptions, MetricOptions } from '../types/simulation.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { partitionResults, trySync, type Result } from '../utils/result-helpers.js';
import { analyzeStability, resolvePlant, servoClosedLoop, type PlantInput } from './closed-loop.js';
import { calculateStepResponseMetrics } from './performance-metrics.js';
import { stepResponse } from './simulation.js';

export interface SweepEntry {
  gains: PidGains;
  metrics: PerformanceMetrics;
  stable: boolean;
  spectralAbscissa: number;
}

export type SweepResult = Result<SweepEntry, ControlSystemError>;

export interface SweepOptions extends HorizonOptions, MetricOptions {
  logger?: Logger;
}

/**
 * Axis values for a full-factorial gain grid
 */
export interface GainGrid {
  kp: readonly number[];
  ki: readonly number[];
  kd: readonly number[];
}

/**
 * Cartesian product of the grid axes, kp varying slowest
 */
export function expandGainGrid(grid: GainGrid): PidGains[] {
  const candidates: PidGains[] = [];
  for (const kp of grid.kp) {
    for (const ki of grid.ki) {
      for (const kd of grid.kd) {
        candidates.push({ kp, ki, kd });
      }
    }
  }
  return candidates;
}

/**
 * Evaluate every candidate; the result array is index-aligned with `candidates`
 */
export function sweepGains(
  plant: PlantInput,
  candidates: readonly PidGains[],
  options: SweepOptions = {}
): SweepResult[] {
  const transferFunction = resolvePlant(plant);

  const results = candidates.map((gains) =>
    trySync((): SweepEntry => {
      const loop = servoClosedLoop(gains, transferFunction);
      const { time, output } = stepResponse(loop, { tEnd: options.tEnd, samples: options.samples });
      const stability = analyzeStability(loop);
      return {
        gains: { ...gains },
        metrics: calculateStepResponseMetrics(time, output, options),
        stable: stability.stable,
        spectralAbscissa: stability.spectralAbscissa,
      };
    })
  );

  lazyLog(
    options.logger,
    'info',
    () => {
      const { ok, err } = partitionResults(results);
      return { candidates: candidates.length, succeeded: ok.length, failed: err.length };
    },
    'Parameter sweep finished'
  );

  return results;
}

/**
 * Successful, stable entry with the smallest value of `metric`, if any
 */
export function bestCandidate(
  results: readonly SweepResult[],
  metric: keyof PerformanceMetrics = 'iae'
): SweepEntry | undefined {
  let best: SweepEntry | undefined;
  for (const result of results) {
    if (result.err || !result.val.stable) {
      continue;
    }
    if (!best || result.val.metrics[metric] < best.metrics[metric]) {
      best = result.val;
    }
  }
  return best;
}
