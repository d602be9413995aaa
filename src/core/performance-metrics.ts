/**
 * Performance Metrics
 *
 * Shape descriptors and integral error indices of sampled trajectories.
 * Degenerate traces (flat, never settling, never rising) produce sentinel
 * values; only malformed input arrays raise.
 */

import { invalidConfiguration } from '../api/errors.js';
import { METRICS } from '../config/defaults.js';
import type { DisturbanceMetrics, PerformanceMetrics } from '../types/control.js';
import type { MetricOptions } from '../types/simulation.js';
import { argMax, safeAverage, trapezoid } from '../utils/math-helpers.js';

function assertTrace(time: readonly number[], output: readonly number[]): void {
  if (time.length < 2) {
    throw invalidConfiguration(`metrics need at least 2 samples (got ${time.length})`, {
      samples: time.length,
    });
  }
  if (output.length !== time.length) {
    throw invalidConfiguration(
      `output length ${output.length} does not match time length ${time.length}`,
      { timeLength: time.length, outputLength: output.length }
    );
  }
}

/**
 * Mean of the trailing fraction of samples (at least one sample)
 */
export function steadyStateValue(
  output: readonly number[],
  fraction: number = METRICS.STEADY_STATE_FRACTION
): number {
  const start = Math.min(Math.floor(output.length * (1 - fraction)), output.length - 1);
  return safeAverage(output.slice(Math.max(start, 0)));
}

function firstIndexAtLeast(values: readonly number[], threshold: number): number {
  return values.findIndex((v) => v >= threshold);
}

/**
 * Step-response metrics against a constant reference.
 *
 * - `riseTime` is the time between the first sample ≥ 90% of the
 *   reference and the first sample ≥ 10% of it; 0 when either level is
 *   never reached.
 * - `settlingTime` is the time of the last sample outside
 *   steadyStateValue ± settlingTolerance·reference. A value of 0 means the
 *   response was settled at or before t = 0: either no sample ever left
 *   the band or only the first one did at t = 0.
 * - `overshootPercent` is 0 for a zero reference.
 *
 * @throws {ControlSystemError} InvalidConfiguration for fewer than two
 * samples or mismatched lengths
 */
export function calculateStepResponseMetrics(
  time: readonly number[],
  output: readonly number[],
  options: MetricOptions = {}
): PerformanceMetrics {
  assertTrace(time, output);
  const reference = options.reference ?? METRICS.REFERENCE;
  const tolerance = options.settlingTolerance ?? METRICS.SETTLING_TOLERANCE;

  const finalValue = steadyStateValue(output);
  const steadyStateError = Math.abs(reference - finalValue);

  const peakIndex = argMax(output);
  const peak = output[peakIndex];
  const overshootPercent = reference !== 0 ? Math.max(0, ((peak - reference) / reference) * 100) : 0;

  const riseStart = firstIndexAtLeast(output, METRICS.RISE_LOW * reference);
  const riseEnd = firstIndexAtLeast(output, METRICS.RISE_HIGH * reference);
  const riseTime = riseStart !== -1 && riseEnd !== -1 ? time[riseEnd] - time[riseStart] : 0;

  const upper = finalValue + tolerance * reference;
  const lower = finalValue - tolerance * reference;
  let lastOutside = -1;
  for (let i = output.length - 1; i >= 0; i--) {
    if (output[i] > upper || output[i] < lower) {
      lastOutside = i;
      break;
    }
  }
  const settlingTime = lastOutside === -1 ? 0 : time[lastOutside];

  const error = output.map((y) => reference - y);
  const absError = error.map(Math.abs);

  return {
    overshootPercent,
    settlingTime,
    riseTime,
    peakTime: time[peakIndex],
    steadyStateValue: finalValue,
    steadyStateError,
    iae: trapezoid(time, absError),
    ise: trapezoid(time, error.map((e) => e * e)),
    itae: trapezoid(time, absError.map((e, i) => time[i] * e)),
  };
}

/**
 * Load-disturbance rejection metrics; the reference is 0.
 *
 * `recoveryTime` is the first time |y| is within 5% of the largest
 * deviation, or the final time when it never gets there. The search
 * starts at t[0], so a response that starts from rest reports t[0].
 *
 * @throws {ControlSystemError} InvalidConfiguration for fewer than two
 * samples or mismatched lengths
 */
export function calculateDisturbanceRejectionMetrics(
  time: readonly number[],
  output: readonly number[]
): DisturbanceMetrics {
  assertTrace(time, output);
  const magnitude = output.map(Math.abs);
  const maxDeviation = magnitude.reduce((max, v) => Math.max(max, v), 0);

  const target = METRICS.RECOVERY_FRACTION * maxDeviation;
  const recovered = magnitude.findIndex((v) => v <= target);
  const recoveryTime = recovered === -1 ? time[time.length - 1] : time[recovered];

  return {
    maxDeviation,
    recoveryTime,
    disturbanceEnergy: trapezoid(time, output.map((y) => y * y)),
  };
}
