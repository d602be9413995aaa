/**
 * Result Type Helpers
 *
 * Batch operations (parameter sweeps, controller comparisons) report one
 * outcome per candidate instead of aborting on the first failure.
 *
 * Usage:
 * ```typescript
 * const outcome = trySync(() => simulateClosedLoop(gains, plant));
 * if (outcome.err) {
 *   logger.warn({ code: outcome.val.code }, 'candidate rejected');
 * } else {
 *   const trajectory = outcome.val;
 * }
 * ```
 */

import { Ok, Err } from 'ts-results';
import type { Result } from 'ts-results';
import {
  toControlSystemError,
  type ControlErrorCode,
  type ControlSystemError,
} from '../api/errors.js';

/**
 * Run a throwing computation and capture its failure as a ControlSystemError.
 *
 * Errors that are not already ControlSystemErrors are mapped with
 * `fallbackCode`.
 */
export function trySync<T>(
  fn: () => T,
  fallbackCode: ControlErrorCode = 'NumericalInstability'
): Result<T, ControlSystemError> {
  try {
    return Ok(fn());
  } catch (error) {
    return Err(toControlSystemError(error, fallbackCode));
  }
}

/**
 * Helper to unwrap Result or throw
 *
 * @example
 * ```typescript
 * const entry = unwrap(sweep[0]); // Throws the captured error if Err
 * ```
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
  if (result.ok) {
    return result.val;
  }
  throw result.val;
}

/**
 * Helper to get value or default
 */
export function getOrDefault<T, E extends Error>(result: Result<T, E>, defaultValue: T): T {
  return result.ok ? result.val : defaultValue;
}

/**
 * Helper to map Result value
 */
export function mapResult<T, U, E extends Error>(
  result: Result<T, E>,
  fn: (value: T) => U
): Result<U, E> {
  return result.ok ? Ok(fn(result.val)) : result;
}

/**
 * Split a batch of results into successes and failures, keeping order
 */
export function partitionResults<T, E extends Error>(
  results: readonly Result<T, E>[]
): { ok: T[]; err: E[] } {
  const ok: T[] = [];
  const err: E[] = [];
  for (const result of results) {
    if (result.ok) {
      ok.push(result.val);
    } else {
      err.push(result.val);
    }
  }
  return { ok, err };
}

export { Ok, Err };
export type { Result };
