/**
 * API Validators for pid-loop-sim
 *
 * Validation at the facade boundary, before anything reaches the
 * numerical core. `validate*` functions collect every problem;
 * `assertValid*` throw InvalidConfiguration with the same list.
 */

import type { ZodType } from 'zod';
import type { PlantInput } from '../core/closed-loop.js';
import { TransferFunction } from '../core/transfer-function.js';
import {
  HorizonOptionsSchema,
  MetricOptionsSchema,
  PidGainsSchema,
  PlantModelSchema,
  SecondOrderParametersSchema,
} from '../types/schemas/control.js';
import { ControlSystemError, formatZodIssues } from './errors.js';

/**
 * Validation result type
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

function validateWith(schema: ZodType<unknown>, value: unknown): ValidationResult {
  const parsed = schema.safeParse(value);
  return parsed.success
    ? { valid: true, errors: [] }
    : { valid: false, errors: formatZodIssues(parsed.error) };
}

function assertResult(label: string, result: ValidationResult): void {
  if (!result.valid) {
    throw new ControlSystemError(
      'InvalidConfiguration',
      `Invalid ${label}: ${result.errors.join(', ')}`,
      { errors: result.errors }
    );
  }
}

/**
 * Validate PID gains (finite kp, ki, kd).
 */
export function validatePidGains(gains: unknown): ValidationResult {
  return validateWith(PidGainsSchema, gains);
}

/**
 * Validate a tagged plant model.
 */
export function validatePlantModel(model: unknown): ValidationResult {
  return validateWith(PlantModelSchema, model);
}

/**
 * Validate anything accepted as a closed-loop plant.
 *
 * TransferFunction instances are valid by construction; objects with a
 * `kind` are checked as plant models, anything else as (ωn, ζ).
 */
export function validatePlantInput(plant: unknown): ValidationResult {
  if (plant instanceof TransferFunction) {
    return { valid: true, errors: [] };
  }
  if (typeof plant === 'object' && plant !== null && 'kind' in plant) {
    return validatePlantModel(plant);
  }
  return validateWith(SecondOrderParametersSchema, plant);
}

/**
 * Validate a simulation horizon (tEnd > 0, samples integer ≥ 2).
 */
export function validateHorizonOptions(options: unknown): ValidationResult {
  return validateWith(HorizonOptionsSchema, options);
}

/**
 * Validate step-response metric options.
 */
export function validateMetricOptions(options: unknown): ValidationResult {
  return validateWith(MetricOptionsSchema, options);
}

/**
 * Validate a sampled trajectory before metric extraction.
 */
export function validateTimeSeries(
  time: readonly number[],
  output: readonly number[]
): ValidationResult {
  const errors: string[] = [];

  if (time.length < 2) {
    errors.push('time must have at least 2 samples');
  }
  if (output.length !== time.length) {
    errors.push(`output length ${output.length} must match time length ${time.length}`);
  }
  if (time.some((t, i) => !Number.isFinite(t) || (i > 0 && t < time[i - 1]))) {
    errors.push('time must be finite and non-decreasing');
  }
  if (output.some((y) => !Number.isFinite(y))) {
    errors.push('output must be finite');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * @throws {ControlSystemError} InvalidConfiguration if validation fails
 */
export function assertValidPidGains(gains: unknown): void {
  assertResult('PID gains', validatePidGains(gains));
}

/**
 * @throws {ControlSystemError} InvalidConfiguration if validation fails
 */
export function assertValidPlantInput(plant: unknown): asserts plant is PlantInput {
  assertResult('plant', validatePlantInput(plant));
}

/**
 * @throws {ControlSystemError} InvalidConfiguration if validation fails
 */
export function assertValidHorizonOptions(options: unknown): void {
  assertResult('horizon', validateHorizonOptions(options));
}

/**
 * @throws {ControlSystemError} InvalidConfiguration if validation fails
 */
export function assertValidMetricOptions(options: unknown): void {
  assertResult('metric options', validateMetricOptions(options));
}

/**
 * @throws {ControlSystemError} InvalidConfiguration if validation fails
 */
export function assertValidTimeSeries(time: readonly number[], output: readonly number[]): void {
  assertResult('time series', validateTimeSeries(time, output));
}
