/**
 * Control-domain schemas
 *
 * Runtime validation for the values callers hand to the simulator:
 * gains, plant descriptions, horizons and metric options.
 */

import { z } from 'zod';
import {
  ComplexLikeSchema,
  FiniteNumber,
  NonNegativeNumber,
  OpenFraction,
  PositiveInteger,
  PositiveNumber,
} from './common.js';

/**
 * PID gains (any finite values; negative gains are legal)
 */
export const PidGainsSchema = z.object({
  kp: FiniteNumber,
  ki: FiniteNumber,
  kd: FiniteNumber,
});

export const FirstOrderModelSchema = z.object({
  kind: z.literal('first-order'),
  tau: PositiveNumber,
  k: FiniteNumber.optional(),
});

export const SecondOrderModelSchema = z.object({
  kind: z.literal('second-order'),
  wn: PositiveNumber,
  zeta: FiniteNumber,
  k: FiniteNumber.optional(),
});

export const IntegratorModelSchema = z.object({
  kind: z.literal('integrator'),
  k: FiniteNumber.optional(),
});

export const DelayedFirstOrderModelSchema = z.object({
  kind: z.literal('delayed-first-order'),
  delay: NonNegativeNumber,
  tau: PositiveNumber.optional(),
  k: FiniteNumber.optional(),
});

export const HighOrderModelSchema = z.object({
  kind: z.literal('high-order'),
  poles: z.array(ComplexLikeSchema).min(1, 'At least one pole is required'),
  zeros: z.array(ComplexLikeSchema).optional(),
  k: FiniteNumber.optional(),
});

/**
 * Tagged plant description
 */
export const PlantModelSchema = z.discriminatedUnion('kind', [
  FirstOrderModelSchema,
  SecondOrderModelSchema,
  IntegratorModelSchema,
  DelayedFirstOrderModelSchema,
  HighOrderModelSchema,
]);

/**
 * Bare (ωn, ζ) pair of the unit-numerator second-order plant
 */
export const SecondOrderParametersSchema = z.object({
  wn: PositiveNumber,
  zeta: FiniteNumber,
});

/**
 * Uniform-grid horizon
 */
export const HorizonOptionsSchema = z.object({
  tEnd: PositiveNumber.optional(),
  samples: PositiveInteger.min(2, 'At least 2 samples are required').optional(),
});

/**
 * Step-response metric options
 */
export const MetricOptionsSchema = z.object({
  reference: FiniteNumber.optional(),
  settlingTolerance: OpenFraction.optional(),
});

export type PidGainsInput = z.infer<typeof PidGainsSchema>;
export type PlantModelInput = z.infer<typeof PlantModelSchema>;
export type HorizonOptionsInput = z.infer<typeof HorizonOptionsSchema>;
export type MetricOptionsInput = z.infer<typeof MetricOptionsSchema>;
