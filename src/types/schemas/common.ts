/**
 * Common Zod schema primitives for pid-loop-sim
 */

import { z } from 'zod';

/**
 * Finite number (rejects NaN and ±Infinity)
 */
export const FiniteNumber = z.number().finite('Must be a finite number');

/**
 * Strictly positive finite number
 */
export const PositiveNumber = FiniteNumber.positive('Must be positive');

/**
 * Non-negative finite number
 */
export const NonNegativeNumber = FiniteNumber.min(0, 'Must be non-negative');

/**
 * Positive integer validator
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Fraction in the open interval (0, 1)
 */
export const OpenFraction = FiniteNumber.gt(0, 'Must be greater than 0').lt(1, 'Must be less than 1');

/**
 * Complex root, either a real number or `{ re, im }`
 */
export const ComplexLikeSchema = z.union([
  FiniteNumber,
  z.object({ re: FiniteNumber, im: FiniteNumber }),
]);
