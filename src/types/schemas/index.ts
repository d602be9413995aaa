/**
 * Zod schema exports for pid-loop-sim validation
 *
 * These schemas provide runtime validation for every value that crosses
 * the public API boundary, with `path message` issues for invalid input.
 *
 * @example
 * ```typescript
 * import { PlantModelSchema } from 'pid-loop-sim';
 *
 * const result = PlantModelSchema.safeParse({ kind: 'first-order', tau: 0 });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Gains, plants, horizons, metric options
export * from './control.js';

// Config file schemas
export * from './config.js';
