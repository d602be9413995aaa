/**
 * Math Helper Utilities
 *
 * Guarded reductions and grid helpers shared by the simulation drivers
 * and the metric extractors.
 */

/**
 * Calculate safe average of an array of numbers
 *
 * @param values - Array of numbers to average
 * @param defaultValue - Value to return if array is empty (default: 0)
 *
 * @example
 * ```typescript
 * safeAverage([1, 2, 3])   // => 2
 * safeAverage([], 100)     // => 100
 * ```
 */
export function safeAverage(values: readonly number[], defaultValue = 0): number {
  if (values.length === 0) {
    return defaultValue;
  }

  const sum = values.reduce((acc, val) => acc + val, 0);
  return sum / values.length;
}

/**
 * Trapezoidal integral of `y` over the sample points `x`
 *
 * @example
 * ```typescript
 * trapezoid([0, 1, 2], [0, 1, 2]) // => 2
 * ```
 */
export function trapezoid(x: readonly number[], y: readonly number[]): number {
  let total = 0;
  for (let i = 1; i < x.length; i++) {
    total += ((x[i] - x[i - 1]) * (y[i] + y[i - 1])) / 2;
  }
  return total;
}

/**
 * `n` evenly spaced points over [start, stop], both ends included
 *
 * @example
 * ```typescript
 * linspace(0, 1, 5) // => [0, 0.25, 0.5, 0.75, 1]
 * ```
 */
export function linspace(start: number, stop: number, n: number): number[] {
  if (n <= 0) {
    return [];
  }
  if (n === 1) {
    return [start];
  }
  const step = (stop - start) / (n - 1);
  return Array.from({ length: n }, (_, i) => (i === n - 1 ? stop : start + i * step));
}

/**
 * Index of the first maximum; -1 for an empty array
 */
export function argMax(values: readonly number[]): number {
  let best = -1;
  for (let i = 0; i < values.length; i++) {
    if (best === -1 || values[i] > values[best]) {
      best = i;
    }
  }
  return best;
}

