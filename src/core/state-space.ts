/**
 * State-Space Realization
 *
 * Controllable canonical form of a SISO transfer function. Built fresh
 * for every simulation call; nothing is cached.
 */

import { ControlSystemError } from '../api/errors.js';
import { zeros, type Matrix } from './matrix.js';
import type { TransferFunction } from './transfer-function.js';

/**
 * ẋ = A·x + B·u, y = C·x + D·u
 */
export interface StateSpaceRealization {
  /** Number of states (denominator degree) */
  readonly order: number;
  readonly a: Matrix;
  readonly b: readonly number[];
  readonly c: readonly number[];
  readonly d: number;
}

/**
 * Realize a transfer function in controllable canonical form.
 *
 * With den = [1, a1, …, an] and num padded to [b0, b1, …, bn]:
 * the first row of A is [−a1 … −an] over a shifted identity,
 * B = e1, C_i = b_i − a_i·b0 and D = b0.
 *
 * A zero-order (static gain) system has no states: output = D·input.
 *
 * @throws {ControlSystemError} NonCausalSystem when deg(num) > deg(den)
 */
export function realize(tf: TransferFunction): StateSpaceRealization {
  const den = tf.denominator;
  const num = tf.numerator;
  const n = den.length - 1;

  if (num.length - 1 > n) {
    throw new ControlSystemError(
      'NonCausalSystem',
      `Numerator degree ${num.length - 1} exceeds denominator degree ${n}; the system has no causal realization`,
      { numeratorDegree: num.length - 1, denominatorDegree: n }
    );
  }

  const lead = den[0];
  const a = den.map((coef) => coef / lead);
  const padded = [...new Array<number>(n + 1 - num.length).fill(0), ...num].map((coef) => coef / lead);
  const d = padded[0];

  if (n === 0) {
    return { order: 0, a: [], b: [], c: [], d };
  }

  const stateMatrix = zeros(n, n);
  for (let j = 0; j < n; j++) {
    stateMatrix[0][j] = -a[j + 1];
  }
  for (let i = 1; i < n; i++) {
    stateMatrix[i][i - 1] = 1;
  }

  const input = new Array<number>(n).fill(0);
  input[0] = 1;

  const output = Array.from({ length: n }, (_, i) => padded[i + 1] - a[i + 1] * d);

  return { order: n, a: stateMatrix, b: input, c: output, d };
}
