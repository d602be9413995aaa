/**
 * PID pole placement for the standard second-order plant
 *
 * With G(s) = 1 / (s² + a·s + b), a = 2ζωn, b = ωn², and
 * C(s) = (kd·s² + kp·s + ki) / s, the servo characteristic polynomial is
 *
 *   s³ + (a + kd)·s² + (b + kp)·s + ki
 *
 * Matching it against ∏(s − p_i) for three desired poles fixes all three
 * gains.
 */

import { invalidConfiguration } from '../api/errors.js';
import { TransferFunction } from '../core/transfer-function.js';
import type { ComplexLike, PidGains } from '../types/control.js';
import type { SecondOrderParameters } from '../types/plants.js';

export type DesiredPoles = readonly [ComplexLike, ComplexLike, ComplexLike];

/**
 * Gains that place the closed-loop poles at `poles`.
 *
 * Gains may come out negative when the requested poles are slower than
 * the open-loop plant.
 *
 * @throws {ControlSystemError} ComplexConjugateMismatch when a complex pole
 * lacks its conjugate, InvalidConfiguration for a non-finite plant
 */
export function pidGainsForPoles(plant: SecondOrderParameters, poles: DesiredPoles): PidGains {
  if (!Number.isFinite(plant.wn) || !Number.isFinite(plant.zeta)) {
    throw invalidConfiguration('plant parameters must be finite', { ...plant });
  }
  const [, c1, c2, c3] = TransferFunction.fromPoles(poles).denominator;
  const a = 2 * plant.zeta * plant.wn;
  const b = plant.wn ** 2;
  return { kp: c2 - b, ki: c3, kd: c1 - a };
}
