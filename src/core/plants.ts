/**
 * Plant constructors
 *
 * Named constructors taking primitive parameters and returning a
 * TransferFunction, plus a dispatcher over the PlantModel variant.
 */

import { invalidConfiguration } from '../api/errors.js';
import type { ComplexLike } from '../types/control.js';
import type { PlantModel } from '../types/plants.js';
import { TransferFunction, padeDelay } from './transfer-function.js';

function requirePositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw invalidConfiguration(`${name} must be positive (got ${value})`, { [name]: value });
  }
}

function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw invalidConfiguration(`${name} must be finite (got ${value})`, { [name]: value });
  }
}

/**
 * K / (τs + 1)
 */
export function firstOrderPlant(tau: number, k = 1.0): TransferFunction {
  requirePositive('tau', tau);
  requireFinite('k', k);
  return TransferFunction.create([k], [tau, 1]);
}

/**
 * K·ωn² / (s² + 2ζωn·s + ωn²)
 */
export function secondOrderPlant(wn: number, zeta: number, k = 1.0): TransferFunction {
  requirePositive('wn', wn);
  requireFinite('zeta', zeta);
  requireFinite('k', k);
  return TransferFunction.create([k * wn ** 2], [1, 2 * zeta * wn, wn ** 2]);
}

/**
 * 1 / (s² + 2ζωn·s + ωn²).
 *
 * Unnormalized form (DC gain 1/ωn²) used by the servo and regulatory
 * simulators when they are handed bare (ωn, ζ) parameters.
 */
export function standardSecondOrderPlant(wn: number, zeta: number): TransferFunction {
  requirePositive('wn', wn);
  requireFinite('zeta', zeta);
  return TransferFunction.create([1], [1, 2 * zeta * wn, wn ** 2]);
}

/**
 * K / s
 */
export function integratorPlant(k = 1.0): TransferFunction {
  requireFinite('k', k);
  return TransferFunction.create([k], [1, 0]);
}

/**
 * K / (τs + 1) with a first-order Padé approximation of the dead time
 */
export function delayedFirstOrderPlant(delay: number, tau = 1.0, k = 1.0): TransferFunction {
  requireFinite('k', k);
  return padeDelay(delay, tau, k);
}

/**
 * K·∏(s − z) / ∏(s − p); complex roots must come in conjugate pairs
 */
export function highOrderPlant(
  poles: readonly ComplexLike[],
  zeros: readonly ComplexLike[] = [],
  k = 1.0
): TransferFunction {
  if (poles.length === 0) {
    throw invalidConfiguration('high-order plant needs at least one pole');
  }
  requireFinite('k', k);
  return TransferFunction.fromPoles(poles, zeros, k);
}

/**
 * Build the transfer function described by a plant model
 */
export function buildPlant(model: PlantModel): TransferFunction {
  switch (model.kind) {
    case 'first-order':
      return firstOrderPlant(model.tau, model.k);
    case 'second-order':
      return secondOrderPlant(model.wn, model.zeta, model.k);
    case 'integrator':
      return integratorPlant(model.k);
    case 'delayed-first-order':
      return delayedFirstOrderPlant(model.delay, model.tau, model.k);
    case 'high-order':
      return highOrderPlant(model.poles, model.zeros, model.k);
  }
}
