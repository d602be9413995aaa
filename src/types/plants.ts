/**
 * Plant model variants
 *
 * Tagged union replacing free-form parameter dictionaries. Every variant
 * maps to exactly one named constructor in core/plants.ts.
 */

import type { ComplexLike } from './control.js';

export interface FirstOrderModel {
  kind: 'first-order';
  /** Time constant (s), must be positive */
  tau: number;
  /** Static gain (default 1) */
  k?: number;
}

export interface SecondOrderModel {
  kind: 'second-order';
  /** Natural frequency (rad/s) */
  wn: number;
  /** Damping ratio */
  zeta: number;
  k?: number;
}

export interface IntegratorModel {
  kind: 'integrator';
  k?: number;
}

export interface DelayedFirstOrderModel {
  kind: 'delayed-first-order';
  /** Dead time (s), approximated by a first-order Padé term */
  delay: number;
  tau?: number;
  k?: number;
}

export interface HighOrderModel {
  kind: 'high-order';
  poles: readonly ComplexLike[];
  zeros?: readonly ComplexLike[];
  k?: number;
}

/**
 * Bare second-order parameters: 1 / (s² + 2ζωn·s + ωn²), no gain factor
 */
export interface SecondOrderParameters {
  wn: number;
  zeta: number;
}

/**
 * Buildable plant descriptions
 */
export type PlantModel =
  | FirstOrderModel
  | SecondOrderModel
  | IntegratorModel
  | DelayedFirstOrderModel
  | HighOrderModel;

/**
 * Plant classes understood by the tuning heuristics.
 * `unknown` has no parameters and yields conservative gains.
 */
export type TuningTarget =
  | FirstOrderModel
  | SecondOrderModel
  | IntegratorModel
  | { kind: 'unknown' };
