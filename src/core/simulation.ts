/**
 * Simulation Engine
 *
 * Forced response of a state-space realization to a sampled input.
 *
 * The input is treated as piecewise linear between samples and each
 * step is advanced with the exact discretization of that input: the
 * matrix exponential of the augmented matrix
 *
 *   [ A·dt  B·dt  0 ]
 *   [ 0     0     1 ]
 *   [ 0     0     0 ]
 *
 * yields Φ = e^{A·dt} and the two input gains Γ0, Γ1, so that
 * x[k+1] = Φ·x[k] + (Γ0 − Γ1)·u[k] + Γ1·u[k+1]. One discretization is
 * computed per distinct step length within a call (a uniform grid needs
 * exactly one); nothing survives between calls.
 *
 * Growing outputs (integrators, unstable poles) are valid results. Only
 * non-finite values are reported, as NumericalInstability.
 */

import { ControlSystemError, invalidConfiguration } from '../api/errors.js';
import type { SimulationResult } from '../types/control.js';
import type { HorizonOptions, SimulateOptions } from '../types/simulation.js';
import { SIMULATION } from '../config/defaults.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { linspace } from '../utils/math-helpers.js';
import { expm, matVec, zeros, type Matrix } from './matrix.js';
import { realize, type StateSpaceRealization } from './state-space.js';
import type { TransferFunction } from './transfer-function.js';

interface Discretization {
  phi: Matrix;
  gamma0: number[];
  gamma1: number[];
}

function validateGrid(time: readonly number[], input: readonly number[]): void {
  if (time.length === 0) {
    throw invalidConfiguration('time grid must not be empty');
  }
  if (input.length !== time.length) {
    throw invalidConfiguration(
      `input length ${input.length} does not match time length ${time.length}`,
      { timeLength: time.length, inputLength: input.length }
    );
  }
  if (!Number.isFinite(time[0]) || time[0] < 0) {
    throw invalidConfiguration(`time grid must start at t >= 0 (got ${time[0]})`);
  }
  for (let i = 1; i < time.length; i++) {
    if (!Number.isFinite(time[i]) || time[i] <= time[i - 1]) {
      throw invalidConfiguration(`time grid must be strictly increasing (index ${i})`, {
        index: i,
        previous: time[i - 1],
        value: time[i],
      });
    }
  }
  const badInput = input.findIndex((u) => !Number.isFinite(u));
  if (badInput !== -1) {
    throw invalidConfiguration(`input sample ${badInput} is not finite`, { index: badInput });
  }
}

function discretize(realization: StateSpaceRealization, dt: number): Discretization {
  const n = realization.order;
  const augmented = zeros(n + 2, n + 2);
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      augmented[i][j] = realization.a[i][j] * dt;
    }
    augmented[i][n] = realization.b[i] * dt;
  }
  augmented[n][n + 1] = 1;

  let exp: Matrix;
  try {
    exp = expm(augmented);
  } catch (error) {
    throw new ControlSystemError(
      'NumericalInstability',
      `Discretization failed for step ${dt}: ${error instanceof Error ? error.message : String(error)}`,
      { dt }
    );
  }

  const phi = exp.slice(0, n).map((row) => row.slice(0, n));
  const gamma1 = exp.slice(0, n).map((row) => row[n + 1]);
  const gamma0 = exp.slice(0, n).map((row, i) => row[n] - gamma1[i]);
  return { phi, gamma0, gamma1 };
}

function instability(index: number, time: number): ControlSystemError {
  return new ControlSystemError(
    'NumericalInstability',
    `Simulation produced a non-finite value at sample ${index} (t = ${time})`,
    { index, time }
  );
}

/**
 * Forced response of a realization.
 *
 * @param realization - Output of {@link realize}
 * @param time - Sample instants, t[0] ≥ 0, strictly increasing
 * @param input - Input samples, same length as `time`
 * @throws {ControlSystemError} InvalidConfiguration for a malformed grid,
 * NumericalInstability when the state or output stops being finite
 */
export function simulate(
  realization: StateSpaceRealization,
  time: readonly number[],
  input: readonly number[],
  options: SimulateOptions = {}
): SimulationResult {
  validateGrid(time, input);
  const n = realization.order;
  const output = new Array<number>(time.length);

  if (n === 0) {
    for (let k = 0; k < time.length; k++) {
      output[k] = realization.d * input[k];
      if (!Number.isFinite(output[k])) {
        throw instability(k, time[k]);
      }
    }
    return freezeResult(time, output);
  }

  let x: number[];
  if (options.x0) {
    if (options.x0.length !== n) {
      throw invalidConfiguration(`initial state must have ${n} entries (got ${options.x0.length})`);
    }
    x = [...options.x0];
  } else {
    x = new Array<number>(n).fill(0);
  }

  const cache = new Map<number, Discretization>();
  const outputAt = (state: readonly number[], u: number): number =>
    state.reduce((acc, v, i) => acc + realization.c[i] * v, realization.d * u);

  output[0] = outputAt(x, input[0]);
  if (!Number.isFinite(output[0])) {
    throw instability(0, time[0]);
  }

  // Steps that differ from the first only by rounding share its discretization
  const baseDt = time.length > 1 ? time[1] - time[0] : 0;
  for (let k = 0; k < time.length - 1; k++) {
    const rawDt = time[k + 1] - time[k];
    const dt = Math.abs(rawDt - baseDt) <= 1e-9 * baseDt ? baseDt : rawDt;
    let step = cache.get(dt);
    if (!step) {
      step = discretize(realization, dt);
      cache.set(dt, step);
    }
    const { phi, gamma0, gamma1 } = step;

    const u0 = input[k];
    const u1 = input[k + 1];
    x = matVec(phi, x).map((v, i) => v + gamma0[i] * u0 + gamma1[i] * u1);

    const y = outputAt(x, u1);
    if (!Number.isFinite(y) || x.some((v) => !Number.isFinite(v))) {
      throw instability(k + 1, time[k + 1]);
    }
    output[k + 1] = y;
  }

  lazyLog(
    options.logger,
    'debug',
    () => ({ order: n, samples: time.length, discretizations: cache.size }),
    'Forced response computed'
  );

  return freezeResult(time, output);
}

function freezeResult(time: readonly number[], output: number[]): SimulationResult {
  return Object.freeze({
    time: Object.freeze([...time]),
    output: Object.freeze(output),
  });
}

/**
 * Realize and simulate a transfer function in one call.
 *
 * @throws {ControlSystemError} NonCausalSystem for improper transfer functions
 */
export function simulateTransferFunction(
  tf: TransferFunction,
  time: readonly number[],
  input: readonly number[],
  options: SimulateOptions = {}
): SimulationResult {
  return simulate(realize(tf), time, input, options);
}

/**
 * Build the uniform grid of `samples` points over [0, tEnd].
 *
 * @throws {ControlSystemError} InvalidConfiguration for a zero-length
 * horizon or fewer than two samples
 */
export function uniformTimeGrid(options: HorizonOptions = {}): number[] {
  const tEnd = options.tEnd ?? SIMULATION.T_END;
  const samples = options.samples ?? SIMULATION.SAMPLES;
  if (!Number.isFinite(tEnd) || tEnd <= 0) {
    throw invalidConfiguration(`simulation horizon must be positive (got ${tEnd})`, { tEnd });
  }
  if (!Number.isInteger(samples) || samples < 2) {
    throw invalidConfiguration(`sample count must be an integer >= 2 (got ${samples})`, { samples });
  }
  return linspace(0, tEnd, samples);
}

/**
 * Response to a step of the given amplitude on a uniform grid
 */
export function stepResponse(
  tf: TransferFunction,
  options: HorizonOptions & SimulateOptions & { amplitude?: number } = {}
): SimulationResult {
  const time = uniformTimeGrid(options);
  const amplitude = options.amplitude ?? SIMULATION.STEP_AMPLITUDE;
  const input = new Array<number>(time.length).fill(amplitude);
  return simulateTransferFunction(tf, time, input, options);
}
