/**
 * Closed-loop synthesis and simulation drivers
 *
 * Servo (tracking) loop:      T(s) = C·G / (1 + C·G)      = feedback(series(C, G), 1)
 * Regulatory (load) loop:     S(s) = G / (1 + G·C)        = feedback(G, C)
 *
 * The load disturbance enters at the plant input, so the regulatory
 * response to a unit step is the output deviation the controller has to
 * reject. Neither reduction cancels the controller's pole at the origin
 * against a zero, so a kd = ki = 0 controller keeps an s/s factor and
 * reports a pole at 0.
 */

import type { Logger } from 'pino';
import type { Complex, PidGains, SimulationResult, StabilityReport } from '../types/control.js';
import type { PlantModel, SecondOrderParameters } from '../types/plants.js';
import type { ClosedLoopOptions } from '../types/simulation.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { pidTransferFunction } from './pid-controller.js';
import { buildPlant, standardSecondOrderPlant } from './plants.js';
import { stepResponse } from './simulation.js';
import { TransferFunction, feedback, series } from './transfer-function.js';

/**
 * Anything a closed-loop driver accepts as the plant
 */
export type PlantInput = TransferFunction | PlantModel | SecondOrderParameters;

/**
 * Resolve a plant description to its transfer function
 */
export function resolvePlant(plant: PlantInput): TransferFunction {
  if (plant instanceof TransferFunction) {
    return plant;
  }
  if ('kind' in plant) {
    return buildPlant(plant);
  }
  return standardSecondOrderPlant(plant.wn, plant.zeta);
}

/**
 * Reference-to-output transfer function
 */
export function servoClosedLoop(gains: PidGains, plant: PlantInput): TransferFunction {
  return feedback(series(pidTransferFunction(gains), resolvePlant(plant)), 1);
}

/**
 * Input-disturbance-to-output transfer function
 */
export function disturbanceClosedLoop(gains: PidGains, plant: PlantInput): TransferFunction {
  return feedback(resolvePlant(plant), pidTransferFunction(gains));
}

function runStep(
  loop: TransferFunction,
  options: ClosedLoopOptions,
  label: string
): SimulationResult {
  const result = stepResponse(loop, {
    tEnd: options.tEnd,
    samples: options.samples,
    amplitude: options.amplitude,
    logger: options.logger,
  });
  logRun(options.logger, label, loop, result);
  return result;
}

function logRun(
  logger: Logger | undefined,
  label: string,
  loop: TransferFunction,
  result: SimulationResult
): void {
  lazyLog(
    logger,
    'debug',
    () => ({
      loop: label,
      transferFunction: loop.toString(),
      samples: result.time.length,
      finalOutput: result.output[result.output.length - 1],
    }),
    'Closed-loop step simulated'
  );
}

/**
 * Unit-step servo response on a uniform grid (defaults: 500 points over [0, 10])
 *
 * @throws {ControlSystemError} InvalidConfiguration for a bad horizon,
 * NonCausalSystem if the loop is improper, NumericalInstability on overflow
 */
export function simulateClosedLoop(
  gains: PidGains,
  plant: PlantInput,
  options: ClosedLoopOptions = {}
): SimulationResult {
  return runStep(servoClosedLoop(gains, plant), options, 'servo');
}

/**
 * Unit-step load-disturbance response on a uniform grid
 */
export function simulateDisturbance(
  gains: PidGains,
  plant: PlantInput,
  options: ClosedLoopOptions = {}
): SimulationResult {
  return runStep(disturbanceClosedLoop(gains, plant), options, 'disturbance');
}

/**
 * Stability verdict from the unreduced pole set of a transfer function.
 * A pole on the imaginary axis counts as unstable.
 */
export function analyzeStability(tf: TransferFunction): StabilityReport {
  const poles = tf.poles();
  const unstablePoles = poles.filter((p) => p.re >= 0);
  const spectralAbscissa = poles.reduce((max, p) => Math.max(max, p.re), -Infinity);
  return {
    poles,
    stable: unstablePoles.length === 0,
    spectralAbscissa,
    unstablePoles,
  };
}

/**
 * Poles of the servo loop
 */
export function closedLoopPoles(gains: PidGains, plant: PlantInput): Complex[] {
  return servoClosedLoop(gains, plant).poles();
}
