/**
 * Core control-system types for pid-loop-sim
 *
 * Value shapes shared by the transfer-function algebra, the simulation
 * engine and the metric extractors.
 */

/**
 * Polynomial coefficients, highest degree first.
 *
 * `[1, 3, 2]` is `s² + 3s + 2`.
 */
export type Polynomial = readonly number[];

/**
 * Complex number in rectangular form
 */
export interface Complex {
  re: number;
  im: number;
}

/**
 * Root accepted by pole/zero constructors.
 * A plain number is a real root.
 */
export type ComplexLike = number | Complex;

/**
 * PID gains in parallel (ideal) form: kp + ki/s + kd·s
 */
export interface PidGains {
  kp: number;
  ki: number;
  kd: number;
}

/**
 * Sampled trajectory produced by one simulation call.
 * Arrays have equal length and time is non-decreasing.
 */
export interface SimulationResult {
  readonly time: readonly number[];
  readonly output: readonly number[];
}

/**
 * Step-response performance figures
 */
export interface PerformanceMetrics {
  /** Peak overshoot above the reference, in percent (0 when reference is 0) */
  overshootPercent: number;
  /** Time of the last sample outside the tolerance band; 0 when always inside */
  settlingTime: number;
  /** 10%→90% rise time; 0 when either threshold is never reached */
  riseTime: number;
  peakTime: number;
  steadyStateValue: number;
  steadyStateError: number;
  /** Integral of absolute error */
  iae: number;
  /** Integral of squared error */
  ise: number;
  /** Integral of time-weighted absolute error */
  itae: number;
}

/**
 * Load-disturbance rejection figures (reference is implicitly 0)
 */
export interface DisturbanceMetrics {
  maxDeviation: number;
  /** First time |y| falls to 5% of the max deviation, or the final time */
  recoveryTime: number;
  /** Integral of y² */
  disturbanceEnergy: number;
}

/**
 * Stability verdict derived from a pole set
 */
export interface StabilityReport {
  poles: Complex[];
  stable: boolean;
  /** Largest real part among the poles (-Infinity for a pole-free system) */
  spectralAbscissa: number;
  /** Poles with non-negative real part */
  unstablePoles: Complex[];
}
