/**
 * Default Configuration Constants
 *
 * All numeric defaults and tolerances centralized here. The YAML
 * loader maps onto the SIMULATION, METRICS and COMPARISON groups.
 */

/**
 * Closed-loop simulation horizon
 */
export const SIMULATION = {
  /** Final simulation time (s) */
  T_END: 10.0,

  /** Grid points over [0, T_END] */
  SAMPLES: 500,

  /** Amplitude of the step applied to the loop */
  STEP_AMPLITUDE: 1.0,
} as const;

/**
 * Metric extraction
 */
export const METRICS = {
  /** Setpoint for step-response metrics */
  REFERENCE: 1.0,

  /** Settling band half-width, fraction of reference (2%) */
  SETTLING_TOLERANCE: 0.02,

  /** Trailing fraction of samples averaged for the steady-state value */
  STEADY_STATE_FRACTION: 0.1,

  /** Rise-time thresholds, fractions of reference */
  RISE_LOW: 0.1,
  RISE_HIGH: 0.9,

  /** Disturbance recovered once |y| drops to this fraction of the max deviation */
  RECOVERY_FRACTION: 0.05,
} as const;

/**
 * Numerical tolerances
 */
export const NUMERICS = {
  /** Relative imaginary residue allowed when expanding roots into real coefficients */
  CONJUGATE_TOLERANCE: 1e-9,

  /** Root-finder iteration cap */
  ROOT_MAX_ITERATIONS: 500,

  /** Root-finder convergence threshold (relative step size) */
  ROOT_TOLERANCE: 1e-14,

  /** Distance under which a pole and a zero cancel (explicit cancellation only) */
  CANCELLATION_TOLERANCE: 1e-8,
} as const;

/**
 * Controller comparison runs
 */
export const COMPARISON = {
  T_END: 10.0,
  SAMPLES: 1000,
} as const;

type Widen<T> = { -readonly [K in keyof T]: T[K] extends number ? number : T[K] };

/**
 * Fully resolved settings accepted by the LoopSimulator facade
 */
export interface ResolvedConfig {
  simulation: Widen<typeof SIMULATION>;
  metrics: Widen<Pick<typeof METRICS, 'REFERENCE' | 'SETTLING_TOLERANCE'>>;
  comparison: Widen<typeof COMPARISON>;
}

/**
 * Configuration type for runtime overrides
 */
export type RuntimeConfig = {
  [G in keyof ResolvedConfig]?: Partial<ResolvedConfig[G]>;
};

/**
 * Merge runtime configuration with defaults
 */
export function mergeConfig(override?: RuntimeConfig): ResolvedConfig {
  return {
    simulation: { ...SIMULATION, ...override?.simulation },
    metrics: {
      REFERENCE: METRICS.REFERENCE,
      SETTLING_TOLERANCE: METRICS.SETTLING_TOLERANCE,
      ...override?.metrics,
    },
    comparison: { ...COMPARISON, ...override?.comparison },
  };
}
