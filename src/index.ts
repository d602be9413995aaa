export { LoopSimulator } from './api/loop-simulator.js';
export type {
  AnalysisOptions,
  LoopAnalysis,
  LoopSimulatorOptions,
  NamedGains,
} from './api/loop-simulator.js';
export * from './api/errors.js';
export * from './api/validators.js';

// Transfer-function algebra and simulation
export * from './core/complex.js';
export * from './core/polynomial.js';
export * from './core/transfer-function.js';
export { realize, type StateSpaceRealization } from './core/state-space.js';
export {
  simulate,
  simulateTransferFunction,
  stepResponse,
  uniformTimeGrid,
} from './core/simulation.js';
export { linspace } from './utils/math-helpers.js';

// Control
export * from './core/pid-controller.js';
export * from './core/closed-loop.js';
export * from './core/performance-metrics.js';
export * from './core/plants.js';
export * from './core/plant-catalog.js';
export * from './core/controller-comparison.js';
export * from './core/parameter-sweep.js';
export * from './tuning/suggestions.js';
export * from './tuning/pole-placement.js';

// Configuration
export {
  SIMULATION,
  METRICS,
  NUMERICS,
  COMPARISON,
  mergeConfig,
  type ResolvedConfig,
  type RuntimeConfig,
} from './config/defaults.js';
export {
  loadConfig,
  validateConfig,
  toSimulatorSettings,
  defaultConfigPath,
  type SimulatorSettings,
} from './config/loader.js';
export { trySync, unwrap, getOrDefault, mapResult, partitionResults } from './utils/result-helpers.js';

export * from './types/index.js';
export * from './types/schemas/index.js';
