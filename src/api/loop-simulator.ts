import type { Logger } from 'pino';
import { pino } from 'pino';
import { mergeConfig, type ResolvedConfig, type RuntimeConfig } from '../config/defaults.js';
import type { SimulatorSettings } from '../config/loader.js';
import {
  analyzeStability,
  disturbanceClosedLoop,
  servoClosedLoop,
  type PlantInput,
} from '../core/closed-loop.js';
import { ControllerComparison } from '../core/controller-comparison.js';
import {
  expandGainGrid,
  sweepGains,
  type GainGrid,
  type SweepResult,
} from '../core/parameter-sweep.js';
import {
  calculateDisturbanceRejectionMetrics,
  calculateStepResponseMetrics,
} from '../core/performance-metrics.js';
import { stepResponse } from '../core/simulation.js';
import type { TransferFunction } from '../core/transfer-function.js';
import type {
  DisturbanceMetrics,
  PerformanceMetrics,
  PidGains,
  SimulationResult,
  StabilityReport,
} from '../types/control.js';
import type { ConfigLogLevel } from '../types/schemas/config.js';
import type { HorizonOptions, MetricOptions } from '../types/simulation.js';
import { toControlSystemError } from './errors.js';
import {
  assertValidHorizonOptions,
  assertValidMetricOptions,
  assertValidPidGains,
  assertValidPlantInput,
  assertValidTimeSeries,
} from './validators.js';

export interface LoopSimulatorOptions {
  /** Overrides merged over the built-in defaults */
  config?: RuntimeConfig;
  /** Level of the logger created when none is injected */
  logLevel?: ConfigLogLevel;
}

interface LoopSimulatorDependencies {
  logger?: Logger;
}

export type AnalysisOptions = HorizonOptions & MetricOptions;

/**
 * Servo and regulatory view of one controller/plant pair
 */
export interface LoopAnalysis {
  servo: SimulationResult;
  disturbance: SimulationResult;
  servoMetrics: PerformanceMetrics;
  disturbanceMetrics: DisturbanceMetrics;
  stability: StabilityReport;
}

export interface NamedGains {
  name: string;
  gains: PidGains;
}

const DEFAULT_LOG_LEVEL = process.env.PID_SIM_LOG_LEVEL ?? 'info';

/**
 * High-level facade over the closed-loop simulator.
 *
 * Validates every input at the boundary, applies the configured horizon
 * and metric defaults, and reports all failures as ControlSystemError.
 * Holds no state between calls apart from its settings and logger.
 *
 * @example
 * ```typescript
 * const simulator = new LoopSimulator();
 * const report = simulator.analyze({ kp: 2, ki: 1, kd: 0.5 }, { wn: 1, zeta: 0.3 });
 * console.log(report.servoMetrics.overshootPercent, report.stability.stable);
 * ```
 */
export class LoopSimulator {
  private readonly logger: Logger;
  private readonly config: ResolvedConfig;

  constructor(options: LoopSimulatorOptions = {}, dependencies: LoopSimulatorDependencies = {}) {
    this.config = mergeConfig(options.config);
    this.logger = dependencies.logger ?? pino({ level: options.logLevel ?? DEFAULT_LOG_LEVEL });
  }

  /**
   * Build a simulator from settings produced by the config loader
   */
  public static fromSettings(
    settings: SimulatorSettings,
    dependencies: LoopSimulatorDependencies = {}
  ): LoopSimulator {
    return new LoopSimulator({ config: settings.config, logLevel: settings.logLevel }, dependencies);
  }

  public get settings(): ResolvedConfig {
    return this.config;
  }

  /**
   * Step response of the servo (tracking) loop
   */
  public simulateServo(gains: PidGains, plant: PlantInput, horizon: HorizonOptions = {}): SimulationResult {
    return this.run('simulateServo', () => {
      this.assertLoopInputs(gains, plant, horizon);
      return this.step(servoClosedLoop(gains, plant), horizon);
    });
  }

  /**
   * Response to a unit load step at the plant input
   */
  public simulateDisturbance(
    gains: PidGains,
    plant: PlantInput,
    horizon: HorizonOptions = {}
  ): SimulationResult {
    return this.run('simulateDisturbance', () => {
      this.assertLoopInputs(gains, plant, horizon);
      return this.step(disturbanceClosedLoop(gains, plant), horizon);
    });
  }

  /**
   * Both trajectories, both metric records and the servo pole set
   */
  public analyze(gains: PidGains, plant: PlantInput, options: AnalysisOptions = {}): LoopAnalysis {
    return this.run('analyze', () => {
      this.assertLoopInputs(gains, plant, options);
      assertValidMetricOptions({
        reference: options.reference,
        settlingTolerance: options.settlingTolerance,
      });

      const servoLoop = servoClosedLoop(gains, plant);
      const servo = this.step(servoLoop, options);
      const disturbance = this.step(disturbanceClosedLoop(gains, plant), options);
      const stability = analyzeStability(servoLoop);

      if (!stability.stable) {
        this.logger.warn(
          { gains, spectralAbscissa: stability.spectralAbscissa },
          'Closed loop has poles outside the open left half-plane'
        );
      }

      return {
        servo,
        disturbance,
        servoMetrics: calculateStepResponseMetrics(servo.time, servo.output, this.metricOptions(options)),
        disturbanceMetrics: calculateDisturbanceRejectionMetrics(disturbance.time, disturbance.output),
        stability,
      };
    });
  }

  /**
   * Step-response metrics of an externally produced trajectory
   */
  public metrics(
    time: readonly number[],
    output: readonly number[],
    options: MetricOptions = {}
  ): PerformanceMetrics {
    return this.run('metrics', () => {
      assertValidTimeSeries(time, output);
      assertValidMetricOptions(options);
      return calculateStepResponseMetrics(time, output, this.metricOptions(options));
    });
  }

  /**
   * Run several named controllers against one plant on the comparison grid.
   * Controllers that fail are reported through the comparison's
   * `controllerFailed` event and left out.
   */
  public compare(
    plant: PlantInput,
    controllers: readonly NamedGains[],
    options: MetricOptions = {}
  ): ControllerComparison {
    return this.run('compare', () => {
      assertValidPlantInput(plant);
      assertValidMetricOptions(options);
      const comparison = new ControllerComparison(
        plant,
        {
          tEnd: this.config.comparison.T_END,
          samples: this.config.comparison.SAMPLES,
          ...this.metricOptions(options),
        },
        this.logger
      );
      for (const { name, gains } of controllers) {
        comparison.addController(name, gains);
      }
      return comparison;
    });
  }

  /**
   * Evaluate a list or grid of gain sets; one Result per candidate
   */
  public sweep(
    plant: PlantInput,
    candidates: readonly PidGains[] | GainGrid,
    options: AnalysisOptions = {}
  ): SweepResult[] {
    return this.run('sweep', () => {
      assertValidPlantInput(plant);
      assertValidHorizonOptions({ tEnd: options.tEnd, samples: options.samples });
      assertValidMetricOptions({
        reference: options.reference,
        settlingTolerance: options.settlingTolerance,
      });
      const gainSets = isGainList(candidates) ? candidates : expandGainGrid(candidates);
      return sweepGains(plant, gainSets, {
        tEnd: options.tEnd ?? this.config.simulation.T_END,
        samples: options.samples ?? this.config.simulation.SAMPLES,
        ...this.metricOptions(options),
        logger: this.logger,
      });
    });
  }

  private assertLoopInputs(gains: PidGains, plant: PlantInput, horizon: HorizonOptions): void {
    assertValidPidGains(gains);
    assertValidPlantInput(plant);
    assertValidHorizonOptions({ tEnd: horizon.tEnd, samples: horizon.samples });
  }

  private step(loop: TransferFunction, horizon: HorizonOptions): SimulationResult {
    return stepResponse(loop, {
      tEnd: horizon.tEnd ?? this.config.simulation.T_END,
      samples: horizon.samples ?? this.config.simulation.SAMPLES,
      amplitude: this.config.simulation.STEP_AMPLITUDE,
      logger: this.logger,
    });
  }

  private metricOptions(options: MetricOptions): Required<MetricOptions> {
    return {
      reference: options.reference ?? this.config.metrics.REFERENCE,
      settlingTolerance: options.settlingTolerance ?? this.config.metrics.SETTLING_TOLERANCE,
    };
  }

  private run<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      const mapped = toControlSystemError(error, 'NumericalInstability');
      this.logger.error({ operation, code: mapped.code, details: mapped.details }, mapped.message);
      throw mapped;
    }
  }
}

function isGainList(candidates: readonly PidGains[] | GainGrid): candidates is readonly PidGains[] {
  return Array.isArray(candidates);
}
