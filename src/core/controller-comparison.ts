/**
 * Controller Comparison
 *
 * Runs several named gain sets against one plant on a common grid
 * (1000 points over [0, 10] by default) and keeps the trajectories,
 * metrics and pole sets side by side. Adding a controller under an
 * existing name replaces the earlier entry.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { ControlSystemError } from '../api/errors.js';
import { COMPARISON } from '../config/defaults.js';
import type {
  PerformanceMetrics,
  PidGains,
  SimulationResult,
  StabilityReport,
} from '../types/control.js';
import type { HorizonOptions, MetricOptions } from '../types/simulation.js';
import { trySync, type Result } from '../utils/result-helpers.js';
import { analyzeStability, resolvePlant, type PlantInput } from './closed-loop.js';
import { calculateStepResponseMetrics } from './performance-metrics.js';
import { PIDController } from './pid-controller.js';
import { stepResponse } from './simulation.js';
import { feedback, type TransferFunction } from './transfer-function.js';

export interface ComparisonEntry {
  name: string;
  controller: PIDController;
  closedLoop: TransferFunction;
  result: SimulationResult;
  metrics: PerformanceMetrics;
  stability: StabilityReport;
}

export type ComparisonOptions = HorizonOptions & MetricOptions;

/**
 * Controller comparison events
 */
export interface ControllerComparisonEvents {
  controllerAdded: (entry: ComparisonEntry) => void;
  controllerFailed: (name: string, error: ControlSystemError) => void;
}

/**
 * Metrics where a smaller value is better
 */
export type RankingMetric = Exclude<keyof PerformanceMetrics, 'steadyStateValue' | 'peakTime'>;

export class ControllerComparison extends EventEmitter<ControllerComparisonEvents> {
  public readonly plant: TransferFunction;
  private readonly entries = new Map<string, ComparisonEntry>();
  private readonly options: ComparisonOptions;
  private readonly logger?: Logger;

  constructor(plant: PlantInput, options: ComparisonOptions = {}, logger?: Logger) {
    super();
    this.plant = resolvePlant(plant);
    this.options = {
      tEnd: options.tEnd ?? COMPARISON.T_END,
      samples: options.samples ?? COMPARISON.SAMPLES,
      reference: options.reference,
      settlingTolerance: options.settlingTolerance,
    };
    this.logger = logger;
  }

  /**
   * Simulate a gain set and store it under `name`.
   *
   * Failures (invalid gains, an improper loop, numerical overflow) are
   * returned and emitted as `controllerFailed`; earlier entries are kept.
   */
  public addController(name: string, gains: PidGains): Result<ComparisonEntry, ControlSystemError> {
    const outcome = trySync(() => this.evaluate(name, gains));

    if (outcome.ok) {
      this.entries.set(name, outcome.val);
      this.logger?.debug(
        { name, gains, settlingTime: outcome.val.metrics.settlingTime },
        'Controller added to comparison'
      );
      this.emit('controllerAdded', outcome.val);
    } else {
      this.logger?.warn({ name, gains, code: outcome.val.code }, outcome.val.message);
      this.emit('controllerFailed', name, outcome.val);
    }

    return outcome;
  }

  private evaluate(name: string, gains: PidGains): ComparisonEntry {
    const controller = PIDController.fromGains(gains);
    const closedLoop = feedback(controller.toTransferFunction().series(this.plant), 1);
    const result = stepResponse(closedLoop, {
      tEnd: this.options.tEnd,
      samples: this.options.samples,
      logger: this.logger,
    });
    return {
      name,
      controller,
      closedLoop,
      result,
      metrics: calculateStepResponseMetrics(result.time, result.output, this.options),
      stability: analyzeStability(closedLoop),
    };
  }

  public get(name: string): ComparisonEntry | undefined {
    return this.entries.get(name);
  }

  public remove(name: string): boolean {
    return this.entries.delete(name);
  }

  public clear(): void {
    this.entries.clear();
  }

  public get size(): number {
    return this.entries.size;
  }

  /**
   * All entries in insertion order
   */
  public getComparisonData(): ComparisonEntry[] {
    return [...this.entries.values()];
  }

  /**
   * Entry names ordered by a metric, smallest first. Ties keep insertion order.
   */
  public rank(metric: RankingMetric = 'iae'): string[] {
    return this.getComparisonData()
      .sort((a, b) => a.metrics[metric] - b.metrics[metric])
      .map((entry) => entry.name);
  }
}
