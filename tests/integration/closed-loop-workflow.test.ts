/**
 * End-to-end: YAML settings → facade → catalog plants, tuning and comparison
 */

import { describe, it, expect } from 'vitest';
import { LoopSimulator } from '@/api/loop-simulator.js';
import { defaultConfigPath, loadConfig, toSimulatorSettings } from '@/config/loader.js';
import { PLANT_CATALOG_IDS, catalogPlant } from '@/core/plant-catalog.js';
import { pidGainsForPoles } from '@/tuning/pole-placement.js';
import { suggestPidGains } from '@/tuning/suggestions.js';
import { silentLogger } from '../helpers/control.js';

function createSimulator(): LoopSimulator {
  const settings = toSimulatorSettings(loadConfig(defaultConfigPath(), 'test'));
  return LoopSimulator.fromSettings(settings, { logger: silentLogger() });
}

describe('closed-loop workflow', () => {
  it('should run the test-environment horizon from the bundled config', () => {
    const simulator = createSimulator();
    const plant = catalogPlant('underdamped').transferFunction;

    const report = simulator.analyze(suggestPidGains({ kind: 'second-order', wn: 1, zeta: 0.3 }), plant);

    expect(report.servo.time).toHaveLength(200);
    // s³ + 1.6s² + 1.6s + 1 = (s + 1)(s² + 0.6s + 1)
    expect(report.stability.stable).toBe(true);
    expect(report.stability.spectralAbscissa).toBeCloseTo(-0.3, 6);
  });

  it('should track the reference with placed poles', () => {
    const simulator = createSimulator();
    const plant = { wn: 1, zeta: 0.3 };
    const gains = pidGainsForPoles(plant, [-2, { re: -2, im: 2 }, { re: -2, im: -2 }]);

    const report = simulator.analyze(gains, plant);

    expect(report.stability.spectralAbscissa).toBeCloseTo(-2, 6);
    expect(report.servoMetrics.steadyStateValue).toBeCloseTo(1, 3);
    expect(report.servoMetrics.steadyStateError).toBeLessThan(1e-3);
  });

  it('should simulate a moderate controller on every catalog plant', () => {
    const simulator = createSimulator();
    for (const id of PLANT_CATALOG_IDS) {
      const { time, output } = simulator.simulateServo(
        { kp: 0.5, ki: 0.1, kd: 0 },
        catalogPlant(id).transferFunction
      );
      expect(time).toHaveLength(200);
      expect(output.every(Number.isFinite)).toBe(true);
    }
  });

  it('should rank catalog controllers on the comparison grid', () => {
    const simulator = createSimulator();
    const comparison = simulator.compare(catalogPlant('first-order-fast').transferFunction, [
      { name: 'p', gains: { kp: 1, ki: 0, kd: 0 } },
      { name: 'suggested', gains: suggestPidGains({ kind: 'first-order', tau: 0.5 }) },
    ]);

    expect(comparison.get('p')?.result.time).toHaveLength(200);
    expect(comparison.rank('steadyStateError')).toEqual(['suggested', 'p']);
  });
});
