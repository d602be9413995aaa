import { describe, it, expect } from 'vitest';
import { COMPARISON, METRICS, SIMULATION, mergeConfig } from '@/config/defaults.js';

describe('mergeConfig', () => {
  it('should return the defaults without overrides', () => {
    expect(mergeConfig()).toEqual({
      simulation: { T_END: SIMULATION.T_END, SAMPLES: SIMULATION.SAMPLES, STEP_AMPLITUDE: 1 },
      metrics: { REFERENCE: METRICS.REFERENCE, SETTLING_TOLERANCE: METRICS.SETTLING_TOLERANCE },
      comparison: { T_END: COMPARISON.T_END, SAMPLES: COMPARISON.SAMPLES },
    });
  });

  it('should override single values and keep the rest', () => {
    const config = mergeConfig({ comparison: { SAMPLES: 250 } });
    expect(config.comparison).toEqual({ T_END: 10, SAMPLES: 250 });
    expect(config.simulation.SAMPLES).toBe(500);
  });

  it('should not share state between calls', () => {
    const first = mergeConfig();
    first.simulation.SAMPLES = 3;
    expect(mergeConfig().simulation.SAMPLES).toBe(500);
    expect(SIMULATION.SAMPLES).toBe(500);
  });
});
