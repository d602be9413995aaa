import { describe, it, expect } from 'vitest';
import { bestCandidate, expandGainGrid, sweepGains } from '@/core/parameter-sweep.js';
import { firstOrderPlant } from '@/core/plants.js';
import { createCapturingLogger } from '../../helpers/control.js';

const plant = firstOrderPlant(1);

describe('expandGainGrid', () => {
  it('should vary kp slowest and kd fastest', () => {
    expect(expandGainGrid({ kp: [1, 2], ki: [0, 1], kd: [0] })).toEqual([
      { kp: 1, ki: 0, kd: 0 },
      { kp: 1, ki: 1, kd: 0 },
      { kp: 2, ki: 0, kd: 0 },
      { kp: 2, ki: 1, kd: 0 },
    ]);
  });

  it('should produce nothing for an empty axis', () => {
    expect(expandGainGrid({ kp: [1], ki: [], kd: [0] })).toEqual([]);
  });
});

describe('sweepGains', () => {
  it('should return one result per candidate in order', () => {
    const results = sweepGains(
      plant,
      [
        { kp: 1, ki: 1, kd: 0 },
        { kp: Number.NaN, ki: 0, kd: 0 },
        { kp: 2, ki: 2, kd: 0 },
      ],
      { samples: 200 }
    );

    expect(results).toHaveLength(3);
    expect(results[0].ok).toBe(true);
    expect(results[1].err).toBe(true);
    expect(results[1].val).toMatchObject({ code: 'InvalidConfiguration' });
    expect(results[2].ok).toBe(true);
  });

  it('should store the gains, metrics and stability of each candidate', () => {
    const [result] = sweepGains(plant, [{ kp: 2, ki: 2, kd: 0 }], { samples: 1001 });
    if (result.err) {
      throw result.val;
    }
    // (2s + 2)/(s² + 3s + 2) = 2/(s + 2): error e^{−2t}
    expect(result.val.gains).toEqual({ kp: 2, ki: 2, kd: 0 });
    expect(result.val.stable).toBe(true);
    expect(result.val.spectralAbscissa).toBeCloseTo(-1, 10);
    expect(result.val.metrics.iae).toBeCloseTo(0.5, 3);
  });

  it('should log a summary', () => {
    const { logger, records } = createCapturingLogger('info');
    sweepGains(plant, [{ kp: 1, ki: 1, kd: 0 }, { kp: Infinity, ki: 0, kd: 0 }], {
      samples: 100,
      logger,
    });
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      msg: 'Parameter sweep finished',
      candidates: 2,
      succeeded: 1,
      failed: 1,
    });
  });
});

describe('bestCandidate', () => {
  it('should pick the stable candidate with the smallest metric', () => {
    const results = sweepGains(
      plant,
      [
        { kp: 1, ki: 1, kd: 0 },
        { kp: Number.NaN, ki: 0, kd: 0 },
        { kp: 2, ki: 2, kd: 0 },
      ],
      { samples: 500 }
    );
    expect(bestCandidate(results)?.gains).toEqual({ kp: 2, ki: 2, kd: 0 });
  });

  it('should skip unstable candidates', () => {
    const results = sweepGains(plant, [{ kp: 1, ki: 0, kd: 0 }], { samples: 200 });
    expect(results[0].ok).toBe(true);
    expect(bestCandidate(results)).toBeUndefined();
  });
});
