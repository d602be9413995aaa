import { describe, it, expect, vi } from 'vitest';
import { ControllerComparison } from '@/core/controller-comparison.js';
import { firstOrderPlant } from '@/core/plants.js';
import { createCapturingLogger } from '../../helpers/control.js';

const P = { kp: 1, ki: 0, kd: 0 };
const PI = { kp: 2, ki: 1, kd: 0 };

describe('ControllerComparison', () => {
  it('should simulate on 1000 points by default', () => {
    const comparison = new ControllerComparison(firstOrderPlant(1));
    const result = comparison.addController('pi', PI);
    expect(result.ok).toBe(true);
    expect(comparison.get('pi')?.result.time).toHaveLength(1000);
  });

  it('should honour the horizon options', () => {
    const comparison = new ControllerComparison(firstOrderPlant(1), { tEnd: 5, samples: 200 });
    comparison.addController('pi', PI);
    const time = comparison.get('pi')?.result.time ?? [];
    expect(time).toHaveLength(200);
    expect(time[199]).toBe(5);
  });

  it('should emit controllerAdded with the stored entry', () => {
    const comparison = new ControllerComparison(firstOrderPlant(1), { samples: 200 });
    const onAdded = vi.fn();
    comparison.on('controllerAdded', onAdded);

    comparison.addController('p', P);

    expect(onAdded).toHaveBeenCalledTimes(1);
    expect(onAdded).toHaveBeenCalledWith(comparison.get('p'));
  });

  it('should report failures without dropping earlier entries', () => {
    const comparison = new ControllerComparison(firstOrderPlant(1), { samples: 200 });
    const onFailed = vi.fn();
    comparison.on('controllerFailed', onFailed);
    comparison.addController('p', P);

    const result = comparison.addController('broken', { kp: Number.NaN, ki: 0, kd: 0 });

    expect(result.err).toBe(true);
    expect(result.val).toMatchObject({ code: 'InvalidConfiguration' });
    expect(onFailed).toHaveBeenCalledWith('broken', result.val);
    expect(comparison.size).toBe(1);
    expect(comparison.get('broken')).toBeUndefined();
  });

  it('should log failures as warnings', () => {
    const { logger, records } = createCapturingLogger('warn');
    const comparison = new ControllerComparison(firstOrderPlant(1), { samples: 200 }, logger);
    comparison.addController('broken', { kp: 1, ki: Infinity, kd: 0 });
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ level: 40, name: 'broken', code: 'InvalidConfiguration' });
  });

  it('should replace an entry added under the same name', () => {
    const comparison = new ControllerComparison(firstOrderPlant(1), { samples: 200 });
    comparison.addController('c', P);
    comparison.addController('c', PI);
    expect(comparison.size).toBe(1);
    expect(comparison.get('c')?.controller.gains).toEqual(PI);
  });

  it('should remove and clear entries', () => {
    const comparison = new ControllerComparison(firstOrderPlant(1), { samples: 200 });
    comparison.addController('p', P);
    comparison.addController('pi', PI);

    expect(comparison.remove('p')).toBe(true);
    expect(comparison.remove('p')).toBe(false);
    expect(comparison.getComparisonData().map((e) => e.name)).toEqual(['pi']);

    comparison.clear();
    expect(comparison.size).toBe(0);
  });

  it('should keep insertion order in the comparison data', () => {
    const comparison = new ControllerComparison(firstOrderPlant(1), { samples: 200 });
    comparison.addController('pi', PI);
    comparison.addController('p', P);
    expect(comparison.getComparisonData().map((e) => e.name)).toEqual(['pi', 'p']);
  });

  it('should rank controllers by a metric', () => {
    const comparison = new ControllerComparison(firstOrderPlant(1), { samples: 200 });
    comparison.addController('p', P);
    comparison.addController('pi', PI);

    expect(comparison.rank('steadyStateError')).toEqual(['pi', 'p']);
    expect(comparison.rank()).toEqual(['pi', 'p']);
  });

  it('should record the unreduced pole set of each loop', () => {
    const comparison = new ControllerComparison(firstOrderPlant(1), { samples: 200 });
    comparison.addController('p', P);
    comparison.addController('pi', PI);

    expect(comparison.get('p')?.stability.stable).toBe(false);
    expect(comparison.get('pi')?.stability.stable).toBe(true);
    expect(comparison.get('p')?.metrics.steadyStateValue).toBeCloseTo(0.5, 6);
  });
});
