import { describe, it, expect } from 'vitest';
import { isControlSystemError } from '@/api/errors.js';
import { analyzeStability, closedLoopPoles, servoClosedLoop } from '@/core/closed-loop.js';
import { pidGainsForPoles } from '@/tuning/pole-placement.js';
import { expectRootsClose } from '../../helpers/control.js';

describe('pidGainsForPoles', () => {
  const plant = { wn: 1, zeta: 0.5 };

  it('should match the characteristic polynomial', () => {
    // (s + 1)(s² + 2s + 2) = s³ + 3s² + 4s + 2 against s³ + (1 + kd)s² + (1 + kp)s + ki
    const gains = pidGainsForPoles(plant, [-1, { re: -1, im: 1 }, { re: -1, im: -1 }]);
    expect(gains).toEqual({ kp: 3, ki: 2, kd: 2 });
  });

  it('should place the servo poles where requested', () => {
    const desired = [-2, { re: -1, im: 2 }, { re: -1, im: -2 }] as const;
    const gains = pidGainsForPoles(plant, desired);
    expectRootsClose(closedLoopPoles(gains, plant), desired, 1e-6);
  });

  it('should report a placed triple pole as real', () => {
    const lightlyDamped = { wn: 1, zeta: 0.3 };
    const gains = pidGainsForPoles(lightlyDamped, [-2, -2, -2]);
    const report = analyzeStability(servoClosedLoop(gains, lightlyDamped));

    expectRootsClose(report.poles, [-2, -2, -2], 1e-9);
    report.poles.forEach((pole) => expect(pole.im).toBe(0));
    expect(report.stable).toBe(true);
    expect(report.spectralAbscissa).toBeCloseTo(-2, 9);
  });

  it('should reject a complex pole without its conjugate', () => {
    let caught: unknown;
    try {
      pidGainsForPoles(plant, [-1, -2, { re: -1, im: 1 }]);
    } catch (error) {
      caught = error;
    }
    expect(isControlSystemError(caught, 'ComplexConjugateMismatch')).toBe(true);
  });

  it('should reject non-finite plant parameters', () => {
    let caught: unknown;
    try {
      pidGainsForPoles({ wn: Number.NaN, zeta: 0.5 }, [-1, -2, -3]);
    } catch (error) {
      caught = error;
    }
    expect(isControlSystemError(caught, 'InvalidConfiguration')).toBe(true);
  });
});
