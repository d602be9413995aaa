import { describe, it, expect } from 'vitest';
import { ControlSystemError, isControlSystemError } from '@/api/errors.js';
import {
  buildPlant,
  delayedFirstOrderPlant,
  firstOrderPlant,
  highOrderPlant,
  integratorPlant,
  secondOrderPlant,
  standardSecondOrderPlant,
} from '@/core/plants.js';
import { expectCoefficientsClose, expectRootsClose } from '../../helpers/control.js';

describe('plant constructors', () => {
  it('should build a first-order lag', () => {
    const tf = firstOrderPlant(2, 3);
    expect(tf.numerator).toEqual([3]);
    expect(tf.denominator).toEqual([2, 1]);
    expect(tf.dcGain()).toBe(3);
  });

  it('should build a normalized second-order plant', () => {
    const tf = secondOrderPlant(2, 0.5, 3);
    expect(tf.numerator).toEqual([12]);
    expect(tf.denominator).toEqual([1, 2, 4]);
    expect(tf.dcGain()).toBe(3);
  });

  it('should build the unnormalized second-order form', () => {
    const tf = standardSecondOrderPlant(2, 0.5);
    expect(tf.numerator).toEqual([1]);
    expect(tf.denominator).toEqual([1, 2, 4]);
    expect(tf.dcGain()).toBe(0.25);
  });

  it('should build an integrator', () => {
    const tf = integratorPlant(2);
    expect(tf.numerator).toEqual([2]);
    expect(tf.denominator).toEqual([1, 0]);
  });

  it('should build a delayed lag with a right-half-plane zero', () => {
    const tf = delayedFirstOrderPlant(0.5);
    expectRootsClose(tf.zeros(), [4]);
    expectRootsClose(tf.poles(), [-4, -1]);
    expect(tf.dcGain()).toBe(1);
  });

  it('should build a high-order plant from poles and zeros', () => {
    const tf = highOrderPlant([-1, -2], [-3], 2);
    expect(tf.numerator).toEqual([2, 6]);
    expect(tf.denominator).toEqual([1, 3, 2]);
  });

  it.each([
    { label: 'a zero time constant', build: () => firstOrderPlant(0) },
    { label: 'a non-finite gain', build: () => firstOrderPlant(1, Number.NaN) },
    { label: 'a negative natural frequency', build: () => secondOrderPlant(-1, 0.5) },
    { label: 'a non-finite damping ratio', build: () => standardSecondOrderPlant(1, Infinity) },
    { label: 'a non-finite integrator gain', build: () => integratorPlant(Infinity) },
    { label: 'a negative delay', build: () => delayedFirstOrderPlant(-1) },
    { label: 'a high-order plant without poles', build: () => highOrderPlant([]) },
  ])('should reject $label', ({ build }) => {
    expect(build).toThrow(ControlSystemError);
  });
});

describe('buildPlant', () => {
  it('should default every gain to 1', () => {
    expect(buildPlant({ kind: 'first-order', tau: 0.5 }).dcGain()).toBe(1);
    expect(buildPlant({ kind: 'second-order', wn: 3, zeta: 0.7 }).dcGain()).toBe(1);
    expect(buildPlant({ kind: 'integrator' }).numerator).toEqual([1]);
    expect(buildPlant({ kind: 'delayed-first-order', delay: 0.2 }).dcGain()).toBe(1);
  });

  it('should expand complex pole pairs to real coefficients', () => {
    const tf = buildPlant({
      kind: 'high-order',
      poles: [-1, -2, -3, { re: -0.5, im: 1 }, { re: -0.5, im: -1 }],
    });
    expectCoefficientsClose(tf.denominator, [1, 7, 18.25, 24.5, 19.75, 7.5]);
    expect(tf.order).toBe(5);
  });

  it('should surface a conjugate mismatch', () => {
    let caught: unknown;
    try {
      buildPlant({ kind: 'high-order', poles: [-1, { re: -0.5, im: 1 }] });
    } catch (error) {
      caught = error;
    }
    expect(isControlSystemError(caught, 'ComplexConjugateMismatch')).toBe(true);
  });
});
