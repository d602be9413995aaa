import { describe, it, expect } from 'vitest';
import {
  convolve,
  degree,
  expandRoots,
  isZeroPolynomial,
  polyAdd,
  polyEval,
  polyEvalComplex,
  polyRoots,
  polyScale,
  trimLeadingZeros,
} from '@/core/polynomial.js';
import { expectCoefficientsClose, expectRootsClose } from '../../helpers/control.js';

describe('Polynomial', () => {
  describe('coefficient arithmetic', () => {
    it('should convolve coefficient arrays', () => {
      expect(convolve([1, 1], [1, 2])).toEqual([1, 3, 2]);
      expect(convolve([2], [1, 0, -1])).toEqual([2, 0, -2]);
    });

    it('should return an empty product for an empty operand', () => {
      expect(convolve([], [1, 2])).toEqual([]);
    });

    it('should add polynomials aligned at the constant term', () => {
      expect(polyAdd([1, 0, 0], [2, 3])).toEqual([1, 2, 3]);
      expect(polyAdd([4], [1, 1])).toEqual([1, 5]);
    });

    it('should scale every coefficient', () => {
      expect(polyScale([1, -2, 3], 2)).toEqual([2, -4, 6]);
    });

    it('should trim leading zeros and keep the zero polynomial as [0]', () => {
      expect(trimLeadingZeros([0, 0, 1, 2])).toEqual([1, 2]);
      expect(trimLeadingZeros([0, 0])).toEqual([0]);
      expect(isZeroPolynomial([0, 0, 0])).toBe(true);
      expect(isZeroPolynomial([0, 1])).toBe(false);
    });

    it('should report the degree after trimming', () => {
      expect(degree([0, 3, 1])).toBe(1);
      expect(degree([5])).toBe(0);
    });
  });

  describe('evaluation', () => {
    it('should evaluate with Horner at a real point', () => {
      expect(polyEval([1, 3, 2], 2)).toBe(12);
      expect(polyEval([1, 3, 2], -1)).toBe(0);
    });

    it('should evaluate at a complex point', () => {
      const value = polyEvalComplex([1, 0, 1], { re: 0, im: 1 });
      expect(value.re).toBeCloseTo(0, 12);
      expect(value.im).toBeCloseTo(0, 12);
    });
  });

  describe('expandRoots', () => {
    it('should expand real roots into monic coefficients', () => {
      const coeffs = expandRoots([
        { re: -1, im: 0 },
        { re: -2, im: 0 },
      ]);
      expectCoefficientsClose(coeffs.map((c) => c.re), [1, 3, 2]);
      coeffs.forEach((c) => expect(c.im).toBeCloseTo(0, 12));
    });

    it('should return [1] when there are no roots', () => {
      expect(expandRoots([])).toEqual([{ re: 1, im: 0 }]);
    });
  });

  describe('polyRoots', () => {
    it('should solve linear polynomials exactly', () => {
      expect(polyRoots([2, 4])).toEqual([{ re: -2, im: 0 }]);
    });

    it('should solve quadratics in closed form', () => {
      expect(polyRoots([1, 3, 2])).toEqual([
        { re: -2, im: 0 },
        { re: -1, im: 0 },
      ]);
    });

    it('should return complex conjugate quadratic roots, negative imaginary part first', () => {
      expect(polyRoots([1, 2, 5])).toEqual([
        { re: -1, im: -2 },
        { re: -1, im: 2 },
      ]);
    });

    it('should extract exact roots at the origin', () => {
      const roots = polyRoots([1, 0, 0]);
      expect(roots).toHaveLength(2);
      roots.forEach((r) => {
        expect(Math.abs(r.re)).toBe(0);
        expect(Math.abs(r.im)).toBe(0);
      });
    });

    it('should return no roots for constants', () => {
      expect(polyRoots([5])).toEqual([]);
      expect(polyRoots([0, 0])).toEqual([]);
    });

    it('should find real roots of a cubic', () => {
      expectRootsClose(polyRoots([1, 6, 11, 6]), [-1, -2, -3]);
    });

    it('should find a complex pair of a cubic', () => {
      // (s + 1)(s² + 2s + 5)
      expectRootsClose(polyRoots([1, 3, 7, 5]), [-1, { re: -1, im: 2 }, { re: -1, im: -2 }]);
    });

    it('should handle a non-monic quintic', () => {
      // 2(s + 1)(s + 2)(s + 3)(s² + s + 1.25)
      const roots = polyRoots([2, 14, 36.5, 49, 39.5, 15]);
      expectRootsClose(roots, [-1, -2, -3, { re: -0.5, im: 1 }, { re: -0.5, im: -1 }]);
    });

    it('should collapse a fourfold real root onto the real axis', () => {
      // (s + 1)⁴
      const roots = polyRoots([1, 4, 6, 4, 1]);
      expectRootsClose(roots, [-1, -1, -1, -1], 1e-12);
      roots.forEach((r) => expect(r.im).toBe(0));
    });

    it('should keep a real triple root next to a simple one apart', () => {
      // (s + 1)³(s + 3)
      const roots = polyRoots([1, 6, 12, 10, 3]);
      expectRootsClose(roots, [-1, -1, -1, -3], 1e-10);
      roots.forEach((r) => expect(r.im).toBe(0));
    });

    it('should return exact conjugate pairs for a repeated complex pair', () => {
      // (s² + 2s + 5)²
      const roots = polyRoots([1, 4, 14, 20, 25]);
      expectRootsClose(roots, [{ re: -1, im: 2 }, { re: -1, im: 2 }, { re: -1, im: -2 }, { re: -1, im: -2 }], 1e-6);
      roots.forEach((r) => {
        expect(roots.some((other) => other.re === r.re && other.im === -r.im)).toBe(true);
      });
    });

    it('should ignore leading zeros', () => {
      expect(polyRoots([0, 0, 1, 1])).toEqual([{ re: -1, im: 0 }]);
    });
  });
});
