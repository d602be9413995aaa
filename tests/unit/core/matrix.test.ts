import { describe, it, expect } from 'vitest';
import { expm, identity, matMul, normInf, solve, zeros } from '@/core/matrix.js';

function expectMatrixClose(actual: number[][], expected: number[][], digits = 10): void {
  expect(actual).toHaveLength(expected.length);
  actual.forEach((row, i) => {
    expect(row).toHaveLength(expected[i].length);
    row.forEach((value, j) => expect(value).toBeCloseTo(expected[i][j], digits));
  });
}

describe('matrix helpers', () => {
  it('should multiply matrices', () => {
    expect(matMul([[1, 2], [3, 4]], [[5], [6]])).toEqual([[17], [39]]);
  });

  it('should compute the infinity norm', () => {
    expect(normInf([[1, -2], [3, 4]])).toBe(7);
    expect(normInf([])).toBe(0);
  });

  describe('solve', () => {
    it('should solve a well-conditioned system', () => {
      const x = solve([[2, 1], [1, 3]], [[3], [5]]);
      expect(x).not.toBeNull();
      expectMatrixClose(x ?? [], [[0.8], [1.4]], 12);
    });

    it('should pivot around a zero diagonal entry', () => {
      const x = solve([[0, 1], [1, 0]], [[2], [3]]);
      expectMatrixClose(x ?? [], [[3], [2]], 12);
    });

    it('should return null for a singular matrix', () => {
      expect(solve([[1, 2], [2, 4]], [[1], [2]])).toBeNull();
    });
  });

  describe('expm', () => {
    it('should return the identity for the zero matrix', () => {
      expectMatrixClose(expm(zeros(3, 3)), identity(3), 14);
    });

    it('should exponentiate a diagonal matrix element-wise', () => {
      expectMatrixClose(expm([[1, 0], [0, -2]]), [[Math.E, 0], [0, Math.exp(-2)]]);
    });

    it('should handle a nilpotent matrix exactly', () => {
      expectMatrixClose(expm([[0, 1], [0, 0]]), [[1, 1], [0, 1]]);
    });

    it('should produce a rotation for a skew-symmetric generator', () => {
      expectMatrixClose(expm([[0, 1], [-1, 0]]), [
        [Math.cos(1), Math.sin(1)],
        [-Math.sin(1), Math.cos(1)],
      ]);
    });

    it('should stay accurate for large norms through squaring', () => {
      expectMatrixClose(expm([[-20]]), [[Math.exp(-20)]], 14);
      expect(expm([[10]])[0][0] / Math.exp(10)).toBeCloseTo(1, 10);
    });

    it('should return an empty matrix for empty input', () => {
      expect(expm([])).toEqual([]);
    });

    it('should reject non-finite entries', () => {
      expect(() => expm([[Number.NaN]])).toThrow('non-finite input');
    });
  });
});
