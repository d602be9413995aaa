/**
 * Polynomial arithmetic
 *
 * Coefficients are ordered highest degree first, the same convention
 * used by transfer-function numerators and denominators.
 */

import { NUMERICS } from '../config/defaults.js';
import type { Complex, Polynomial } from '../types/control.js';
import {
  ONE,
  ZERO,
  cAbs,
  cAdd,
  cConj,
  cDiv,
  cMul,
  cScale,
  cSub,
  compareComplex,
  complex,
} from './complex.js';

/**
 * Drop leading zero coefficients. The zero polynomial becomes `[0]`.
 */
export function trimLeadingZeros(p: Polynomial): number[] {
  const first = p.findIndex((c) => c !== 0);
  return first === -1 ? [0] : p.slice(first);
}

/**
 * True when every coefficient is zero (or the array is empty)
 */
export function isZeroPolynomial(p: Polynomial): boolean {
  return p.every((c) => c === 0);
}

/**
 * Degree after trimming leading zeros; the zero polynomial has degree 0.
 */
export function degree(p: Polynomial): number {
  return trimLeadingZeros(p).length - 1;
}

/**
 * Polynomial product (discrete convolution of coefficient arrays)
 *
 * @example
 * ```typescript
 * convolve([1, 1], [1, 2]) // => [1, 3, 2]
 * ```
 */
export function convolve(a: Polynomial, b: Polynomial): number[] {
  if (a.length === 0 || b.length === 0) {
    return [];
  }

  const out = new Array<number>(a.length + b.length - 1).fill(0);
  for (let i = 0; i < a.length; i++) {
    for (let j = 0; j < b.length; j++) {
      out[i + j] += a[i] * b[j];
    }
  }
  return out;
}

/**
 * Sum of two polynomials, aligned at the constant term
 */
export function polyAdd(a: Polynomial, b: Polynomial): number[] {
  const n = Math.max(a.length, b.length);
  const out = new Array<number>(n).fill(0);
  for (let i = 0; i < a.length; i++) {
    out[n - a.length + i] += a[i];
  }
  for (let i = 0; i < b.length; i++) {
    out[n - b.length + i] += b[i];
  }
  return out;
}

export function polyScale(p: Polynomial, k: number): number[] {
  return p.map((c) => c * k);
}

/**
 * Horner evaluation at a real point
 */
export function polyEval(p: Polynomial, x: number): number {
  let acc = 0;
  for (const c of p) {
    acc = acc * x + c;
  }
  return acc;
}

/**
 * Horner evaluation at a complex point
 */
export function polyEvalComplex(p: Polynomial, z: Complex): Complex {
  let acc = ZERO;
  for (const c of p) {
    acc = cAdd(cMul(acc, z), complex(c));
  }
  return acc;
}

function polyDerivative(p: Polynomial): number[] {
  const n = p.length - 1;
  return p.slice(0, n).map((c, i) => c * (n - i));
}

function nthDerivative(p: Polynomial, order: number): number[] {
  let out = [...p];
  for (let k = 0; k < order && out.length > 0; k++) {
    out = polyDerivative(out);
  }
  return out;
}

/**
 * Expand ∏(s − root) with complex coefficients.
 *
 * No roots gives the constant polynomial `[1]`.
 */
export function expandRoots(roots: readonly Complex[]): Complex[] {
  let coeffs: Complex[] = [ONE];
  for (const root of roots) {
    const next: Complex[] = new Array<Complex>(coeffs.length + 1).fill(ZERO);
    for (let i = 0; i < coeffs.length; i++) {
      next[i] = cAdd(next[i], coeffs[i]);
      next[i + 1] = cSub(next[i + 1], cMul(coeffs[i], root));
    }
    coeffs = next;
  }
  return coeffs;
}

function quadraticRoots(a: number, b: number, c: number): Complex[] {
  const disc = b * b - 4 * a * c;
  if (disc >= 0) {
    // Avoid cancellation: compute the larger-magnitude root first
    const q = -0.5 * (b + Math.sign(b || 1) * Math.sqrt(disc));
    const r1 = q / a;
    const r2 = q !== 0 ? c / q : 0;
    return [complex(r1), complex(r2)];
  }
  const re = -b / (2 * a);
  const im = Math.sqrt(-disc) / (2 * a);
  return [complex(re, Math.abs(im)), complex(re, -Math.abs(im))];
}

/**
 * Newton refinement of a root estimate against the input coefficients
 */
function polishRoot(p: Polynomial, dp: Polynomial, z: Complex): Complex {
  let current = z;
  for (let i = 0; i < 3; i++) {
    const value = polyEvalComplex(p, current);
    const slope = polyEvalComplex(dp, current);
    if (cAbs(slope) === 0) {
      break;
    }
    const next = cSub(current, cDiv(value, slope));
    if (!Number.isFinite(next.re) || !Number.isFinite(next.im)) {
      break;
    }
    if (cAbs(polyEvalComplex(p, next)) >= cAbs(value)) {
      break;
    }
    current = next;
  }
  return current;
}

/**
 * Durand–Kerner simultaneous iteration on a monic polynomial of degree ≥ 3
 */
function durandKerner(monic: number[], maxIterations: number, tolerance: number): Complex[] {
  const n = monic.length - 1;
  const radius = 1 + Math.max(...monic.slice(1).map(Math.abs));
  let roots: Complex[] = Array.from({ length: n }, (_, k) => {
    const theta = (2 * Math.PI * k) / n + 0.4;
    return complex(radius * Math.cos(theta), radius * Math.sin(theta));
  });

  for (let iter = 0; iter < maxIterations; iter++) {
    let maxStep = 0;
    const next = roots.map((zi, i) => {
      let denom = complex(1);
      for (let j = 0; j < n; j++) {
        if (j !== i) {
          denom = cMul(denom, cSub(zi, roots[j]));
        }
      }
      if (cAbs(denom) === 0) {
        // Coincident estimates: nudge apart
        denom = complex(tolerance);
      }
      const step = cDiv(polyEvalComplex(monic, zi), denom);
      maxStep = Math.max(maxStep, cAbs(step) / (1 + cAbs(zi)));
      return cSub(zi, step);
    });
    roots = next;
    if (maxStep <= tolerance) {
      break;
    }
  }
  return roots;
}

const SQRT_EPSILON = Math.sqrt(Number.EPSILON);

/** Allowed spread of a cluster, in multiples of its expected perturbation */
const CLUSTER_SPREAD_FACTOR = 10;

function factorial(k: number): number {
  let out = 1;
  for (let i = 2; i <= k; i++) {
    out *= i;
  }
  return out;
}

/**
 * Expected radius of the perturbed copies of a root of multiplicity m at c:
 * (ε·Σ|aᵢ||c|ⁱ / |p⁽ᵐ⁾(c)/m!|)^(1/m). Infinite when p⁽ᵐ⁾(c) vanishes.
 */
function multipleRootRadius(p: Polynomial, c: Complex, m: number): number {
  const evaluationError = Number.EPSILON * polyEval(p.map(Math.abs), cAbs(c));
  const leading = cAbs(polyEvalComplex(nthDerivative(p, m), c)) / factorial(m);
  return leading === 0 ? Infinity : Math.pow(evaluationError / leading, 1 / m);
}

/**
 * Merge estimates that scatter around a multiple root.
 *
 * Near a root of multiplicity m the estimates land on a ring of radius
 * about ε^(1/m). Each group of nearest neighbours is tried from the
 * largest size down; a group is accepted when its members lie within
 * a few expected radii of its centroid, refined as a simple root of
 * p⁽ᵐ⁻¹⁾. Every member is then replaced by the refined value.
 */
function mergeMultipleRoots(p: Polynomial, estimates: readonly Complex[]): Complex[] {
  const pending = [...estimates];
  const out: Complex[] = [];

  while (pending.length > 0) {
    const [seed] = pending.splice(0, 1);
    const neighbours = pending
      .map((root, index) => ({ index, distance: cAbs(cSub(root, seed)) }))
      .sort((a, b) => a.distance - b.distance);

    let merged = false;
    for (let m = neighbours.length + 1; m >= 2 && !merged; m--) {
      const members = [seed, ...neighbours.slice(0, m - 1).map(({ index }) => pending[index])];
      const centroid = cScale(members.reduce(cAdd, ZERO), 1 / m);
      const refined = polishRoot(nthDerivative(p, m - 1), nthDerivative(p, m), centroid);
      const radius = multipleRootRadius(p, refined, m);
      const spread = Math.max(...members.map((root) => cAbs(cSub(root, refined))));

      if (Number.isFinite(radius) && spread <= CLUSTER_SPREAD_FACTOR * radius) {
        const taken = new Set(neighbours.slice(0, m - 1).map(({ index }) => index));
        const rest = pending.filter((_, index) => !taken.has(index));
        pending.length = 0;
        pending.push(...rest);
        out.push(...members.map(() => refined));
        merged = true;
      }
    }

    if (!merged) {
      out.push(seed);
    }
  }

  return out;
}

function isNumericallyReal(z: Complex): boolean {
  return Math.abs(z.im) <= SQRT_EPSILON * Math.max(1, cAbs(z));
}

/**
 * Make the roots of a real polynomial closed under conjugation.
 *
 * Each complex root is paired with the remaining root nearest its
 * conjugate and both are replaced by the averaged pair. Roots within
 * √ε of the real axis, and complex roots left without a partner, are
 * put on the real axis.
 */
function closeUnderConjugation(roots: readonly Complex[]): Complex[] {
  const pending = [...roots];
  const out: Complex[] = [];

  while (pending.length > 0) {
    const [root] = pending.splice(0, 1);
    if (isNumericallyReal(root)) {
      out.push(complex(root.re));
      continue;
    }

    let partner = -1;
    let best = Infinity;
    pending.forEach((candidate, index) => {
      if (isNumericallyReal(candidate) || Math.sign(candidate.im) === Math.sign(root.im)) {
        return;
      }
      const distance = cAbs(cSub(candidate, cConj(root)));
      if (distance < best) {
        best = distance;
        partner = index;
      }
    });

    if (partner === -1) {
      out.push(complex(root.re));
      continue;
    }

    const [mate] = pending.splice(partner, 1);
    const upper = root.im > 0 ? root : mate;
    const lower = root.im > 0 ? mate : root;
    const average = cScale(cAdd(upper, cConj(lower)), 0.5);
    out.push(average, cConj(average));
  }

  return out;
}

/**
 * All complex roots of a real polynomial, sorted by real then imaginary
 * part. The result is closed under conjugation and real roots carry an
 * imaginary part of exactly zero.
 *
 * Leading zeros are ignored; exact trailing zeros yield exact roots at
 * the origin. Constants (including the zero polynomial) have no roots.
 */
export function polyRoots(
  p: Polynomial,
  maxIterations: number = NUMERICS.ROOT_MAX_ITERATIONS,
  tolerance: number = NUMERICS.ROOT_TOLERANCE
): Complex[] {
  let coeffs = trimLeadingZeros(p);
  if (coeffs.length <= 1) {
    return [];
  }

  const roots: Complex[] = [];
  while (coeffs.length > 1 && coeffs[coeffs.length - 1] === 0) {
    roots.push(complex(0));
    coeffs = coeffs.slice(0, -1);
  }

  const n = coeffs.length - 1;
  if (n === 1) {
    roots.push(complex(-coeffs[1] / coeffs[0]));
  } else if (n === 2) {
    roots.push(...quadraticRoots(coeffs[0], coeffs[1], coeffs[2]));
  } else if (n >= 3) {
    const monic = coeffs.map((c) => c / coeffs[0]);
    const derivative = polyDerivative(coeffs);
    const estimates = durandKerner(monic, maxIterations, tolerance).map((estimate) =>
      polishRoot(coeffs, derivative, estimate)
    );
    roots.push(...mergeMultipleRoots(coeffs, estimates));
  }

  return closeUnderConjugation(roots).sort(compareComplex);
}
