/**
 * Transfer Function Algebra
 *
 * Immutable rational functions in the Laplace variable s. Composition
 * (series, parallel, feedback) always returns a new instance and never
 * cancels common poles and zeros on its own: pole maps and stability
 * checks downstream rely on seeing the full, unreduced pole set.
 * Cancellation is available only through the explicit
 * {@link cancelCommonRoots}.
 */

import { ControlSystemError, invalidConfiguration } from '../api/errors.js';
import { NUMERICS } from '../config/defaults.js';
import type { Complex, ComplexLike, Polynomial } from '../types/control.js';
import { cAbs, cDiv, toComplex } from './complex.js';
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
} from './polynomial.js';

/**
 * Feedback sign: +1 gives G / (1 + G·H) (negative feedback loop),
 * -1 gives G / (1 − G·H).
 */
export type FeedbackSign = 1 | -1;

function assertCoefficients(name: string, coeffs: Polynomial): void {
  if (coeffs.length === 0) {
    throw invalidConfiguration(`${name} must have at least one coefficient`);
  }
  const bad = coeffs.findIndex((c) => !Number.isFinite(c));
  if (bad !== -1) {
    throw invalidConfiguration(`${name} coefficient ${bad} is not finite`, {
      index: bad,
      value: coeffs[bad],
    });
  }
}

export class TransferFunction {
  public readonly numerator: Polynomial;
  public readonly denominator: Polynomial;

  private constructor(numerator: number[], denominator: number[]) {
    this.numerator = Object.freeze(numerator);
    this.denominator = Object.freeze(denominator);
    Object.freeze(this);
  }

  /**
   * Build from explicit coefficient arrays (highest degree first).
   *
   * Leading zeros are trimmed from both polynomials.
   *
   * @throws {ControlSystemError} InvalidConfiguration for empty or
   * non-finite coefficients or a zero denominator
   */
  public static create(numerator: Polynomial, denominator: Polynomial): TransferFunction {
    assertCoefficients('numerator', numerator);
    assertCoefficients('denominator', denominator);
    if (isZeroPolynomial(denominator)) {
      throw invalidConfiguration('denominator must not be the zero polynomial');
    }
    return new TransferFunction(trimLeadingZeros(numerator), trimLeadingZeros(denominator));
  }

  /**
   * Static gain k/1
   */
  public static gain(k: number): TransferFunction {
    return TransferFunction.create([k], [1]);
  }

  /**
   * Build `gain · ∏(s − z) / ∏(s − p)`.
   *
   * Complex roots must come in conjugate pairs so that the expanded
   * coefficients are real.
   *
   * @throws {ControlSystemError} ComplexConjugateMismatch when an expanded
   * coefficient keeps an imaginary part beyond `tolerance` (relative to
   * the largest coefficient magnitude)
   */
  public static fromPoles(
    poles: readonly ComplexLike[],
    zeros: readonly ComplexLike[] = [],
    gain = 1,
    tolerance: number = NUMERICS.CONJUGATE_TOLERANCE
  ): TransferFunction {
    const den = realCoefficients(expandRoots(poles.map(toComplex)), 'poles', tolerance);
    const num = zeros.length > 0
      ? polyScale(realCoefficients(expandRoots(zeros.map(toComplex)), 'zeros', tolerance), gain)
      : [gain];
    return TransferFunction.create(num, den);
  }

  /** Denominator degree (number of states of a minimal realization) */
  public get order(): number {
    return degree(this.denominator);
  }

  /** deg(den) − deg(num); negative for improper systems */
  public get relativeDegree(): number {
    return degree(this.denominator) - degree(this.numerator);
  }

  /**
   * deg(num) ≤ deg(den)
   */
  public isProper(): boolean {
    return this.relativeDegree >= 0;
  }

  public series(other: TransferFunction | number): TransferFunction {
    return series(this, other);
  }

  public parallel(other: TransferFunction | number): TransferFunction {
    return parallel(this, other);
  }

  public feedback(other: TransferFunction | number = 1, sign: FeedbackSign = 1): TransferFunction {
    return feedback(this, other, sign);
  }

  /**
   * Roots of the denominator, sorted by real part
   */
  public poles(): Complex[] {
    return polyRoots(this.denominator);
  }

  /**
   * Roots of the numerator; a zero numerator has none
   */
  public zeros(): Complex[] {
    return isZeroPolynomial(this.numerator) ? [] : polyRoots(this.numerator);
  }

  /**
   * Limit of G(s) as s → 0.
   *
   * Powers of s shared by numerator and denominator are divided out
   * first, so a removable factor at the origin does not turn the gain
   * into NaN. The stored polynomials (and the pole set) are unchanged.
   * ±Infinity when a pole at the origin remains.
   */
  public dcGain(): number {
    let num = this.numerator.length;
    let den = this.denominator.length;
    while (num > 1 && den > 1 && this.numerator[num - 1] === 0 && this.denominator[den - 1] === 0) {
      num--;
      den--;
    }
    return polyEval(this.numerator.slice(0, num), 0) / polyEval(this.denominator.slice(0, den), 0);
  }

  /**
   * Evaluate at a complex frequency
   */
  public evaluate(s: ComplexLike): Complex {
    const point = toComplex(s);
    return cDiv(polyEvalComplex(this.numerator, point), polyEvalComplex(this.denominator, point));
  }

  /**
   * Every pole strictly in the open left half-plane
   */
  public isStable(): boolean {
    return this.poles().every((p) => p.re < 0);
  }

  public toString(): string {
    return `(${formatPolynomial(this.numerator)}) / (${formatPolynomial(this.denominator)})`;
  }
}

function realCoefficients(coeffs: Complex[], what: string, tolerance: number): number[] {
  const scale = Math.max(1, ...coeffs.map(cAbs));
  const worst = coeffs.reduce((max, c) => Math.max(max, Math.abs(c.im)), 0);
  if (worst > tolerance * scale) {
    throw new ControlSystemError(
      'ComplexConjugateMismatch',
      `Complex ${what} must appear in conjugate pairs (imaginary residue ${worst.toExponential(3)})`,
      { residue: worst, tolerance }
    );
  }
  return coeffs.map((c) => c.re);
}

function asTransferFunction(value: TransferFunction | number): TransferFunction {
  return typeof value === 'number' ? TransferFunction.gain(value) : value;
}

/**
 * Series connection G1·G2.
 *
 * num = conv(num1, num2), den = conv(den1, den2); nothing is cancelled.
 */
export function series(g1: TransferFunction, g2: TransferFunction | number): TransferFunction {
  const other = asTransferFunction(g2);
  return TransferFunction.create(
    convolve(g1.numerator, other.numerator),
    convolve(g1.denominator, other.denominator)
  );
}

/**
 * Parallel connection G1 + G2
 */
export function parallel(g1: TransferFunction, g2: TransferFunction | number): TransferFunction {
  const other = asTransferFunction(g2);
  return TransferFunction.create(
    polyAdd(convolve(g1.numerator, other.denominator), convolve(other.numerator, g1.denominator)),
    convolve(g1.denominator, other.denominator)
  );
}

/**
 * Feedback reduction G / (1 + sign·G·H).
 *
 * num = numG·denH, den = denG·denH + sign·numG·numH.
 *
 * @throws {ControlSystemError} DegenerateFeedback when the closed-loop
 * denominator vanishes identically
 */
export function feedback(
  g: TransferFunction,
  h: TransferFunction | number = 1,
  sign: FeedbackSign = 1
): TransferFunction {
  const path = asTransferFunction(h);
  const num = convolve(g.numerator, path.denominator);
  const den = polyAdd(
    convolve(g.denominator, path.denominator),
    polyScale(convolve(g.numerator, path.numerator), sign)
  );
  if (isZeroPolynomial(den)) {
    throw new ControlSystemError(
      'DegenerateFeedback',
      'Feedback reduction produced a zero denominator',
      { forward: g.toString(), feedback: path.toString(), sign }
    );
  }
  return TransferFunction.create(num, den);
}

/**
 * First-order lag with dead time: k/(τs + 1) · (1 − Ls/2)/(1 + Ls/2).
 *
 * The delay uses the first-order Padé approximant only.
 *
 * @param delay - Dead time L (s), ≥ 0
 * @param tau - Time constant τ (s), > 0
 * @param k - Static gain
 */
export function padeDelay(delay: number, tau = 1.0, k = 1.0): TransferFunction {
  if (!Number.isFinite(tau) || tau <= 0) {
    throw invalidConfiguration(`time constant must be positive (got ${tau})`, { tau });
  }
  if (!Number.isFinite(delay) || delay < 0) {
    throw invalidConfiguration(`delay must be non-negative (got ${delay})`, { delay });
  }
  const lag = TransferFunction.create([k], [tau, 1]);
  const pade = TransferFunction.create([-delay / 2, 1], [delay / 2, 1]);
  return series(lag, pade);
}

/**
 * Remove pole/zero pairs closer than `tolerance` (relative to the pole
 * magnitude). Never applied implicitly by any other operation.
 *
 * The remaining roots come from the root finder, which returns
 * conjugate-closed sets, so the re-expanded coefficients keep only
 * their real parts.
 */
export function cancelCommonRoots(
  tf: TransferFunction,
  tolerance: number = NUMERICS.CANCELLATION_TOLERANCE
): TransferFunction {
  const zeros = tf.zeros();
  const remainingPoles = tf.poles();
  const remainingZeros: Complex[] = [];

  for (const zero of zeros) {
    const match = remainingPoles.findIndex(
      (pole) => Math.hypot(pole.re - zero.re, pole.im - zero.im) <= tolerance * Math.max(1, cAbs(pole))
    );
    if (match === -1) {
      remainingZeros.push(zero);
    } else {
      remainingPoles.splice(match, 1);
    }
  }

  if (remainingZeros.length === zeros.length) {
    return tf;
  }

  const gain = tf.numerator[0] / tf.denominator[0];
  return TransferFunction.create(
    polyScale(realParts(expandRoots(remainingZeros)), gain),
    realParts(expandRoots(remainingPoles))
  );
}

function realParts(coeffs: readonly Complex[]): number[] {
  return coeffs.map((c) => c.re);
}

/**
 * Human-readable polynomial in s, e.g. `s^2 + 0.6s + 1`
 */
export function formatPolynomial(p: Polynomial, variable = 's'): string {
  const n = p.length - 1;
  const terms: string[] = [];
  p.forEach((c, i) => {
    if (c === 0) return;
    const power = n - i;
    const magnitude = Math.abs(c);
    const coeff = magnitude === 1 && power > 0 ? '' : `${magnitude}`;
    const symbol = power === 0 ? '' : power === 1 ? variable : `${variable}^${power}`;
    const sign = c < 0 ? '-' : '+';
    terms.push(terms.length === 0 ? `${c < 0 ? '-' : ''}${coeff}${symbol}` : `${sign} ${coeff}${symbol}`);
  });
  return terms.length === 0 ? '0' : terms.join(' ');
}
