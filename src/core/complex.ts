/**
 * Complex arithmetic used by root finding and pole/zero expansion.
 */

import type { Complex, ComplexLike } from '../types/control.js';

export const ZERO: Complex = Object.freeze({ re: 0, im: 0 });
export const ONE: Complex = Object.freeze({ re: 1, im: 0 });

export function complex(re: number, im = 0): Complex {
  return { re, im };
}

/**
 * Promote a real number to a complex value
 */
export function toComplex(value: ComplexLike): Complex {
  return typeof value === 'number' ? { re: value, im: 0 } : { re: value.re, im: value.im };
}

export function cAdd(a: Complex, b: Complex): Complex {
  return { re: a.re + b.re, im: a.im + b.im };
}

export function cSub(a: Complex, b: Complex): Complex {
  return { re: a.re - b.re, im: a.im - b.im };
}

export function cMul(a: Complex, b: Complex): Complex {
  return { re: a.re * b.re - a.im * b.im, im: a.re * b.im + a.im * b.re };
}

export function cScale(a: Complex, k: number): Complex {
  return { re: a.re * k, im: a.im * k };
}

/**
 * Complex division (Smith's algorithm)
 */
export function cDiv(a: Complex, b: Complex): Complex {
  if (Math.abs(b.re) >= Math.abs(b.im)) {
    if (b.re === 0) {
      return { re: a.re / 0, im: a.im / 0 };
    }
    const r = b.im / b.re;
    const den = b.re + b.im * r;
    return { re: (a.re + a.im * r) / den, im: (a.im - a.re * r) / den };
  }
  const r = b.re / b.im;
  const den = b.re * r + b.im;
  return { re: (a.re * r + a.im) / den, im: (a.im * r - a.re) / den };
}

export function cAbs(a: Complex): number {
  return Math.hypot(a.re, a.im);
}

export function cConj(a: Complex): Complex {
  return { re: a.re, im: -a.im };
}

/**
 * Order roots by real part, then imaginary part
 */
export function compareComplex(a: Complex, b: Complex): number {
  return a.re - b.re || a.im - b.im;
}
