/**
 * Dense matrix helpers
 *
 * Small row-major `number[][]` matrices sized by the realization order.
 * Only the operations the integrator needs.
 */

export type Matrix = number[][];

export function zeros(rows: number, cols: number): Matrix {
  return Array.from({ length: rows }, () => new Array<number>(cols).fill(0));
}

export function identity(n: number): Matrix {
  const m = zeros(n, n);
  for (let i = 0; i < n; i++) {
    m[i][i] = 1;
  }
  return m;
}

/**
 * C = A · B
 */
export function matMul(a: Matrix, b: Matrix): Matrix {
  const rows = a.length;
  const inner = b.length;
  const cols = inner === 0 ? 0 : b[0].length;
  const c = zeros(rows, cols);
  for (let i = 0; i < rows; i++) {
    for (let k = 0; k < inner; k++) {
      const aik = a[i][k];
      if (aik === 0) continue;
      for (let j = 0; j < cols; j++) {
        c[i][j] += aik * b[k][j];
      }
    }
  }
  return c;
}

/**
 * y = A · x
 */
export function matVec(a: Matrix, x: readonly number[]): number[] {
  return a.map((row) => row.reduce((acc, v, j) => acc + v * x[j], 0));
}

export function matAdd(a: Matrix, b: Matrix): Matrix {
  return a.map((row, i) => row.map((v, j) => v + b[i][j]));
}

export function matScale(a: Matrix, k: number): Matrix {
  return a.map((row) => row.map((v) => v * k));
}

/**
 * Infinity norm (max absolute row sum)
 */
export function normInf(a: Matrix): number {
  return a.reduce((max, row) => Math.max(max, row.reduce((s, v) => s + Math.abs(v), 0)), 0);
}

/**
 * Solve A · X = B by Gaussian elimination with partial pivoting.
 *
 * @returns X, or null when A is numerically singular
 */
export function solve(a: Matrix, b: Matrix): Matrix | null {
  const n = a.length;
  const cols = b.length === 0 ? 0 : b[0].length;
  const m = a.map((row) => [...row]);
  const x = b.map((row) => [...row]);

  for (let i = 0; i < n; i++) {
    let pivotRow = i;
    for (let k = i + 1; k < n; k++) {
      if (Math.abs(m[k][i]) > Math.abs(m[pivotRow][i])) {
        pivotRow = k;
      }
    }
    if (Math.abs(m[pivotRow][i]) < 1e-300) {
      return null;
    }
    [m[i], m[pivotRow]] = [m[pivotRow], m[i]];
    [x[i], x[pivotRow]] = [x[pivotRow], x[i]];

    for (let k = i + 1; k < n; k++) {
      const factor = m[k][i] / m[i][i];
      if (factor === 0) continue;
      for (let j = i; j < n; j++) {
        m[k][j] -= factor * m[i][j];
      }
      for (let j = 0; j < cols; j++) {
        x[k][j] -= factor * x[i][j];
      }
    }
  }

  for (let i = n - 1; i >= 0; i--) {
    for (let j = 0; j < cols; j++) {
      let sum = x[i][j];
      for (let k = i + 1; k < n; k++) {
        sum -= m[i][k] * x[k][j];
      }
      x[i][j] = sum / m[i][i];
    }
  }
  return x;
}

const PADE_ORDER = 6;

/**
 * Matrix exponential by scaling and squaring with a diagonal Padé
 * approximant of order 6.
 *
 * @throws Error when the Padé denominator is singular (non-finite input)
 */
export function expm(a: Matrix): Matrix {
  const n = a.length;
  if (n === 0) {
    return [];
  }

  const norm = normInf(a);
  if (!Number.isFinite(norm)) {
    throw new Error('Matrix exponential failed: non-finite input');
  }
  const squarings = norm > 0 ? Math.max(0, 1 + Math.floor(Math.log2(norm))) : 0;
  const scaled = matScale(a, 1 / 2 ** squarings);

  let x = identity(n);
  let num = identity(n);
  let den = identity(n);
  let c = 1;
  for (let k = 1; k <= PADE_ORDER; k++) {
    c = (c * (PADE_ORDER - k + 1)) / ((2 * PADE_ORDER - k + 1) * k);
    x = matMul(scaled, x);
    num = matAdd(num, matScale(x, c));
    den = matAdd(den, matScale(x, k % 2 === 0 ? c : -c));
  }

  let result = solve(den, num);
  if (!result) {
    throw new Error('Matrix exponential failed: singular Padé denominator');
  }
  for (let k = 0; k < squarings; k++) {
    result = matMul(result, result);
  }
  return result;
}
