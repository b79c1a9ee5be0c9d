/**
 * Dense linear algebra for the small systems that appear per gene
 * (p × p normal equations) and per experiment (n × n sample cross-products).
 * Matrices are row-major Float64Arrays.
 */

/** Lower-triangular Cholesky factor of a symmetric positive-definite matrix, or null. */
export function cholesky(a: Float64Array, p: number): Float64Array | null {
  const l = new Float64Array(p * p);
  for (let i = 0; i < p; i++) {
    for (let j = 0; j <= i; j++) {
      let s = a[i * p + j]!;
      for (let k = 0; k < j; k++) s -= l[i * p + k]! * l[j * p + k]!;
      if (i === j) {
        if (!(s > 0)) return null;
        l[i * p + i] = Math.sqrt(s);
      } else {
        l[i * p + j] = s / l[j * p + j]!;
      }
    }
  }
  return l;
}

/** Solve L Lᵀ x = b given the Cholesky factor L. */
export function choleskySolve(l: Float64Array, p: number, b: ArrayLike<number>): Float64Array {
  const y = new Float64Array(p);
  for (let i = 0; i < p; i++) {
    let s = b[i]!;
    for (let k = 0; k < i; k++) s -= l[i * p + k]! * y[k]!;
    y[i] = s / l[i * p + i]!;
  }
  const x = new Float64Array(p);
  for (let i = p - 1; i >= 0; i--) {
    let s = y[i]!;
    for (let k = i + 1; k < p; k++) s -= l[k * p + i]! * x[k]!;
    x[i] = s / l[i * p + i]!;
  }
  return x;
}

/** Inverse of an SPD matrix from its Cholesky factor. */
export function choleskyInverse(l: Float64Array, p: number): Float64Array {
  const inv = new Float64Array(p * p);
  const e = new Float64Array(p);
  for (let j = 0; j < p; j++) {
    e.fill(0);
    e[j] = 1;
    const col = choleskySolve(l, p, e);
    for (let i = 0; i < p; i++) inv[i * p + j] = col[i]!;
  }
  return inv;
}

/** log det(A) = 2 Σ log L_ii. */
export function logDetFromCholesky(l: Float64Array, p: number): number {
  let s = 0;
  for (let i = 0; i < p; i++) s += Math.log(l[i * p + i]!);
  return 2 * s;
}

/**
 * XᵀWX (+ diag(ridge)) for an n × p design and per-row weights.
 */
export function crossProduct(
  x: Float64Array,
  n: number,
  p: number,
  w: ArrayLike<number>,
  ridge?: ArrayLike<number>,
): Float64Array {
  const out = new Float64Array(p * p);
  for (let r = 0; r < n; r++) {
    const wr = w[r]!;
    if (wr === 0) continue;
    for (let i = 0; i < p; i++) {
      const xi = x[r * p + i]!;
      if (xi === 0) continue;
      for (let j = 0; j <= i; j++) {
        out[i * p + j]! += wr * xi * x[r * p + j]!;
      }
    }
  }
  for (let i = 0; i < p; i++) {
    if (ridge) out[i * p + i]! += ridge[i]!;
    for (let j = 0; j < i; j++) out[j * p + i] = out[i * p + j]!;
  }
  return out;
}

export interface EigenDecomposition {
  /** Eigenvalues, descending. */
  values: Float64Array;
  /** Eigenvectors as columns (row-major n × n), matching `values`. */
  vectors: Float64Array;
  sweeps: number;
  converged: boolean;
}

/**
 * Cyclic Jacobi eigendecomposition of a symmetric matrix.
 * Eigenpairs are returned in descending eigenvalue order; equal eigenvalues
 * keep the order in which the rotation left them.
 */
export function symmetricEigen(a: Float64Array, n: number, maxSweeps = 100): EigenDecomposition {
  const m = Float64Array.from(a);
  const v = new Float64Array(n * n);
  for (let i = 0; i < n; i++) v[i * n + i] = 1;

  let scale = 0;
  for (let i = 0; i < n * n; i++) scale += m[i]! * m[i]!;
  const eps = 1e-22 * Math.max(scale, 1e-300);

  let sweeps = 0;
  let converged = false;
  for (; sweeps < maxSweeps; sweeps++) {
    let off = 0;
    for (let i = 0; i < n; i++) {
      for (let j = i + 1; j < n; j++) off += m[i * n + j]! ** 2;
    }
    if (off <= eps) { converged = true; break; }

    for (let p = 0; p < n - 1; p++) {
      for (let q = p + 1; q < n; q++) {
        const apq = m[p * n + q]!;
        if (apq === 0) continue;
        const app = m[p * n + p]!;
        const aqq = m[q * n + q]!;
        const theta = (aqq - app) / (2 * apq);
        const t = Math.sign(theta || 1) / (Math.abs(theta) + Math.sqrt(theta * theta + 1));
        const c = 1 / Math.sqrt(t * t + 1);
        const s = t * c;

        for (let k = 0; k < n; k++) {
          const mkp = m[k * n + p]!;
          const mkq = m[k * n + q]!;
          m[k * n + p] = c * mkp - s * mkq;
          m[k * n + q] = s * mkp + c * mkq;
        }
        for (let k = 0; k < n; k++) {
          const mpk = m[p * n + k]!;
          const mqk = m[q * n + k]!;
          m[p * n + k] = c * mpk - s * mqk;
          m[q * n + k] = s * mpk + c * mqk;
        }
        for (let k = 0; k < n; k++) {
          const vkp = v[k * n + p]!;
          const vkq = v[k * n + q]!;
          v[k * n + p] = c * vkp - s * vkq;
          v[k * n + q] = s * vkp + c * vkq;
        }
      }
    }
  }

  const order = Array.from({ length: n }, (_, i) => i)
    .sort((x, y) => m[y * n + y]! - m[x * n + x]!);
  const values = new Float64Array(n);
  const vectors = new Float64Array(n * n);
  order.forEach((src, dst) => {
    values[dst] = m[src * n + src]!;
    for (let k = 0; k < n; k++) vectors[k * n + dst] = v[k * n + src]!;
  });
  return { values, vectors, sweeps, converged };
}
