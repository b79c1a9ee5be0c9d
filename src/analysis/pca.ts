/**
 * Principal component projection of samples from a transformed matrix.
 */
import { symmetricEigen } from './linalg';

export interface PcaInput {
  genes: readonly string[];
  samples: readonly string[];
  /** Row-major genes × samples. */
  values: Float64Array;
}

export interface PcaOptions {
  /** Number of highest-variance genes to keep (default 500). */
  ntop?: number;
  /** Number of components to report (default 2). */
  components?: number;
  /** Scale genes to unit variance after centering. */
  scale?: boolean;
  /** Optional per-sample group labels carried into the output. */
  groups?: readonly string[];
}

export interface PcaSample {
  sample: string;
  group: string | null;
  coordinates: number[];
}

export interface PcaProjection {
  samples: PcaSample[];
  /** Fraction of total variance per reported component. */
  explainedVariance: number[];
  genesUsed: string[];
  /** True when the input carries (near) zero variance. */
  degenerate: boolean;
  converged: boolean;
}

function rowVariances(values: Float64Array, nGenes: number, n: number): Float64Array {
  const out = new Float64Array(nGenes);
  for (let g = 0; g < nGenes; g++) {
    let s = 0;
    for (let j = 0; j < n; j++) s += values[g * n + j]!;
    const m = s / n;
    let ss = 0;
    for (let j = 0; j < n; j++) ss += (values[g * n + j]! - m) ** 2;
    out[g] = n > 1 ? ss / (n - 1) : 0;
  }
  return out;
}

/**
 * Project samples onto the leading principal components.
 * Equivalent to an SVD of the centered samples × genes matrix, computed from
 * the eigenvectors of the samples × samples cross-product.
 */
export function projectPca(input: PcaInput, options: PcaOptions = {}): PcaProjection {
  const { ntop = 500, components = 2, scale = false, groups } = options;
  const nGenes = input.genes.length;
  const n = input.samples.length;
  const k = Math.max(0, Math.min(components, n));

  const vars = rowVariances(input.values, nGenes, n);
  const selected = Array.from({ length: nGenes }, (_, g) => g)
    .sort((a, b) => vars[b]! - vars[a]!)
    .slice(0, Math.min(ntop, nGenes));

  // Centered (and optionally scaled) rows of the selected genes.
  const rows = selected.map(g => {
    const row = input.values.slice(g * n, (g + 1) * n);
    const m = row.reduce((s, v) => s + v, 0) / n;
    const sd = Math.sqrt(vars[g]!);
    return row.map(v => (scale ? (sd > 0 ? (v - m) / sd : 0) : v - m));
  });

  const gram = new Float64Array(n * n);
  for (const row of rows) {
    for (let i = 0; i < n; i++) {
      for (let j = 0; j <= i; j++) gram[i * n + j]! += row[i]! * row[j]!;
    }
  }
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < i; j++) gram[j * n + i] = gram[i * n + j]!;
  }

  const eig = symmetricEigen(gram, n);
  const lambdas = Array.from(eig.values, v => Math.max(v, 0));
  const total = lambdas.reduce((s, v) => s + v, 0);
  const degenerate = !(total > 1e-12);

  const coords = Array.from({ length: n }, () => new Array<number>(k).fill(0));
  for (let c = 0; c < k; c++) {
    const sv = Math.sqrt(lambdas[c]!);
    let pivot = 0;
    for (let i = 0; i < n; i++) {
      if (Math.abs(eig.vectors[i * n + c]!) > Math.abs(eig.vectors[pivot * n + c]!)) pivot = i;
    }
    const sign = eig.vectors[pivot * n + c]! < 0 ? -1 : 1;
    for (let i = 0; i < n; i++) coords[i]![c] = degenerate ? 0 : sign * eig.vectors[i * n + c]! * sv;
  }

  return {
    samples: input.samples.map((sample, i) => ({
      sample,
      group: groups?.[i] ?? null,
      coordinates: coords[i]!,
    })),
    explainedVariance: lambdas.slice(0, k).map(v => (degenerate ? 0 : v / total)),
    genesUsed: selected.map(g => input.genes[g]!),
    degenerate,
    converged: eig.converged,
  };
}
