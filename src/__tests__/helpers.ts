/**
 * Shared test helpers and fixtures for count-de tests.
 */
import type { CountModel, SampleAssignment } from '../analysis/count-model';
import { createCountMatrix, createCountModel, createDesign } from '../analysis/count-model';

/** Linear congruential generator in [0, 1); same seed, same sequence. */
export function lcg(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0;
    return s / 4294967296;
  };
}

/** Approximate standard normal from twelve uniforms. */
function normal(rand: () => number): number {
  let s = 0;
  for (let i = 0; i < 12; i++) s += rand();
  return s - 6;
}

function poisson(rand: () => number, lambda: number): number {
  if (lambda > 50) return Math.max(0, Math.round(lambda + Math.sqrt(lambda) * normal(rand)));
  const limit = Math.exp(-lambda);
  let k = 0;
  let p = rand();
  while (p > limit) { k++; p *= rand(); }
  return k;
}

export interface SimulationOptions {
  nGenes?: number;
  perGroup?: number;
  /** Number of leading genes that change between conditions. */
  nChanged?: number;
  /** Multiplicative change in the treated group. */
  foldChange?: number;
  seed?: number;
}

export interface SimulatedData {
  genes: string[];
  samples: string[];
  rows: number[][];
  assignments: SampleAssignment[];
  changed: Set<string>;
}

/**
 * Counts with dispersion 0.05 + 2/μ (Poisson over a log-normal mean), sample
 * depths varying by ±20% and the first `nChanged` genes up in 'treated'.
 */
export function simulateCounts(options: SimulationOptions = {}): SimulatedData {
  const { nGenes = 300, perGroup = 3, nChanged = 30, foldChange = 4, seed = 7 } = options;
  const rand = lcg(seed);
  const n = 2 * perGroup;
  const samples = Array.from({ length: n }, (_, j) => (j < perGroup ? `ctrl${j + 1}` : `trt${j - perGroup + 1}`));
  const depth = samples.map((_, j) => 0.8 + (0.4 * j) / (n - 1));
  const genes = Array.from({ length: nGenes }, (_, g) => `gene${String(g + 1).padStart(3, '0')}`);

  const rows = genes.map((_, g) => {
    const base = 10 ** (-0.5 + 3.8 * rand());
    return samples.map((__, j) => {
      const mu = base * depth[j]! * (g < nChanged && j >= perGroup ? foldChange : 1);
      const sigma = Math.sqrt(Math.log(1 + 0.05 + 2 / Math.max(mu, 0.01)));
      return poisson(rand, mu * Math.exp(sigma * normal(rand) - sigma * sigma / 2));
    });
  });

  return {
    genes,
    samples,
    rows,
    assignments: samples.map((sample, j) => ({ sample, condition: j < perGroup ? 'control' : 'treated' })),
    changed: new Set(genes.slice(0, nChanged)),
  };
}

/** Model with 'control' as the reference. */
export function makeModel(data: { genes: string[]; samples: string[]; rows: number[][]; assignments: SampleAssignment[] }): CountModel {
  const counts = createCountMatrix(data.genes, data.samples, data.rows);
  return createCountModel(counts, createDesign(data.assignments, 'control'));
}

export const TWO_BY_TWO_SAMPLES = ['c1', 'c2', 't1', 't2'];

export const TWO_BY_TWO_ASSIGNMENTS: SampleAssignment[] = [
  { sample: 'c1', condition: 'control' },
  { sample: 'c2', condition: 'control' },
  { sample: 't1', condition: 'treated' },
  { sample: 't2', condition: 'treated' },
];

/**
 * Gene A drops tenfold in 'treated', gene B is flat; optional flat background
 * genes pin every size factor to 1.
 */
export function foldChangeModel(background = 0): CountModel {
  const genes = ['A', 'B'];
  const rows = [[100, 100, 10, 10], [50, 50, 50, 50]];
  for (let k = 0; k < background; k++) {
    const level = 20 + 20 * k;
    genes.push(`flat${k + 1}`);
    rows.push([level, level, level, level]);
  }
  return makeModel({ genes, samples: TWO_BY_TWO_SAMPLES, rows, assignments: TWO_BY_TWO_ASSIGNMENTS });
}

