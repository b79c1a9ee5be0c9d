/**
 * Immutable counts matrix, sample design and the model matrix derived from it.
 *
 * Everything here is validated once at construction and frozen; downstream
 * stages are pure functions of a CountModel and never mutate it.
 */
import { ConfigurationError } from '../errors';

// ── Counts ───────────────────────────────────────────────────────────────────

export interface CountMatrix {
  readonly genes: readonly string[];
  readonly samples: readonly string[];
  readonly nGenes: number;
  readonly nSamples: number;
  /** Copy of the row-major genes × samples counts. */
  values(): Float64Array;
  /** Copy of one gene's counts. */
  row(g: number): Float64Array;
}

/** Build a validated counts matrix from one row of counts per gene. */
export function createCountMatrix(
  genes: readonly string[],
  samples: readonly string[],
  rows: readonly (readonly number[])[],
): CountMatrix {
  assertUnique(genes, 'gene', 'DUPLICATE_GENE');
  assertUnique(samples, 'sample', 'DUPLICATE_SAMPLE');
  if (rows.length !== genes.length) {
    throw new ConfigurationError(
      `Expected ${genes.length} count rows, got ${rows.length}`,
      'SHAPE_MISMATCH',
    );
  }

  const nGenes = genes.length;
  const nSamples = samples.length;
  const values = new Float64Array(nGenes * nSamples);
  for (let g = 0; g < nGenes; g++) {
    const row = rows[g]!;
    if (row.length !== nSamples) {
      throw new ConfigurationError(
        `Gene '${genes[g]}' has ${row.length} counts for ${nSamples} samples`,
        'SHAPE_MISMATCH',
      );
    }
    for (let j = 0; j < nSamples; j++) {
      const v = row[j]!;
      if (!Number.isInteger(v) || v < 0) {
        throw new ConfigurationError(
          `Count for gene '${genes[g]}' in sample '${samples[j]}' is not a non-negative integer: ${v}`,
          'INVALID_COUNT',
        );
      }
      values[g * nSamples + j] = v;
    }
  }

  return Object.freeze({
    genes: Object.freeze([...genes]),
    samples: Object.freeze([...samples]),
    nGenes,
    nSamples,
    values: () => values.slice(),
    row: (g: number) => values.slice(g * nSamples, (g + 1) * nSamples),
  });
}

/** One gene's counts. */
export function geneCounts(counts: CountMatrix, g: number): Float64Array {
  return counts.row(g);
}

function assertUnique(ids: readonly string[], what: string, code: 'DUPLICATE_GENE' | 'DUPLICATE_SAMPLE'): void {
  const seen = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) {
      throw new ConfigurationError(`Duplicate ${what} identifier '${id}'`, code);
    }
    seen.add(id);
  }
}

// ── Design ───────────────────────────────────────────────────────────────────

export interface SampleAssignment {
  sample: string;
  condition: string;
}

export interface Design {
  readonly samples: readonly string[];
  /** Condition levels, reference first, then in order of first appearance. */
  readonly levels: readonly string[];
  readonly reference: string;
  /** Per-sample index into `levels`. */
  readonly levelIndex: readonly number[];
}

/**
 * Build the condition factor with an explicit baseline level.
 */
export function createDesign(assignments: readonly SampleAssignment[], reference: string): Design {
  assertUnique(assignments.map(a => a.sample), 'sample', 'DUPLICATE_SAMPLE');

  const observed: string[] = [];
  for (const { condition } of assignments) {
    if (!observed.includes(condition)) observed.push(condition);
  }
  if (!observed.includes(reference)) {
    throw new ConfigurationError(
      `Reference level '${reference}' is not among the observed conditions`,
      'UNKNOWN_REFERENCE',
      `observed: ${observed.join(', ')}`,
    );
  }
  const levels = [reference, ...observed.filter(l => l !== reference)];

  return Object.freeze({
    samples: Object.freeze(assignments.map(a => a.sample)),
    levels: Object.freeze(levels),
    reference,
    levelIndex: Object.freeze(assignments.map(a => levels.indexOf(a.condition))),
  });
}

/** Condition label of each sample. */
export function sampleConditions(design: Design): string[] {
  return design.levelIndex.map(i => design.levels[i]!);
}

// ── Model ────────────────────────────────────────────────────────────────────

export interface CountModel {
  readonly counts: CountMatrix;
  /** Design with samples in the same order as the matrix columns. */
  readonly design: Design;
}

/**
 * Pair a counts matrix with a design. The design is reordered to follow the
 * matrix columns; every matrix sample must be in the design and vice versa.
 */
export function createCountModel(counts: CountMatrix, design: Design): CountModel {
  const missing = counts.samples.filter(s => !design.samples.includes(s));
  const extra = design.samples.filter(s => !counts.samples.includes(s));
  if (missing.length > 0 || extra.length > 0) {
    const parts: string[] = [];
    if (missing.length > 0) parts.push(`not in design: ${missing.join(', ')}`);
    if (extra.length > 0) parts.push(`not in matrix: ${extra.join(', ')}`);
    throw new ConfigurationError('Design samples do not match matrix columns', 'SAMPLE_MISMATCH', parts.join('; '));
  }
  if (counts.nGenes === 0 || counts.values().every(v => v === 0)) {
    throw new ConfigurationError('Count matrix has no non-zero counts', 'ALL_ZERO');
  }

  const levelIndex = counts.samples.map(s => design.levelIndex[design.samples.indexOf(s)]!);
  const ordered: Design = Object.freeze({
    samples: counts.samples,
    levels: design.levels,
    reference: design.reference,
    levelIndex: Object.freeze(levelIndex),
  });
  return Object.freeze({ counts, design: ordered });
}

// ── Model matrix ─────────────────────────────────────────────────────────────

export interface DesignMatrix {
  readonly nrow: number;
  readonly ncol: number;
  /** Row-major nrow × ncol. */
  readonly data: Float64Array;
  readonly columns: readonly string[];
}

/** Intercept plus one indicator column per non-reference level. */
export function modelMatrix(design: Design): DesignMatrix {
  const n = design.samples.length;
  const p = design.levels.length;
  const data = new Float64Array(n * p);
  for (let i = 0; i < n; i++) {
    data[i * p] = 1;
    const lvl = design.levelIndex[i]!;
    if (lvl > 0) data[i * p + lvl] = 1;
  }
  const columns = ['Intercept', ...design.levels.slice(1).map(l => `condition_${l}_vs_${design.reference}`)];
  return { nrow: n, ncol: p, data, columns };
}

/** Intercept-only design, used for blind dispersion estimation. */
export function interceptMatrix(n: number): DesignMatrix {
  return { nrow: n, ncol: 1, data: new Float64Array(n).fill(1), columns: ['Intercept'] };
}
