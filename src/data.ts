/**
 * Tabular input and output: count tables and sample sheets in, result
 * tables out (Papa Parse).
 */
import Papa from 'papaparse';
import { ParseError } from './errors';
import type { CountMatrix, SampleAssignment } from './analysis/count-model';
import { createCountMatrix } from './analysis/count-model';
import type { FitResult } from './analysis/glm';
import type { PcaProjection } from './analysis/pca';
import type { TransformedMatrix } from './analysis/transform';

export interface ParsedTable {
  headers: string[];
  rows: string[][];
}

/** Parse CSV/TSV text; the delimiter is detected from the content. */
export function parseDelimited(text: string): ParsedTable {
  const result = Papa.parse<string[]>(text.trim(), {
    header: false,
    skipEmptyLines: true,
    dynamicTyping: false,
  });
  // A single-column table has no delimiter to detect; that is not an error.
  const errors = result.errors.filter(e => e.code !== 'UndetectableDelimiter');
  const first = errors[0];
  if (first) {
    throw new ParseError(first.message, first.row !== undefined ? first.row + 1 : undefined);
  }

  const raw = result.data;
  if (raw.length < 2) {
    throw new ParseError('Table has fewer than 2 rows');
  }
  const headers = raw[0]!.map(h => String(h).trim());
  const rows = raw.slice(1).map(row => row.map(c => String(c).trim()));
  return { headers, rows };
}

// ── Count tables ─────────────────────────────────────────────────────────────

export interface CountTableOptions {
  /** Annotation columns to ignore (e.g. gene length or chromosome). */
  dropColumns?: string[];
}

/**
 * Parse a genes × samples count table. The first column holds gene
 * identifiers; the header row names the samples.
 */
export function parseCountTable(text: string, options: CountTableOptions = {}): CountMatrix {
  const { headers, rows } = parseDelimited(text);
  const drop = new Set(options.dropColumns ?? []);
  const keep: number[] = [];
  for (let i = 1; i < headers.length; i++) {
    if (!drop.has(headers[i]!)) keep.push(i);
  }
  if (keep.length === 0) {
    throw new ParseError('Count table has no sample columns', 1);
  }

  const genes: string[] = [];
  const values: number[][] = [];
  rows.forEach((row, r) => {
    const line = r + 2;
    if (row.length !== headers.length) {
      throw new ParseError(`Expected ${headers.length} fields, found ${row.length}`, line);
    }
    const gene = row[0]!;
    if (!gene) throw new ParseError('Missing gene identifier', line);
    genes.push(gene);
    values.push(keep.map(i => {
      const cell = row[i]!;
      const v = Number(cell);
      if (cell === '' || Number.isNaN(v)) {
        throw new ParseError(`Non-numeric count '${cell}' for gene '${gene}' in column '${headers[i]}'`, line);
      }
      return v;
    }));
  });

  return createCountMatrix(genes, keep.map(i => headers[i]!), values);
}

// ── Sample sheets ────────────────────────────────────────────────────────────

const SAMPLE_PATTERNS = /^(sample|samples|sample_?id|sample_?name|id|name|run|library|column)$/i;
const CONDITION_PATTERNS = /^(condition|group|treatment|status|class|phenotype|genotype|type)$/i;

/**
 * Guess which columns hold the sample name and the condition from header
 * names, falling back to the first two columns.
 */
export function guessSampleSheetColumns(headers: string[]): { sampleCol: number; conditionCol: number } {
  let sampleCol = -1, conditionCol = -1;
  for (let i = 0; i < headers.length; i++) {
    const h = headers[i]!;
    if (sampleCol === -1 && SAMPLE_PATTERNS.test(h)) sampleCol = i;
    else if (conditionCol === -1 && CONDITION_PATTERNS.test(h)) conditionCol = i;
  }
  if (sampleCol === -1) sampleCol = conditionCol === 0 ? 1 : 0;
  if (conditionCol === -1) {
    conditionCol = headers.findIndex((_, i) => i !== sampleCol);
  }
  return { sampleCol, conditionCol };
}

export interface SampleSheetOptions {
  sampleColumn?: string;
  conditionColumn?: string;
}

function columnIndex(headers: string[], name: string): number {
  const idx = headers.indexOf(name);
  if (idx < 0) {
    throw new ParseError(`Column '${name}' not found; available: ${headers.join(', ')}`, 1);
  }
  return idx;
}

/** Parse a sample sheet into one condition assignment per sample. */
export function parseSampleSheet(text: string, options: SampleSheetOptions = {}): SampleAssignment[] {
  const { headers, rows } = parseDelimited(text);
  if (headers.length < 2) {
    throw new ParseError('Sample sheet needs a sample column and a condition column', 1);
  }
  const guess = guessSampleSheetColumns(headers);
  const sampleCol = options.sampleColumn !== undefined ? columnIndex(headers, options.sampleColumn) : guess.sampleCol;
  const conditionCol = options.conditionColumn !== undefined
    ? columnIndex(headers, options.conditionColumn)
    : guess.conditionCol;

  return rows.map((row, r) => {
    const sample = row[sampleCol] ?? '';
    const condition = row[conditionCol] ?? '';
    if (!sample || !condition) {
      throw new ParseError('Empty sample name or condition', r + 2);
    }
    return { sample, condition };
  });
}

// ── Export ───────────────────────────────────────────────────────────────────

/** Missing and non-finite values are written as NA. */
function cell(v: number | null): string {
  return v === null || !Number.isFinite(v) ? 'NA' : String(v);
}

/** CSV of the per-gene results. */
export function formatResultsTable(results: readonly FitResult[]): string {
  return Papa.unparse({
    fields: [
      'gene', 'baseMean', 'log2FoldChange', 'lfcSE', 'statistic', 'pvalue', 'padj', 'status', 'dispersionOutlier',
    ],
    data: results.map(r => [
      r.gene, cell(r.baseMean), cell(r.log2FoldChange), cell(r.lfcSE),
      cell(r.statistic), cell(r.pvalue), cell(r.padj), r.status, r.dispersionOutlier ? 'TRUE' : 'FALSE',
    ]),
  }, { newline: '\n' });
}

/** CSV of a transformed genes × samples matrix. */
export function formatMatrix(matrix: TransformedMatrix): string {
  const n = matrix.samples.length;
  return Papa.unparse({
    fields: ['gene', ...matrix.samples],
    data: matrix.genes.map((gene, g) => [
      gene,
      ...Array.from(matrix.values.subarray(g * n, (g + 1) * n), v => cell(v)),
    ]),
  }, { newline: '\n' });
}

/** CSV of sample coordinates on the principal components. */
export function formatPca(pca: PcaProjection): string {
  const k = pca.explainedVariance.length;
  const pcs = Array.from({ length: k }, (_, c) => `PC${c + 1}`);
  return Papa.unparse({
    fields: ['sample', 'group', ...pcs],
    data: pca.samples.map(s => [s.sample, s.group ?? 'NA', ...s.coordinates.map(v => cell(v))]),
  }, { newline: '\n' });
}
