/**
 * Independent filtering on mean expression and Benjamini–Hochberg adjustment.
 */
import * as d3 from 'd3';
import type { FitResult } from './glm';

/**
 * Benjamini–Hochberg adjusted p-values. Null entries are not tested and stay
 * null; n is the number of non-null p-values.
 */
export function adjustPValuesBH(pValues: readonly (number | null)[]): (number | null)[] {
  const indexed: { p: number; i: number }[] = [];
  pValues.forEach((p, i) => { if (p !== null) indexed.push({ p, i }); });
  const m = indexed.length;
  const adjusted = new Array<number | null>(pValues.length).fill(null);
  if (m === 0) return adjusted;

  indexed.sort((a, b) => a.p - b.p || a.i - b.i);
  let minSoFar = 1;
  for (let j = m - 1; j >= 0; j--) {
    const adj = indexed[j]!.p * m / (j + 1);
    minSoFar = Math.min(minSoFar, adj);
    // p·m/rank can round below p at the largest rank
    adjusted[indexed[j]!.i] = Math.min(1, Math.max(indexed[j]!.p, minSoFar));
  }
  return adjusted;
}

export interface FilterStep {
  theta: number;
  cutoff: number;
  rejections: number;
}

export interface FilteringResult {
  padj: (number | null)[];
  /** True for genes excluded by the chosen cutoff. */
  filtered: boolean[];
  theta: number;
  cutoff: number;
  curve: FilterStep[];
}

export interface FilteringOptions {
  alpha: number;
  /** Quantiles of the filter statistic to try; defaults to 50 points up to 0.95. */
  theta?: number[];
}

function defaultTheta(filterStat: ArrayLike<number>): number[] {
  let zeros = 0;
  for (let i = 0; i < filterStat.length; i++) if (filterStat[i] === 0) zeros++;
  const lower = filterStat.length > 0 ? zeros / filterStat.length : 0;
  const upper = lower < 0.95 ? 0.95 : 1;
  const num = 50;
  return Array.from({ length: num }, (_, k) => lower + ((upper - lower) * k) / (num - 1));
}

/**
 * Choose the mean-expression cutoff that maximizes the number of BH
 * rejections at `alpha`. Ties go to the lower cutoff. Genes below the cutoff
 * get no adjusted p-value.
 */
export function independentFiltering(
  filterStat: ArrayLike<number>,
  pValues: readonly (number | null)[],
  options: FilteringOptions,
): FilteringResult {
  const { alpha } = options;
  const theta = options.theta ?? defaultTheta(filterStat);
  const sorted = Array.from(filterStat).sort((a, b) => a - b);

  let best: { step: FilterStep; padj: (number | null)[] } | null = null;
  const curve: FilterStep[] = [];
  for (const t of theta) {
    const cutoff = d3.quantileSorted(sorted, t) ?? 0;
    const padj = adjustPValuesBH(pValues.map((p, i) => (filterStat[i]! >= cutoff ? p : null)));
    const rejections = padj.reduce((s: number, q) => s + (q !== null && q < alpha ? 1 : 0), 0);
    const step = { theta: t, cutoff, rejections };
    curve.push(step);
    if (best === null || rejections > best.step.rejections) best = { step, padj };
  }

  if (best === null) {
    return { padj: adjustPValuesBH(pValues), filtered: pValues.map(() => false), theta: 0, cutoff: 0, curve };
  }
  const cutoff = best.step.cutoff;
  return {
    padj: best.padj,
    filtered: pValues.map((_, i) => filterStat[i]! < cutoff),
    theta: best.step.theta,
    cutoff,
    curve,
  };
}

export interface CorrectionOptions {
  alpha: number;
  independentFiltering: boolean;
}

export interface CorrectionSummary {
  results: FitResult[];
  filtering: FilteringResult | null;
}

/**
 * Fill in `padj` for the result rows. Rows removed by independent filtering
 * are marked `filtered`; rows without a p-value keep their status.
 */
export function correctMultipleTesting(results: readonly FitResult[], options: CorrectionOptions): CorrectionSummary {
  const pValues = results.map(r => r.pvalue);
  if (!options.independentFiltering) {
    const padj = adjustPValuesBH(pValues);
    return { results: results.map((r, i) => ({ ...r, padj: padj[i] ?? null })), filtering: null };
  }

  const filtering = independentFiltering(results.map(r => r.baseMean), pValues, { alpha: options.alpha });
  return {
    results: results.map((r, i): FitResult => ({
      ...r,
      padj: filtering.padj[i] ?? null,
      status: r.status === 'ok' && filtering.filtered[i] ? 'filtered' : r.status,
    })),
    filtering,
  };
}
