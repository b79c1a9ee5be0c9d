import { describe, it, expect } from 'vitest';
import type { FitResult } from '../analysis/glm';
import { adjustPValuesBH, independentFiltering, correctMultipleTesting } from '../analysis/multiple-testing';

describe('adjustPValuesBH', () => {
  it('adjusts and keeps the input order', () => {
    const adj = adjustPValuesBH([0.01, 0.04, 0.03, 0.005]);
    [0.02, 0.04, 0.04, 0.02].forEach((v, i) => expect(adj[i]).toBeCloseTo(v, 12));
  });

  it('passes nulls through and counts only tested values', () => {
    const adj = adjustPValuesBH([0.01, null, 0.04]);
    expect(adj[1]).toBeNull();
    expect(adj[0]).toBeCloseTo(0.02, 12);
    expect(adj[2]).toBeCloseTo(0.04, 12);
  });

  it('caps at 1', () => {
    expect(adjustPValuesBH([0.9, 0.8])).toEqual([0.9, 0.9]);
    expect(adjustPValuesBH([1, 1])).toEqual([1, 1]);
  });

  it('is never below the raw p-value and monotone in it', () => {
    const p = [0.2, 0.001, 0.05, 0.5, 0.03, 0.7, 0.0004];
    const adj = adjustPValuesBH(p);
    const order = p.map((_, i) => i).sort((a, b) => p[a]! - p[b]!);
    for (let k = 0; k < order.length; k++) {
      const i = order[k]!;
      expect(adj[i]!).toBeGreaterThanOrEqual(p[i]!);
      if (k > 0) expect(adj[i]!).toBeGreaterThanOrEqual(adj[order[k - 1]!]!);
    }
  });

  it('keeps the largest p-value unchanged despite rounding in p·m/m', () => {
    for (let k = 1; k < 1000; k++) {
      const top = 1 - (k * 1e-6) / 7;
      const adj = adjustPValuesBH([0.001, 0.002, top]);
      expect(adj[2]).toBe(top);
    }
  });

  it('handles all-null input', () => {
    expect(adjustPValuesBH([null, null])).toEqual([null, null]);
  });
});

// Means 1..20: the ten lowest have p = 0.9, the ten highest p = 0.03.
const MEANS = Array.from({ length: 20 }, (_, i) => i + 1);
const PVALUES = MEANS.map(m => (m > 10 ? 0.03 : 0.9));

describe('independentFiltering', () => {
  it('removes low-mean genes when that gains rejections', () => {
    const res = independentFiltering(MEANS, PVALUES, { alpha: 0.05 });
    expect(res.theta).toBeCloseTo((0.95 * 9) / 49, 12);
    expect(res.cutoff).toBeCloseTo(1 + 19 * ((0.95 * 9) / 49), 10);
    expect(res.filtered).toEqual(MEANS.map(m => m <= 4));
    expect(res.padj.slice(0, 4)).toEqual([null, null, null, null]);
    res.padj.slice(4, 10).forEach(q => expect(q).toBeCloseTo(0.9, 12));
    res.padj.slice(10).forEach(q => expect(q).toBeCloseTo(0.048, 12));
  });

  it('records the rejection curve', () => {
    const res = independentFiltering(MEANS, PVALUES, { alpha: 0.05 });
    expect(res.curve).toHaveLength(50);
    expect(res.curve[0]).toEqual({ theta: 0, cutoff: 1, rejections: 0 });
    expect(res.curve[8]?.rejections).toBe(0);
    expect(res.curve[9]?.rejections).toBe(10);
  });

  it('prefers the lowest cutoff on ties', () => {
    const pv = MEANS.map(m => (m > 10 ? 0.004 : 0.9));
    const res = independentFiltering(MEANS, pv, { alpha: 0.05 });
    expect(res.theta).toBe(0);
    expect(res.cutoff).toBe(1);
    expect(res.filtered.every(f => !f)).toBe(true);
  });

  it('starts the grid at the fraction of zero means', () => {
    const means = [0, 0, 0, 0, 5, 6, 7, 8];
    const res = independentFiltering(means, means.map(() => 0.5), { alpha: 0.05 });
    expect(res.curve[0]?.theta).toBe(0.5);
  });

  it('leaves untested genes null', () => {
    const res = independentFiltering([5, 6, 7], [null, 0.01, 0.02], { alpha: 0.05 });
    expect(res.padj[0]).toBeNull();
  });
});

function row(gene: string, baseMean: number, pvalue: number | null, status: FitResult['status'] = 'ok'): FitResult {
  return {
    gene,
    baseMean,
    log2FoldChange: pvalue === null ? null : 1,
    lfcSE: pvalue === null ? null : 0.5,
    statistic: pvalue === null ? null : 2,
    pvalue,
    padj: null,
    status,
    dispersionOutlier: false,
  };
}

describe('correctMultipleTesting', () => {
  const results = MEANS.map((m, i) => row(`g${i + 1}`, m, PVALUES[i]!));

  it('without filtering adjusts every p-value', () => {
    const { results: out, filtering } = correctMultipleTesting(results, { alpha: 0.05, independentFiltering: false });
    expect(filtering).toBeNull();
    expect(out.every(r => r.padj !== null)).toBe(true);
    expect(out.every(r => r.status === 'ok')).toBe(true);
  });

  it('with filtering marks removed genes', () => {
    const { results: out, filtering } = correctMultipleTesting(results, { alpha: 0.05, independentFiltering: true });
    expect(filtering?.cutoff).toBeGreaterThan(4);
    expect(out.filter(r => r.status === 'filtered').map(r => r.gene)).toEqual(['g1', 'g2', 'g3', 'g4']);
    out.filter(r => r.status === 'filtered').forEach(r => expect(r.padj).toBeNull());
  });

  it('filtering never adds adjusted p-values', () => {
    const on = correctMultipleTesting(results, { alpha: 0.05, independentFiltering: true }).results;
    const off = correctMultipleTesting(results, { alpha: 0.05, independentFiltering: false }).results;
    const count = (rs: FitResult[]) => rs.filter(r => r.padj !== null).length;
    expect(count(on)).toBeLessThanOrEqual(count(off));
  });

  it('keeps the status of rows without a p-value', () => {
    const mixed = [row('z', 0, null, 'allZero'), row('n', 3, null, 'notConverged'), ...results];
    const { results: out } = correctMultipleTesting(mixed, { alpha: 0.05, independentFiltering: true });
    expect(out[0]?.status).toBe('allZero');
    expect(out[1]?.status).toBe('notConverged');
    expect(out[0]?.padj).toBeNull();
  });
});
