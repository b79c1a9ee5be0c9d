/**
 * Negative-binomial dispersion estimation.
 *
 * Three stages, with a barrier between the first and the rest:
 *  1. gene-wise maximum of the Cox–Reid adjusted profile likelihood
 *     (independent per gene);
 *  2. a mean–dispersion trend across all genes (parametric α = a + b/μ,
 *     local regression, or a constant);
 *  3. empirical-Bayes shrinkage of each gene towards the trend, with a
 *     log-normal prior whose width comes from the spread of the residuals.
 */
import * as d3 from 'd3';
import type { CountMatrix, DesignMatrix } from './count-model';
import { geneCounts } from './count-model';
import { fitNegativeBinomialGlm, nbLogLik } from './glm';
import { cholesky, choleskySolve, crossProduct, logDetFromCholesky } from './linalg';
import { baseMeans } from './size-factors';
import { interpolateLinear, maximizeOnInterval, trigamma } from './stats-utils';

/** Smallest dispersion considered; gene-wise estimates are bounded below by it. */
export const MIN_DISP = 1e-8;

// ── Types ────────────────────────────────────────────────────────────────────

export type DispersionTrend =
  | { kind: 'parametric'; asymptDisp: number; extraPois: number }
  | { kind: 'local'; logMean: Float64Array; logDisp: Float64Array }
  | { kind: 'constant'; value: number };

export type TrendFitType = DispersionTrend['kind'];

export interface DispersionOptions {
  fitType?: TrendFitType;
  /** Below this many usable genes the trend is replaced by a constant. */
  minGenesForTrend?: number;
  /** Residual SDs above the trend beyond which a gene keeps its raw estimate. */
  outlierSD?: number;
}

export interface DispersionResult {
  baseMean: Float64Array;
  /** Gene-wise (raw) estimates. */
  geneEstimate: Float64Array;
  /** Trend evaluated at each gene's baseMean. */
  trendValue: Float64Array;
  /** Shrunk values used for testing. */
  final: Float64Array;
  /** 1 where the gene is a dispersion outlier and kept its raw estimate. */
  outlier: Uint8Array;
  trend: DispersionTrend;
  /** True when the requested trend fit was replaced by a fallback. */
  trendFallback: boolean;
  /** Robust variance of log raw − log trend. */
  residualVar: number;
  /** Variance of the log-normal prior (NaN without residual degrees of freedom). */
  priorVar: number;
  warnings: string[];
}

export interface DispersionEstimate {
  baseMean: number;
  geneEstimate: number;
  trend: number;
  final: number;
  outlier: boolean;
}

// ── Trend evaluation ─────────────────────────────────────────────────────────

/** Trend dispersion at a mean of normalized counts. */
export function evaluateTrend(trend: DispersionTrend, mean: number): number {
  switch (trend.kind) {
    case 'parametric':
      return trend.asymptDisp + trend.extraPois / mean;
    case 'local':
      return Math.exp(interpolateLinear(trend.logMean, trend.logDisp, Math.log(mean)));
    case 'constant':
      return trend.value;
  }
}

// ── Stage 1: gene-wise ───────────────────────────────────────────────────────

/** Cox–Reid adjusted profile log-likelihood at log α, with μ held fixed. */
export function adjustedLogLik(
  logAlpha: number,
  y: ArrayLike<number>,
  mu: ArrayLike<number>,
  x: DesignMatrix,
): number {
  const alpha = Math.exp(logAlpha);
  const n = x.nrow;
  const w = new Float64Array(n);
  let ll = 0;
  for (let i = 0; i < n; i++) {
    ll += nbLogLik(y[i]!, mu[i]!, alpha);
    w[i] = mu[i]! / (1 + alpha * mu[i]!);
  }
  const l = cholesky(crossProduct(x.data, n, x.ncol, w), x.ncol);
  return l ? ll - 0.5 * logDetFromCholesky(l, x.ncol) : ll;
}

/** Coarse grid, then golden-section refinement around the best grid point. */
function maximizeLogAlpha(f: (la: number) => number, lo: number, hi: number): number {
  const gridSize = 20;
  const step = (hi - lo) / (gridSize - 1);
  let best = 0;
  let bestVal = -Infinity;
  for (let k = 0; k < gridSize; k++) {
    const v = f(lo + k * step);
    if (v > bestVal) { bestVal = v; best = k; }
  }
  const a = lo + Math.max(0, best - 1) * step;
  const b = lo + Math.min(gridSize - 1, best + 1) * step;
  const refined = maximizeOnInterval(f, a, b, 1e-6);
  return f(refined) >= bestVal ? refined : lo + best * step;
}

function momentsDispersion(y: ArrayLike<number>, sizeFactors: ArrayLike<number>, mean: number): number {
  const n = y.length;
  let ss = 0, xim = 0;
  for (let i = 0; i < n; i++) {
    ss += (y[i]! / sizeFactors[i]! - mean) ** 2;
    xim += 1 / sizeFactors[i]!;
  }
  const variance = ss / (n - 1);
  return (variance - (xim / n) * mean) / (mean * mean);
}

interface GeneWiseFit {
  alpha: number;
  /** Fitted means the final estimate was profiled at. */
  mu: Float64Array | null;
}

function geneWiseDispersion(
  y: ArrayLike<number>,
  sizeFactors: ArrayLike<number>,
  x: DesignMatrix,
  mean: number,
  maxDisp: number,
): GeneWiseFit {
  if (mean === 0) return { alpha: NaN, mu: null };
  const lo = Math.log(MIN_DISP);
  const hi = Math.log(maxDisp);

  let alpha = Math.min(maxDisp, Math.max(MIN_DISP, momentsDispersion(y, sizeFactors, mean)));
  let mu = fitNegativeBinomialGlm(y, sizeFactors, x, alpha).mu;
  for (let round = 0; round < 2; round++) {
    const fixedMu = mu;
    alpha = Math.exp(maximizeLogAlpha(la => adjustedLogLik(la, y, fixedMu, x), lo, hi));
    if (round === 0) mu = fitNegativeBinomialGlm(y, sizeFactors, x, alpha).mu;
  }
  return { alpha, mu };
}

// ── Stage 2: trend ───────────────────────────────────────────────────────────

/**
 * Gamma-family GLM with identity link: y ≈ a + b·x, weights 1/fitted².
 * Returns null when a fitted value becomes non-positive.
 */
function gammaIdentityFit(
  xs: number[],
  ys: number[],
  start: [number, number],
): { a: number; b: number; converged: boolean } | null {
  let [a, b] = start;
  let dev = Infinity;
  for (let iter = 0; iter < 25; iter++) {
    let s0 = 0, s1 = 0, s2 = 0, t0 = 0, t1 = 0;
    for (let i = 0; i < xs.length; i++) {
      const f = a + b * xs[i]!;
      if (!(f > 0)) return null;
      const w = 1 / (f * f);
      s0 += w; s1 += w * xs[i]!; s2 += w * xs[i]! * xs[i]!;
      t0 += w * ys[i]!; t1 += w * xs[i]! * ys[i]!;
    }
    const l = cholesky(Float64Array.of(s0, s1, s1, s2), 2);
    if (!l) return null;
    const coef = choleskySolve(l, 2, [t0, t1]);
    a = coef[0]!;
    b = coef[1]!;

    let devNew = 0;
    for (let i = 0; i < xs.length; i++) {
      const f = a + b * xs[i]!;
      if (!(f > 0)) return null;
      devNew += 2 * (-Math.log(ys[i]! / f) + (ys[i]! - f) / f);
    }
    if (Math.abs(devNew - dev) / (Math.abs(devNew) + 0.1) < 1e-8) return { a, b, converged: true };
    dev = devNew;
  }
  return { a, b, converged: false };
}

function parametricTrend(means: number[], disps: number[]): DispersionTrend | null {
  let a = 0.1, b = 1;
  for (let iter = 0; iter <= 10; iter++) {
    const xs: number[] = [];
    const ys: number[] = [];
    for (let i = 0; i < means.length; i++) {
      const ratio = disps[i]! / (a + b / means[i]!);
      if (ratio > 1e-4 && ratio < 15) { xs.push(1 / means[i]!); ys.push(disps[i]!); }
    }
    if (xs.length < 3) return null;

    const fit = gammaIdentityFit(xs, ys, [a, b]);
    if (!fit || !(fit.a > 0 && fit.b > 0)) return null;
    const change = Math.log(fit.a / a) ** 2 + Math.log(fit.b / b) ** 2;
    a = fit.a;
    b = fit.b;
    if (change < 1e-6 && fit.converged) return { kind: 'parametric', asymptDisp: a, extraPois: b };
  }
  return null;
}

/**
 * Tricube-weighted local linear regression of log dispersion on log mean,
 * weighted by mean, evaluated on a grid and made non-increasing.
 */
function localTrend(means: number[], disps: number[]): DispersionTrend {
  const lx = means.map(Math.log);
  const ly = disps.map(Math.log);
  const [xMin = 0, xMax = 0] = d3.extent(lx);
  const gridSize = xMax > xMin ? 50 : 1;
  const k = Math.min(lx.length, Math.max(3, Math.ceil(0.7 * lx.length)));

  const logMean = new Float64Array(gridSize);
  const logDisp = new Float64Array(gridSize);
  for (let gi = 0; gi < gridSize; gi++) {
    const x0 = gridSize === 1 ? xMin : xMin + ((xMax - xMin) * gi) / (gridSize - 1);
    const dist = lx.map(x => Math.abs(x - x0));
    // Widened slightly so the k-th neighbour keeps a non-zero weight.
    const h = Math.max([...dist].sort((p, q) => p - q)[k - 1] ?? 0, 1e-8) * 1.001;

    let sw = 0, sx = 0, sy = 0;
    const w = dist.map((d, i) => {
      const u = d / h;
      const wi = u < 1 ? (1 - u ** 3) ** 3 * means[i]! : 0;
      sw += wi; sx += wi * lx[i]!; sy += wi * ly[i]!;
      return wi;
    });
    const xBar = sx / sw;
    const yBar = sy / sw;
    let sxx = 0, sxy = 0;
    for (let i = 0; i < lx.length; i++) {
      sxx += w[i]! * (lx[i]! - xBar) ** 2;
      sxy += w[i]! * (lx[i]! - xBar) * (ly[i]! - yBar);
    }
    const slope = sxx > 1e-12 ? sxy / sxx : 0;
    logMean[gi] = x0;
    logDisp[gi] = yBar + slope * (x0 - xBar);
  }
  for (let gi = 1; gi < gridSize; gi++) {
    logDisp[gi] = Math.min(logDisp[gi]!, logDisp[gi - 1]!);
  }
  return { kind: 'local', logMean, logDisp };
}

interface TrendFit {
  trend: DispersionTrend;
  fallback: boolean;
}

/**
 * Fit the mean–dispersion trend on genes with a positive mean and a
 * gene-wise estimate clear of the lower bound.
 */
export function fitDispersionTrend(
  means: ArrayLike<number>,
  geneEstimates: ArrayLike<number>,
  fitType: TrendFitType,
  minGenes: number,
  warnings: string[],
): TrendFit {
  const m: number[] = [];
  const d: number[] = [];
  const finite: number[] = [];
  for (let g = 0; g < means.length; g++) {
    const disp = geneEstimates[g]!;
    if (!Number.isFinite(disp)) continue;
    finite.push(disp);
    if (means[g]! > 0 && disp >= 100 * MIN_DISP) { m.push(means[g]!); d.push(disp); }
  }

  if (m.length < minGenes) {
    const value = Math.max(MIN_DISP, d3.median(m.length > 0 ? d : finite) ?? MIN_DISP);
    const msg = `Only ${m.length} genes usable for the dispersion trend (need ${minGenes}); ` +
      `using a constant dispersion of ${value.toExponential(3)}`;
    console.warn(msg);
    warnings.push(msg);
    return { trend: { kind: 'constant', value }, fallback: fitType !== 'constant' };
  }

  switch (fitType) {
    case 'parametric': {
      const trend = parametricTrend(m, d);
      if (trend) return { trend, fallback: false };
      const msg = 'Parametric dispersion trend did not converge; using local regression instead';
      console.warn(msg);
      warnings.push(msg);
      return { trend: localTrend(m, d), fallback: true };
    }
    case 'local':
      return { trend: localTrend(m, d), fallback: false };
    case 'constant':
      return { trend: { kind: 'constant', value: d3.median(d) ?? MIN_DISP }, fallback: false };
  }
}

// ── Stage 3: shrinkage ───────────────────────────────────────────────────────

/** Median absolute deviation scaled to estimate a normal SD. */
function mad(values: number[]): number {
  const med = d3.median(values) ?? 0;
  return 1.4826 * (d3.median(values.map(v => Math.abs(v - med))) ?? 0);
}

/**
 * Gene-wise estimates, trend and shrunk dispersions for every gene.
 */
export function estimateDispersions(
  counts: CountMatrix,
  sizeFactors: ArrayLike<number>,
  x: DesignMatrix,
  options: DispersionOptions = {},
): DispersionResult {
  const { fitType = 'parametric', minGenesForTrend = 5, outlierSD = 2 } = options;
  const { nGenes, nSamples } = counts;
  const warnings: string[] = [];
  const means = baseMeans(counts, sizeFactors);
  const maxDisp = Math.max(10, nSamples);

  // Gene-wise estimates are independent; everything after needs all of them.
  const genewise = counts.genes.map((_, g) =>
    geneWiseDispersion(geneCounts(counts, g), sizeFactors, x, means[g]!, maxDisp));
  const geneEstimate = Float64Array.from(genewise, r => r.alpha);

  const { trend, fallback } = fitDispersionTrend(means, geneEstimate, fitType, minGenesForTrend, warnings);
  const trendValue = means.map(mean => (mean > 0 ? evaluateTrend(trend, mean) : NaN));

  const residuals: number[] = [];
  for (let g = 0; g < nGenes; g++) {
    if (means[g]! > 0 && geneEstimate[g]! >= 100 * MIN_DISP) {
      residuals.push(Math.log(geneEstimate[g]!) - Math.log(trendValue[g]!));
    }
  }
  const residualVar = residuals.length > 0 ? mad(residuals) ** 2 : 0;
  const dfResidual = nSamples - x.ncol;
  const priorVar = dfResidual > 0 ? Math.max(residualVar - trigamma(dfResidual / 2), 0.25) : NaN;
  if (dfResidual <= 0) {
    const msg = 'The design leaves no residual degrees of freedom; using trend dispersions';
    console.warn(msg);
    warnings.push(msg);
  }
  const outlierBound = outlierSD * Math.sqrt(residualVar);

  const final = new Float64Array(nGenes).fill(NaN);
  const outlier = new Uint8Array(nGenes);
  genewise.forEach(({ alpha: raw, mu }, g) => {
    if (mu === null) return;
    const fitted = trendValue[g]!;
    if (dfResidual <= 0) { final[g] = fitted; return; }

    const logRaw = Math.log(raw);
    const logTrend = Math.log(fitted);
    if (logRaw > logTrend + outlierBound) {
      outlier[g] = 1;
      final[g] = raw;
      return;
    }

    const y = geneCounts(counts, g);
    const lo = Math.min(logRaw, logTrend);
    const hi = Math.max(logRaw, logTrend);
    const map = maximizeOnInterval(
      la => adjustedLogLik(la, y, mu, x) - (la - logTrend) ** 2 / (2 * priorVar),
      lo,
      hi,
    );
    final[g] = Math.min(Math.max(Math.exp(map), Math.min(raw, fitted)), Math.max(raw, fitted));
  });

  return {
    baseMean: means,
    geneEstimate,
    trendValue,
    final,
    outlier,
    trend,
    trendFallback: fallback,
    residualVar,
    priorVar,
    warnings,
  };
}

/** Per-gene view of a dispersion result. */
export function dispersionEstimates(result: DispersionResult): DispersionEstimate[] {
  return Array.from(result.final, (final, g) => ({
    baseMean: result.baseMean[g]!,
    geneEstimate: result.geneEstimate[g]!,
    trend: result.trendValue[g]!,
    final,
    outlier: result.outlier[g] === 1,
  }));
}
