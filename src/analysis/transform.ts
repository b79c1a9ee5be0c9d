/**
 * Variance-stabilizing transforms of a counts matrix.
 *
 *  - pseudo-log2: log2(normalized + 1)
 *  - regularized-log: per-sample log fold changes shrunk towards the gene mean
 *    by a ridge-penalized NB GLM at the trend dispersion
 *  - vst: closed-form (or integrated) transform derived from the trend
 *
 * Blind mode re-estimates the trend with an intercept-only design so that
 * condition labels cannot leak into the transformed values.
 */
import * as d3 from 'd3';
import type { CountModel } from './count-model';
import { geneCounts, interceptMatrix, modelMatrix } from './count-model';
import type { DispersionTrend, TrendFitType } from './dispersion';
import { estimateDispersions, evaluateTrend } from './dispersion';
import { fitNegativeBinomialGlm } from './glm';
import { baseMeans, normalizedCounts } from './size-factors';
import { interpolateLinear, weightedQuantile } from './stats-utils';

export type TransformPolicy = 'pseudo-log2' | 'regularized-log' | 'vst';

export interface TransformOptions {
  policy: TransformPolicy;
  /** Re-estimate the trend ignoring condition labels (default true). */
  blind?: boolean;
  /** Trend to use when not blind; estimated from the design when absent. */
  trend?: DispersionTrend;
  fitType?: TrendFitType;
  minGenesForTrend?: number;
}

export interface TransformedMatrix {
  genes: readonly string[];
  samples: readonly string[];
  /** Row-major genes × samples. */
  values: Float64Array;
  policy: TransformPolicy;
  blind: boolean;
  trend: DispersionTrend | null;
}

/** Transform the counts with the chosen policy. */
export function transformCounts(
  model: CountModel,
  sizeFactors: ArrayLike<number>,
  options: TransformOptions,
): TransformedMatrix {
  const { policy, blind = true } = options;
  const { counts } = model;
  const base = { genes: counts.genes, samples: counts.samples, policy, blind };

  switch (policy) {
    case 'pseudo-log2':
      return { ...base, values: pseudoLog2(model, sizeFactors), trend: null };
    case 'regularized-log': {
      const trend = resolveTrend(model, sizeFactors, options, blind);
      return { ...base, values: regularizedLog(model, sizeFactors, trend), trend };
    }
    case 'vst': {
      const trend = resolveTrend(model, sizeFactors, options, blind);
      return { ...base, values: varianceStabilize(model, sizeFactors, trend), trend };
    }
  }
}

function resolveTrend(
  model: CountModel,
  sizeFactors: ArrayLike<number>,
  options: TransformOptions,
  blind: boolean,
): DispersionTrend {
  if (!blind && options.trend) return options.trend;
  const x = blind ? interceptMatrix(model.counts.nSamples) : modelMatrix(model.design);
  return estimateDispersions(model.counts, sizeFactors, x, {
    fitType: options.fitType,
    minGenesForTrend: options.minGenesForTrend,
  }).trend;
}

// ── pseudo-log2 ──────────────────────────────────────────────────────────────

function pseudoLog2(model: CountModel, sizeFactors: ArrayLike<number>): Float64Array {
  return normalizedCounts(model.counts, sizeFactors).map(q => Math.log2(q + 1));
}

// ── vst ──────────────────────────────────────────────────────────────────────

function varianceStabilize(
  model: CountModel,
  sizeFactors: ArrayLike<number>,
  trend: DispersionTrend,
): Float64Array {
  const norm = normalizedCounts(model.counts, sizeFactors);
  switch (trend.kind) {
    case 'parametric': {
      const { asymptDisp: a, extraPois: b } = trend;
      return norm.map(q =>
        Math.log2((1 + b + 2 * a * q + 2 * Math.sqrt(a * q * (1 + b + a * q))) / (4 * a)));
    }
    case 'constant': {
      const a = trend.value;
      return norm.map(q => (2 * Math.asinh(Math.sqrt(a * q)) - Math.log(a) - Math.log(4)) / Math.LN2);
    }
    case 'local':
      return integratedVst(model, sizeFactors, norm, trend);
  }
}

/**
 * Numerically integrate 1/sqrt(v(μ)) on an asinh-spaced grid, then map the
 * result onto the log2 scale between the 95th and 99.9th percentile of means.
 */
function integratedVst(
  model: CountModel,
  sizeFactors: ArrayLike<number>,
  norm: Float64Array,
  trend: DispersionTrend,
): Float64Array {
  const gridSize = 1000;
  const top = Math.asinh(d3.max(norm) ?? 0);
  const xg = Array.from({ length: gridSize - 1 }, (_, i) => Math.sinh((top * (i + 1)) / (gridSize - 1)));
  const xim = d3.mean(Array.from(sizeFactors, s => 1 / s)) ?? 1;
  const integrand = xg.map(x => 1 / Math.sqrt(evaluateTrend(trend, x) * x * x + xim * x));

  const knots = new Float64Array(xg.length - 1);
  const cumulative = new Float64Array(xg.length - 1);
  let acc = 0;
  for (let i = 0; i < xg.length - 1; i++) {
    acc += (xg[i + 1]! - xg[i]!) * (integrand[i]! + integrand[i + 1]!) / 2;
    knots[i] = Math.asinh((xg[i]! + xg[i + 1]!) / 2);
    cumulative[i] = acc;
  }
  const integral = (q: number): number => interpolateLinear(knots, cumulative, Math.asinh(q));

  const means = Array.from(baseMeans(model.counts, sizeFactors)).sort((p, q) => p - q);
  const h1 = d3.quantileSorted(means, 0.95) ?? 1;
  const h2 = d3.quantileSorted(means, 0.999) ?? 1;
  let eta = (Math.log2(h2) - Math.log2(h1)) / (integral(h2) - integral(h1));
  let xi = Math.log2(h1) - eta * integral(h1);
  if (!Number.isFinite(eta) || !Number.isFinite(xi)) {
    // Too few distinct means to calibrate; keep the raw integral.
    eta = 1;
    xi = 0;
  }
  return norm.map(q => eta * integral(q) + xi);
}

// ── regularized log ──────────────────────────────────────────────────────────

/** 97.5th percentile of the standard normal. */
const Z_975 = 1.959963984540054;

/**
 * Prior variance for sample effects: the weighted 95% quantile of absolute
 * log2 deviations from the gene mean, read as a normal SD.
 */
function sampleEffectPriorVar(
  norm: Float64Array,
  means: Float64Array,
  nSamples: number,
  trend: DispersionTrend,
): number {
  const dev: number[] = [];
  const weights: number[] = [];
  means.forEach((mean, g) => {
    if (mean <= 0) return;
    const w = 1 / (1 / mean + evaluateTrend(trend, mean));
    const centre = Math.log2(mean + 0.5);
    for (let j = 0; j < nSamples; j++) {
      dev.push(Math.abs(Math.log2(norm[g * nSamples + j]! + 0.5) - centre));
      weights.push(w);
    }
  });
  const sd = weightedQuantile(dev, weights, 0.95) / Z_975;
  return Number.isFinite(sd) ? Math.max(sd * sd, 1e-8) : 1e-8;
}

function regularizedLog(
  model: CountModel,
  sizeFactors: ArrayLike<number>,
  trend: DispersionTrend,
): Float64Array {
  const { counts } = model;
  const n = counts.nSamples;
  const norm = normalizedCounts(counts, sizeFactors);
  const means = baseMeans(counts, sizeFactors);
  const priorVar = sampleEffectPriorVar(norm, means, n, trend);

  // Intercept plus one indicator per sample; penalties set on the log2 scale.
  const p = n + 1;
  const data = new Float64Array(n * p);
  for (let i = 0; i < n; i++) { data[i * p] = 1; data[i * p + i + 1] = 1; }
  const x = { nrow: n, ncol: p, data, columns: ['Intercept', ...counts.samples] };
  const ridge = new Float64Array(p).fill(1 / priorVar / (Math.LN2 * Math.LN2));
  ridge[0] = 1e-6 / (Math.LN2 * Math.LN2);

  const out = new Float64Array(counts.nGenes * n);
  for (let g = 0; g < counts.nGenes; g++) {
    if (means[g] === 0) continue;
    const fit = fitNegativeBinomialGlm(geneCounts(counts, g), sizeFactors, x, evaluateTrend(trend, means[g]!), { ridge });
    for (let j = 0; j < n; j++) {
      out[g * n + j] = (fit.beta[0]! + fit.beta[j + 1]!) / Math.LN2;
    }
  }
  return out;
}
