/**
 * Negative-binomial GLM (log link, size-factor offset) fitted by IRLS, and
 * the per-gene Wald test of a condition coefficient against the reference.
 */
import { ConfigurationError } from '../errors';
import type { CountModel, DesignMatrix } from './count-model';
import { geneCounts, modelMatrix } from './count-model';
import type { DispersionResult } from './dispersion';
import { crossProduct, cholesky, choleskySolve, choleskyInverse } from './linalg';
import { baseMeans } from './size-factors';
import { lgamma, lgammaRatio, twoSidedNormalP } from './stats-utils';

export interface GlmOptions {
  /** Ridge penalty per coefficient on the natural-log scale. */
  ridge?: ArrayLike<number>;
  maxIter?: number;
  /** Relative deviance change that counts as converged. */
  tolerance?: number;
  /** Lower bound for fitted means inside the iteration. */
  minMu?: number;
}

export interface GlmFit {
  /** Coefficients on the natural-log scale. */
  beta: Float64Array;
  se: Float64Array;
  mu: Float64Array;
  deviance: number;
  iterations: number;
  converged: boolean;
}

/** Default ridge: 1e-6 on the log2 scale, converted to natural log. */
export function defaultRidge(p: number): Float64Array {
  return new Float64Array(p).fill(1e-6 / (Math.LN2 * Math.LN2));
}

/** Coefficients beyond this (natural log) mark the fit as diverged. */
const LARGE_BETA = 30 * Math.LN2;

/** NB log-likelihood of one observation, variance μ + αμ². */
export function nbLogLik(y: number, mu: number, alpha: number): number {
  const r = 1 / alpha;
  const am = alpha * mu;
  const l1p = Math.log1p(am);
  const tail = y > 0 ? y * (Math.log(am) - l1p) : 0;
  return lgammaRatio(y, r) - lgamma(y + 1) - r * l1p + tail;
}

function deviance(y: ArrayLike<number>, mu: ArrayLike<number>, alpha: number): number {
  let ll = 0;
  for (let i = 0; i < y.length; i++) ll += nbLogLik(y[i]!, mu[i]!, alpha);
  return -2 * ll;
}

function fittedMeans(
  beta: Float64Array,
  x: DesignMatrix,
  sizeFactors: ArrayLike<number>,
  minMu: number,
): Float64Array {
  const { nrow: n, ncol: p, data } = x;
  const mu = new Float64Array(n);
  for (let i = 0; i < n; i++) {
    let eta = 0;
    for (let k = 0; k < p; k++) eta += data[i * p + k]! * beta[k]!;
    mu[i] = Math.max(minMu, sizeFactors[i]! * Math.exp(eta));
  }
  return mu;
}

function weightedXtz(x: DesignMatrix, w: ArrayLike<number>, z: ArrayLike<number>): Float64Array {
  const { nrow: n, ncol: p, data } = x;
  const out = new Float64Array(p);
  for (let i = 0; i < n; i++) {
    const wz = w[i]! * z[i]!;
    for (let k = 0; k < p; k++) out[k]! += data[i * p + k]! * wz;
  }
  return out;
}

/**
 * Fit one gene by iteratively reweighted least squares with a fixed dispersion.
 */
export function fitNegativeBinomialGlm(
  y: ArrayLike<number>,
  sizeFactors: ArrayLike<number>,
  x: DesignMatrix,
  alpha: number,
  options: GlmOptions = {},
): GlmFit {
  const { maxIter = 100, tolerance = 1e-8, minMu = 0.5 } = options;
  const n = x.nrow;
  const p = x.ncol;
  const ridge = options.ridge ?? defaultRidge(p);

  // Start from least squares on log normalized counts.
  const z0 = new Float64Array(n);
  for (let i = 0; i < n; i++) z0[i] = Math.log(y[i]! / sizeFactors[i]! + 0.1);
  const ones = new Float64Array(n).fill(1);
  const l0 = cholesky(crossProduct(x.data, n, p, ones, ridge), p);
  let beta = l0 ? choleskySolve(l0, p, weightedXtz(x, ones, z0)) : new Float64Array(p);

  let mu = fittedMeans(beta, x, sizeFactors, minMu);
  let dev = deviance(y, mu, alpha);
  let converged = false;
  let iterations = 0;
  const w = new Float64Array(n);
  const z = new Float64Array(n);

  while (iterations < maxIter) {
    iterations++;
    for (let i = 0; i < n; i++) {
      const m = mu[i]!;
      w[i] = m / (1 + alpha * m);
      z[i] = Math.log(m / sizeFactors[i]!) + (y[i]! - m) / m;
    }
    const l = cholesky(crossProduct(x.data, n, p, w, ridge), p);
    if (!l) break;
    beta = choleskySolve(l, p, weightedXtz(x, w, z));
    if (beta.some(b => !Number.isFinite(b) || Math.abs(b) > LARGE_BETA)) break;

    mu = fittedMeans(beta, x, sizeFactors, minMu);
    const devNew = deviance(y, mu, alpha);
    const change = Math.abs(devNew - dev) / (Math.abs(devNew) + 0.1);
    dev = devNew;
    if (change < tolerance) { converged = true; break; }
  }

  const se = new Float64Array(p).fill(NaN);
  for (let i = 0; i < n; i++) w[i] = mu[i]! / (1 + alpha * mu[i]!);
  const lFinal = cholesky(crossProduct(x.data, n, p, w, ridge), p);
  if (lFinal) {
    const cov = choleskyInverse(lFinal, p);
    for (let k = 0; k < p; k++) se[k] = Math.sqrt(cov[k * p + k]!);
  } else {
    converged = false;
  }

  return { beta, se, mu, deviance: dev, iterations, converged };
}

// ── Wald test ────────────────────────────────────────────────────────────────

export type GeneStatus = 'ok' | 'allZero' | 'notConverged' | 'filtered';

export interface FitResult {
  gene: string;
  baseMean: number;
  log2FoldChange: number | null;
  lfcSE: number | null;
  statistic: number | null;
  pvalue: number | null;
  padj: number | null;
  status: GeneStatus;
  dispersionOutlier: boolean;
}

export interface WaldOptions {
  /** Level compared against the reference; defaults to the last level. */
  contrastLevel?: string;
  maxIter?: number;
}

/** Index of the tested coefficient in the model matrix. */
export function contrastCoefficient(levels: readonly string[], contrastLevel?: string): number {
  if (levels.length < 2) {
    throw new ConfigurationError('The design needs at least two condition levels', 'TOO_FEW_LEVELS');
  }
  const level = contrastLevel ?? levels[levels.length - 1]!;
  const idx = levels.indexOf(level);
  if (idx < 0) {
    throw new ConfigurationError(`Unknown condition level '${level}'`, 'UNKNOWN_LEVEL', `levels: ${levels.join(', ')}`);
  }
  if (idx === 0) {
    throw new ConfigurationError(`'${level}' is the reference level and cannot be tested against itself`, 'UNKNOWN_LEVEL');
  }
  return idx;
}

/**
 * Fit every gene at its final dispersion and Wald-test the contrast
 * coefficient. Genes fail individually; the batch always returns one row per gene.
 */
export function waldTest(
  model: CountModel,
  sizeFactors: ArrayLike<number>,
  dispersions: DispersionResult,
  options: WaldOptions = {},
): FitResult[] {
  const { counts, design } = model;
  const coef = contrastCoefficient(design.levels, options.contrastLevel);
  const x = modelMatrix(design);
  const means = baseMeans(counts, sizeFactors);

  return counts.genes.map((gene, g): FitResult => {
    const row: FitResult = {
      gene,
      baseMean: means[g]!,
      log2FoldChange: null,
      lfcSE: null,
      statistic: null,
      pvalue: null,
      padj: null,
      status: 'ok',
      dispersionOutlier: dispersions.outlier[g] === 1,
    };
    if (means[g] === 0) return { ...row, status: 'allZero' };

    const fit = fitNegativeBinomialGlm(geneCounts(counts, g), sizeFactors, x, dispersions.final[g]!, {
      maxIter: options.maxIter,
    });
    const beta = fit.beta[coef]!;
    const se = fit.se[coef]!;
    if (!fit.converged || !Number.isFinite(se) || se <= 0) return { ...row, status: 'notConverged' };

    const statistic = beta / se;
    return {
      ...row,
      log2FoldChange: beta / Math.LN2,
      lfcSE: se / Math.LN2,
      statistic,
      pvalue: twoSidedNormalP(statistic),
    };
  });
}
