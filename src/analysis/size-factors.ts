/**
 * Median-of-ratios size factors.
 */
import * as d3 from 'd3';
import { ConfigurationError } from '../errors';
import type { CountMatrix } from './count-model';

/**
 * One size factor per sample: the median, over genes with no zero count, of
 * the sample's count divided by the gene's geometric mean. Factors are
 * rescaled to a geometric mean of 1.
 */
export function estimateSizeFactors(counts: CountMatrix): Float64Array {
  const { nGenes, nSamples } = counts;
  const values = counts.values();
  if (nSamples < 2) {
    throw new ConfigurationError('Size factors need at least two samples', 'TOO_FEW_SAMPLES');
  }

  const logGeoMeans = new Float64Array(nGenes);
  const retained: number[] = [];
  for (let g = 0; g < nGenes; g++) {
    let s = 0;
    for (let j = 0; j < nSamples; j++) s += Math.log(values[g * nSamples + j]!);
    logGeoMeans[g] = s / nSamples;
    if (Number.isFinite(logGeoMeans[g]!)) retained.push(g);
  }
  if (retained.length === 0) {
    throw new ConfigurationError(
      'Every gene contains a zero count; no gene has a positive geometric mean',
      'NO_INFORMATIVE_GENES',
    );
  }

  const logFactors = new Float64Array(nSamples);
  const logRatios = new Float64Array(retained.length);
  for (let j = 0; j < nSamples; j++) {
    retained.forEach((g, k) => {
      logRatios[k] = Math.log(values[g * nSamples + j]!) - logGeoMeans[g]!;
    });
    logFactors[j] = d3.median(logRatios) ?? 0;
  }

  const center = d3.mean(logFactors) ?? 0;
  return logFactors.map(lf => Math.exp(lf - center));
}

/** Validate caller-supplied size factors. */
export function checkSizeFactors(sizeFactors: ArrayLike<number>, nSamples: number): Float64Array {
  if (sizeFactors.length !== nSamples) {
    throw new ConfigurationError(
      `Expected ${nSamples} size factors, got ${sizeFactors.length}`,
      'INVALID_SIZE_FACTORS',
    );
  }
  const out = Float64Array.from(sizeFactors);
  if (!out.every(s => Number.isFinite(s) && s > 0)) {
    throw new ConfigurationError('Size factors must be positive and finite', 'INVALID_SIZE_FACTORS');
  }
  return out;
}

/** Counts divided by the sample's size factor (genes × samples, row-major). */
export function normalizedCounts(counts: CountMatrix, sizeFactors: ArrayLike<number>): Float64Array {
  const { nSamples } = counts;
  return counts.values().map((v, i) => v / sizeFactors[i % nSamples]!);
}

/** Per-gene mean of normalized counts. */
export function baseMeans(counts: CountMatrix, sizeFactors: ArrayLike<number>): Float64Array {
  const { nGenes, nSamples } = counts;
  const norm = normalizedCounts(counts, sizeFactors);
  const out = new Float64Array(nGenes);
  for (let g = 0; g < nGenes; g++) {
    let s = 0;
    for (let j = 0; j < nSamples; j++) s += norm[g * nSamples + j]!;
    out[g] = s / nSamples;
  }
  return out;
}
