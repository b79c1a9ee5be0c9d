/**
 * End-to-end differential expression run.
 *
 * size factors → gene-wise dispersions ┃ trend + shrinkage ┃ per-gene Wald
 * tests ┃ multiple-testing correction. Each ┃ is a barrier: the stage after it
 * needs the stage before it complete for every gene.
 */
import type { AnalysisConfig } from '../config';
import { resolveConfig } from '../config';
import type { CountModel } from './count-model';
import { modelMatrix, sampleConditions } from './count-model';
import type { DispersionResult } from './dispersion';
import { estimateDispersions } from './dispersion';
import type { FitResult } from './glm';
import { contrastCoefficient, waldTest } from './glm';
import type { FilteringResult } from './multiple-testing';
import { correctMultipleTesting } from './multiple-testing';
import type { PcaProjection } from './pca';
import { projectPca } from './pca';
import { checkSizeFactors, estimateSizeFactors } from './size-factors';
import type { TransformedMatrix } from './transform';
import { transformCounts } from './transform';

export interface ResultsSummary {
  alpha: number;
  /** Genes with a non-zero total count. */
  nonZero: number;
  up: number;
  down: number;
  dispersionOutliers: number;
  /** Genes removed by independent filtering. */
  lowCounts: number;
  notConverged: number;
  /** Mean-count cutoff of independent filtering, when applied. */
  meanCountCutoff: number | null;
}

export interface DifferentialExpressionRun {
  config: AnalysisConfig;
  sizeFactors: Float64Array;
  dispersions: DispersionResult;
  /** One row per gene, in matrix order. */
  results: FitResult[];
  filtering: FilteringResult | null;
  summary: ResultsSummary;
  warnings: string[];
}

/**
 * Run the whole testing pipeline. Invalid input or options throw before any
 * statistics are computed; per-gene failures end up in the result rows.
 */
export function runDifferentialExpression(model: CountModel, options: unknown = {}): DifferentialExpressionRun {
  const config = resolveConfig(options);
  const { counts, design } = model;
  contrastCoefficient(design.levels, config.contrastLevel);

  const sizeFactors = config.sizeFactors
    ? checkSizeFactors(config.sizeFactors, counts.nSamples)
    : estimateSizeFactors(counts);

  const dispersions = estimateDispersions(counts, sizeFactors, modelMatrix(design), {
    fitType: config.trendFit,
    minGenesForTrend: config.minGenesForTrend,
    outlierSD: config.outlierSD,
  });

  const tested = waldTest(model, sizeFactors, dispersions, { contrastLevel: config.contrastLevel });
  const { results, filtering } = correctMultipleTesting(tested, {
    alpha: config.significanceThreshold,
    independentFiltering: config.independentFiltering,
  });

  return {
    config,
    sizeFactors,
    dispersions,
    results,
    filtering,
    summary: summarizeResults(results, config.significanceThreshold, filtering),
    warnings: [...dispersions.warnings],
  };
}

// ── Summary ──────────────────────────────────────────────────────────────────

export function summarizeResults(
  results: readonly FitResult[],
  alpha: number,
  filtering: FilteringResult | null,
): ResultsSummary {
  const summary: ResultsSummary = {
    alpha,
    nonZero: 0,
    up: 0,
    down: 0,
    dispersionOutliers: 0,
    lowCounts: 0,
    notConverged: 0,
    meanCountCutoff: filtering ? filtering.cutoff : null,
  };
  for (const r of results) {
    if (r.status !== 'allZero') summary.nonZero++;
    if (r.dispersionOutlier) summary.dispersionOutliers++;
    if (r.status === 'filtered') summary.lowCounts++;
    if (r.status === 'notConverged') summary.notConverged++;
    if (r.padj !== null && r.padj < alpha && r.log2FoldChange !== null) {
      if (r.log2FoldChange > 0) summary.up++;
      else if (r.log2FoldChange < 0) summary.down++;
    }
  }
  return summary;
}

function share(count: number, total: number): string {
  return `${count}, ${total > 0 ? ((100 * count) / total).toFixed(1) : '0.0'}%`;
}

/** Plain-text report of a results summary. */
export function formatSummary(summary: ResultsSummary): string {
  const { nonZero } = summary;
  const lines = [
    `out of ${nonZero} with nonzero total read count`,
    `adjusted p-value < ${summary.alpha}`,
    `LFC > 0 (up)       : ${share(summary.up, nonZero)}`,
    `LFC < 0 (down)     : ${share(summary.down, nonZero)}`,
    `outliers [1]       : ${share(summary.dispersionOutliers, nonZero)}`,
    `low counts [2]     : ${share(summary.lowCounts, nonZero)}`,
    `not converged      : ${share(summary.notConverged, nonZero)}`,
  ];
  if (summary.meanCountCutoff !== null) {
    lines.push(`(mean count < ${Math.round(summary.meanCountCutoff)})`);
  }
  lines.push('[1] dispersion outliers keep their gene-wise estimate');
  lines.push('[2] see independent filtering');
  return lines.join('\n');
}

// ── Exploration ──────────────────────────────────────────────────────────────

export interface SampleExploration {
  transformed: TransformedMatrix;
  pca: PcaProjection;
}

/**
 * Transform the counts with the configured policy and project the samples.
 * Pass the size factors of an earlier run to avoid re-estimating them.
 */
export function exploreSamples(
  model: CountModel,
  options: unknown = {},
  sizeFactors?: ArrayLike<number>,
): SampleExploration {
  const config = resolveConfig(options);
  const { counts, design } = model;
  const sf = sizeFactors
    ? checkSizeFactors(sizeFactors, counts.nSamples)
    : config.sizeFactors
      ? checkSizeFactors(config.sizeFactors, counts.nSamples)
      : estimateSizeFactors(counts);

  const transformed = transformCounts(model, sf, {
    policy: config.transform,
    blind: config.blindTrend,
    fitType: config.trendFit,
    minGenesForTrend: config.minGenesForTrend,
  });
  const pca = projectPca(transformed, {
    ntop: config.pcaTop,
    components: config.pcaComponents,
    groups: sampleConditions(design),
  });
  if (pca.degenerate) {
    console.warn('Transformed matrix has no variance across samples; PCA coordinates are all zero');
  }
  return { transformed, pca };
}
