/**
 * Command-line entry point.
 *
 *   count-de --counts counts.tsv --samples samples.csv --reference control \
 *            [--contrast treated] [--out results.csv] [--transform-out vst.csv] [--pca-out pca.csv]
 */
import { readFileSync, writeFileSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { parseArgs } from 'node:util';
import { AnalysisError, ConfigurationError } from './errors';
import { createCountModel, createDesign } from './analysis/count-model';
import { exploreSamples, formatSummary, runDifferentialExpression } from './analysis/pipeline';
import { formatMatrix, formatPca, formatResultsTable, parseCountTable, parseSampleSheet } from './data';

export interface CliOptions {
  counts: string;
  samples: string;
  reference: string;
  out?: string;
  transformOut?: string;
  pcaOut?: string;
  /** Options passed on to the analysis (validated there). */
  analysis: Record<string, unknown>;
}

function numberOption(name: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (Number.isNaN(n)) throw new ConfigurationError(`--${name} expects a number, got '${value}'`, 'INVALID_CONFIG');
  return n;
}

/** Turn command-line arguments into CLI options. */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      counts: { type: 'string' },
      samples: { type: 'string' },
      reference: { type: 'string' },
      contrast: { type: 'string' },
      alpha: { type: 'string' },
      'no-filter': { type: 'boolean', default: false },
      transform: { type: 'string' },
      'fit-type': { type: 'string' },
      'not-blind': { type: 'boolean', default: false },
      ntop: { type: 'string' },
      out: { type: 'string' },
      'transform-out': { type: 'string' },
      'pca-out': { type: 'string' },
    },
  });
  const { counts, samples, reference } = values;
  if (counts === undefined || samples === undefined || reference === undefined) {
    throw new ConfigurationError('Usage: count-de --counts <file> --samples <file> --reference <level> [options]', 'INVALID_CONFIG');
  }

  const analysis: Record<string, unknown> = {
    independentFiltering: !values['no-filter'],
    blindTrend: !values['not-blind'],
  };
  if (values.contrast !== undefined) analysis.contrastLevel = values.contrast;
  if (values.transform !== undefined) analysis.transform = values.transform;
  if (values['fit-type'] !== undefined) analysis.trendFit = values['fit-type'];
  const alpha = numberOption('alpha', values.alpha);
  if (alpha !== undefined) analysis.significanceThreshold = alpha;
  const ntop = numberOption('ntop', values.ntop);
  if (ntop !== undefined) analysis.pcaTop = ntop;

  return {
    counts,
    samples,
    reference,
    out: values.out,
    transformOut: values['transform-out'],
    pcaOut: values['pca-out'],
    analysis,
  };
}

/** Run an analysis from files and write the requested outputs. */
export function main(argv: string[]): void {
  const opts = parseCliArgs(argv);
  const counts = parseCountTable(readFileSync(opts.counts, 'utf8'));
  const design = createDesign(parseSampleSheet(readFileSync(opts.samples, 'utf8')), opts.reference);
  const model = createCountModel(counts, design);

  const run = runDifferentialExpression(model, opts.analysis);
  const table = formatResultsTable(run.results);
  if (opts.out) writeFileSync(opts.out, table + '\n');
  else console.log(table);
  console.log(formatSummary(run.summary));

  if (opts.transformOut || opts.pcaOut) {
    const { transformed, pca } = exploreSamples(model, opts.analysis, run.sizeFactors);
    if (opts.transformOut) writeFileSync(opts.transformOut, formatMatrix(transformed) + '\n');
    if (opts.pcaOut) writeFileSync(opts.pcaOut, formatPca(pca) + '\n');
    const pct = pca.explainedVariance.map((v, i) => `PC${i + 1} ${(100 * v).toFixed(1)}%`);
    console.log(`variance explained: ${pct.join(', ')}`);
  }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  try {
    main(process.argv.slice(2));
  } catch (err) {
    if (!(err instanceof AnalysisError)) throw err;
    console.error(err.toString());
    process.exitCode = 1;
  }
}
