/**
 * Analysis configuration: schema, defaults and validation.
 */
import { type } from 'arktype';
import { ConfigurationError } from './errors';
import type { TrendFitType } from './analysis/dispersion';
import type { TransformPolicy } from './analysis/transform';

export const AnalysisConfigSchema = type({
  '+': 'reject',
  'significanceThreshold?': '0 < number < 1',
  'independentFiltering?': 'boolean',
  'blindTrend?': 'boolean',
  'transform?': "'pseudo-log2' | 'regularized-log' | 'vst'",
  'trendFit?': "'parametric' | 'local' | 'constant'",
  'outlierSD?': 'number > 0',
  'minGenesForTrend?': 'number.integer >= 1',
  'contrastLevel?': 'string > 0',
  'pcaTop?': 'number.integer >= 1',
  'pcaComponents?': 'number.integer >= 1',
  'sizeFactors?': 'number[]',
});

export interface AnalysisConfig {
  /** FDR cutoff for independent filtering and for reporting. */
  significanceThreshold: number;
  independentFiltering: boolean;
  /** Estimate the transform's trend without condition labels. */
  blindTrend: boolean;
  transform: TransformPolicy;
  trendFit: TrendFitType;
  outlierSD: number;
  minGenesForTrend: number;
  contrastLevel?: string;
  pcaTop: number;
  pcaComponents: number;
  /** Use these instead of estimating size factors. */
  sizeFactors?: number[];
}

export const DEFAULT_CONFIG: AnalysisConfig = {
  significanceThreshold: 0.05,
  independentFiltering: true,
  blindTrend: true,
  transform: 'vst',
  trendFit: 'parametric',
  outlierSD: 2,
  minGenesForTrend: 5,
  pcaTop: 500,
  pcaComponents: 2,
};

const camelCase = (key: string): string => key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());

/** Accept `significance_threshold` style keys alongside the camelCase ones. */
function normalizeKeys(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) return input;
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    const name = camelCase(key);
    if (Object.hasOwn(out, name)) {
      throw new ConfigurationError(`Option '${name}' given more than once`, 'INVALID_CONFIG');
    }
    out[name] = value;
  }
  return out;
}

/**
 * Validate user options and fill in defaults. Unknown options are rejected.
 */
export function resolveConfig(input: unknown = {}): AnalysisConfig {
  const out = AnalysisConfigSchema(normalizeKeys(input));
  if (out instanceof type.errors) {
    throw new ConfigurationError(`Invalid configuration: ${out.summary}`, 'INVALID_CONFIG');
  }
  return { ...DEFAULT_CONFIG, ...out };
}
