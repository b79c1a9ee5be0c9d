/**
 * Error taxonomy for count-based differential expression.
 *
 * Fatal problems with the input or the configuration abort the run before
 * any statistics are computed. Per-gene problems never throw: they are
 * recorded as a status on the gene's result row.
 */

export type ErrorCode =
  | 'DUPLICATE_GENE'
  | 'DUPLICATE_SAMPLE'
  | 'INVALID_COUNT'
  | 'SHAPE_MISMATCH'
  | 'SAMPLE_MISMATCH'
  | 'UNKNOWN_REFERENCE'
  | 'UNKNOWN_LEVEL'
  | 'TOO_FEW_LEVELS'
  | 'TOO_FEW_SAMPLES'
  | 'ALL_ZERO'
  | 'NO_INFORMATIVE_GENES'
  | 'INVALID_SIZE_FACTORS'
  | 'INVALID_CONFIG'
  | 'PARSE_ERROR';

/** Base class for every error raised by the engine. */
export class AnalysisError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context?: string,
  ) {
    super(message);
    this.name = 'AnalysisError';
  }

  override toString(): string {
    let msg = `${this.name} [${this.code}]: ${this.message}`;
    if (this.context !== undefined && this.context !== '') {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/** A violated precondition on the counts, the design or the options. */
export class ConfigurationError extends AnalysisError {
  constructor(message: string, code: ErrorCode, context?: string) {
    super(message, code, context);
    this.name = 'ConfigurationError';
  }
}

/** Malformed tabular input. */
export class ParseError extends AnalysisError {
  constructor(
    message: string,
    public readonly lineNumber?: number,
    context?: string,
  ) {
    super(lineNumber !== undefined ? `${message} (line ${lineNumber})` : message, 'PARSE_ERROR', context);
    this.name = 'ParseError';
  }
}
