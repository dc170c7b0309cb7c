/**
 * Error taxonomy for the extraction pipeline
 */

export type ExtractionErrorCode = 'CONFIGURATION_ERROR' | 'MALFORMED_INPUT' | 'TECHNIQUE_FAILURE';

export class ExtractionError extends Error {
  public readonly code: ExtractionErrorCode;

  constructor(code: ExtractionErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionError';
    this.code = code;
  }
}

/**
 * A configured technique identifier could not be resolved to a factory
 */
export class ConfigurationError extends ExtractionError {
  public readonly technique: string;

  constructor(technique: string, message?: string) {
    super('CONFIGURATION_ERROR', message ?? `Unknown extraction technique: "${technique}"`);
    this.name = 'ConfigurationError';
    this.technique = technique;
  }
}

/**
 * The markup or source URL handed to extract() is unusable
 */
export class MalformedInputError extends ExtractionError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MALFORMED_INPUT', message, options);
    this.name = 'MalformedInputError';
  }
}

/**
 * Thrown by a technique that hits a fault it cannot turn into empty output.
 * The extractor lets it propagate and returns no partial result.
 */
export class TechniqueFailure extends ExtractionError {
  public readonly technique: string;

  constructor(technique: string, message: string, options?: { cause?: unknown }) {
    super('TECHNIQUE_FAILURE', `${technique}: ${message}`, options);
    this.name = 'TechniqueFailure';
    this.technique = technique;
  }
}

export function isExtractionError(value: unknown): value is ExtractionError {
  return value instanceof ExtractionError;
}
