/**
 * Error hierarchy for the summarization pipeline.
 *
 * Configuration problems are thrown at construction time. Provider failures
 * are thrown inside the request engine only and folded into a
 * SummaryResponse before they reach a caller.
 */

/**
 * Base error carrying a machine-readable code.
 */
export class SummarizerError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = 'SummarizerError';
    this.code = code;
  }
}

/**
 * Invalid or unusable configuration. Fatal for the run.
 */
export class ConfigError extends SummarizerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

/**
 * A backend request failed (network, rate limit, malformed response).
 */
export class ProviderError extends SummarizerError {
  /** Provider that failed */
  readonly provider: string;

  constructor(message: string, provider: string, options?: { cause?: unknown }) {
    super(message, 'PROVIDER_ERROR', options);
    this.name = 'ProviderError';
    this.provider = provider;
  }
}

/**
 * A file or chunk could not be processed.
 */
export class ProcessingError extends SummarizerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PROCESSING_ERROR', options);
    this.name = 'ProcessingError';
  }
}

/**
 * A unit of work did not finish within its time limit.
 */
export class TimeoutError extends SummarizerError {
  constructor(message: string) {
    super(message, 'TIMEOUT');
    this.name = 'TimeoutError';
  }
}

/**
 * Render any thrown value as a single-line message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
