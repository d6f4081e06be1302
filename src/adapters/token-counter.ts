/**
 * TokenCounter: Single source of truth for token accounting.
 *
 * Counting, context-window lookup and budget truncation all go through this
 * interface so that the request engine never tokenizes on its own.
 */

/**
 * TokenCounter interface.
 * Implementations must be synchronous and side-effect free apart from
 * internal memoization.
 */
export interface TokenCounter {
  /**
   * Count tokens of `text` under the tokenizer associated with `model`.
   * Unknown models use a default tokenizer.
   */
  countTokens(text: string, model: string): number;

  /**
   * Maximum context window for `model`.
   */
  contextLimit(model: string): number;

  /**
   * Fit `text` into `maxTokens`. Returns the text unchanged when it already
   * fits; otherwise a shortened text ending in TRUNCATION_MARKER whose count
   * is at most `maxTokens`. Idempotent.
   */
  truncate(text: string, maxTokens: number, model: string): string;
}

/**
 * Context window assumed for models missing from the table.
 */
export const DEFAULT_CONTEXT_LIMIT = 4096;

/**
 * Appended to truncated text.
 */
export const TRUNCATION_MARKER = '\n... [truncated]';

/**
 * Tokens held back for the truncation marker.
 */
export const TRUNCATION_RESERVE = 10;

/**
 * Known context windows (tokens).
 */
export const MODEL_CONTEXT_LIMITS: Readonly<Record<string, number>> = {
  // OpenAI
  'gpt-4': 8192,
  'gpt-4-turbo': 128_000,
  'gpt-4o': 128_000,
  'gpt-4o-mini': 128_000,
  'gpt-4.1': 1_047_576,
  'gpt-4.1-mini': 1_047_576,
  'gpt-3.5-turbo': 4096,
  'gpt-3.5-turbo-16k': 16_384,

  // Perplexity
  'sonar-large-chat': 16_384,
  'sonar-medium-chat': 16_384,
  'sonar-small-chat': 16_384,
  'sonar-large-online': 16_384,
  'sonar-medium-online': 16_384,
  sonar: 127_072,
  'sonar-pro': 200_000,

  // Anthropic
  'claude-3-opus-20240229': 200_000,
  'claude-3-sonnet-20240229': 200_000,
  'claude-3-haiku-20240307': 200_000,
  'claude-3-5-sonnet-20241022': 200_000,
  'claude-3-5-haiku-20241022': 200_000,
  'claude-2.1': 200_000,
  'claude-2.0': 100_000,
  'claude-instant-1.2': 100_000,
};

/**
 * Look up a model's context window.
 *
 * @param model - Model identifier
 * @returns Context window, or DEFAULT_CONTEXT_LIMIT for unknown models
 */
export function lookupContextLimit(model: string): number {
  return Object.hasOwn(MODEL_CONTEXT_LIMITS, model)
    ? MODEL_CONTEXT_LIMITS[model]
    : DEFAULT_CONTEXT_LIMIT;
}
