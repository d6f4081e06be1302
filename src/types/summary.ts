/**
 * Request/response value objects for summarization.
 */

/**
 * Kind of content being summarized. Selects wording only.
 */
export type ChunkType = 'file' | 'function' | 'class' | 'block' | 'unknown';

/**
 * Input to a single summarization call.
 */
export interface SummaryRequest {
  /** Text to summarize */
  readonly content: string;

  /** File path or `path:start-end`; used for logging and prompt text */
  readonly identifier: string;

  /** Language hint */
  readonly language: string;

  /** Content kind */
  readonly chunkType: ChunkType;

  /** Opaque caller metadata (size, extension, ...) */
  readonly metadata?: Readonly<Record<string, unknown>>;
}

/**
 * Outcome of a summarize or aggregate call. Exactly one per call.
 */
export interface SummaryResponse {
  /** Summary text, or an `Error: ...` placeholder on failure */
  readonly summary: string;

  /** Input + output tokens across the requests that produced the summary */
  readonly tokensUsed: number;

  /** Wall time of the call (ms) */
  readonly processingTimeMs: number;

  /** Model that answered (or last failed); 'none' when the chain is exhausted */
  readonly modelUsed: string;

  /** Provider that answered (or last failed); 'none' when the chain is exhausted */
  readonly providerUsed: string;

  /** Failure description, absent on success */
  readonly error?: string;

  /** True when a provider other than the primary answered or was tried */
  readonly fallbackUsed: boolean;
}

/**
 * Per-provider counters.
 */
export interface ProviderUsage {
  requests: number;
  tokens: number;
  errors: number;
}

/**
 * Read-only copy of the usage ledger plus chain metadata.
 */
export interface UsageSnapshot {
  totalRequests: number;
  totalTokensUsed: number;
  estimatedCost: number;
  primaryProvider: string;
  primaryModel: string;
  providersConfigured: number;
  fallbackEnabled: boolean;
  providerStats: Record<string, ProviderUsage>;
}
