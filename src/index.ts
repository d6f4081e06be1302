/**
 * code-digest - Multi-provider LLM summarization for codebases
 *
 * Ordered provider fallback, per-provider retry with backoff, token-budget
 * truncation and hierarchical aggregation of summaries.
 */

// Core types and configuration schemas
export * from './types/index.js';

// Errors
export * from './errors.js';

// Logging
export * from './logging/logger.js';

// Token counting
export * from './adapters/index.js';

// Backend adapters and the provider chain
export * from './providers/index.js';

// Request engine, aggregation, batch runs, reports
export * from './pipeline/index.js';

// Default and environment-derived settings
export * from './policies/index.js';
