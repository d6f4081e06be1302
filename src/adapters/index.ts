/**
 * Adapter exports (token counting)
 */

export * from './token-counter.js';
export * from './tiktoken-counter.js';
