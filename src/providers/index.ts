/**
 * Provider adapter exports.
 */

export * from './capabilities.js';
export * from './provider-adapter.js';
export * from './openai-adapter.js';
export * from './anthropic-adapter.js';
export * from './chain.js';
