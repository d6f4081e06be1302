/**
 * Core types for code-digest
 */

export * from './config.js';
export * from './summary.js';
