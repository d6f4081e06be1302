/**
 * Policy exports
 */

export * from './default-policy.js';
export * from './env-policy.js';
