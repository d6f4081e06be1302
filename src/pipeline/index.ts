/**
 * Pipeline exports (request engine, aggregation, batch runs, reports)
 */

export * from './request-engine.js';
export * from './aggregator.js';
export * from './usage-ledger.js';
export * from './prompts.js';
export * from './chunker.js';
export * from './syntax-chunker.js';
export * from './batch-runner.js';
export * from './report.js';
