/**
 * Default settings for the request engine and the batch runner.
 *
 * These are the schema defaults spelled out, for callers that want to
 * start from them and override a few fields.
 *
 * @example
 * ```typescript
 * import { DEFAULT_ENGINE_SETTINGS, createSummarizationEngine } from 'code-digest';
 *
 * const engine = createSummarizationEngine({
 *   ...DEFAULT_ENGINE_SETTINGS,
 *   retryAttempts: 5,
 *   models: [{ provider: 'openai', model: 'gpt-4o', apiKey: 'test-key' }],
 * });
 * ```
 */

import type { BatchRunSettings, EngineSettings } from '../types/config.js';
import { parseBatchRunSettings, parseEngineSettings } from '../types/config.js';

export const DEFAULT_ENGINE_SETTINGS: Readonly<EngineSettings> = Object.freeze(
  parseEngineSettings({})
);

export const DEFAULT_BATCH_RUN_SETTINGS: Readonly<BatchRunSettings> = Object.freeze(
  parseBatchRunSettings({})
);
