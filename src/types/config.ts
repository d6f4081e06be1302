/**
 * Configuration schemas for model backends, the request engine and the
 * batch runner.
 */

import { z } from 'zod';
import { ConfigError } from '../errors.js';

/**
 * Supported backend families.
 */
export const PROVIDERS = ['perplexity', 'openai', 'anthropic'] as const;

export const ProviderSchema = z.enum(PROVIDERS);

/**
 * LLM provider type.
 */
export type Provider = z.infer<typeof ProviderSchema>;

/**
 * Single backend model configuration.
 */
export const ModelConfigSchema = z
  .object({
    /** Backend family */
    provider: ProviderSchema,

    /** Model identifier (provider-specific) */
    model: z.string().trim().min(1, 'Model name is required'),

    /** API key for this backend */
    apiKey: z.string().trim().min(1, 'API key is required'),

    /** Sampling temperature */
    temperature: z.number().min(0).max(2).default(0),

    /** Response token cap; also bounds the content budget */
    maxTokens: z.number().int().positive().default(16_000),
  })
  .readonly();

export type ModelConfig = z.infer<typeof ModelConfigSchema>;
export type ModelConfigInput = z.input<typeof ModelConfigSchema>;

/**
 * Request engine settings.
 */
export const EngineSettingsSchema = z.object({
  /** Tries per provider before falling back */
  retryAttempts: z.number().int().min(1).default(3),

  /** Consult fallback providers when the current one fails */
  fallbackEnabled: z.boolean().default(true),

  /** Token threshold selecting the full-file prompt over the chunk prompt */
  chunkSize: z.number().int().positive().default(2000),

  /** Flat cost estimate per token, regardless of provider */
  costPerToken: z.number().nonnegative().default(0.00002),

  /** Summaries reduced per request during hierarchical aggregation */
  aggregationBatchSize: z.number().int().min(2).default(10),

  /** Tokens held back from the context window for prompt and response */
  promptReserveTokens: z.number().int().nonnegative().default(1000),
});

export type EngineSettings = z.infer<typeof EngineSettingsSchema>;
export type EngineSettingsInput = z.input<typeof EngineSettingsSchema>;

/**
 * Batch runner settings.
 */
export const BatchRunSettingsSchema = z.object({
  /** Files processed concurrently */
  concurrency: z.number().int().positive().default(8),

  /** Per-file time limit (ms) */
  timeoutMs: z.number().int().positive().default(30_000),

  /** Overlap carried between consecutive chunks (tokens) */
  chunkOverlap: z.number().int().nonnegative().default(400),

  /** Files above chunkSize * multiplier tokens are chunked */
  largeFileMultiplier: z.number().positive().default(4),
});

export type BatchRunSettings = z.infer<typeof BatchRunSettingsSchema>;
export type BatchRunSettingsInput = z.input<typeof BatchRunSettingsSchema>;

/**
 * Parse with a schema, converting validation failures into ConfigError.
 *
 * @param schema - Zod schema
 * @param input - Raw value
 * @param label - What is being parsed (used in the message)
 */
function parseOrThrow<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  input: unknown,
  label: string
): z.infer<TSchema> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${label}: ${issues}`, { cause: result.error });
  }
  return result.data;
}

export function parseModelConfig(input: unknown): ModelConfig {
  return parseOrThrow(ModelConfigSchema, input, 'model configuration');
}

export function parseEngineSettings(input: unknown): EngineSettings {
  return parseOrThrow(EngineSettingsSchema, input, 'engine settings');
}

export function parseBatchRunSettings(input: unknown): BatchRunSettings {
  return parseOrThrow(BatchRunSettingsSchema, input, 'batch run settings');
}
