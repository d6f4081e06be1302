/**
 * Configuration derived from environment variables.
 */

import type { EngineSettingsInput, ModelConfig, Provider } from '../types/config.js';
import { parseModelConfig } from '../types/config.js';
import { ConfigError } from '../errors.js';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Per-provider environment defaults, in fallback order.
 */
const ENV_PROVIDERS: ReadonlyArray<{
  provider: Provider;
  keyVars: string[];
  modelVar: string;
  defaultModel: string;
  maxTokens: number;
}> = [
  {
    provider: 'perplexity',
    keyVars: ['PPLX_API_KEY', 'PERPLEXITY_API_KEY'],
    modelVar: 'PERPLEXITY_MODEL',
    defaultModel: 'sonar-large-chat',
    maxTokens: 16_000,
  },
  {
    provider: 'openai',
    keyVars: ['OPENAI_API_KEY'],
    modelVar: 'OPENAI_MODEL',
    defaultModel: 'gpt-4o',
    maxTokens: 8000,
  },
  {
    provider: 'anthropic',
    keyVars: ['ANTHROPIC_API_KEY'],
    modelVar: 'ANTHROPIC_MODEL',
    defaultModel: 'claude-3-sonnet-20240229',
    maxTokens: 100_000,
  },
];

const numberFromEnv = (value: string | undefined): number | undefined => {
  if (!value) return undefined;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? undefined : parsed;
};

const booleanFromEnv = (value: string | undefined): boolean | undefined => {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return undefined;
};

/**
 * Build the provider chain configuration from API keys in the environment.
 * Order: perplexity, openai, anthropic (only those with a key).
 *
 * @param env - Environment (default: process.env)
 * @throws ConfigError when no API key is set
 */
export function modelConfigsFromEnv(env: Env = process.env): ModelConfig[] {
  const models: ModelConfig[] = [];

  for (const entry of ENV_PROVIDERS) {
    const apiKey = entry.keyVars.map((name) => env[name]).find((value) => !!value);
    if (!apiKey) continue;

    models.push(
      parseModelConfig({
        provider: entry.provider,
        model: env[entry.modelVar] || entry.defaultModel,
        apiKey,
        temperature: 0,
        maxTokens: entry.maxTokens,
      })
    );
  }

  if (models.length === 0) {
    throw new ConfigError(
      'No API keys found in environment variables. Set one of: ' +
        'PPLX_API_KEY, OPENAI_API_KEY, or ANTHROPIC_API_KEY'
    );
  }
  return models;
}

/**
 * Engine settings overrides from the environment. Unset or malformed
 * values are left out so schema defaults apply.
 *
 * @param env - Environment (default: process.env)
 */
export function engineSettingsFromEnv(env: Env = process.env): EngineSettingsInput {
  const settings: EngineSettingsInput = {};

  const retryAttempts = numberFromEnv(env.CODE_DIGEST_RETRY_ATTEMPTS);
  if (retryAttempts !== undefined) settings.retryAttempts = retryAttempts;

  const fallbackEnabled = booleanFromEnv(env.CODE_DIGEST_FALLBACK_ENABLED);
  if (fallbackEnabled !== undefined) settings.fallbackEnabled = fallbackEnabled;

  const chunkSize = numberFromEnv(env.CODE_DIGEST_CHUNK_SIZE);
  if (chunkSize !== undefined) settings.chunkSize = chunkSize;

  return settings;
}

/**
 * Guess the provider family from a model name.
 *
 * @param model - Model identifier
 * @returns Provider; 'openai' when nothing matches
 */
export function detectProviderFromModel(model: string): Provider {
  if (model.startsWith('claude-')) return 'anthropic';
  if (model.startsWith('sonar')) return 'perplexity';
  return 'openai';
}

/**
 * Single-model configuration with the provider inferred from the model.
 */
export function legacyModelConfig(options: {
  model: string;
  apiKey: string;
  temperature?: number;
  maxTokens?: number;
}): ModelConfig {
  return parseModelConfig({
    provider: detectProviderFromModel(options.model),
    model: options.model,
    apiKey: options.apiKey,
    temperature: options.temperature,
    maxTokens: options.maxTokens,
  });
}
