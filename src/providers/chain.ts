/**
 * Provider chain: ordered primary + fallback adapters, built once per run.
 */

import type { ModelConfig, ModelConfigInput } from '../types/config.js';
import { parseModelConfig } from '../types/config.js';
import type { AdapterFactory, ProviderAdapter } from './provider-adapter.js';
import { OpenAICompatibleAdapter } from './openai-adapter.js';
import { AnthropicAdapter } from './anthropic-adapter.js';
import { ConfigError, describeError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';

/**
 * One configured backend.
 */
export interface ProviderLink {
  readonly config: ModelConfig;
  readonly adapter: ProviderAdapter;
}

/**
 * Non-empty, ordered chain. Index 0 is the primary provider.
 */
export type ProviderChain = readonly [ProviderLink, ...ProviderLink[]];

/**
 * Create the adapter variant matching a configuration.
 *
 * @param config - Validated model configuration
 * @returns Adapter for the configured backend
 */
export function createProviderAdapter(config: ModelConfig): ProviderAdapter {
  switch (config.provider) {
    case 'openai':
    case 'perplexity':
      return new OpenAICompatibleAdapter(config);
    case 'anthropic':
      return new AnthropicAdapter(config);
    default: {
      const unknown: never = config.provider;
      throw new ConfigError(`Unknown provider: ${String(unknown)}`);
    }
  }
}

/**
 * Chain construction options.
 */
export interface ProviderChainOptions {
  /** Adapter factory (default: createProviderAdapter) */
  factory?: AdapterFactory;

  logger?: Logger;
}

/**
 * Build the provider chain.
 *
 * Malformed configurations abort construction. Entries whose adapter can not
 * be constructed are logged and skipped.
 *
 * @param configs - Model configurations in fallback order
 * @param options - Factory and logger overrides
 * @returns Non-empty chain
 * @throws ConfigError when no provider could be initialized
 */
export function buildProviderChain(
  configs: ReadonlyArray<ModelConfig | ModelConfigInput>,
  options: ProviderChainOptions = {}
): ProviderChain {
  const factory = options.factory ?? createProviderAdapter;
  const log = options.logger ?? defaultLogger;

  const validated = configs.map((config, index) => {
    try {
      return parseModelConfig(config);
    } catch (error) {
      throw new ConfigError(
        `Invalid model configuration at index ${index}: ${describeError(error)}`,
        { cause: error }
      );
    }
  });

  const links: ProviderLink[] = [];
  for (const config of validated) {
    try {
      links.push({ config, adapter: factory(config) });
      log.info(
        { provider: config.provider, model: config.model },
        'Initialized provider'
      );
    } catch (error) {
      log.warn(
        { provider: config.provider, model: config.model, err: error },
        'Failed to initialize provider, skipping'
      );
    }
  }

  const [primary, ...fallbacks] = links;
  if (!primary) {
    throw new ConfigError('No AI providers could be initialized');
  }
  return [primary, ...fallbacks];
}
