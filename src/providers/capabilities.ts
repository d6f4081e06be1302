/**
 * Provider capabilities and request limits.
 */

import type { Provider } from '../types/config.js';

/**
 * Provider capabilities.
 */
export interface ProviderCapabilities {
  /** Provider identifier */
  provider: Provider;

  /** SDK family used to reach the backend */
  client: 'openai' | 'anthropic';

  /** API base URL override (omit = SDK default) */
  baseURL?: string;

  /** Hard ceiling on response tokens, applied regardless of configuration */
  maxOutputTokens: number;
}

/**
 * Get capabilities for a provider.
 *
 * @param provider - Provider identifier
 * @returns Provider capabilities
 */
export function getProviderCapabilities(provider: Provider): ProviderCapabilities {
  switch (provider) {
    case 'perplexity':
      return {
        provider: 'perplexity',
        client: 'openai',
        baseURL: 'https://api.perplexity.ai',
        maxOutputTokens: 4096,
      };

    case 'openai':
      return {
        provider: 'openai',
        client: 'openai',
        maxOutputTokens: 16_384,
      };

    case 'anthropic':
      return {
        provider: 'anthropic',
        client: 'anthropic',
        maxOutputTokens: 64_000,
      };

    default: {
      const unknown: never = provider;
      throw new Error(`Unknown provider: ${String(unknown)}`);
    }
  }
}

/**
 * Response token ceilings of individual models, where lower than their
 * provider's.
 */
export const MODEL_OUTPUT_LIMITS: Readonly<Record<string, number>> = {
  'gpt-4': 8192,
  'gpt-4-turbo': 4096,
  'gpt-3.5-turbo': 4096,
  'claude-3-opus-20240229': 4096,
  'claude-3-sonnet-20240229': 4096,
  'claude-3-haiku-20240307': 4096,
  'claude-3-5-sonnet-20241022': 8192,
  'claude-3-5-haiku-20241022': 8192,
  'claude-2.1': 4096,
  'claude-2.0': 4096,
  'claude-instant-1.2': 4096,
};

/**
 * Response token cap actually sent to the backend: the configured value,
 * bounded by the provider's and then the model's ceiling.
 *
 * @param provider - Provider identifier
 * @param model - Model identifier
 * @param configured - Configured maxTokens
 */
export function cappedMaxTokens(provider: Provider, model: string, configured: number): number {
  const capped = Math.min(configured, getProviderCapabilities(provider).maxOutputTokens);
  return Object.hasOwn(MODEL_OUTPUT_LIMITS, model)
    ? Math.min(capped, MODEL_OUTPUT_LIMITS[model])
    : capped;
}
