/**
 * ProviderAdapter: uniform wrapper over one backend's request call.
 *
 * An adapter performs exactly one network call per `invoke` and propagates
 * failures. Retry and fallback belong to the request engine.
 */

import type { ModelConfig, Provider } from '../types/config.js';

/**
 * Rendered prompt handed to an adapter.
 */
export interface SummaryPrompt {
  /** System instruction */
  system: string;

  /** User message (formatted content) */
  user: string;
}

/**
 * ProviderAdapter interface.
 */
export interface ProviderAdapter {
  /** Backend family */
  readonly provider: Provider;

  /** Model identifier */
  readonly model: string;

  /**
   * Send one request.
   *
   * @param prompt - Rendered prompt
   * @returns Raw response text
   */
  invoke(prompt: SummaryPrompt): Promise<string>;
}

/**
 * Builds an adapter from configuration. Throws when the configuration can
 * not be served.
 */
export type AdapterFactory = (config: ModelConfig) => ProviderAdapter;
