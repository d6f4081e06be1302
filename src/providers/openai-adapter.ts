/**
 * OpenAI-compatible adapter.
 *
 * Serves OpenAI directly and Perplexity through its OpenAI-compatible chat
 * completions endpoint.
 */

import OpenAI from 'openai';
import type { ModelConfig, Provider } from '../types/config.js';
import type { ProviderAdapter, SummaryPrompt } from './provider-adapter.js';
import { cappedMaxTokens, getProviderCapabilities } from './capabilities.js';
import { ConfigError, ProviderError } from '../errors.js';

/**
 * Adapter over the chat completions API.
 */
export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly provider: Provider;
  readonly model: string;

  private readonly client: OpenAI;
  private readonly temperature: number;
  private readonly maxTokens: number;

  /**
   * Create an adapter.
   *
   * @param config - Model configuration (provider 'openai' or 'perplexity')
   */
  constructor(config: ModelConfig) {
    const capabilities = getProviderCapabilities(config.provider);
    if (capabilities.client !== 'openai') {
      throw new ConfigError(
        `Provider ${config.provider} is not served by the chat completions API`
      );
    }

    this.provider = config.provider;
    this.model = config.model;
    this.temperature = config.temperature;
    this.maxTokens = cappedMaxTokens(config.provider, config.model, config.maxTokens);
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: capabilities.baseURL,
      maxRetries: 0, // retries are owned by the request engine
    });
  }

  async invoke(prompt: SummaryPrompt): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      max_tokens: this.maxTokens,
      messages: [
        { role: 'system', content: prompt.system },
        { role: 'user', content: prompt.user },
      ],
    });

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new ProviderError(`${this.provider} returned an empty response`, this.provider);
    }
    return content;
  }
}
