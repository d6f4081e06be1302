/**
 * Anthropic adapter.
 *
 * Uses the Messages API with the system prompt passed separately.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { ModelConfig } from '../types/config.js';
import type { ProviderAdapter, SummaryPrompt } from './provider-adapter.js';
import { cappedMaxTokens } from './capabilities.js';
import { ConfigError, ProviderError } from '../errors.js';

export class AnthropicAdapter implements ProviderAdapter {
  readonly provider = 'anthropic' as const;
  readonly model: string;

  private readonly client: Anthropic;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(config: ModelConfig) {
    if (config.provider !== 'anthropic') {
      throw new ConfigError(`AnthropicAdapter cannot serve provider ${config.provider}`);
    }

    this.model = config.model;
    // Messages API accepts temperature in [0, 1]
    this.temperature = Math.min(config.temperature, 1);
    this.maxTokens = cappedMaxTokens('anthropic', config.model, config.maxTokens);
    this.client = new Anthropic({ apiKey: config.apiKey, maxRetries: 0 });
  }

  async invoke(prompt: SummaryPrompt): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      temperature: this.temperature,
      system: prompt.system,
      messages: [{ role: 'user', content: prompt.user }],
    });

    const text = response.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('');
    if (!text) {
      throw new ProviderError('anthropic returned an empty response', this.provider);
    }
    return text;
  }
}
