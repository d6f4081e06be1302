/**
 * Unit tests for provider chain construction.
 */

import { describe, it, expect, vi } from 'vitest';
import { buildProviderChain, createProviderAdapter } from '../providers/chain.js';
import { OpenAICompatibleAdapter } from '../providers/openai-adapter.js';
import { AnthropicAdapter } from '../providers/anthropic-adapter.js';
import type { ModelConfig } from '../types/config.js';
import { ScriptedAdapter, reply, silentLogger } from './helpers/fakes.js';

describe('createProviderAdapter', () => {
  it('should serve openai and perplexity through the chat completions adapter', () => {
    const openai = createProviderAdapter({
      provider: 'openai',
      model: 'gpt-4o',
      apiKey: 'test-key',
      temperature: 0,
      maxTokens: 8000,
    });
    const perplexity = createProviderAdapter({
      provider: 'perplexity',
      model: 'sonar-large-chat',
      apiKey: 'test-key',
      temperature: 0,
      maxTokens: 8000,
    });

    expect(openai).toBeInstanceOf(OpenAICompatibleAdapter);
    expect(perplexity).toBeInstanceOf(OpenAICompatibleAdapter);
    expect(perplexity.provider).toBe('perplexity');
  });

  it('should serve anthropic through the messages adapter', () => {
    const adapter = createProviderAdapter({
      provider: 'anthropic',
      model: 'claude-3-haiku-20240307',
      apiKey: 'test-key',
      temperature: 0,
      maxTokens: 8000,
    });

    expect(adapter).toBeInstanceOf(AnthropicAdapter);
    expect(adapter.model).toBe('claude-3-haiku-20240307');
  });
});

describe('buildProviderChain', () => {
  const scripted = vi.fn(
    (config: ModelConfig) => new ScriptedAdapter(config.provider, config.model, reply('ok'))
  );

  it('should keep configuration order and apply defaults', () => {
    const chain = buildProviderChain(
      [
        { provider: 'perplexity', model: 'sonar-large-chat', apiKey: 'test-key' },
        { provider: 'openai', model: 'gpt-4o', apiKey: 'test-key', maxTokens: 8000 },
      ],
      { factory: scripted, logger: silentLogger }
    );

    expect(chain.map((link) => link.config.model)).toEqual(['sonar-large-chat', 'gpt-4o']);
    expect(chain[0].config.temperature).toBe(0);
    expect(chain[0].config.maxTokens).toBe(16_000);
    expect(chain[1].config.maxTokens).toBe(8000);
    expect(Object.isFrozen(chain[0].config)).toBe(true);
  });

  it('should skip providers whose adapter cannot be constructed', () => {
    const chain = buildProviderChain(
      [
        { provider: 'perplexity', model: 'sonar-large-chat', apiKey: 'test-key' },
        { provider: 'anthropic', model: 'claude-3-haiku-20240307', apiKey: 'test-key' },
      ],
      {
        factory: (config) => {
          if (config.provider === 'perplexity') {
            throw new Error('client unavailable');
          }
          return new ScriptedAdapter(config.provider, config.model, reply('ok'));
        },
        logger: silentLogger,
      }
    );

    expect(chain).toHaveLength(1);
    expect(chain[0].adapter.provider).toBe('anthropic');
  });

  it('should fail when no provider initializes', () => {
    expect(() =>
      buildProviderChain([{ provider: 'openai', model: 'gpt-4o', apiKey: 'test-key' }], {
        factory: () => {
          throw new Error('client unavailable');
        },
        logger: silentLogger,
      })
    ).toThrow('No AI providers could be initialized');
  });

  it('should reject a malformed configuration with its index', () => {
    expect(() =>
      buildProviderChain(
        [
          { provider: 'openai', model: 'gpt-4o', apiKey: 'test-key' },
          { provider: 'openai', model: 'gpt-4o', apiKey: '' },
        ],
        { factory: scripted, logger: silentLogger }
      )
    ).toThrow(/^Invalid model configuration at index 1: .*apiKey: API key is required/);
  });
});
