/**
 * Unit tests for the SDK-backed provider adapters.
 *
 * Both SDKs are replaced with in-process fakes; no request leaves the test.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const sdk = vi.hoisted(() => {
  const openaiOptions: unknown[] = [];
  const anthropicOptions: unknown[] = [];
  return {
    openaiOptions,
    anthropicOptions,
    createCompletion: vi.fn(),
    createMessage: vi.fn(),
  };
});

vi.mock('openai', () => ({
  default: class {
    chat = { completions: { create: sdk.createCompletion } };
    constructor(options: unknown) {
      sdk.openaiOptions.push(options);
    }
  },
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: sdk.createMessage };
    constructor(options: unknown) {
      sdk.anthropicOptions.push(options);
    }
  },
}));

import { OpenAICompatibleAdapter } from '../providers/openai-adapter.js';
import { AnthropicAdapter } from '../providers/anthropic-adapter.js';
import { cappedMaxTokens } from '../providers/capabilities.js';
import { ConfigError, ProviderError } from '../errors.js';
import { parseModelConfig } from '../types/config.js';

const prompt = { system: 'Summarize.', user: 'File: a.ts\nLanguage: typescript\nContent:\nx' };

beforeEach(() => {
  sdk.openaiOptions.length = 0;
  sdk.anthropicOptions.length = 0;
  sdk.createCompletion.mockReset();
  sdk.createMessage.mockReset();
});

describe('cappedMaxTokens', () => {
  it('should apply the provider output ceiling to unlisted models', () => {
    expect(cappedMaxTokens('perplexity', 'sonar-large-chat', 16_000)).toBe(4096);
    expect(cappedMaxTokens('openai', 'gpt-4o', 8000)).toBe(8000);
    expect(cappedMaxTokens('anthropic', 'claude-next', 100_000)).toBe(64_000);
  });

  it('should apply the lower ceiling of a listed model', () => {
    expect(cappedMaxTokens('anthropic', 'claude-3-sonnet-20240229', 100_000)).toBe(4096);
    expect(cappedMaxTokens('anthropic', 'claude-3-5-sonnet-20241022', 100_000)).toBe(8192);
    expect(cappedMaxTokens('openai', 'gpt-4', 16_000)).toBe(8192);
    expect(cappedMaxTokens('openai', 'gpt-3.5-turbo', 1000)).toBe(1000);
  });
});

describe('OpenAICompatibleAdapter', () => {
  it('should send a system and user message with capped max_tokens', async () => {
    sdk.createCompletion.mockResolvedValue({
      choices: [{ message: { content: 'A summary' } }],
    });
    const adapter = new OpenAICompatibleAdapter(
      parseModelConfig({ provider: 'openai', model: 'gpt-4o', apiKey: 'test-key', maxTokens: 20_000 })
    );

    const text = await adapter.invoke(prompt);

    expect(text).toBe('A summary');
    expect(sdk.createCompletion).toHaveBeenCalledWith({
      model: 'gpt-4o',
      temperature: 0,
      max_tokens: 16_384,
      messages: [
        { role: 'system', content: 'Summarize.' },
        { role: 'user', content: prompt.user },
      ],
    });
    expect(sdk.openaiOptions).toEqual([{ apiKey: 'test-key', maxRetries: 0 }]);
  });

  it('should point perplexity at its endpoint', async () => {
    sdk.createCompletion.mockResolvedValue({ choices: [{ message: { content: 'ok' } }] });
    const adapter = new OpenAICompatibleAdapter(
      parseModelConfig({ provider: 'perplexity', model: 'sonar-large-chat', apiKey: 'test-key' })
    );

    await adapter.invoke(prompt);

    expect(adapter.provider).toBe('perplexity');
    expect(sdk.openaiOptions).toEqual([
      { apiKey: 'test-key', baseURL: 'https://api.perplexity.ai', maxRetries: 0 },
    ]);
    expect(sdk.createCompletion.mock.calls[0][0].max_tokens).toBe(4096);
  });

  it('should reject an empty response', async () => {
    sdk.createCompletion.mockResolvedValue({ choices: [{ message: { content: null } }] });
    const adapter = new OpenAICompatibleAdapter(
      parseModelConfig({ provider: 'openai', model: 'gpt-4o', apiKey: 'test-key' })
    );

    await expect(adapter.invoke(prompt)).rejects.toThrow(ProviderError);
  });

  it('should propagate SDK errors unchanged', async () => {
    sdk.createCompletion.mockRejectedValue(new Error('429 Too Many Requests'));
    const adapter = new OpenAICompatibleAdapter(
      parseModelConfig({ provider: 'openai', model: 'gpt-4o', apiKey: 'test-key' })
    );

    await expect(adapter.invoke(prompt)).rejects.toThrow('429 Too Many Requests');
  });

  it('should refuse an anthropic configuration', () => {
    expect(
      () =>
        new OpenAICompatibleAdapter(
          parseModelConfig({ provider: 'anthropic', model: 'claude-3-haiku-20240307', apiKey: 'test-key' })
        )
    ).toThrow(ConfigError);
  });
});

describe('AnthropicAdapter', () => {
  it('should pass the system prompt separately and join text blocks', async () => {
    sdk.createMessage.mockResolvedValue({
      content: [
        { type: 'text', text: 'Part one.' },
        { type: 'tool_use', id: 'tool-1', name: 'noop', input: {} },
        { type: 'text', text: ' Part two.' },
      ],
    });
    const adapter = new AnthropicAdapter(
      parseModelConfig({
        provider: 'anthropic',
        model: 'claude-3-sonnet-20240229',
        apiKey: 'test-key',
        temperature: 1.5,
        maxTokens: 100_000,
      })
    );

    const text = await adapter.invoke(prompt);

    expect(text).toBe('Part one. Part two.');
    expect(sdk.createMessage).toHaveBeenCalledWith({
      model: 'claude-3-sonnet-20240229',
      max_tokens: 4096,
      temperature: 1,
      system: 'Summarize.',
      messages: [{ role: 'user', content: prompt.user }],
    });
    expect(sdk.anthropicOptions).toEqual([{ apiKey: 'test-key', maxRetries: 0 }]);
  });

  it('should reject a response without text', async () => {
    sdk.createMessage.mockResolvedValue({ content: [] });
    const adapter = new AnthropicAdapter(
      parseModelConfig({ provider: 'anthropic', model: 'claude-3-haiku-20240307', apiKey: 'test-key' })
    );

    await expect(adapter.invoke(prompt)).rejects.toThrow('anthropic returned an empty response');
  });

  it('should refuse a non-anthropic configuration', () => {
    expect(
      () =>
        new AnthropicAdapter(
          parseModelConfig({ provider: 'openai', model: 'gpt-4o', apiKey: 'test-key' })
        )
    ).toThrow('AnthropicAdapter cannot serve provider openai');
  });
});
