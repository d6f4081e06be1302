/**
 * Unit tests for token counting, context limits and truncation.
 */

import { describe, it, expect, afterAll } from 'vitest';
import { TiktokenCounter, resolveEncoding } from '../adapters/tiktoken-counter.js';
import {
  DEFAULT_CONTEXT_LIMIT,
  TRUNCATION_MARKER,
  lookupContextLimit,
} from '../adapters/token-counter.js';
import { silentLogger } from './helpers/fakes.js';

describe('lookupContextLimit', () => {
  it('should return known context windows', () => {
    expect(lookupContextLimit('gpt-4')).toBe(8192);
    expect(lookupContextLimit('gpt-3.5-turbo')).toBe(4096);
    expect(lookupContextLimit('claude-3-sonnet-20240229')).toBe(200_000);
  });

  it('should fall back to the default for unknown models', () => {
    expect(lookupContextLimit('mystery-model')).toBe(DEFAULT_CONTEXT_LIMIT);
    expect(lookupContextLimit('toString')).toBe(DEFAULT_CONTEXT_LIMIT);
  });
});

describe('resolveEncoding', () => {
  it('should map models to encodings', () => {
    expect(resolveEncoding('gpt-4')).toEqual({ encoding: 'cl100k_base', known: true });
    expect(resolveEncoding('gpt-4o-mini')).toEqual({ encoding: 'o200k_base', known: true });
    expect(resolveEncoding('sonar-large-chat')).toEqual({ encoding: 'cl100k_base', known: true });
  });

  it('should use the default encoding for unknown models', () => {
    expect(resolveEncoding('mystery-model')).toEqual({ encoding: 'cl100k_base', known: false });
    expect(resolveEncoding('constructor')).toEqual({ encoding: 'cl100k_base', known: false });
  });
});

describe('TiktokenCounter', () => {
  const counter = new TiktokenCounter(silentLogger);

  afterAll(() => {
    counter.dispose();
  });

  describe('countTokens', () => {
    it('should count tokens exactly', () => {
      expect(counter.countTokens('hello world', 'gpt-4')).toBe(2);
    });

    it('should return 0 for empty text', () => {
      expect(counter.countTokens('', 'gpt-4')).toBe(0);
    });

    it('should count unknown models with the default encoding', () => {
      expect(counter.countTokens('hello world', 'mystery-model')).toBe(2);
    });

    it('should treat special token strings as ordinary text', () => {
      expect(counter.countTokens('<|endoftext|>', 'gpt-4')).toBeGreaterThan(1);
    });
  });

  describe('countTokens growth', () => {
    const pairs: Array<[string, string]> = [
      ['hello', ' world'],
      ['function add(a, b) {', ' return a + b; }'],
      ['naïve café', ' déjà vu'],
      ['日本語', 'のテキスト'],
      ['🙂', '🙂🙂 ok'],
      ['   ', '\n\t'],
      ['line one\n', '\n\nline two'],
    ];

    it.each(['gpt-4', 'gpt-4o'])('should never shrink when text is appended (%s)', (model) => {
      for (const [head, tail] of pairs) {
        expect(counter.countTokens(head + tail, model)).toBeGreaterThanOrEqual(
          counter.countTokens(head, model)
        );
      }
    });
  });

  describe('truncate', () => {
    const long = 'word '.repeat(1000);

    it('should return text that fits unchanged', () => {
      expect(counter.truncate('hello world', 10, 'gpt-4')).toBe('hello world');
    });

    it('should cut to the budget and append the marker', () => {
      const result = counter.truncate(long, 50, 'gpt-4');

      expect(result.endsWith(TRUNCATION_MARKER)).toBe(true);
      expect(result.startsWith('word word')).toBe(true);
      expect(counter.countTokens(result, 'gpt-4')).toBeLessThanOrEqual(50);
    });

    it('should be idempotent', () => {
      const once = counter.truncate(long, 50, 'gpt-4o');

      expect(counter.truncate(once, 50, 'gpt-4o')).toBe(once);
    });

    it('should return an empty string for a zero budget', () => {
      expect(counter.truncate(long, 0, 'gpt-4')).toBe('');
    });

    it('should stay within a budget smaller than the marker', () => {
      const result = counter.truncate(long, 3, 'gpt-4');

      expect(counter.countTokens(result, 'gpt-4')).toBeLessThanOrEqual(3);
    });

    it('should not split multi-byte characters into oversized text', () => {
      const emoji = '🙂'.repeat(500);
      const result = counter.truncate(emoji, 40, 'gpt-4');

      expect(counter.countTokens(result, 'gpt-4')).toBeLessThanOrEqual(40);
    });
  });

  it('should keep working after dispose', () => {
    const local = new TiktokenCounter(silentLogger);
    expect(local.countTokens('hello world', 'gpt-4')).toBe(2);

    local.dispose();

    expect(local.countTokens('hello world', 'gpt-4')).toBe(2);
    local.dispose();
  });
});
