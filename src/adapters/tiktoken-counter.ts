/**
 * TiktokenCounter: Exact token counting via tiktoken.
 *
 * Perplexity and Anthropic models have no public local tokenizer; they are
 * counted with cl100k_base as an approximation.
 */

import { get_encoding } from 'tiktoken';
import type { Tiktoken, TiktokenEncoding } from 'tiktoken';
import type { TokenCounter } from './token-counter.js';
import {
  lookupContextLimit,
  TRUNCATION_MARKER,
  TRUNCATION_RESERVE,
} from './token-counter.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';

/**
 * Encoding used for models missing from the tables below.
 */
export const DEFAULT_ENCODING: TiktokenEncoding = 'cl100k_base';

/**
 * Explicit model → encoding mapping.
 */
const MODEL_ENCODINGS: Readonly<Record<string, TiktokenEncoding>> = {
  'gpt-4': 'cl100k_base',
  'gpt-4-turbo': 'cl100k_base',
  'gpt-3.5-turbo': 'cl100k_base',
  'gpt-3.5-turbo-16k': 'cl100k_base',
  'sonar-large-chat': 'cl100k_base',
  'sonar-medium-chat': 'cl100k_base',
  'sonar-small-chat': 'cl100k_base',
  'sonar-large-online': 'cl100k_base',
  'sonar-medium-online': 'cl100k_base',
  'claude-3-opus-20240229': 'cl100k_base',
  'claude-3-sonnet-20240229': 'cl100k_base',
  'claude-3-haiku-20240307': 'cl100k_base',
  'claude-2.1': 'cl100k_base',
  'claude-2.0': 'cl100k_base',
  'claude-instant-1.2': 'cl100k_base',
};

/**
 * Model families on the newer o200k vocabulary (matched by prefix).
 */
const O200K_PREFIXES = ['gpt-4o', 'gpt-4.1', 'o1', 'o3', 'o4'];

/**
 * Resolve the tiktoken encoding for a model.
 *
 * @param model - Model identifier
 * @returns Encoding name and whether the model was recognized
 */
export function resolveEncoding(model: string): {
  encoding: TiktokenEncoding;
  known: boolean;
} {
  if (Object.hasOwn(MODEL_ENCODINGS, model)) {
    return { encoding: MODEL_ENCODINGS[model], known: true };
  }
  if (O200K_PREFIXES.some((prefix) => model.startsWith(prefix))) {
    return { encoding: 'o200k_base', known: true };
  }
  return { encoding: DEFAULT_ENCODING, known: false };
}

/**
 * TokenCounter backed by tiktoken encoders, memoized per model name.
 */
export class TiktokenCounter implements TokenCounter {
  private readonly encoders = new Map<string, Tiktoken>();
  private readonly decoder = new TextDecoder();
  private readonly logger: Logger;

  /**
   * Create a TiktokenCounter.
   *
   * @param logger - Logger for tokenizer fallbacks
   */
  constructor(logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  countTokens(text: string, model: string): number {
    if (text.length === 0) {
      return 0;
    }
    return this.encode(text, model).length;
  }

  contextLimit(model: string): number {
    return lookupContextLimit(model);
  }

  truncate(text: string, maxTokens: number, model: string): string {
    if (maxTokens <= 0) {
      return '';
    }

    const tokens = this.encode(text, model);
    if (tokens.length <= maxTokens) {
      return text;
    }

    // Decoding a prefix can split a multi-byte character, and re-encoding
    // the decoded text can yield more tokens; shrink until the result fits.
    let keep = Math.max(0, maxTokens - TRUNCATION_RESERVE);
    for (;;) {
      const candidate = this.decode(tokens.subarray(0, keep), model) + TRUNCATION_MARKER;
      const count = this.countTokens(candidate, model);
      if (count <= maxTokens) {
        return candidate;
      }
      if (keep === 0) {
        break;
      }
      keep = Math.max(0, keep - (count - maxTokens));
    }

    // Budget smaller than the marker itself: hard cut.
    keep = maxTokens;
    for (;;) {
      const candidate = this.decode(tokens.subarray(0, keep), model);
      const count = this.countTokens(candidate, model);
      if (count <= maxTokens) {
        return candidate;
      }
      keep = Math.max(0, keep - (count - maxTokens));
    }
  }

  /**
   * Free all cached encoders. The counter stays usable; encoders are
   * recreated on demand.
   */
  dispose(): void {
    for (const encoder of this.encoders.values()) {
      encoder.free();
    }
    this.encoders.clear();
  }

  private encode(text: string, model: string): Uint32Array {
    // Special-token strings inside source files are ordinary text here.
    return this.encoderFor(model).encode(text, [], []);
  }

  private decode(tokens: Uint32Array, model: string): string {
    return this.decoder.decode(this.encoderFor(model).decode(tokens));
  }

  private encoderFor(model: string): Tiktoken {
    const cached = this.encoders.get(model);
    if (cached) {
      return cached;
    }

    const { encoding, known } = resolveEncoding(model);
    if (!known) {
      this.logger.debug({ model, encoding }, 'Unknown model, using default encoding');
    }
    const encoder = get_encoding(encoding);
    this.encoders.set(model, encoder);
    return encoder;
  }
}
