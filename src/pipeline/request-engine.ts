/**
 * SummarizationEngine: multi-provider request pipeline with ordered
 * fallback, per-provider retry with exponential backoff, token-budget
 * truncation and hierarchical aggregation.
 *
 * Provider failures never escape `summarize` or `aggregate`; they are
 * encoded in the returned SummaryResponse. Only configuration problems
 * throw, and only from `createSummarizationEngine`.
 */

import type { EngineSettings, EngineSettingsInput, ModelConfig, ModelConfigInput } from '../types/config.js';
import { parseEngineSettings } from '../types/config.js';
import type { SummaryRequest, SummaryResponse, UsageSnapshot } from '../types/summary.js';
import type { TokenCounter } from '../adapters/token-counter.js';
import { TiktokenCounter } from '../adapters/tiktoken-counter.js';
import type { AdapterFactory, SummaryPrompt } from '../providers/provider-adapter.js';
import { buildProviderChain, type ProviderChain, type ProviderLink } from '../providers/chain.js';
import { renderAggregatePrompt, renderContentPrompt, type PromptKind } from './prompts.js';
import { reduceHierarchically } from './aggregator.js';
import { UsageLedger } from './usage-ledger.js';
import { describeError, ProviderError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';

/**
 * Summary returned for an empty aggregation input.
 */
export const EMPTY_AGGREGATE_SUMMARY = 'No content to summarize';

/**
 * Engine construction options: the chain plus engine settings.
 */
export type EngineOptions = EngineSettingsInput & {
  /** Model configurations in fallback order (index 0 = primary) */
  models: ReadonlyArray<ModelConfig | ModelConfigInput>;
};

/**
 * Injectable collaborators. All optional.
 */
export interface EngineDependencies {
  logger?: Logger;
  tokenCounter?: TokenCounter;
  adapterFactory?: AdapterFactory;

  /** Backoff sleep (default: setTimeout-based) */
  sleep?: (ms: number) => Promise<void>;

  /** Clock in ms (default: performance.now) */
  now?: () => number;
}

/**
 * Result of one provider's successful attempt.
 */
interface Completion {
  summary: string;
  tokensUsed: number;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Multi-provider summarization engine.
 */
export class SummarizationEngine {
  private readonly ledger: UsageLedger;
  private readonly logger: Logger;
  private readonly tokens: TokenCounter;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  /**
   * Prefer createSummarizationEngine, which validates configuration and
   * builds the chain.
   */
  constructor(
    private readonly chain: ProviderChain,
    private readonly settings: EngineSettings,
    deps: EngineDependencies = {}
  ) {
    this.logger = deps.logger ?? defaultLogger;
    this.tokens = deps.tokenCounter ?? new TiktokenCounter(this.logger);
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => performance.now());
    this.ledger = new UsageLedger(settings.costPerToken, {
      primaryProvider: chain[0].config.provider,
      primaryModel: chain[0].config.model,
      providersConfigured: chain.length,
      fallbackEnabled: settings.fallbackEnabled,
    });
  }

  /**
   * Primary model configuration.
   */
  get primary(): ModelConfig {
    return this.chain[0].config;
  }

  /**
   * Token threshold between the chunk and full-file prompts.
   */
  get chunkSize(): number {
    return this.settings.chunkSize;
  }

  /**
   * Count tokens under the primary model's tokenizer.
   */
  countTokens(text: string): number {
    return this.tokens.countTokens(text, this.primary.model);
  }

  /**
   * Summarize one file or chunk, trying providers in chain order.
   *
   * @param request - Content and attribution
   * @returns Exactly one response; failures are encoded, never thrown
   */
  async summarize(request: SummaryRequest): Promise<SummaryResponse> {
    const kind: Exclude<PromptKind, 'aggregate'> =
      this.countTokens(request.content) > this.settings.chunkSize ? 'file' : 'chunk';

    return this.runWithFallback(request.identifier, async (link) => {
      const model = link.config.model;
      const content = this.tokens.truncate(request.content, this.contentBudget(link), model);
      const prompt = renderContentPrompt(kind, {
        identifier: request.identifier,
        language: request.language,
        chunkType: request.chunkType,
        content,
      });

      const summary = await this.complete(link, content, prompt);
      this.logger.debug(
        { identifier: request.identifier, provider: link.adapter.provider, tokens: summary.tokensUsed },
        'Summarized content'
      );
      return summary;
    });
  }

  /**
   * Combine summaries into one. Uses a single request when the joined text
   * fits the provider's budget, hierarchical reduction otherwise.
   *
   * @param summaries - Partial summaries in scan order
   * @returns Exactly one response; failures are encoded, never thrown
   */
  async aggregate(summaries: readonly string[]): Promise<SummaryResponse> {
    if (summaries.length === 0) {
      return {
        summary: EMPTY_AGGREGATE_SUMMARY,
        tokensUsed: 0,
        processingTimeMs: 0,
        modelUsed: 'none',
        providerUsed: 'none',
        fallbackUsed: false,
      };
    }

    return this.runWithFallback('aggregate', async (link) => {
      const model = link.config.model;
      const budget = this.contentBudget(link);
      const combined = summaries.join('\n\n');

      if (this.tokens.countTokens(combined, model) <= budget) {
        return this.complete(link, combined, renderAggregatePrompt(combined));
      }

      this.logger.info(
        { provider: link.adapter.provider, summaries: summaries.length, budget },
        'Summaries exceed budget, reducing hierarchically'
      );

      let tokensUsed = 0;
      const reduced = await reduceHierarchically(
        summaries,
        this.settings.aggregationBatchSize,
        async (batch) => {
          const content = this.tokens.truncate(batch.join('\n\n'), budget, model);
          const step = await this.complete(link, content, renderAggregatePrompt(content));
          tokensUsed += step.tokensUsed;
          return step.summary;
        }
      );

      this.logger.debug(
        { provider: link.adapter.provider, levels: reduced.levels, reductions: reduced.reductions },
        'Hierarchical aggregation complete'
      );
      return { summary: reduced.result, tokensUsed };
    });
  }

  /**
   * Usage counters plus chain metadata (a copy).
   */
  usageSnapshot(): UsageSnapshot {
    return this.ledger.snapshot();
  }

  /**
   * Tokens available to content for a provider.
   */
  private contentBudget(link: ProviderLink): number {
    const limit = this.tokens.contextLimit(link.config.model);
    return Math.max(0, Math.min(limit - this.settings.promptReserveTokens, link.config.maxTokens));
  }

  /**
   * Send one prompt (with retry) and record the usage.
   *
   * @param link - Provider to use
   * @param content - Content embedded in the prompt (counted as input)
   * @param prompt - Rendered prompt
   */
  private async complete(
    link: ProviderLink,
    content: string,
    prompt: SummaryPrompt
  ): Promise<Completion> {
    const model = link.config.model;
    const text = await this.requestWithRetry(link, prompt);
    const tokensUsed = this.tokens.countTokens(content, model) + this.tokens.countTokens(text, model);
    this.ledger.recordSuccess(link.adapter.provider, tokensUsed);
    return { summary: text.trim(), tokensUsed };
  }

  /**
   * Invoke a provider up to `retryAttempts` times, sleeping 2^attempt
   * seconds between tries.
   *
   * @throws ProviderError when every attempt failed
   */
  private async requestWithRetry(link: ProviderLink, prompt: SummaryPrompt): Promise<string> {
    const provider = link.adapter.provider;
    const { retryAttempts } = this.settings;
    let lastError: unknown;

    for (let attempt = 0; attempt < retryAttempts; attempt++) {
      try {
        return await link.adapter.invoke(prompt);
      } catch (error) {
        lastError = error;
        this.ledger.recordError(provider);

        const isLast = attempt === retryAttempts - 1;
        const waitMs = 2 ** attempt * 1000;
        this.logger.warn(
          { provider, model: link.config.model, attempt: attempt + 1, retryAttempts, waitMs: isLast ? 0 : waitMs, err: error },
          'Provider request failed'
        );
        if (!isLast) {
          await this.sleep(waitMs);
        }
      }
    }

    throw new ProviderError(
      `All retry attempts failed for ${provider}. Last error: ${describeError(lastError)}`,
      provider,
      { cause: lastError }
    );
  }

  /**
   * Try each provider in chain order until one succeeds.
   *
   * @param label - Identifier for logs
   * @param attempt - Work to run against one provider; throws on failure
   */
  private async runWithFallback(
    label: string,
    attempt: (link: ProviderLink) => Promise<Completion>
  ): Promise<SummaryResponse> {
    const startedAt = this.now();
    const elapsed = (): number => this.now() - startedAt;
    const lastIndex = this.chain.length - 1;

    for (const [index, link] of this.chain.entries()) {
      const provider = link.adapter.provider;
      try {
        const completion = await attempt(link);
        return {
          summary: completion.summary,
          tokensUsed: completion.tokensUsed,
          processingTimeMs: elapsed(),
          modelUsed: link.config.model,
          providerUsed: provider,
          fallbackUsed: index > 0,
        };
      } catch (error) {
        const message = describeError(error);
        this.logger.warn({ identifier: label, provider, err: error }, 'Provider failed');

        if (index === lastIndex) {
          this.logger.error({ identifier: label }, 'All providers failed');
          return {
            summary: `Error: All AI providers failed. Last error: ${message}`,
            tokensUsed: 0,
            processingTimeMs: elapsed(),
            modelUsed: 'none',
            providerUsed: 'none',
            error: message,
            fallbackUsed: index > 0,
          };
        }

        if (!this.settings.fallbackEnabled) {
          return {
            summary: `Error: ${provider} failed and fallback disabled`,
            tokensUsed: 0,
            processingTimeMs: elapsed(),
            modelUsed: link.config.model,
            providerUsed: provider,
            error: message,
            fallbackUsed: false,
          };
        }

        this.logger.info({ identifier: label, from: provider }, 'Falling back to next provider');
      }
    }

    // Unreachable: the chain is non-empty and the last index always returns.
    throw new Error('Provider chain exhausted without a result');
  }
}

/**
 * Validate configuration, build the provider chain and create an engine.
 *
 * @param options - Models in fallback order plus engine settings
 * @param deps - Injectable collaborators
 * @throws ConfigError on invalid settings or when no provider initializes
 */
export function createSummarizationEngine(
  options: EngineOptions,
  deps: EngineDependencies = {}
): SummarizationEngine {
  const { models, ...settingsInput } = options;
  const settings = parseEngineSettings(settingsInput);
  const chain = buildProviderChain(models, {
    factory: deps.adapterFactory,
    logger: deps.logger,
  });
  return new SummarizationEngine(chain, settings, deps);
}
