/**
 * Batch runner: summarizes a list of scanned files with bounded
 * concurrency, then reduces the per-file summaries into a master summary.
 */

import type { BatchRunSettingsInput } from '../types/config.js';
import { parseBatchRunSettings } from '../types/config.js';
import type { SummaryResponse } from '../types/summary.js';
import type { SummarizationEngine } from './request-engine.js';
import { chunkBySyntax } from './syntax-chunker.js';
import { describeError, ProcessingError, TimeoutError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logging/logger.js';

/**
 * File handed over by the scanner.
 */
export interface SourceFile {
  /** Path relative to the codebase root; used as the summary key */
  path: string;
  language: string;
  content: string;
  extension?: string;
  size?: number;
}

/**
 * Engine surface the batch runner needs.
 */
export type DigestEngine = Pick<
  SummarizationEngine,
  'summarize' | 'aggregate' | 'countTokens' | 'chunkSize'
>;

export interface BatchRunDependencies {
  logger?: Logger;
}

/**
 * Outcome of summarizeFiles.
 */
export interface BatchRunResult {
  /** path -> summary (or `Error: ...`), in scan order */
  fileSummaries: Map<string, string>;

  /** One message per failed file */
  errors: string[];

  filesProcessed: number;
  chunksCreated: number;
  fallbacksUsed: number;
}

export interface MasterSummary {
  summary: string;

  /** Aggregation was answered by a non-primary provider */
  fallbackUsed: boolean;
}

export const EMPTY_FILE_SUMMARY = 'Empty file';
export const NO_VALID_SUMMARIES = 'No valid summaries could be generated.';

/** Files listed per language in the fallback digest */
const DIGEST_FILES_PER_LANGUAGE = 10;

/** Characters kept per summary in the fallback digest */
const DIGEST_SUMMARY_CHARS = 200;

/**
 * Reject with TimeoutError when `promise` does not settle within `ms`.
 * The underlying work is not cancelled.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  message = `Operation timed out after ${ms}ms`
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(message)), ms);
  });
  return Promise.race([promise, expired]).finally(() => clearTimeout(timer));
}

const isErrorSummary = (summary: string): boolean => summary.startsWith('Error:');

/**
 * Summarize files in windows of `concurrency`. Failed or timed-out files
 * become `Error: ...` entries; the run always completes.
 *
 * @param engine - Summarization engine
 * @param files - Files in scan order
 * @param settingsInput - Batch run settings (defaults apply)
 * @param deps - Injectable logger
 * @throws ConfigError on invalid settings
 */
export async function summarizeFiles(
  engine: DigestEngine,
  files: readonly SourceFile[],
  settingsInput: BatchRunSettingsInput = {},
  deps: BatchRunDependencies = {}
): Promise<BatchRunResult> {
  const settings = parseBatchRunSettings(settingsInput);
  const log = deps.logger ?? defaultLogger;

  const fileSummaries = new Map<string, string>();
  const errors: string[] = [];
  const tally = { filesProcessed: 0, chunksCreated: 0, fallbacksUsed: 0 };

  const noteFallback = (response: SummaryResponse, identifier: string): void => {
    if (!response.fallbackUsed) return;
    tally.fallbacksUsed += 1;
    log.info({ identifier, provider: response.providerUsed }, 'Used fallback provider');
  };

  const summarizeLargeFile = async (file: SourceFile): Promise<string> => {
    const chunks = chunkBySyntax(file.content, {
      chunkSize: engine.chunkSize,
      overlap: settings.chunkOverlap,
      language: file.language,
      countTokens: (text) => engine.countTokens(text),
    });
    tally.chunksCreated += chunks.length;

    const chunkSummaries: string[] = [];
    for (const chunk of chunks) {
      const identifier = `${file.path}:${chunk.startLine}-${chunk.endLine}`;
      const response = await engine.summarize({
        content: chunk.content,
        identifier,
        language: chunk.language,
        chunkType: chunk.chunkType,
        metadata: chunk.metadata,
      });
      noteFallback(response, identifier);

      if (response.error) {
        log.warn({ identifier, error: response.error }, 'Failed to summarize chunk');
        continue;
      }
      chunkSummaries.push(response.summary);
    }

    if (chunkSummaries.length === 0) {
      return `Could not summarize file ${file.path} (all chunks failed)`;
    }
    return 'File summary (chunked):\n' + chunkSummaries.join('\n\n');
  };

  const summarizeFile = async (file: SourceFile): Promise<string> => {
    if (file.content.trim() === '') {
      return EMPTY_FILE_SUMMARY;
    }

    if (engine.countTokens(file.content) > engine.chunkSize * settings.largeFileMultiplier) {
      return summarizeLargeFile(file);
    }

    const response = await engine.summarize({
      content: file.content,
      identifier: file.path,
      language: file.language,
      chunkType: 'file',
      metadata: { size: file.size, extension: file.extension },
    });
    noteFallback(response, file.path);

    if (response.error) {
      throw new ProcessingError(`AI summarization failed: ${response.error}`);
    }
    return response.summary;
  };

  for (let i = 0; i < files.length; i += settings.concurrency) {
    const window = files.slice(i, i + settings.concurrency);
    const results = await Promise.allSettled(
      window.map((file) =>
        withTimeout(
          summarizeFile(file),
          settings.timeoutMs,
          `Timed out after ${settings.timeoutMs}ms`
        )
      )
    );

    for (const [j, result] of results.entries()) {
      const file = window[j];
      if (result.status === 'fulfilled') {
        fileSummaries.set(file.path, result.value);
        tally.filesProcessed += 1;
        log.debug({ identifier: file.path }, 'Processed file');
      } else {
        const message = `Failed to process ${file.path}: ${describeError(result.reason)}`;
        log.error({ identifier: file.path, err: result.reason }, 'File processing failed');
        errors.push(message);
        fileSummaries.set(file.path, `Error: ${message}`);
      }
    }
  }

  return { fileSummaries, errors, ...tally };
}

/**
 * Reduce the non-error file summaries into one. Falls back to a
 * per-language digest when aggregation fails.
 *
 * @param engine - Summarization engine
 * @param run - Result of summarizeFiles
 * @param files - Files in scan order (grouping for the digest)
 */
export async function createMasterSummary(
  engine: DigestEngine,
  run: Pick<BatchRunResult, 'fileSummaries'>,
  files: readonly SourceFile[],
  deps: BatchRunDependencies = {}
): Promise<MasterSummary> {
  const log = deps.logger ?? defaultLogger;
  const valid = [...run.fileSummaries.values()].filter((summary) => !isErrorSummary(summary));

  if (valid.length === 0) {
    return { summary: NO_VALID_SUMMARIES, fallbackUsed: false };
  }

  const response = await engine.aggregate(valid);
  if (response.fallbackUsed) {
    log.info({ provider: response.providerUsed }, 'Used fallback provider for aggregation');
  }

  if (response.error) {
    log.warn({ error: response.error }, 'Aggregation failed, using fallback digest');
    return { summary: fallbackDigest(run.fileSummaries, files), fallbackUsed: response.fallbackUsed };
  }
  return { summary: response.summary, fallbackUsed: response.fallbackUsed };
}

/**
 * Plain digest grouped by language: up to ten files per language, each
 * summary cut to 200 characters.
 */
export function fallbackDigest(
  fileSummaries: ReadonlyMap<string, string>,
  files: readonly SourceFile[]
): string {
  const byLanguage = new Map<string, SourceFile[]>();
  for (const file of files) {
    const group = byLanguage.get(file.language);
    if (group) {
      group.push(file);
    } else {
      byLanguage.set(file.language, [file]);
    }
  }

  const lines = ['# Codebase Summary', ''];
  for (const [language, group] of byLanguage) {
    lines.push(`## ${titleCase(language)} Files`);
    for (const file of group.slice(0, DIGEST_FILES_PER_LANGUAGE)) {
      const summary = fileSummaries.get(file.path);
      if (summary !== undefined && !isErrorSummary(summary)) {
        lines.push(`**${file.path}**: ${summary.slice(0, DIGEST_SUMMARY_CHARS)}...`);
      }
    }
    lines.push('');
  }
  return lines.join('\n');
}

function titleCase(value: string): string {
  return value.toLowerCase().replace(/\b[a-z]/g, (letter) => letter.toUpperCase());
}
