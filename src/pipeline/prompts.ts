/**
 * Prompt templates for file, chunk and aggregate summarization.
 */

import type { SummaryPrompt } from '../providers/provider-adapter.js';
import type { ChunkType } from '../types/summary.js';

/**
 * Template selector.
 * - 'file': content larger than the chunk threshold, structured analysis
 * - 'chunk': smaller fragment, brief summary
 * - 'aggregate': combine many summaries into one overview
 */
export type PromptKind = 'file' | 'chunk' | 'aggregate';

export const FILE_SUMMARY_SYSTEM = [
  'You are a senior software engineer reviewing source code.',
  'Write a concise, technical summary of the file below covering:',
  '- its primary purpose and behaviour',
  '- key data structures and what they represent',
  '- the public interface (exported functions, classes, methods)',
  '- notable algorithms or business rules',
  '- dependencies and integrations',
  '- architectural patterns worth knowing about',
  '',
  'Use precise terminology. Keep the answer under 300 tokens.',
].join('\n');

export const CHUNK_SUMMARY_SYSTEM = [
  'You are reviewing a fragment of a source file. Briefly describe:',
  '- what the code does',
  '- its main functions or methods and their roles',
  '- important data structures',
  '- notable patterns or algorithms',
  '',
  'Keep the answer under 150 tokens.',
].join('\n');

export const AGGREGATE_SUMMARY_SYSTEM = [
  'Merge the file summaries below into one coherent project overview, organised by:',
  '- project structure and architecture',
  '- key modules and their responsibilities',
  '- main features',
  '- technology stack and dependencies',
  '- notable patterns and design decisions',
  '',
  'Write it as technical documentation.',
].join('\n');

/**
 * Fields available to file and chunk templates.
 */
export interface ContentPromptFields {
  identifier: string;
  language: string;
  chunkType: ChunkType;
  content: string;
}

/**
 * Render a file or chunk summarization prompt.
 *
 * @param kind - 'file' or 'chunk'
 * @param fields - Request fields with content already fitted to budget
 */
export function renderContentPrompt(
  kind: Exclude<PromptKind, 'aggregate'>,
  fields: ContentPromptFields
): SummaryPrompt {
  if (kind === 'file') {
    return {
      system: FILE_SUMMARY_SYSTEM,
      user: `File: ${fields.identifier}\nLanguage: ${fields.language}\nContent:\n${fields.content}`,
    };
  }
  return {
    system: CHUNK_SUMMARY_SYSTEM,
    user: `Chunk type: ${fields.chunkType}\nLanguage: ${fields.language}\nContent:\n${fields.content}`,
  };
}

/**
 * Render an aggregation prompt.
 *
 * @param summaries - Joined summaries, already fitted to budget
 */
export function renderAggregatePrompt(summaries: string): SummaryPrompt {
  return {
    system: AGGREGATE_SUMMARY_SYSTEM,
    user: `File summaries:\n${summaries}`,
  };
}
