/**
 * Line-based chunker for files too large to summarize in one request.
 *
 * Lines are accumulated until the next one would push the chunk over
 * `chunkSize` tokens. Each new chunk starts with the trailing lines of the
 * previous one, proportionally to `overlap / chunkSize`.
 */

import type { ChunkType } from '../types/summary.js';

/**
 * Contiguous span of source lines.
 */
export interface CodeChunk {
  content: string;

  /** First line (0-based, inclusive) */
  startLine: number;

  /** Last line (0-based, exclusive) */
  endLine: number;

  chunkType: ChunkType;
  language: string;

  /** Declaration kind (`function`, `struct`, ...) for syntax chunks */
  metadata?: Readonly<Record<string, string>>;
}

export interface ChunkOptions {
  /** Token ceiling per chunk (a single oversized line still forms a chunk) */
  chunkSize: number;

  /** Overlap target in tokens */
  overlap: number;

  language: string;

  /** Token counter for one line */
  countTokens: (text: string) => number;
}

/**
 * Split content into overlapping line chunks.
 *
 * @returns Chunks in line order; empty for empty content
 */
export function chunkByTokens(content: string, options: ChunkOptions): CodeChunk[] {
  if (content === '') return [];

  const { chunkSize, overlap, language, countTokens } = options;
  const lines = content.split('\n');
  const chunks: CodeChunk[] = [];

  let current: string[] = [];
  let currentTokens = 0;

  const emit = (endLine: number): void => {
    chunks.push({
      content: current.join('\n'),
      startLine: endLine - current.length,
      endLine,
      chunkType: 'block',
      language,
    });
  };

  for (const [index, line] of lines.entries()) {
    const lineTokens = countTokens(line);

    if (currentTokens + lineTokens > chunkSize && current.length > 0) {
      emit(index);

      // Overlap never repeats a whole chunk and never pushes the next one over budget
      const overlapLines = Math.min(
        Math.floor((current.length * overlap) / chunkSize),
        current.length - 1
      );
      current = overlapLines > 0 ? current.slice(-overlapLines) : [];
      currentTokens = current.reduce((sum, kept) => sum + countTokens(kept), 0);
      while (current.length > 0 && currentTokens + lineTokens > chunkSize) {
        const [dropped, ...rest] = current;
        current = rest;
        currentTokens -= countTokens(dropped);
      }
    }

    current.push(line);
    currentTokens += lineTokens;
  }

  if (current.length > 0) {
    emit(lines.length);
  }
  return chunks;
}
