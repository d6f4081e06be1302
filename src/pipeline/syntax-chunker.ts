/**
 * Declaration-aware chunker.
 *
 * Top-level declarations found by per-language line patterns become chunks
 * of their own. Brace languages end a declaration on the first line where
 * its brackets balance; Python ends it at the next line indented no deeper
 * than the declaration. Small declarations are skipped and oversized ones
 * are re-split by tokens. Content with no qualifying declaration, or in a
 * language without patterns, is chunked by tokens.
 */

import type { ChunkType } from '../types/summary.js';
import { chunkByTokens, type ChunkOptions, type CodeChunk } from './chunker.js';

/** Declarations at or below this many tokens are not chunked */
export const MIN_DECLARATION_TOKENS = 50;

/** Declarations over chunkSize times this are re-split */
export const OVERSIZE_FACTOR = 1.5;

export interface SyntaxChunkOptions extends ChunkOptions {
  /** Default: MIN_DECLARATION_TOKENS */
  minChunkTokens?: number;
}

interface DeclarationPattern {
  kind: string;
  chunkType: ChunkType;
  pattern: RegExp;
}

interface LanguageRules {
  blockEnd: 'indent' | 'brackets';
  patterns: readonly DeclarationPattern[];
}

const PYTHON: LanguageRules = {
  blockEnd: 'indent',
  patterns: [
    { kind: 'function', chunkType: 'function', pattern: /^(async\s+)?def\s+\w+/ },
    { kind: 'class', chunkType: 'class', pattern: /^class\s+\w+/ },
  ],
};

const RUST: LanguageRules = {
  blockEnd: 'brackets',
  patterns: [
    { kind: 'function', chunkType: 'function', pattern: /^(pub(\([\w:]+\))?\s+)?(async\s+)?fn\s+\w+/ },
    { kind: 'struct', chunkType: 'class', pattern: /^(pub(\([\w:]+\))?\s+)?(struct|enum|trait)\s+\w+/ },
    { kind: 'impl', chunkType: 'class', pattern: /^impl\b/ },
    { kind: 'mod', chunkType: 'block', pattern: /^(pub(\([\w:]+\))?\s+)?mod\s+\w+/ },
  ],
};

const GO: LanguageRules = {
  blockEnd: 'brackets',
  patterns: [
    { kind: 'function', chunkType: 'function', pattern: /^func\s+/ },
    { kind: 'type', chunkType: 'class', pattern: /^type\s+\w+/ },
    { kind: 'var', chunkType: 'block', pattern: /^(var|const)\s+/ },
  ],
};

const JAVASCRIPT: LanguageRules = {
  blockEnd: 'brackets',
  patterns: [
    {
      kind: 'function',
      chunkType: 'function',
      pattern: /^(export\s+)?(default\s+)?(async\s+)?function\b/,
    },
    {
      kind: 'class',
      chunkType: 'class',
      pattern: /^(export\s+)?(default\s+)?(abstract\s+)?(class|interface)\s+\w+/,
    },
    { kind: 'const', chunkType: 'block', pattern: /^(export\s+)?const\s+\w+\s*=/ },
  ],
};

const RULES = new Map<string, LanguageRules>([
  ['python', PYTHON],
  ['py', PYTHON],
  ['rust', RUST],
  ['rs', RUST],
  ['go', GO],
  ['golang', GO],
  ['javascript', JAVASCRIPT],
  ['typescript', JAVASCRIPT],
  ['js', JAVASCRIPT],
  ['ts', JAVASCRIPT],
  ['jsx', JAVASCRIPT],
  ['tsx', JAVASCRIPT],
]);

/**
 * Split content into declaration chunks, falling back to chunkByTokens.
 *
 * @returns Chunks in line order; empty for empty content
 */
export function chunkBySyntax(content: string, options: SyntaxChunkOptions): CodeChunk[] {
  const rules = RULES.get(options.language.toLowerCase());
  if (content === '' || !rules) {
    return chunkByTokens(content, options);
  }

  const minTokens = options.minChunkTokens ?? MIN_DECLARATION_TOKENS;
  const lines = content.split('\n');
  const declarations: CodeChunk[] = [];

  for (const [start, line] of lines.entries()) {
    const declaration = rules.patterns.find(({ pattern }) => pattern.test(line));
    if (!declaration) continue;

    const end =
      rules.blockEnd === 'indent' ? indentBlockEnd(lines, start) : bracketBlockEnd(lines, start);
    const text = lines.slice(start, end).join('\n');
    if (options.countTokens(text) <= minTokens) continue;

    declarations.push({
      content: text,
      startLine: start,
      endLine: end,
      chunkType: declaration.chunkType,
      language: options.language,
      metadata: { kind: declaration.kind },
    });
  }

  if (declarations.length === 0) {
    return chunkByTokens(content, options);
  }
  return declarations.flatMap((chunk) => splitOversized(chunk, options));
}

function splitOversized(chunk: CodeChunk, options: ChunkOptions): CodeChunk[] {
  if (options.countTokens(chunk.content) <= options.chunkSize * OVERSIZE_FACTOR) {
    return [chunk];
  }
  return chunkByTokens(chunk.content, options).map((piece) => ({
    ...piece,
    startLine: piece.startLine + chunk.startLine,
    endLine: piece.endLine + chunk.startLine,
  }));
}

/** Exclusive end: first later non-blank line indented at most as deep as `start` */
function indentBlockEnd(lines: readonly string[], start: number): number {
  const base = indentOf(lines[start]);
  let end = lines.length;
  for (let i = start + 1; i < lines.length; i++) {
    if (lines[i].trim() !== '' && indentOf(lines[i]) <= base) {
      end = i;
      break;
    }
  }
  while (end > start + 1 && lines[end - 1].trim() === '') {
    end--;
  }
  return end;
}

/** Exclusive end: first line (from `start`) where `{[(` and `}])` balance */
function bracketBlockEnd(lines: readonly string[], start: number): number {
  let depth = 0;
  for (let i = start; i < lines.length; i++) {
    for (const char of lines[i]) {
      if (char === '{' || char === '(' || char === '[') depth++;
      else if (char === '}' || char === ')' || char === ']') depth--;
    }
    if (depth <= 0) return i + 1;
  }
  return lines.length;
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}
