/**
 * End-to-end run over scripted backends: file summaries, master summary
 * and report.
 */

import { describe, it, expect } from 'vitest';
import { createMasterSummary, summarizeFiles } from '../pipeline/batch-runner.js';
import { renderReport } from '../pipeline/report.js';
import { ScriptedAdapter, buildEngine, echoContent, failWith, silentLogger } from './helpers/fakes.js';

describe('summarization run', () => {
  it('should fail over to the second provider for every request', async () => {
    const primary = new ScriptedAdapter('perplexity', 'sonar-large-chat', failWith('503 unavailable'));
    const backup = new ScriptedAdapter('openai', 'gpt-4o', (prompt, call) =>
      prompt.user.startsWith('File summaries:') ? 'Two small modules.' : echoContent(prompt, call)
    );
    const { engine, sleeps } = buildEngine([primary, backup], { retryAttempts: 2 });
    const files = [
      { path: 'src/a.ts', language: 'typescript', content: 'export const a = 1;' },
      { path: 'src/b.ts', language: 'typescript', content: 'export const b = 2;' },
    ];

    const run = await summarizeFiles(engine, files, {}, { logger: silentLogger });
    const master = await createMasterSummary(engine, run, files, { logger: silentLogger });
    const usage = engine.usageSnapshot();

    expect([...run.fileSummaries.values()]).toEqual([
      'about export const a = 1;',
      'about export const b = 2;',
    ]);
    expect(run.fallbacksUsed).toBe(2);
    expect(master).toEqual({ summary: 'Two small modules.', fallbackUsed: true });
    // two attempts per request on the primary, one backoff each
    expect(primary.calls).toHaveLength(6);
    expect(sleeps).toEqual([1000, 1000, 1000]);
    expect(usage.totalRequests).toBe(3);
    expect(usage.providerStats.perplexity).toEqual({ requests: 0, tokens: 0, errors: 6 });
    expect(usage.providerStats.openai.requests).toBe(3);

    const report = renderReport(
      { master, run, usage, generatedAt: new Date(2026, 0, 1) },
      'markdown'
    );
    expect(report).toContain('- **AI requests:** 3\n');
    expect(report).toContain('- **Fallbacks used:** 3\n');
    expect(report).toContain('- **perplexity:** 0 requests, 0 tokens, 6 errors\n');
    expect(report).toContain('- **Primary provider:** perplexity (sonar-large-chat)\n');
  });
});
