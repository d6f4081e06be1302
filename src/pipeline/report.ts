/**
 * Report rendering for a completed run.
 */

import type { UsageSnapshot } from '../types/summary.js';
import type { BatchRunResult, MasterSummary } from './batch-runner.js';

export type ReportFormat = 'markdown' | 'json' | 'text';

export interface ReportInput {
  master: MasterSummary;
  run: BatchRunResult;

  /** Include Processing Statistics when present */
  usage?: UsageSnapshot;

  /** Codebase root shown in the markdown header */
  codebase?: string;

  /** Run duration (ms) */
  processingTimeMs?: number;

  /** Header timestamp (default: now) */
  generatedAt?: Date;
}

/**
 * Render a run in the requested format.
 */
export function renderReport(input: ReportInput, format: ReportFormat = 'markdown'): string {
  switch (format) {
    case 'json':
      return renderJson(input);
    case 'text':
      return `MASTER SUMMARY\n${'='.repeat(50)}\n\n${input.master.summary}\n\n`;
    case 'markdown':
      return renderMarkdown(input);
  }
}

function renderJson(input: ReportInput): string {
  const { run } = input;
  return JSON.stringify(
    {
      masterSummary: input.master.summary,
      fileSummaries: Object.fromEntries(run.fileSummaries),
      stats: {
        filesProcessed: run.filesProcessed,
        chunksCreated: run.chunksCreated,
        fallbacksUsed: fallbacksUsed(input),
        errors: run.errors,
        processingTime: formatDuration(input.processingTimeMs),
        aiUsage: input.usage,
      },
    },
    null,
    2
  );
}

function renderMarkdown(input: ReportInput): string {
  const { run, usage } = input;

  const lines = [
    '# Codebase Analysis Summary',
    '',
    `**Generated:** ${formatTimestamp(input.generatedAt ?? new Date())}`,
  ];
  if (input.codebase !== undefined) {
    lines.push(`**Codebase:** ${input.codebase}`);
  }
  lines.push(`**Files Processed:** ${run.filesProcessed}`, '', '## Overview', '', input.master.summary, '');

  if (usage) {
    lines.push(
      '## Processing Statistics',
      '',
      `- **Files processed:** ${run.filesProcessed}`,
      `- **Chunks created:** ${run.chunksCreated}`,
      `- **AI requests:** ${usage.totalRequests}`,
      `- **Tokens used:** ${usage.totalTokensUsed}`,
      `- **Estimated cost:** $${usage.estimatedCost.toFixed(4)}`,
      `- **Processing time:** ${formatDuration(input.processingTimeMs)}`,
      `- **Primary provider:** ${usage.primaryProvider} (${usage.primaryModel})`,
      `- **Providers configured:** ${usage.providersConfigured}`,
      `- **Fallbacks used:** ${fallbacksUsed(input)}`,
      ''
    );

    const providers = Object.entries(usage.providerStats);
    if (providers.length > 1) {
      lines.push('### Provider Breakdown', '');
      for (const [provider, stats] of providers) {
        lines.push(
          `- **${provider}:** ${stats.requests} requests, ${stats.tokens} tokens, ${stats.errors} errors`
        );
      }
      lines.push('');
    }
  }

  if (run.errors.length > 0) {
    lines.push('## Errors', '', ...run.errors.map((error) => `- ${error}`), '');
  }

  return lines.join('\n');
}

/** File and chunk fallbacks plus the master aggregation's */
function fallbacksUsed({ run, master }: ReportInput): number {
  return run.fallbacksUsed + (master.fallbackUsed ? 1 : 0);
}

function formatDuration(ms: number | undefined): string {
  return ms === undefined ? 'Unknown' : `${(ms / 1000).toFixed(2)} seconds`;
}

/** YYYY-MM-DD HH:MM:SS in local time */
function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
