/**
 * Usage ledger: running request/token/error counters.
 *
 * Every mutation is a synchronous read-modify-write with no await inside,
 * so concurrent summarize calls sharing one ledger can not lose updates.
 */

import type { ProviderUsage, UsageSnapshot } from '../types/summary.js';

/**
 * Chain metadata echoed on every snapshot.
 */
export interface LedgerChainInfo {
  primaryProvider: string;
  primaryModel: string;
  providersConfigured: number;
  fallbackEnabled: boolean;
}

export class UsageLedger {
  private totalRequests = 0;
  private totalTokensUsed = 0;
  private readonly providerStats = new Map<string, ProviderUsage>();

  constructor(
    private readonly costPerToken: number,
    private readonly chain: LedgerChainInfo
  ) {}

  /**
   * Record a completed request.
   *
   * @param provider - Provider that answered
   * @param tokens - Input + output tokens of the request
   */
  recordSuccess(provider: string, tokens: number): void {
    const stats = this.statsFor(provider);
    stats.requests += 1;
    stats.tokens += tokens;
    this.totalRequests += 1;
    this.totalTokensUsed += tokens;
  }

  /**
   * Record a failed attempt (one per retry).
   */
  recordError(provider: string): void {
    this.statsFor(provider).errors += 1;
  }

  /**
   * Copy of the current counters. Never exposes live state.
   */
  snapshot(): UsageSnapshot {
    const providerStats: Record<string, ProviderUsage> = {};
    for (const [provider, stats] of this.providerStats) {
      providerStats[provider] = { ...stats };
    }

    return {
      totalRequests: this.totalRequests,
      totalTokensUsed: this.totalTokensUsed,
      estimatedCost: this.totalTokensUsed * this.costPerToken,
      ...this.chain,
      providerStats,
    };
  }

  private statsFor(provider: string): ProviderUsage {
    let stats = this.providerStats.get(provider);
    if (!stats) {
      stats = { requests: 0, tokens: 0, errors: 0 };
      this.providerStats.set(provider, stats);
    }
    return stats;
  }
}
