/**
 * Per-pass sync statistics
 */

import type { ListStatus } from '../types.js';

export interface UpdateResult {
  title: string;
  status: ListStatus | null;
  detail?: string;
  skipReason?: string;
  error?: string;
}

export interface StatisticsSummary {
  total: number;
  updated: number;
  skipped: number;
  errors: number;
  dryRun: number;
}

export class Statistics {
  total = 0;
  readonly updated: UpdateResult[] = [];
  readonly skipped: UpdateResult[] = [];
  readonly errored: UpdateResult[] = [];
  readonly dryRun: UpdateResult[] = [];

  incrementTotal(): void {
    this.total++;
  }

  recordUpdate(result: UpdateResult): void {
    this.updated.push(result);
  }

  recordSkip(result: UpdateResult): void {
    this.skipped.push(result);
  }

  recordError(result: UpdateResult): void {
    this.errored.push(result);
  }

  recordDryRun(result: UpdateResult): void {
    this.dryRun.push(result);
  }

  summary(): StatisticsSummary {
    return {
      total: this.total,
      updated: this.updated.length,
      skipped: this.skipped.length,
      errors: this.errored.length,
      dryRun: this.dryRun.length,
    };
  }

  /** Skip counts grouped by reason, most common first */
  skipReasons(): Array<{ reason: string; count: number }> {
    const counts = new Map<string, number>();
    for (const skip of this.skipped) {
      const reason = skip.skipReason ?? 'unknown';
      counts.set(reason, (counts.get(reason) ?? 0) + 1);
    }
    return [...counts.entries()]
      .map(([reason, count]) => ({ reason, count }))
      .sort((a, b) => b.count - a.count || (a.reason < b.reason ? -1 : 1));
  }
}
