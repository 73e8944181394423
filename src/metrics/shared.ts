/**
 * Shared metric plumbing
 *
 * Every metric function takes a MetricContext and throws on failure; the
 * aggregator decides what a failure means for the record.
 */

import type { RepoApi, RepoRef } from '../clients/repo-api.js';
import type { TimeWindow } from '../orchestrator/time-range.js';
import type { RunLog } from '../orchestrator/run-log.js';

export interface MetricSettings {
  /** Cap on concurrent per-item detail fetches inside one metric. */
  detailConcurrency: number;
  integrationLabel: string;
  rollbackKeyword: string;
}

export const DEFAULT_METRIC_SETTINGS: MetricSettings = {
  detailConcurrency: 10,
  integrationLabel: 'bug-integration',
  rollbackKeyword: 'rollback',
};

export interface MetricContext {
  api: RepoApi;
  ref: RepoRef;
  window: TimeWindow;
  settings: MetricSettings;
  log: RunLog;
}

/** part / total × 100, or 0 when there is nothing to divide by. */
export function percentage(part: number, total: number): number {
  return total === 0 ? 0 : (part / total) * 100;
}

/** total / count, or 0 when there is nothing to divide by. */
export function average(total: number, count: number): number {
  return count === 0 ? 0 : total / count;
}

/** Map of counts as a plain record with keys in sorted order. */
export function toSortedRecord(counts: Map<string, number>): Record<string, number> {
  return Object.fromEntries([...counts.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

export function increment(counts: Map<string, number>, key: string, by = 1): void {
  counts.set(key, (counts.get(key) ?? 0) + by);
}

/**
 * Log how many per-item detail fetches a metric had to skip.
 * Silent when everything succeeded.
 */
export function reportSkippedDetails(
  ctx: MetricContext,
  what: string,
  results: PromiseSettledResult<unknown>[]
): void {
  const failed = results.filter((r) => r.status === 'rejected').length;
  if (failed === 0) return;
  ctx.log.warn(
    `${ctx.ref.owner}/${ctx.ref.repo}: skipped ${failed} of ${results.length} ${what} that could not be fetched`
  );
}
