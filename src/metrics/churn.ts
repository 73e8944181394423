/**
 * Churn
 *
 * How often each file (and directory) shows up as changed across the
 * commits authored in the window. Commit details are fetched under the
 * detail concurrency cap; a commit whose detail fails is skipped.
 */

import { posix } from 'node:path';
import { collect } from '../clients/repo-api.js';
import { mapWithConcurrency, fulfilledValues } from '../orchestrator/concurrency.js';
import { increment, reportSkippedDetails, toSortedRecord, type MetricContext } from './shared.js';

export interface ChurnSummary {
  byFile: Record<string, number>;
  byDir: Record<string, number>;
}

export async function churnByFile(ctx: MetricContext): Promise<Record<string, number>> {
  const commits = await collect(ctx.api.listCommits(ctx.ref, ctx.window));

  const results = await mapWithConcurrency(commits, ctx.settings.detailConcurrency, (commit) =>
    ctx.api.getCommitDetail(ctx.ref, commit.sha)
  );
  reportSkippedDetails(ctx, 'commit details', results);

  const counts = new Map<string, number>();
  for (const detail of fulfilledValues(results)) {
    for (const file of detail.files) {
      increment(counts, file);
    }
  }
  return toSortedRecord(counts);
}

/**
 * Roll file churn up to each file's parent directory ("." for the root).
 * Totals are preserved: the directory counts sum to the file counts.
 */
export function churnByDirectory(byFile: Record<string, number>): Record<string, number> {
  const counts = new Map<string, number>();
  for (const [file, touches] of Object.entries(byFile)) {
    increment(counts, posix.dirname(file), touches);
  }
  return toSortedRecord(counts);
}

export async function churn(ctx: MetricContext): Promise<ChurnSummary> {
  const byFile = await churnByFile(ctx);
  return { byFile, byDir: churnByDirectory(byFile) };
}

/** The `limit` most-touched entries, ties broken by path. */
export function topChurn(counts: Record<string, number>, limit: number): Array<[string, number]> {
  return Object.entries(counts)
    .sort(([pathA, a], [pathB, b]) => b - a || (pathA < pathB ? -1 : pathA > pathB ? 1 : 0))
    .slice(0, limit);
}
