/**
 * Commit Metrics
 *
 * Each metric walks the commits authored inside the window on its own, so a
 * failed walk only costs that metric.
 */

import { increment, percentage, toSortedRecord, type MetricContext } from './shared.js';

export interface ContributorSummary {
  count: number;
  /** Sorted, de-duplicated contributor identities. */
  contributors: string[];
}

export async function countUniqueContributors(ctx: MetricContext): Promise<ContributorSummary> {
  const unique = new Set<string>();
  for await (const commit of ctx.api.listCommits(ctx.ref, ctx.window)) {
    if (commit.author) unique.add(commit.author);
  }
  const contributors = [...unique].sort();
  return { count: contributors.length, contributors };
}

/** Commits per contributor. Commits with no known author are not attributed. */
export async function commitDistribution(ctx: MetricContext): Promise<Record<string, number>> {
  const counts = new Map<string, number>();
  for await (const commit of ctx.api.listCommits(ctx.ref, ctx.window)) {
    if (commit.author) increment(counts, commit.author);
  }
  return toSortedRecord(counts);
}

/** Share of commits (percent) whose message mentions "revert". */
export async function revertRate(ctx: MetricContext): Promise<number> {
  let total = 0;
  let reverts = 0;
  for await (const commit of ctx.api.listCommits(ctx.ref, ctx.window)) {
    total++;
    if (commit.message.toLowerCase().includes('revert')) reverts++;
  }
  return percentage(reverts, total);
}
