/**
 * Pull Request Metrics
 *
 * Conflicts, merge latency and review coverage for PRs created inside the
 * window. Per-PR detail fetches run under the detail concurrency cap and
 * each task returns its own value; totals are folded after the join.
 */

import { collect } from '../clients/repo-api.js';
import { mapWithConcurrency, fulfilledValues } from '../orchestrator/concurrency.js';
import { average, percentage, reportSkippedDetails, type MetricContext } from './shared.js';

const HOUR_MS = 60 * 60 * 1000;

export interface ConflictSummary {
  /** Percent of PRs in the window that cannot merge cleanly. */
  rate: number;
  count: number;
}

/**
 * A PR counts as conflicting when its detail reports `mergeable === false`.
 * A PR whose detail could not be fetched stays in the denominator.
 */
export async function conflictRateAndCount(ctx: MetricContext): Promise<ConflictSummary> {
  const prs = await collect(ctx.api.listPullRequests(ctx.ref, { state: 'all', window: ctx.window }));

  const results = await mapWithConcurrency(prs, ctx.settings.detailConcurrency, (pr) =>
    ctx.api.getPullRequestDetail(ctx.ref, pr.number)
  );
  reportSkippedDetails(ctx, 'pull request details', results);

  const count = fulfilledValues(results).filter((detail) => detail.mergeable === false).length;
  return { rate: percentage(count, prs.length), count };
}

/**
 * Mean days from creation to merge over merged PRs created in the window.
 */
export async function averageMergeTimeDays(ctx: MetricContext): Promise<number> {
  let totalHours = 0;
  let merged = 0;

  for await (const pr of ctx.api.listPullRequests(ctx.ref, { state: 'closed', window: ctx.window })) {
    if (!pr.mergedAt) continue;
    totalHours += (new Date(pr.mergedAt).getTime() - new Date(pr.createdAt).getTime()) / HOUR_MS;
    merged++;
  }

  return average(totalHours, merged * 24);
}

export interface ReviewerSummary {
  avgReviewersPerPr: number;
  crossTeamReviews: number;
}

/**
 * Mean number of distinct reviewers per PR. The denominator is the PRs
 * whose reviews could be fetched.
 *
 * Cross-team reviews need a reviewer-to-team mapping that does not exist
 * yet, so that count is always 0.
 */
export async function averageReviewersPerPr(ctx: MetricContext): Promise<ReviewerSummary> {
  const prs = await collect(ctx.api.listPullRequests(ctx.ref, { state: 'all', window: ctx.window }));

  const results = await mapWithConcurrency(prs, ctx.settings.detailConcurrency, async (pr) => {
    const reviews = await ctx.api.listPullRequestReviews(ctx.ref, pr.number);
    const reviewers = new Set<string>();
    for (const review of reviews) {
      if (review.reviewer) reviewers.add(review.reviewer);
    }
    return reviewers.size;
  });
  reportSkippedDetails(ctx, 'pull request review lists', results);

  const perPr = fulfilledValues(results);
  const totalReviewers = perPr.reduce((sum, n) => sum + n, 0);
  return {
    avgReviewersPerPr: average(totalReviewers, perPr.length),
    crossTeamReviews: 0,
  };
}
