/**
 * Thread Depth
 *
 * Mean comment count over the issues and pull requests created in the
 * window. A comment list that cannot be fetched counts as zero comments;
 * the item still counts toward the denominator.
 */

import { collect } from '../clients/repo-api.js';
import { mapWithConcurrency, fulfilledValues } from '../orchestrator/concurrency.js';
import { average, reportSkippedDetails, type MetricContext } from './shared.js';

type Thread = { kind: 'issue' | 'pull'; number: number };

export async function averageThreadDepth(ctx: MetricContext): Promise<number> {
  const [issues, prs] = await Promise.all([
    collect(ctx.api.listIssues(ctx.ref, { state: 'all', window: ctx.window, by: 'created' })),
    collect(ctx.api.listPullRequests(ctx.ref, { state: 'all', window: ctx.window })),
  ]);

  const threads: Thread[] = [
    ...issues.map((i): Thread => ({ kind: 'issue', number: i.number })),
    ...prs.map((pr): Thread => ({ kind: 'pull', number: pr.number })),
  ];
  if (threads.length === 0) return 0;

  const results = await mapWithConcurrency(threads, ctx.settings.detailConcurrency, async (t) => {
    const comments =
      t.kind === 'issue'
        ? await ctx.api.listIssueComments(ctx.ref, t.number)
        : await ctx.api.listPullRequestComments(ctx.ref, t.number);
    return comments.length;
  });
  reportSkippedDetails(ctx, 'comment lists', results);

  const totalComments = fulfilledValues(results).reduce((sum, n) => sum + n, 0);
  return average(totalComments, threads.length);
}
