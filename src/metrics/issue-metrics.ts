/**
 * Issue Metrics
 *
 * Integration bugs are matched on an exact label and counted by creation
 * time. Rollbacks are matched on any label containing the rollback keyword
 * and counted by closure time.
 */

import { collect, type Issue } from '../clients/repo-api.js';
import type { MetricContext } from './shared.js';

export async function countIntegrationIssues(ctx: MetricContext): Promise<number> {
  const issues = await collect(
    ctx.api.listIssues(ctx.ref, {
      state: 'all',
      window: ctx.window,
      by: 'created',
      labels: [ctx.settings.integrationLabel],
    })
  );
  return issues.length;
}

export async function countRollbackIssues(ctx: MetricContext): Promise<number> {
  const keyword = ctx.settings.rollbackKeyword.toLowerCase();
  let count = 0;
  const issues = ctx.api.listIssues(ctx.ref, { state: 'closed', window: ctx.window, by: 'closed' });
  for await (const issue of issues) {
    if (hasLabelContaining(issue, keyword)) count++;
  }
  return count;
}

export function hasLabelContaining(issue: Issue, keyword: string): boolean {
  return issue.labels.some((label) => label.toLowerCase().includes(keyword));
}
