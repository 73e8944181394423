/**
 * Repository Metric Aggregator
 *
 * Computes every metric for one repository. Metrics run concurrently and
 * fail independently: a failed metric is recorded and its fields stay at
 * zero. Only a failed repository lookup fails the whole record.
 */

import type { RepoApi, RepoRef } from '../clients/repo-api.js';
import type { MetricFailure, MetricName, RepoMetrics, RepoRecord } from '../types/metrics.js';
import { emptyMetrics, freezeMetrics } from '../types/metrics.js';
import type { MetricContext, MetricSettings } from '../metrics/shared.js';
import type { RunLog } from './run-log.js';
import type { TimeWindow } from './time-range.js';
import { countUniqueContributors, commitDistribution, revertRate } from '../metrics/commit-metrics.js';
import {
  conflictRateAndCount,
  averageMergeTimeDays,
  averageReviewersPerPr,
} from '../metrics/pull-request-metrics.js';
import { churn } from '../metrics/churn.js';
import { countIntegrationIssues, countRollbackIssues } from '../metrics/issue-metrics.js';
import { averageThreadDepth } from '../metrics/thread-depth.js';
import { resolveWorkflowId, workflowRunSummary } from '../metrics/workflow-runs.js';
import { measureBranch } from '../metrics/branch-size.js';

export interface AggregatorDeps {
  api: RepoApi;
  owner: string;
  window: TimeWindow;
  /** Workflow name or numeric ID. */
  workflow: string | number;
  /** Overrides the repository's default branch for branch size. */
  defaultBranch?: string;
  settings: MetricSettings;
  log: RunLog;
}

/** One metric's contribution to the record. */
export type MetricOutcome =
  | { metric: MetricName; ok: true; fields: Partial<RepoMetrics> }
  | { metric: MetricName; ok: false; message: string };

export async function collectRepoMetrics(
  deps: AggregatorDeps,
  area: string,
  repo: string
): Promise<RepoRecord> {
  const ref: RepoRef = { owner: deps.owner, repo };

  let defaultBranch: string;
  try {
    defaultBranch = (await deps.api.getRepository(ref)).defaultBranch;
  } catch (error) {
    const message = errorMessage(error);
    deps.log.error(`${area}/${repo}: repository lookup failed: ${message}`);
    return {
      area,
      repo,
      status: 'failed',
      metrics: freezeMetrics(emptyMetrics()),
      failures: [],
      error: message,
    };
  }

  const ctx: MetricContext = {
    api: deps.api,
    ref,
    window: deps.window,
    settings: deps.settings,
    log: deps.log,
  };
  const branch = deps.defaultBranch ?? defaultBranch;

  const run = (metric: MetricName, compute: () => Promise<Partial<RepoMetrics>>): Promise<MetricOutcome> =>
    compute().then(
      (fields): MetricOutcome => ({ metric, ok: true, fields }),
      (error: unknown): MetricOutcome => ({ metric, ok: false, message: errorMessage(error) })
    );

  const outcomes = await Promise.all([
    run('branchSize', async () => {
      const size = await measureBranch(ctx, branch);
      return { branchSizeBytes: size.sizeBytes, fileCount: size.fileCount };
    }),
    run('contributors', async () => {
      const { count, contributors } = await countUniqueContributors(ctx);
      return { uniqueContributors: count, contributors };
    }),
    run('commitDistribution', async () => ({ commitDistribution: await commitDistribution(ctx) })),
    run('conflicts', async () => {
      const { rate, count } = await conflictRateAndCount(ctx);
      return { conflictRate: rate, conflictCount: count };
    }),
    run('mergeTime', async () => ({ avgMergeTimeDays: await averageMergeTimeDays(ctx) })),
    run('reviewers', async () => averageReviewersPerPr(ctx)),
    run('churn', async () => {
      const { byFile, byDir } = await churn(ctx);
      return { churnByFile: byFile, churnByDir: byDir };
    }),
    run('integrationIssues', async () => ({ integrationIssues: await countIntegrationIssues(ctx) })),
    run('revertRate', async () => ({ revertRate: await revertRate(ctx) })),
    run('rollbackIssues', async () => ({ rollbackIssues: await countRollbackIssues(ctx) })),
    run('workflowRuns', async () => {
      const workflowId = await resolveWorkflowId(deps.api, ref, deps.workflow);
      const summary = await workflowRunSummary(ctx, workflowId);
      return {
        workflowFailures: summary.failures,
        successfulDeploys: summary.successfulDeploys,
        successfulReruns: summary.successfulReruns,
        totalSuccessfulRuns: summary.totalSuccessfulRuns,
        totalRunAttempts: summary.totalRunAttempts,
        avgRunAttempts: summary.avgRunAttempts,
      };
    }),
    run('threadDepth', async () => ({ avgThreadDepth: await averageThreadDepth(ctx) })),
  ]);

  return mergeOutcomes(area, repo, outcomes, deps.log);
}

/** Fold metric outcomes into a single frozen record. */
export function mergeOutcomes(
  area: string,
  repo: string,
  outcomes: MetricOutcome[],
  log: RunLog
): RepoRecord {
  const failures: MetricFailure[] = [];
  const merged: RepoMetrics = emptyMetrics();

  for (const outcome of outcomes) {
    if (outcome.ok) {
      Object.assign(merged, outcome.fields);
    } else {
      failures.push({ metric: outcome.metric, message: outcome.message });
      log.warn(`${area}/${repo}: ${outcome.metric} failed: ${outcome.message}`);
    }
  }

  return {
    area,
    repo,
    status: failures.length === 0 ? 'complete' : 'partial',
    metrics: freezeMetrics(merged),
    failures,
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
