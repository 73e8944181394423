/**
 * Metric data types
 *
 * One RepoMetrics per repository per run. Every field has a zero value so a
 * failed metric leaves its fields at zero instead of invalidating the record.
 */

import type { TimeWindow } from '../orchestrator/time-range.js';

export interface RepoMetrics {
  // Contributors
  uniqueContributors: number;
  contributors: string[];
  commitDistribution: Record<string, number>;

  // Pull requests
  conflictRate: number;
  conflictCount: number;
  avgMergeTimeDays: number;
  avgReviewersPerPr: number;
  /** Needs an identity-to-team mapping; always 0 until one exists. */
  crossTeamReviews: number;

  // Churn
  churnByFile: Record<string, number>;
  churnByDir: Record<string, number>;

  // Issues and commits
  integrationIssues: number;
  revertRate: number;
  rollbackIssues: number;
  avgThreadDepth: number;

  // Default branch
  branchSizeBytes: number;
  fileCount: number;

  // Target workflow
  workflowFailures: number;
  successfulDeploys: number;
  successfulReruns: number;
  totalSuccessfulRuns: number;
  totalRunAttempts: number;
  avgRunAttempts: number;
}

/**
 * Freezes a metrics object together with its nested lists and maps, so a
 * record handed to the report sink cannot be changed.
 */
export function freezeMetrics(metrics: RepoMetrics): Readonly<RepoMetrics> {
  Object.freeze(metrics.contributors);
  Object.freeze(metrics.commitDistribution);
  Object.freeze(metrics.churnByFile);
  Object.freeze(metrics.churnByDir);
  return Object.freeze(metrics);
}

export type MetricName =
  | 'branchSize'
  | 'contributors'
  | 'commitDistribution'
  | 'conflicts'
  | 'mergeTime'
  | 'reviewers'
  | 'churn'
  | 'integrationIssues'
  | 'revertRate'
  | 'rollbackIssues'
  | 'workflowRuns'
  | 'threadDepth';

export interface MetricFailure {
  metric: MetricName;
  message: string;
}

export type RepoStatus = 'complete' | 'partial' | 'failed';

export interface RepoRecord {
  area: string;
  repo: string;
  status: RepoStatus;
  metrics: Readonly<RepoMetrics>;
  failures: MetricFailure[];
  /** Set when the repository itself could not be read. */
  error?: string;
}

export interface RunResult {
  owner: string;
  window: TimeWindow;
  /** Configured area names, sorted; includes areas with no repositories. */
  areas: string[];
  startedAt: string;
  finishedAt: string;
  records: RepoRecord[];
}

export function emptyMetrics(): RepoMetrics {
  return {
    uniqueContributors: 0,
    contributors: [],
    commitDistribution: {},
    conflictRate: 0,
    conflictCount: 0,
    avgMergeTimeDays: 0,
    avgReviewersPerPr: 0,
    crossTeamReviews: 0,
    churnByFile: {},
    churnByDir: {},
    integrationIssues: 0,
    revertRate: 0,
    rollbackIssues: 0,
    avgThreadDepth: 0,
    branchSizeBytes: 0,
    fileCount: 0,
    workflowFailures: 0,
    successfulDeploys: 0,
    successfulReruns: 0,
    totalSuccessfulRuns: 0,
    totalRunAttempts: 0,
    avgRunAttempts: 0,
  };
}
