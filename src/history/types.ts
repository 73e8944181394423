/**
 * History Types
 *
 * Data structures for run history stored in SQLite.
 * Only scalar metric values are persisted; contributor lists, commit
 * distributions and churn maps stay in the run's own report files.
 */

import type { RepoStatus } from '../types/metrics.js';

/** One completed fleet run. */
export interface RunSummary {
  id?: number;
  owner: string;
  windowFrom: string;
  windowTo: string;
  startedAt: string;
  finishedAt: string;
  repoCount: number;
  completeCount: number;
  partialCount: number;
  failedCount: number;
}

/** Scalar metrics of one repository within a run. */
export interface RepoSnapshot {
  id?: number;
  runId?: number;
  area: string;
  repo: string;
  status: RepoStatus;
  uniqueContributors: number;
  conflictRate: number;
  conflictCount: number;
  avgMergeTimeDays: number;
  avgReviewersPerPr: number;
  integrationIssues: number;
  revertRate: number;
  rollbackIssues: number;
  avgThreadDepth: number;
  branchSizeBytes: number;
  fileCount: number;
  workflowFailures: number;
  successfulDeploys: number;
  successfulReruns: number;
}
