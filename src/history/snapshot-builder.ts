/**
 * Snapshot Builder
 *
 * Converts a RunResult into the rows persisted by HistoryStore.
 * Pure functions, no I/O.
 */

import type { RepoRecord, RunResult } from '../types/metrics.js';
import type { RepoSnapshot, RunSummary } from './types.js';

export function buildRunSummary(result: RunResult): RunSummary {
  const count = (status: RepoRecord['status']) =>
    result.records.filter((r) => r.status === status).length;

  return {
    owner: result.owner,
    windowFrom: result.window.from,
    windowTo: result.window.to,
    startedAt: result.startedAt,
    finishedAt: result.finishedAt,
    repoCount: result.records.length,
    completeCount: count('complete'),
    partialCount: count('partial'),
    failedCount: count('failed'),
  };
}

export function buildRepoSnapshot(record: RepoRecord): RepoSnapshot {
  const m = record.metrics;
  return {
    area: record.area,
    repo: record.repo,
    status: record.status,
    uniqueContributors: m.uniqueContributors,
    conflictRate: m.conflictRate,
    conflictCount: m.conflictCount,
    avgMergeTimeDays: m.avgMergeTimeDays,
    avgReviewersPerPr: m.avgReviewersPerPr,
    integrationIssues: m.integrationIssues,
    revertRate: m.revertRate,
    rollbackIssues: m.rollbackIssues,
    avgThreadDepth: m.avgThreadDepth,
    branchSizeBytes: m.branchSizeBytes,
    fileCount: m.fileCount,
    workflowFailures: m.workflowFailures,
    successfulDeploys: m.successfulDeploys,
    successfulReruns: m.successfulReruns,
  };
}

/** Snapshots worth comparing against later runs. Failed records carry no data. */
export function buildRepoSnapshots(result: RunResult): RepoSnapshot[] {
  return result.records.filter((r) => r.status !== 'failed').map(buildRepoSnapshot);
}

/** Key of a repository across runs. */
export function snapshotKey(area: string, repo: string): string {
  return `${area}/${repo}`;
}
