/**
 * Workflow Run Metrics
 *
 * Resolves the target workflow once per repository, then folds a single
 * walk of its completed runs into failure, first-try deploy and rerun
 * counts.
 */

import type { RepoApi, RepoRef, WorkflowRun } from '../clients/repo-api.js';
import { average, type MetricContext } from './shared.js';

export class WorkflowNotFoundError extends Error {
  constructor(
    public workflow: string,
    public repo: string
  ) {
    super(`Workflow "${workflow}" not found in ${repo}`);
    this.name = 'WorkflowNotFoundError';
  }
}

export interface WorkflowRunSummary {
  failures: number;
  /** Successful on the first attempt. */
  successfulDeploys: number;
  /** Successful only after one or more reruns. */
  successfulReruns: number;
  totalSuccessfulRuns: number;
  /** Sum of attempt numbers over successful runs. */
  totalRunAttempts: number;
  avgRunAttempts: number;
}

/**
 * A numeric workflow setting is taken as the ID; anything else must match a
 * workflow name exactly.
 */
export async function resolveWorkflowId(
  api: RepoApi,
  ref: RepoRef,
  workflow: string | number
): Promise<number> {
  if (typeof workflow === 'number') return workflow;
  if (/^\d+$/.test(workflow)) return Number(workflow);

  for await (const wf of api.listWorkflows(ref)) {
    if (wf.name === workflow) return wf.id;
  }
  throw new WorkflowNotFoundError(workflow, `${ref.owner}/${ref.repo}`);
}

export function summarizeRuns(runs: Iterable<WorkflowRun>): WorkflowRunSummary {
  let failures = 0;
  let successfulDeploys = 0;
  let successfulReruns = 0;
  let totalSuccessfulRuns = 0;
  let totalRunAttempts = 0;

  for (const run of runs) {
    if (run.conclusion === 'failure') {
      failures++;
    } else if (run.conclusion === 'success') {
      totalSuccessfulRuns++;
      totalRunAttempts += run.attempt;
      if (run.attempt > 1) successfulReruns++;
      else successfulDeploys++;
    }
  }

  return {
    failures,
    successfulDeploys,
    successfulReruns,
    totalSuccessfulRuns,
    totalRunAttempts,
    avgRunAttempts: average(totalRunAttempts, totalSuccessfulRuns),
  };
}

export async function workflowRunSummary(
  ctx: MetricContext,
  workflowId: number
): Promise<WorkflowRunSummary> {
  const runs: WorkflowRun[] = [];
  for await (const run of ctx.api.listWorkflowRuns(ctx.ref, workflowId, ctx.window)) {
    runs.push(run);
  }
  return summarizeRuns(runs);
}
