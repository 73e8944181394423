/**
 * Fleet Scheduler
 *
 * Runs the aggregator over every repository of every area with a global
 * cap on how many repositories are processed at once. One repository
 * failing never stops the others.
 */

import type { RepoRecord, RunResult } from '../types/metrics.js';
import { emptyMetrics, freezeMetrics } from '../types/metrics.js';
import { mapWithConcurrency } from './concurrency.js';
import { collectRepoMetrics, errorMessage, type AggregatorDeps } from './repo-aggregator.js';

export const DEFAULT_REPO_CONCURRENCY = 5;

export interface FleetPlan {
  /** Area name to repository names. */
  areas: Record<string, string[]>;
  repoConcurrency?: number;
}

export interface FleetDeps extends AggregatorDeps {
  /** Replaces the aggregator, for tests. */
  collect?: typeof collectRepoMetrics;
  now?: () => Date;
}

export interface RepoTarget {
  area: string;
  repo: string;
}

/** Areas and their repositories in sorted order, duplicates removed. */
export function flattenAreas(areas: Record<string, string[]>): RepoTarget[] {
  const targets: RepoTarget[] = [];
  for (const area of Object.keys(areas).sort()) {
    const repos = [...new Set(areas[area] ?? [])].sort();
    for (const repo of repos) {
      targets.push({ area, repo });
    }
  }
  return targets;
}

export function compareRecords(a: RepoTarget, b: RepoTarget): number {
  if (a.area !== b.area) return a.area < b.area ? -1 : 1;
  if (a.repo !== b.repo) return a.repo < b.repo ? -1 : 1;
  return 0;
}

export async function runFleet(deps: FleetDeps, plan: FleetPlan): Promise<RunResult> {
  const now = deps.now ?? (() => new Date());
  const collect = deps.collect ?? collectRepoMetrics;
  const targets = flattenAreas(plan.areas);
  const startedAt = now().toISOString();

  deps.log.info(
    `Collecting metrics for ${targets.length} repositories of ${deps.owner} from ${deps.window.from} to ${deps.window.to}`
  );

  const records: RepoRecord[] = [];
  await mapWithConcurrency(targets, plan.repoConcurrency ?? DEFAULT_REPO_CONCURRENCY, async ({ area, repo }) => {
    deps.log.info(`Processing ${area}/${repo}...`);
    try {
      records.push(await collect(deps, area, repo));
    } catch (error) {
      const message = errorMessage(error);
      deps.log.error(`${area}/${repo}: ${message}`);
      records.push({
        area,
        repo,
        status: 'failed',
        metrics: freezeMetrics(emptyMetrics()),
        failures: [],
        error: message,
      });
    }
  });

  records.sort(compareRecords);
  const failed = records.filter((r) => r.status === 'failed').length;
  const partial = records.filter((r) => r.status === 'partial').length;
  deps.log.info(
    `Finished ${records.length} repositories (${records.length - failed - partial} complete, ${partial} partial, ${failed} failed)`
  );

  return {
    owner: deps.owner,
    window: deps.window,
    areas: Object.keys(plan.areas).sort(),
    startedAt,
    finishedAt: now().toISOString(),
    records,
  };
}
