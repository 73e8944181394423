/**
 * Report Generator
 *
 * Renders a RunResult as Markdown or JSON.
 * All functions are synchronous and do no I/O.
 */

import type { RepoMetrics, RepoRecord, RunResult } from '../types/metrics.js';
import type { RepoSnapshot } from '../history/types.js';
import { snapshotKey } from '../history/snapshot-builder.js';
import { topChurn } from '../metrics/churn.js';
import { bytesToMegabytes } from '../metrics/branch-size.js';
import { lastDayOf, toDay, windowLengthDays } from '../orchestrator/time-range.js';

export interface ReportOptions {
  /** Snapshots of the previous run keyed by "area/repo", for the delta column. */
  previous?: Map<string, RepoSnapshot>;
  /** How many churned files and directories to list. */
  churnLimit?: number;
  repoUrlBase?: string;
}

const DEFAULT_CHURN_LIMIT = 5;
const GITHUB_WEB = 'https://github.com';

interface MetricRow {
  label: string;
  value: string;
  delta?: string;
}

function pct(value: number): string {
  return `${value.toFixed(1)}%`;
}

function fixed2(value: number): string {
  return value.toFixed(2);
}

function signed(diff: number, digits = 0, unit = ''): string {
  const text = diff.toFixed(digits);
  if (Number(text) === 0) return `0${unit}`;
  return `${diff > 0 ? '+' : ''}${text}${unit}`;
}

function metricRows(m: Readonly<RepoMetrics>, previous?: RepoSnapshot): MetricRow[] {
  return [
    { label: 'Unique contributors', value: String(m.uniqueContributors) },
    {
      label: 'Conflicting PRs',
      value: `${m.conflictCount} (${pct(m.conflictRate)})`,
      delta: previous && signed(m.conflictCount - previous.conflictCount),
    },
    { label: 'Avg merge time', value: `${fixed2(m.avgMergeTimeDays)} days` },
    { label: 'Avg reviewers per PR', value: fixed2(m.avgReviewersPerPr) },
    { label: 'Cross-team reviews', value: String(m.crossTeamReviews) },
    { label: 'Integration issues', value: String(m.integrationIssues) },
    {
      label: 'Revert rate',
      value: pct(m.revertRate),
      delta: previous && signed(m.revertRate - previous.revertRate, 1, ' pts'),
    },
    { label: 'Rollback issues', value: String(m.rollbackIssues) },
    { label: 'Avg thread depth', value: fixed2(m.avgThreadDepth) },
    {
      label: 'Branch size',
      value: `${fixed2(bytesToMegabytes(m.branchSizeBytes))} MB (${m.fileCount} files)`,
    },
    {
      label: 'Workflow failures',
      value: String(m.workflowFailures),
      delta: previous && signed(m.workflowFailures - previous.workflowFailures),
    },
    { label: 'Successful deploys', value: String(m.successfulDeploys) },
    { label: 'Successful reruns', value: String(m.successfulReruns) },
    { label: 'Avg run attempts', value: fixed2(m.avgRunAttempts) },
  ];
}

function renderTable(parts: string[], rows: MetricRow[], withDelta: boolean): void {
  if (withDelta) {
    parts.push('| Metric | Value | Δ vs previous run |');
    parts.push('|--------|-------|-------------------|');
    for (const row of rows) {
      parts.push(`| ${row.label} | ${row.value} | ${row.delta ?? ''} |`);
    }
  } else {
    parts.push('| Metric | Value |');
    parts.push('|--------|-------|');
    for (const row of rows) {
      parts.push(`| ${row.label} | ${row.value} |`);
    }
  }
}

function renderChurn(parts: string[], title: string, counts: Record<string, number>, limit: number): void {
  const top = topChurn(counts, limit);
  if (top.length === 0) return;
  parts.push(`**${title}:**`);
  for (const [path, touches] of top) {
    parts.push(`- \`${path}\` (${touches})`);
  }
  parts.push('');
}

function renderRepo(
  parts: string[],
  owner: string,
  record: RepoRecord,
  options: ReportOptions
): void {
  const base = options.repoUrlBase ?? GITHUB_WEB;
  parts.push(`### [${record.repo}](${base}/${owner}/${record.repo})`);
  parts.push('');

  if (record.status === 'failed') {
    parts.push(`**ERROR** ${record.error ?? 'unknown error'}`);
    parts.push('');
    return;
  }

  const m = record.metrics;
  const previous = options.previous?.get(snapshotKey(record.area, record.repo));
  renderTable(parts, metricRows(m, previous), previous !== undefined);
  parts.push('');

  if (m.contributors.length > 0) {
    parts.push(`**Contributors:** ${m.contributors.join(', ')}`);
    const distribution = Object.entries(m.commitDistribution)
      .map(([who, commits]) => `${who} ${commits}`)
      .join(', ');
    parts.push(`**Commits:** ${distribution}`);
    parts.push('');
  }

  const limit = options.churnLimit ?? DEFAULT_CHURN_LIMIT;
  renderChurn(parts, 'Most churned files', m.churnByFile, limit);
  renderChurn(parts, 'Most churned directories', m.churnByDir, limit);

  for (const failure of record.failures) {
    parts.push(`**ERROR** ${failure.metric}: ${failure.message}`);
  }
  if (record.failures.length > 0) parts.push('');
}

/**
 * Markdown report grouped by area, one section per repository. Every
 * configured area gets a heading, even one without repositories.
 * Records are expected in repository order within an area.
 */
export function generateMarkdownReport(result: RunResult, options: ReportOptions = {}): string {
  const parts: string[] = [];
  const count = (status: RepoRecord['status']) =>
    result.records.filter((r) => r.status === status).length;

  parts.push(`# Engineering Metrics — ${result.owner}`);
  parts.push('');
  parts.push(
    `**Window:** ${toDay(result.window.from)} to ${lastDayOf(result.window)} (${Math.round(windowLengthDays(result.window))} days)`
  );
  parts.push(
    `**Repositories:** ${result.records.length} (${count('complete')} complete, ${count('partial')} partial, ${count('failed')} failed)`
  );
  parts.push(`**Generated:** ${result.finishedAt}`);
  parts.push('');

  const areas = [...new Set([...result.areas, ...result.records.map((r) => r.area)])].sort();
  if (areas.length === 0) {
    parts.push('_No repositories configured_');
    parts.push('');
    return parts.join('\n');
  }

  for (const area of areas) {
    parts.push(`## ${area}`);
    parts.push('');
    const records = result.records.filter((r) => r.area === area);
    if (records.length === 0) {
      parts.push('_No repositories_');
      parts.push('');
    }
    for (const record of records) {
      renderRepo(parts, result.owner, record, options);
    }
  }

  return parts.join('\n');
}

/** The full RunResult, two-space indented. */
export function generateJsonReport(result: RunResult): string {
  return JSON.stringify(result, null, 2) + '\n';
}
