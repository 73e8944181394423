/**
 * fleet-metrics history
 *
 * Lists recent runs from the history database.
 */

import { existsSync } from 'node:fs';
import { homeFile } from '../config/paths.js';
import { HistoryStore } from '../history/history-store.js';
import type { RunSummary } from '../history/types.js';

const DEFAULT_LIMIT = 10;

export function runHistory(flags: Record<string, string>, dbPath = homeFile('history')): string {
  const limit = flags['limit'] ? Number(flags['limit']) : DEFAULT_LIMIT;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`--limit must be a positive integer, got "${flags['limit'] ?? ''}"`);
  }
  if (!existsSync(dbPath)) {
    return 'No runs recorded yet.';
  }

  const store = new HistoryStore(dbPath);
  try {
    return formatHistory(store.getRecentRuns(limit));
  } finally {
    store.close();
  }
}

export function formatHistory(runs: RunSummary[]): string {
  if (runs.length === 0) return 'No runs recorded yet.';

  const lines: string[] = [];
  lines.push('| # | Finished | Owner | Window | Repos | Partial | Failed |');
  lines.push('|---|----------|-------|--------|-------|---------|--------|');
  for (const run of runs) {
    const window = `${run.windowFrom.slice(0, 10)} to ${run.windowTo.slice(0, 10)}`;
    lines.push(
      `| ${run.id ?? ''} | ${run.finishedAt} | ${run.owner} | ${window} | ${run.repoCount} | ${run.partialCount} | ${run.failedCount} |`
    );
  }
  return lines.join('\n');
}
