/**
 * fleet-metrics run
 *
 * Loads the config, collects metrics for every configured repository,
 * records the run in history and writes the report files.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { readFleetConfig, resolveWindow, metricSettings, ConfigError } from '../config/fleet-config.js';
import { requireGitHubCredentials } from '../config/credentials.js';
import { configFilePath, prepareHomeFile } from '../config/paths.js';
import type { FleetSettings } from '../config/types.js';
import { GitHubClient } from '../clients/github-client.js';
import type { RepoApi } from '../clients/repo-api.js';
import { RateGovernor } from '../orchestrator/rate-governor.js';
import { createRunLog, type RunLog } from '../orchestrator/run-log.js';
import { runFleet } from '../orchestrator/fleet-scheduler.js';
import { errorMessage } from '../orchestrator/repo-aggregator.js';
import { HistoryStore } from '../history/history-store.js';
import type { RepoSnapshot } from '../history/types.js';
import { generateMarkdownReport, generateJsonReport } from '../generators/report-generator.js';
import type { RunResult } from '../types/metrics.js';

export type ReportFormat = 'markdown' | 'json' | 'both';

export const MARKDOWN_FILE = 'output.md';
export const JSON_FILE = 'metrics.json';

export interface RunOptions {
  configPath?: string;
  outDir: string;
  format: ReportFormat;
  logFile?: string;
  history: boolean;
}

/** Collaborators a caller may substitute. */
export interface RunEnvironment {
  api?: RepoApi;
  log?: RunLog;
  now?: () => Date;
  /** Database file for run history; the config directory's history.db when unset. */
  historyPath?: string;
}

export interface RunOutcome {
  result: RunResult;
  files: string[];
  runId?: number;
}

export function parseRunOptions(flags: Record<string, string>): RunOptions {
  const format = flags['format'] ?? 'both';
  if (format !== 'markdown' && format !== 'json' && format !== 'both') {
    throw new ConfigError(`Unknown --format "${format}" (expected markdown, json or both)`);
  }
  return {
    configPath: flags['config'] || undefined,
    outDir: flags['out'] || '.',
    format,
    logFile: flags['log-file'] || undefined,
    history: !('no-history' in flags),
  };
}

export async function runMetrics(options: RunOptions, env: RunEnvironment = {}): Promise<RunOutcome> {
  const config = readFleetConfig(configFilePath(options.configPath));
  const now = env.now ?? (() => new Date());
  const window = resolveWindow(config.window, now());

  let logFile = options.logFile;
  if (!logFile && config.settings.logToFile) {
    logFile = prepareHomeFile('log');
  }
  const log = env.log ?? createRunLog({ logFile });

  const api = env.api ?? createClient(config.settings, log);

  const result = await runFleet(
    {
      api,
      owner: config.owner,
      window,
      workflow: config.workflow,
      defaultBranch: config.defaultBranch,
      settings: metricSettings(config.settings),
      log,
      now,
    },
    { areas: config.areas, repoConcurrency: config.settings.repoConcurrency }
  );

  let previous: Map<string, RepoSnapshot> | undefined;
  let runId: number | undefined;
  if (options.history) {
    try {
      ({ previous, runId } = recordHistory(result, env.historyPath));
    } catch (error) {
      log.warn(`history not recorded: ${errorMessage(error)}`);
    }
  }

  const files = writeReports(result, options, previous);
  for (const file of files) {
    log.info(`Wrote ${file}`);
  }
  return { result, files, runId };
}

/** Snapshots of the run before this one, then saves this run. */
function recordHistory(
  result: RunResult,
  historyPath: string | undefined
): { previous: Map<string, RepoSnapshot>; runId: number } {
  const store = new HistoryStore(historyPath);
  try {
    const previous = store.getPreviousSnapshots(result.owner, result.startedAt);
    return { previous, runId: store.saveRun(result) };
  } finally {
    store.close();
  }
}

function createClient(settings: FleetSettings, log: RunLog): GitHubClient {
  const { token } = requireGitHubCredentials();
  const governor = new RateGovernor({
    lowWaterMark: settings.rateLimitThreshold,
    cooldownMs: settings.rateLimitCooldownMs,
    log,
  });
  return new GitHubClient(token, {
    baseUrl: settings.apiBaseUrl,
    timeoutMs: settings.requestTimeoutMs,
    governor,
  });
}

/** Write the requested report files. Returns their absolute paths. */
export function writeReports(
  result: RunResult,
  options: Pick<RunOptions, 'outDir' | 'format'>,
  previous?: Map<string, RepoSnapshot>
): string[] {
  const dir = resolve(options.outDir);
  mkdirSync(dir, { recursive: true });

  const files: string[] = [];
  if (options.format !== 'json') {
    const path = join(dir, MARKDOWN_FILE);
    writeFileSync(path, generateMarkdownReport(result, { previous }), 'utf-8');
    files.push(path);
  }
  if (options.format !== 'markdown') {
    const path = join(dir, JSON_FILE);
    writeFileSync(path, generateJsonReport(result), 'utf-8');
    files.push(path);
  }
  return files;
}
