/**
 * History Store
 *
 * SQLite-backed persistence for fleet runs.
 * Uses better-sqlite3 for synchronous, fast local storage.
 * Database lives at ~/.fleet-metrics/history.db by default.
 */

import Database from 'better-sqlite3';
import type { RepoSnapshot, RunSummary } from './types.js';
import type { RepoStatus, RunResult } from '../types/metrics.js';
import { prepareHomeFile } from '../config/paths.js';
import { buildRepoSnapshots, buildRunSummary, snapshotKey } from './snapshot-builder.js';

export class HistoryStore {
  private db: Database.Database;

  constructor(dbPath?: string) {
    this.db = new Database(dbPath ?? prepareHomeFile('history'));
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.migrate();
  }

  /**
   * Save a run and its repository snapshots in one transaction.
   * Returns the run ID.
   */
  saveRun(result: RunResult): number {
    const summary = buildRunSummary(result);
    const snapshots = buildRepoSnapshots(result);

    const insertRun = this.db.prepare(`
      INSERT INTO runs (
        owner, window_from, window_to, started_at, finished_at,
        repo_count, complete_count, partial_count, failed_count
      ) VALUES (
        @owner, @windowFrom, @windowTo, @startedAt, @finishedAt,
        @repoCount, @completeCount, @partialCount, @failedCount
      )
    `);

    const insertSnapshot = this.db.prepare(`
      INSERT INTO repo_snapshots (
        run_id, area, repo, status,
        unique_contributors, conflict_rate, conflict_count,
        avg_merge_time_days, avg_reviewers_per_pr,
        integration_issues, revert_rate, rollback_issues, avg_thread_depth,
        branch_size_bytes, file_count,
        workflow_failures, successful_deploys, successful_reruns
      ) VALUES (
        @runId, @area, @repo, @status,
        @uniqueContributors, @conflictRate, @conflictCount,
        @avgMergeTimeDays, @avgReviewersPerPr,
        @integrationIssues, @revertRate, @rollbackIssues, @avgThreadDepth,
        @branchSizeBytes, @fileCount,
        @workflowFailures, @successfulDeploys, @successfulReruns
      )
    `);

    const save = this.db.transaction((): number => {
      const runId = Number(insertRun.run(summary).lastInsertRowid);
      for (const snapshot of snapshots) {
        insertSnapshot.run({ ...snapshot, runId });
      }
      return runId;
    });

    return save();
  }

  /**
   * Most recent runs first.
   */
  getRecentRuns(limit = 10): RunSummary[] {
    return this.db
      .prepare<[number], RunRow>(`SELECT * FROM runs ORDER BY finished_at DESC, id DESC LIMIT ?`)
      .all(limit)
      .map(mapRunRow);
  }

  getRun(runId: number): RunSummary | null {
    const row = this.db.prepare<[number], RunRow>(`SELECT * FROM runs WHERE id = ?`).get(runId);
    return row ? mapRunRow(row) : null;
  }

  getRepoSnapshots(runId: number): RepoSnapshot[] {
    return this.db
      .prepare<[number], RepoSnapshotRow>(
        `SELECT * FROM repo_snapshots WHERE run_id = ? ORDER BY area, repo`
      )
      .all(runId)
      .map(mapSnapshotRow);
  }

  /**
   * Latest snapshot of each repository of `owner` from runs that finished
   * before `before`. Keyed by "area/repo".
   */
  getPreviousSnapshots(owner: string, before: string): Map<string, RepoSnapshot> {
    const rows = this.db
      .prepare<[string, string], RepoSnapshotRow>(
        `SELECT s.* FROM repo_snapshots s
         JOIN runs r ON r.id = s.run_id
         WHERE r.owner = ? AND r.finished_at < ?
         ORDER BY r.finished_at ASC, r.id ASC`
      )
      .all(owner, before);

    const latest = new Map<string, RepoSnapshot>();
    for (const row of rows) {
      latest.set(snapshotKey(row.area, row.repo), mapSnapshotRow(row));
    }
    return latest;
  }

  /**
   * Close the database connection.
   */
  close(): void {
    this.db.close();
  }

  // ─── Schema Migration ─────────────────────────────────────

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        id              INTEGER PRIMARY KEY AUTOINCREMENT,
        owner           TEXT NOT NULL,
        window_from     TEXT NOT NULL,
        window_to       TEXT NOT NULL,
        started_at      TEXT NOT NULL,
        finished_at     TEXT NOT NULL,
        repo_count      INTEGER NOT NULL DEFAULT 0,
        complete_count  INTEGER NOT NULL DEFAULT 0,
        partial_count   INTEGER NOT NULL DEFAULT 0,
        failed_count    INTEGER NOT NULL DEFAULT 0
      );

      CREATE TABLE IF NOT EXISTS repo_snapshots (
        id                    INTEGER PRIMARY KEY AUTOINCREMENT,
        run_id                INTEGER NOT NULL REFERENCES runs(id),
        area                  TEXT NOT NULL,
        repo                  TEXT NOT NULL,
        status                TEXT NOT NULL,

        unique_contributors   INTEGER NOT NULL DEFAULT 0,
        conflict_rate         REAL NOT NULL DEFAULT 0,
        conflict_count        INTEGER NOT NULL DEFAULT 0,
        avg_merge_time_days   REAL NOT NULL DEFAULT 0,
        avg_reviewers_per_pr  REAL NOT NULL DEFAULT 0,
        integration_issues    INTEGER NOT NULL DEFAULT 0,
        revert_rate           REAL NOT NULL DEFAULT 0,
        rollback_issues       INTEGER NOT NULL DEFAULT 0,
        avg_thread_depth      REAL NOT NULL DEFAULT 0,
        branch_size_bytes     INTEGER NOT NULL DEFAULT 0,
        file_count            INTEGER NOT NULL DEFAULT 0,
        workflow_failures     INTEGER NOT NULL DEFAULT 0,
        successful_deploys    INTEGER NOT NULL DEFAULT 0,
        successful_reruns     INTEGER NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_runs_owner_finished
        ON runs(owner, finished_at);
      CREATE INDEX IF NOT EXISTS idx_repo_snapshots_run
        ON repo_snapshots(run_id);
    `);
  }
}

// ─── Row Mapping ────────────────────────────────────────────

interface RunRow {
  id: number;
  owner: string;
  window_from: string;
  window_to: string;
  started_at: string;
  finished_at: string;
  repo_count: number;
  complete_count: number;
  partial_count: number;
  failed_count: number;
}

interface RepoSnapshotRow {
  id: number;
  run_id: number;
  area: string;
  repo: string;
  status: string;
  unique_contributors: number;
  conflict_rate: number;
  conflict_count: number;
  avg_merge_time_days: number;
  avg_reviewers_per_pr: number;
  integration_issues: number;
  revert_rate: number;
  rollback_issues: number;
  avg_thread_depth: number;
  branch_size_bytes: number;
  file_count: number;
  workflow_failures: number;
  successful_deploys: number;
  successful_reruns: number;
}

function mapRunRow(row: RunRow): RunSummary {
  return {
    id: row.id,
    owner: row.owner,
    windowFrom: row.window_from,
    windowTo: row.window_to,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    repoCount: row.repo_count,
    completeCount: row.complete_count,
    partialCount: row.partial_count,
    failedCount: row.failed_count,
  };
}

function toStatus(value: string): RepoStatus {
  return value === 'complete' || value === 'partial' ? value : 'failed';
}

function mapSnapshotRow(row: RepoSnapshotRow): RepoSnapshot {
  return {
    id: row.id,
    runId: row.run_id,
    area: row.area,
    repo: row.repo,
    status: toStatus(row.status),
    uniqueContributors: row.unique_contributors,
    conflictRate: row.conflict_rate,
    conflictCount: row.conflict_count,
    avgMergeTimeDays: row.avg_merge_time_days,
    avgReviewersPerPr: row.avg_reviewers_per_pr,
    integrationIssues: row.integration_issues,
    revertRate: row.revert_rate,
    rollbackIssues: row.rollback_issues,
    avgThreadDepth: row.avg_thread_depth,
    branchSizeBytes: row.branch_size_bytes,
    fileCount: row.file_count,
    workflowFailures: row.workflow_failures,
    successfulDeploys: row.successful_deploys,
    successfulReruns: row.successful_reruns,
  };
}
