/**
 * GitHub REST API Client
 *
 * Uses native fetch (Node 18+). Implements RepoApi: every list is an async
 * generator that follows the Link header page by page, and every response's
 * remaining-quota header is handed to the RateGovernor before the next
 * request goes out.
 */

import type {
  GitHubApiRepo,
  GitHubApiRef,
  GitHubApiTree,
  GitHubApiWorkflowList,
  GitHubApiWorkflowRunList,
  GitHubApiPullRequest,
  GitHubApiPullRequestDetail,
  GitHubApiReview,
  GitHubApiComment,
  GitHubApiIssue,
  GitHubApiCommit,
  GitHubApiCommitDetail,
} from './types.js';
import {
  BranchNotFoundError,
  type RepoApi,
  type RepoRef,
  type RepositoryInfo,
  type TreeEntry,
  type Workflow,
  type WorkflowRun,
  type PullRequest,
  type PullRequestDetail,
  type PullRequestQuery,
  type Review,
  type Comment,
  type Issue,
  type IssueQuery,
  type Commit,
  type CommitDetail,
} from './repo-api.js';
import { RateGovernor } from '../orchestrator/rate-governor.js';
import {
  isWithinWindow,
  isBeforeWindow,
  toDay,
  lastDayOf,
  type TimeWindow,
} from '../orchestrator/time-range.js';

export const GITHUB_API = 'https://api.github.com';
const DEFAULT_TIMEOUT_MS = 30_000;
const PAGE_SIZE = '100';

export class GitHubClientError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public retryable: boolean
  ) {
    super(message);
    this.name = 'GitHubClientError';
  }
}

export interface GitHubClientOptions {
  baseUrl?: string;
  timeoutMs?: number;
  governor?: RateGovernor;
}

interface Page<T> {
  data: T;
  nextUrl: string | null;
}

export class GitHubClient implements RepoApi {
  private readonly token: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly governor: RateGovernor;

  constructor(token: string, options: GitHubClientOptions = {}) {
    this.token = token;
    this.baseUrl = (options.baseUrl ?? GITHUB_API).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.governor = options.governor ?? new RateGovernor();
  }

  // ─── Repository & Git Data ──────────────────────────────

  async getRepository(ref: RepoRef): Promise<RepositoryInfo> {
    const { data } = await this.request<GitHubApiRepo>(repoPath(ref));
    return {
      fullName: data.full_name,
      defaultBranch: data.default_branch,
      archived: data.archived ?? false,
    };
  }

  async getBranchHead(ref: RepoRef, branch: string): Promise<string> {
    const encodedBranch = branch.split('/').map(encodeURIComponent).join('/');
    try {
      const { data } = await this.request<GitHubApiRef>(
        `${repoPath(ref)}/git/ref/heads/${encodedBranch}`
      );
      return data.object.sha;
    } catch (error) {
      if (error instanceof GitHubClientError && error.statusCode === 404) {
        throw new BranchNotFoundError(branch, `${ref.owner}/${ref.repo}`);
      }
      throw error;
    }
  }

  async listTree(ref: RepoRef, sha: string, recursive: boolean): Promise<TreeEntry[]> {
    const query = recursive ? '?recursive=1' : '';
    const { data } = await this.request<GitHubApiTree>(
      `${repoPath(ref)}/git/trees/${encodeURIComponent(sha)}${query}`
    );
    return data.tree.map((e) => ({ type: e.type, path: e.path, size: e.size }));
  }

  // ─── Actions ────────────────────────────────────────────

  async *listWorkflows(ref: RepoRef): AsyncGenerator<Workflow> {
    const pages = this.paginate<GitHubApiWorkflowList>(
      `${repoPath(ref)}/actions/workflows?per_page=${PAGE_SIZE}`
    );
    for await (const page of pages) {
      for (const wf of page.workflows) {
        yield { id: wf.id, name: wf.name };
      }
    }
  }

  async *listWorkflowRuns(
    ref: RepoRef,
    workflowId: number,
    window: TimeWindow
  ): AsyncGenerator<WorkflowRun> {
    const query = new URLSearchParams();
    query.set('status', 'completed');
    query.set('created', `${toDay(window.from)}..${lastDayOf(window)}`);
    query.set('per_page', PAGE_SIZE);

    const pages = this.paginate<GitHubApiWorkflowRunList>(
      `${repoPath(ref)}/actions/workflows/${workflowId}/runs?${query.toString()}`
    );
    for await (const page of pages) {
      for (const run of page.workflow_runs) {
        // The server filter is day-granular; the window may not be
        if (!isWithinWindow(window, run.created_at)) continue;
        yield {
          id: run.id,
          conclusion: run.conclusion,
          attempt: run.run_attempt ?? 1,
          createdAt: run.created_at,
          updatedAt: run.updated_at,
        };
      }
    }
  }

  // ─── Pull Requests ──────────────────────────────────────

  /**
   * Pull requests created inside the window, newest first.
   * Sorted by creation time, so the walk stops at the first older PR.
   */
  async *listPullRequests(ref: RepoRef, params: PullRequestQuery): AsyncGenerator<PullRequest> {
    const query = new URLSearchParams();
    query.set('state', params.state);
    query.set('sort', 'created');
    query.set('direction', 'desc');
    query.set('per_page', PAGE_SIZE);

    const pages = this.paginate<GitHubApiPullRequest[]>(`${repoPath(ref)}/pulls?${query.toString()}`);
    for await (const page of pages) {
      for (const pr of page) {
        if (isBeforeWindow(params.window, pr.created_at)) return;
        if (!isWithinWindow(params.window, pr.created_at)) continue;
        yield mapPullRequest(pr);
      }
    }
  }

  async getPullRequestDetail(ref: RepoRef, number: number): Promise<PullRequestDetail> {
    const { data } = await this.request<GitHubApiPullRequestDetail>(
      `${repoPath(ref)}/pulls/${number}`
    );
    return {
      number: data.number,
      mergeable: data.mergeable,
      mergeableState: data.mergeable_state,
    };
  }

  async listPullRequestReviews(ref: RepoRef, number: number): Promise<Review[]> {
    const reviews: Review[] = [];
    const pages = this.paginate<GitHubApiReview[]>(
      `${repoPath(ref)}/pulls/${number}/reviews?per_page=${PAGE_SIZE}`
    );
    for await (const page of pages) {
      for (const r of page) {
        reviews.push({ reviewer: r.user?.login ?? null, state: r.state });
      }
    }
    return reviews;
  }

  async listPullRequestComments(ref: RepoRef, number: number): Promise<Comment[]> {
    return this.listComments(`${repoPath(ref)}/pulls/${number}/comments?per_page=${PAGE_SIZE}`);
  }

  // ─── Issues ─────────────────────────────────────────────

  async *listIssues(ref: RepoRef, params: IssueQuery): AsyncGenerator<Issue> {
    const query = new URLSearchParams();
    query.set('state', params.state);
    // `since` matches on update time, which is never earlier than creation or closure
    query.set('since', params.window.from);
    if (params.labels && params.labels.length > 0) {
      query.set('labels', params.labels.join(','));
    }
    query.set('per_page', PAGE_SIZE);

    const pages = this.paginate<GitHubApiIssue[]>(`${repoPath(ref)}/issues?${query.toString()}`);
    for await (const page of pages) {
      for (const issue of page) {
        if (issue.pull_request) continue;
        const timestamp = params.by === 'created' ? issue.created_at : issue.closed_at;
        if (!isWithinWindow(params.window, timestamp)) continue;
        yield {
          number: issue.number,
          title: issue.title,
          createdAt: issue.created_at,
          closedAt: issue.closed_at,
          labels: issue.labels.map((l) => (typeof l === 'string' ? l : l.name)),
        };
      }
    }
  }

  async listIssueComments(ref: RepoRef, number: number): Promise<Comment[]> {
    return this.listComments(`${repoPath(ref)}/issues/${number}/comments?per_page=${PAGE_SIZE}`);
  }

  // ─── Commits ────────────────────────────────────────────

  async *listCommits(ref: RepoRef, window: TimeWindow): AsyncGenerator<Commit> {
    const query = new URLSearchParams();
    query.set('since', window.from);
    query.set('until', window.to);
    query.set('per_page', PAGE_SIZE);

    const pages = this.paginate<GitHubApiCommit[]>(`${repoPath(ref)}/commits?${query.toString()}`);
    for await (const page of pages) {
      for (const c of page) {
        // since/until match the committer date; the client check uses the same date
        const committedAt = c.commit.committer?.date ?? c.commit.author?.date ?? null;
        if (!isWithinWindow(window, committedAt)) continue;
        yield mapCommit(c);
      }
    }
  }

  async getCommitDetail(ref: RepoRef, sha: string): Promise<CommitDetail> {
    const { data } = await this.request<GitHubApiCommitDetail>(
      `${repoPath(ref)}/commits/${encodeURIComponent(sha)}`
    );
    return { sha: data.sha, files: (data.files ?? []).map((f) => f.filename) };
  }

  // ─── HTTP Layer ──────────────────────────────────────────

  private async listComments(path: string): Promise<Comment[]> {
    const comments: Comment[] = [];
    for await (const page of this.paginate<GitHubApiComment[]>(path)) {
      for (const c of page) {
        comments.push({ id: c.id, author: c.user?.login ?? null, createdAt: c.created_at });
      }
    }
    return comments;
  }

  /**
   * Walk pages until the response has no rel="next" link.
   * An error on any page ends the walk by throwing.
   */
  private async *paginate<T>(path: string): AsyncGenerator<T> {
    let next: string | null = path;
    while (next) {
      const page: Page<T> = await this.request<T>(next);
      yield page.data;
      next = page.nextUrl;
    }
  }

  private async request<T>(pathOrUrl: string): Promise<Page<T>> {
    const page = await this.fetchPage<T>(pathOrUrl);
    await this.governor.observe(page.remaining);
    return page;
  }

  private async fetchPage<T>(pathOrUrl: string): Promise<Page<T> & { remaining: number | null }> {
    const url = pathOrUrl.startsWith('http') ? pathOrUrl : `${this.baseUrl}${pathOrUrl}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, {
        headers: {
          Authorization: `Bearer ${this.token}`,
          Accept: 'application/vnd.github+json',
          'X-GitHub-Api-Version': '2022-11-28',
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        throw new GitHubClientError(
          `GitHub API error: ${response.status} ${response.statusText} for ${stripBase(url, this.baseUrl)}`,
          response.status,
          retryable
        );
      }

      return {
        data: (await response.json()) as T,
        nextUrl: parseNextLink(response.headers.get('link')),
        remaining: parseRemaining(response.headers.get('x-ratelimit-remaining')),
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}

// ─── Helpers ─────────────────────────────────────────────────

function repoPath(ref: RepoRef): string {
  return `/repos/${encodeURIComponent(ref.owner)}/${encodeURIComponent(ref.repo)}`;
}

function stripBase(url: string, baseUrl: string): string {
  return url.startsWith(baseUrl) ? url.slice(baseUrl.length) : url;
}

/** URL of the rel="next" entry of a Link header, or null on the last page. */
export function parseNextLink(header: string | null): string | null {
  if (!header) return null;
  for (const part of header.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="([^"]+)"/.exec(part);
    if (match?.[2]?.split(/\s+/).includes('next')) {
      return match[1] ?? null;
    }
  }
  return null;
}

export function parseRemaining(header: string | null): number | null {
  if (header === null || header.trim() === '') return null;
  const value = Number(header);
  return Number.isFinite(value) ? value : null;
}

function mapPullRequest(pr: GitHubApiPullRequest): PullRequest {
  return {
    number: pr.number,
    author: pr.user?.login ?? null,
    createdAt: pr.created_at,
    closedAt: pr.closed_at,
    mergedAt: pr.merged_at,
  };
}

function mapCommit(c: GitHubApiCommit): Commit {
  return {
    sha: c.sha,
    author: c.author?.login ?? c.commit.author?.name ?? null,
    message: c.commit.message,
    authoredAt: c.commit.author?.date ?? null,
  };
}
