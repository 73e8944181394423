/**
 * Repository API capability
 *
 * Everything the metric pipeline needs from the hosting platform. Listing
 * methods return lazy async sequences already narrowed to the time window;
 * GitHubClient implements this over REST, tests use an in-process fake.
 */

import type { TimeWindow } from '../orchestrator/time-range.js';

export class BranchNotFoundError extends Error {
  constructor(
    public branch: string,
    public repo: string
  ) {
    super(`Branch "${branch}" not found in ${repo}`);
    this.name = 'BranchNotFoundError';
  }
}

export interface RepoRef {
  owner: string;
  repo: string;
}

export interface RepositoryInfo {
  fullName: string;
  defaultBranch: string;
  archived: boolean;
}

export interface TreeEntry {
  type: 'blob' | 'tree' | 'commit';
  path: string;
  size?: number;
}

export interface Workflow {
  id: number;
  name: string;
}

export interface WorkflowRun {
  id: number;
  conclusion: string | null;
  attempt: number;
  createdAt: string;
  updatedAt: string;
}

export interface PullRequest {
  number: number;
  author: string | null;
  createdAt: string;
  closedAt: string | null;
  mergedAt: string | null;
}

export interface PullRequestDetail {
  number: number;
  mergeable: boolean | null;
  mergeableState: string;
}

export interface Review {
  reviewer: string | null;
  state: string;
}

export interface Comment {
  id: number;
  author: string | null;
  createdAt: string;
}

export interface Issue {
  number: number;
  title: string;
  createdAt: string;
  closedAt: string | null;
  labels: string[];
}

export interface Commit {
  sha: string;
  /** Linked account login, else the git author name. Null when neither is known. */
  author: string | null;
  message: string;
  authoredAt: string | null;
}

export interface CommitDetail {
  sha: string;
  files: string[];
}

export interface PullRequestQuery {
  state: 'open' | 'closed' | 'all';
  window: TimeWindow;
}

/** Which timestamp of an issue must fall inside the window. */
export type IssueTimestamp = 'created' | 'closed';

export interface IssueQuery {
  state: 'open' | 'closed' | 'all';
  window: TimeWindow;
  by: IssueTimestamp;
  labels?: string[];
}

export interface RepoApi {
  getRepository(ref: RepoRef): Promise<RepositoryInfo>;
  /** Head commit SHA of a branch. */
  getBranchHead(ref: RepoRef, branch: string): Promise<string>;
  listTree(ref: RepoRef, sha: string, recursive: boolean): Promise<TreeEntry[]>;
  listWorkflows(ref: RepoRef): AsyncIterable<Workflow>;
  /** Completed runs of one workflow created inside the window. */
  listWorkflowRuns(ref: RepoRef, workflowId: number, window: TimeWindow): AsyncIterable<WorkflowRun>;
  /** Pull requests created inside the window. */
  listPullRequests(ref: RepoRef, query: PullRequestQuery): AsyncIterable<PullRequest>;
  getPullRequestDetail(ref: RepoRef, number: number): Promise<PullRequestDetail>;
  listPullRequestReviews(ref: RepoRef, number: number): Promise<Review[]>;
  listPullRequestComments(ref: RepoRef, number: number): Promise<Comment[]>;
  /** Issues (never pull requests) whose `query.by` timestamp is inside the window. */
  listIssues(ref: RepoRef, query: IssueQuery): AsyncIterable<Issue>;
  listIssueComments(ref: RepoRef, number: number): Promise<Comment[]>;
  /** Commits authored inside the window. */
  listCommits(ref: RepoRef, window: TimeWindow): AsyncIterable<Commit>;
  getCommitDetail(ref: RepoRef, sha: string): Promise<CommitDetail>;
}

/** Drain a lazy sequence into an array. */
export async function collect<T>(items: AsyncIterable<T>): Promise<T[]> {
  const all: T[] = [];
  for await (const item of items) {
    all.push(item);
  }
  return all;
}
