/**
 * API Response Types
 *
 * TypeScript types for raw GitHub REST API responses.
 * These are the shapes returned by the API; the client maps them to
 * the RepoApi item types (repo-api.ts) by the client.
 */

// ─── Repository & Git Data ───────────────────────────────────

export interface GitHubApiRepo {
  name: string;
  full_name: string;
  owner: { login: string };
  private: boolean;
  archived?: boolean;
  default_branch: string;
}

export interface GitHubApiRef {
  ref: string;
  object: {
    sha: string;
    type: string;
  };
}

export interface GitHubApiTreeEntry {
  path: string;
  mode: string;
  type: 'blob' | 'tree' | 'commit';
  sha: string;
  size?: number;
}

export interface GitHubApiTree {
  sha: string;
  tree: GitHubApiTreeEntry[];
  truncated: boolean;
}

// ─── Actions ─────────────────────────────────────────────────

export interface GitHubApiWorkflow {
  id: number;
  name: string;
  path: string;
  state: string;
}

export interface GitHubApiWorkflowList {
  total_count: number;
  workflows: GitHubApiWorkflow[];
}

export interface GitHubApiWorkflowRun {
  id: number;
  name: string | null;
  status: string | null;
  conclusion: string | null;
  run_attempt?: number;
  created_at: string;
  updated_at: string;
}

export interface GitHubApiWorkflowRunList {
  total_count: number;
  workflow_runs: GitHubApiWorkflowRun[];
}

// ─── Pull Requests ───────────────────────────────────────────

export interface GitHubApiPullRequest {
  number: number;
  title: string;
  state: 'open' | 'closed';
  user: { login: string } | null;
  created_at: string;
  updated_at: string;
  closed_at: string | null;
  merged_at: string | null;
}

/** Single-PR endpoint; adds mergeability, which list responses omit. */
export interface GitHubApiPullRequestDetail extends GitHubApiPullRequest {
  mergeable: boolean | null;
  mergeable_state: string;
}

export interface GitHubApiReview {
  id: number;
  user: { login: string } | null;
  state: 'APPROVED' | 'CHANGES_REQUESTED' | 'COMMENTED' | 'PENDING' | 'DISMISSED';
  submitted_at?: string;
}

export interface GitHubApiComment {
  id: number;
  user: { login: string } | null;
  created_at: string;
}

// ─── Issues ──────────────────────────────────────────────────

export interface GitHubApiLabel {
  name: string;
}

export interface GitHubApiIssue {
  number: number;
  title: string;
  state: 'open' | 'closed';
  created_at: string;
  closed_at: string | null;
  labels: Array<GitHubApiLabel | string>;
  comments?: number;
  /** Present when the "issue" is really a pull request. */
  pull_request?: { url: string };
}

// ─── Commits ─────────────────────────────────────────────────

export interface GitHubApiCommit {
  sha: string;
  commit: {
    message: string;
    author: {
      name: string;
      email: string;
      date: string;
    } | null;
    committer?: {
      name: string;
      email: string;
      date: string;
    } | null;
  };
  author: { login: string } | null;
}

export interface GitHubApiCommitDetail extends GitHubApiCommit {
  files?: Array<{
    filename: string;
    status: string;
    additions: number;
    deletions: number;
  }>;
}
