import { describe, it, expect, vi, beforeEach } from 'vitest';
import { GitHubClient, GitHubClientError, parseNextLink, parseRemaining } from './github-client.js';
import { BranchNotFoundError, collect } from './repo-api.js';
import { RateGovernor } from '../orchestrator/rate-governor.js';
import { fixedWindow } from '../orchestrator/time-range.js';

// Mock global fetch
const mockFetch = vi.fn();
vi.stubGlobal('fetch', mockFetch);

function jsonResponse(
  data: unknown,
  options: { status?: number; link?: string; remaining?: number } = {}
): Response {
  const status = options.status ?? 200;
  const headers = new Headers();
  if (options.link) headers.set('link', options.link);
  if (options.remaining !== undefined) {
    headers.set('x-ratelimit-remaining', String(options.remaining));
  }
  return new Response(JSON.stringify(data), {
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers,
  });
}

function calledUrl(call: number): string {
  const args: unknown[] = mockFetch.mock.calls[call] ?? [];
  return String(args[0]);
}

const ref = { owner: 'acme', repo: 'payments' };
const window = fixedWindow('2024-01-01', '2024-02-01');

describe('GitHubClient', () => {
  let sleep: ReturnType<typeof vi.fn>;
  let client: GitHubClient;

  beforeEach(() => {
    vi.clearAllMocks();
    sleep = vi.fn(() => Promise.resolve());
    client = new GitHubClient('test-token', { governor: new RateGovernor({ sleep }) });
  });

  describe('request headers', () => {
    it('sends the bearer token and API version', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ full_name: 'acme/payments', default_branch: 'main' }));

      await client.getRepository(ref);

      expect(mockFetch).toHaveBeenCalledWith(
        'https://api.github.com/repos/acme/payments',
        expect.objectContaining({
          headers: expect.objectContaining({
            Authorization: 'Bearer test-token',
            'X-GitHub-Api-Version': '2022-11-28',
          }),
        })
      );
    });

    it('uses a custom base URL for enterprise servers', async () => {
      const enterprise = new GitHubClient('test-token', {
        baseUrl: 'https://ghe.example.com/api/v3/',
        governor: new RateGovernor({ sleep }),
      });
      mockFetch.mockResolvedValue(
        jsonResponse({ full_name: 'acme/payments', default_branch: 'develop' })
      );

      const info = await enterprise.getRepository(ref);

      expect(calledUrl(0)).toBe('https://ghe.example.com/api/v3/repos/acme/payments');
      expect(info).toEqual({ fullName: 'acme/payments', defaultBranch: 'develop', archived: false });
    });
  });

  describe('pagination', () => {
    it('follows rel="next" links until the last page', async () => {
      mockFetch
        .mockResolvedValueOnce(
          jsonResponse(
            [
              {
                sha: 'a1',
                commit: { message: 'first', author: { name: 'A', email: '', date: '2024-01-10T00:00:00Z' } },
                author: { login: 'alice' },
              },
            ],
            {
              link: '<https://api.github.com/repositories/1/commits?page=2>; rel="next", <https://api.github.com/repositories/1/commits?page=2>; rel="last"',
            }
          )
        )
        .mockResolvedValueOnce(
          jsonResponse([
            {
              sha: 'b2',
              commit: { message: 'second', author: { name: 'Bob B', email: '', date: '2024-01-11T00:00:00Z' } },
              author: null,
            },
          ])
        );

      const commits = await collect(client.listCommits(ref, window));

      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(calledUrl(1)).toBe('https://api.github.com/repositories/1/commits?page=2');
      expect(commits).toEqual([
        { sha: 'a1', author: 'alice', message: 'first', authoredAt: '2024-01-10T00:00:00Z' },
        { sha: 'b2', author: 'Bob B', message: 'second', authoredAt: '2024-01-11T00:00:00Z' },
      ]);
    });

    it('sends since/until and drops commits outside the window', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse([
          {
            sha: 'old',
            commit: { message: 'x', author: { name: 'C', email: '', date: '2023-12-31T00:00:00Z' } },
            author: { login: 'carol' },
          },
          {
            sha: 'new',
            commit: { message: 'y', author: { name: 'A', email: '', date: '2024-01-02T00:00:00Z' } },
            author: { login: 'alice' },
          },
        ])
      );

      const commits = await collect(client.listCommits(ref, window));

      expect(calledUrl(0)).toBe(
        'https://api.github.com/repos/acme/payments/commits?since=2024-01-01T00%3A00%3A00.000Z&until=2024-02-01T00%3A00%3A00.000Z&per_page=100'
      );
      expect(commits.map((c) => c.sha)).toEqual(['new']);
    });

    it('windows commits by committer date, like since/until', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse([
          {
            sha: 'late',
            commit: {
              message: 'authored in window, committed after it',
              author: { name: 'A', email: '', date: '2024-01-30T00:00:00Z' },
              committer: { name: 'A', email: '', date: '2024-02-02T00:00:00Z' },
            },
            author: { login: 'alice' },
          },
          {
            sha: 'rebased',
            commit: {
              message: 'authored before the window, committed in it',
              author: { name: 'B', email: '', date: '2023-12-28T00:00:00Z' },
              committer: { name: 'B', email: '', date: '2024-01-03T00:00:00Z' },
            },
            author: { login: 'bob' },
          },
        ])
      );

      const commits = await collect(client.listCommits(ref, window));

      expect(commits).toEqual([
        {
          sha: 'rebased',
          author: 'bob',
          message: 'authored before the window, committed in it',
          authoredAt: '2023-12-28T00:00:00Z',
        },
      ]);
    });

    it('stops the walk and throws when a later page fails', async () => {
      mockFetch
        .mockResolvedValueOnce(
          jsonResponse(
            [
              {
                sha: 'a1',
                commit: { message: 'm', author: { name: 'A', email: '', date: '2024-01-10T00:00:00Z' } },
                author: { login: 'alice' },
              },
            ],
            { link: '<https://api.github.com/next>; rel="next"' }
          )
        )
        .mockResolvedValueOnce(jsonResponse({}, { status: 502 }));

      const seen: string[] = [];
      await expect(async () => {
        for await (const c of client.listCommits(ref, window)) {
          seen.push(c.sha);
        }
      }).rejects.toThrow(GitHubClientError);
      expect(seen).toEqual(['a1']);
    });
  });

  describe('rate governor', () => {
    it('pauses after a page whose remaining quota is below the threshold', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ total_count: 0, workflows: [] }, { remaining: 42 }));

      await collect(client.listWorkflows(ref));

      expect(sleep).toHaveBeenCalledWith(5000);
    });

    it('does not pause with plenty of quota left', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ total_count: 0, workflows: [] }, { remaining: 4000 }));

      await collect(client.listWorkflows(ref));

      expect(sleep).not.toHaveBeenCalled();
    });
  });

  describe('getBranchHead', () => {
    it('returns the commit SHA the branch points at', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ ref: 'refs/heads/release/v2', object: { sha: 'abc123', type: 'commit' } })
      );

      const sha = await client.getBranchHead(ref, 'release/v2');

      expect(sha).toBe('abc123');
      expect(calledUrl(0)).toBe(
        'https://api.github.com/repos/acme/payments/git/ref/heads/release/v2'
      );
    });

    it('throws BranchNotFoundError on 404', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ message: 'Not Found' }, { status: 404 }));

      await expect(client.getBranchHead(ref, 'main')).rejects.toThrow(BranchNotFoundError);
    });
  });

  describe('listTree', () => {
    it('requests a recursive tree and maps entries', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({
          sha: 'abc123',
          truncated: false,
          tree: [
            { path: 'src', mode: '040000', type: 'tree', sha: 't1' },
            { path: 'src/a.ts', mode: '100644', type: 'blob', sha: 'b1', size: 120 },
          ],
        })
      );

      const entries = await client.listTree(ref, 'abc123', true);

      expect(calledUrl(0)).toBe(
        'https://api.github.com/repos/acme/payments/git/trees/abc123?recursive=1'
      );
      expect(entries).toEqual([
        { type: 'tree', path: 'src', size: undefined },
        { type: 'blob', path: 'src/a.ts', size: 120 },
      ]);
    });
  });

  describe('listWorkflowRuns', () => {
    it('filters completed runs by creation day and defaults the attempt to 1', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({
          total_count: 2,
          workflow_runs: [
            {
              id: 1,
              name: 'deploy',
              status: 'completed',
              conclusion: 'success',
              created_at: '2024-01-05T10:00:00Z',
              updated_at: '2024-01-05T10:10:00Z',
            },
            {
              id: 2,
              name: 'deploy',
              status: 'completed',
              conclusion: 'failure',
              run_attempt: 3,
              created_at: '2024-01-06T10:00:00Z',
              updated_at: '2024-01-06T10:10:00Z',
            },
          ],
        })
      );

      const runs = await collect(client.listWorkflowRuns(ref, 77, window));

      expect(calledUrl(0)).toBe(
        'https://api.github.com/repos/acme/payments/actions/workflows/77/runs?status=completed&created=2024-01-01..2024-01-31&per_page=100'
      );
      expect(runs.map((r) => [r.id, r.conclusion, r.attempt])).toEqual([
        [1, 'success', 1],
        [2, 'failure', 3],
      ]);
    });
  });

  describe('listPullRequests', () => {
    it('stops walking at the first PR created before the window', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse(
          [
            { number: 3, title: 'c', state: 'open', user: { login: 'a' }, created_at: '2024-02-03T00:00:00Z', updated_at: '', closed_at: null, merged_at: null },
            { number: 2, title: 'b', state: 'closed', user: { login: 'b' }, created_at: '2024-01-15T00:00:00Z', updated_at: '', closed_at: '2024-01-16T00:00:00Z', merged_at: '2024-01-16T00:00:00Z' },
            { number: 1, title: 'a', state: 'closed', user: null, created_at: '2023-12-20T00:00:00Z', updated_at: '', closed_at: null, merged_at: null },
          ],
          { link: '<https://api.github.com/next>; rel="next"' }
        )
      );

      const prs = await collect(client.listPullRequests(ref, { state: 'all', window }));

      expect(mockFetch).toHaveBeenCalledTimes(1);
      expect(prs).toEqual([
        {
          number: 2,
          author: 'b',
          createdAt: '2024-01-15T00:00:00Z',
          closedAt: '2024-01-16T00:00:00Z',
          mergedAt: '2024-01-16T00:00:00Z',
        },
      ]);
    });
  });

  describe('listIssues', () => {
    it('drops pull requests and filters by closure time', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse([
          { number: 10, title: 'Rollback deploy', state: 'closed', created_at: '2023-12-01T00:00:00Z', closed_at: '2024-01-20T00:00:00Z', labels: [{ name: 'Rollback' }] },
          { number: 11, title: 'PR', state: 'closed', created_at: '2024-01-02T00:00:00Z', closed_at: '2024-01-03T00:00:00Z', labels: [], pull_request: { url: '' } },
          { number: 12, title: 'Late', state: 'closed', created_at: '2024-01-02T00:00:00Z', closed_at: '2024-02-03T00:00:00Z', labels: ['rollback'] },
        ])
      );

      const issues = await collect(
        client.listIssues(ref, { state: 'closed', window, by: 'closed', labels: ['rollback'] })
      );

      expect(calledUrl(0)).toBe(
        'https://api.github.com/repos/acme/payments/issues?state=closed&since=2024-01-01T00%3A00%3A00.000Z&labels=rollback&per_page=100'
      );
      expect(issues).toEqual([
        {
          number: 10,
          title: 'Rollback deploy',
          createdAt: '2023-12-01T00:00:00Z',
          closedAt: '2024-01-20T00:00:00Z',
          labels: ['Rollback'],
        },
      ]);
    });
  });

  describe('detail endpoints', () => {
    it('maps pull request mergeability', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({ number: 5, mergeable: false, mergeable_state: 'dirty' })
      );

      await expect(client.getPullRequestDetail(ref, 5)).resolves.toEqual({
        number: 5,
        mergeable: false,
        mergeableState: 'dirty',
      });
    });

    it('collects reviewers across pages', async () => {
      mockFetch
        .mockResolvedValueOnce(
          jsonResponse([{ id: 1, user: { login: 'r1' }, state: 'APPROVED' }], {
            link: '<https://api.github.com/reviews?page=2>; rel="next"',
          })
        )
        .mockResolvedValueOnce(jsonResponse([{ id: 2, user: null, state: 'COMMENTED' }]));

      const reviews = await client.listPullRequestReviews(ref, 5);

      expect(reviews).toEqual([
        { reviewer: 'r1', state: 'APPROVED' },
        { reviewer: null, state: 'COMMENTED' },
      ]);
    });

    it('lists the files a commit touched', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse({
          sha: 'abc',
          commit: { message: 'm', author: null },
          author: null,
          files: [
            { filename: 'src/a.ts', status: 'modified', additions: 1, deletions: 0 },
            { filename: 'README.md', status: 'modified', additions: 2, deletions: 1 },
          ],
        })
      );

      await expect(client.getCommitDetail(ref, 'abc')).resolves.toEqual({
        sha: 'abc',
        files: ['src/a.ts', 'README.md'],
      });
    });

    it('reads issue comments from the issue endpoint', async () => {
      mockFetch.mockResolvedValue(
        jsonResponse([{ id: 9, user: { login: 'x' }, created_at: '2024-01-02T00:00:00Z' }])
      );

      const comments = await client.listIssueComments(ref, 12);

      expect(calledUrl(0)).toBe(
        'https://api.github.com/repos/acme/payments/issues/12/comments?per_page=100'
      );
      expect(comments).toHaveLength(1);
    });
  });

  describe('error handling', () => {
    it('throws GitHubClientError on API failure', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, { status: 401 }));

      await expect(client.getRepository(ref)).rejects.toThrow(
        'GitHub API error: 401 Error for /repos/acme/payments'
      );
    });

    it('marks 429 and 5xx as retryable', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}, { status: 429 }));
      const rateLimited = await client.getRepository(ref).catch((e: unknown) => e);

      mockFetch.mockResolvedValueOnce(jsonResponse({}, { status: 500 }));
      const serverError = await client.getRepository(ref).catch((e: unknown) => e);

      expect(rateLimited).toBeInstanceOf(GitHubClientError);
      expect(rateLimited instanceof GitHubClientError && rateLimited.retryable).toBe(true);
      expect(serverError instanceof GitHubClientError && serverError.retryable).toBe(true);
    });

    it('marks 403 as not retryable', async () => {
      mockFetch.mockResolvedValue(jsonResponse({}, { status: 403 }));

      const error = await client.getRepository(ref).catch((e: unknown) => e);

      expect(error instanceof GitHubClientError && error.retryable).toBe(false);
    });
  });
});

describe('parseNextLink', () => {
  it('finds the next URL among several relations', () => {
    expect(
      parseNextLink('<https://x/p?page=1>; rel="prev", <https://x/p?page=3>; rel="next"')
    ).toBe('https://x/p?page=3');
  });

  it('returns null on the last page', () => {
    expect(parseNextLink('<https://x/p?page=1>; rel="first"')).toBeNull();
    expect(parseNextLink(null)).toBeNull();
  });
});

describe('parseRemaining', () => {
  it('parses numbers and treats missing headers as no signal', () => {
    expect(parseRemaining('57')).toBe(57);
    expect(parseRemaining(null)).toBeNull();
    expect(parseRemaining('')).toBeNull();
    expect(parseRemaining('lots')).toBeNull();
  });
});
