/**
 * GitHubPullRequestFinder Unit Tests
 *
 * Octokit is replaced by a jest mock; no request leaves the process.
 */

import type { Octokit } from '@octokit/rest';
import { loadEnvironment } from '../environment/environment';
import {
  GitHubPullRequestFinder,
  buildExistingPullRequestQuery,
  createPullRequestFinder,
} from './github_pull_request_finder';
import { GitHubApiError } from './github_api_error';

// ==================== Test Helpers ====================

const upstream = { owner: 'test-org', repo: 'test-manifests' };

function createMockOctokit() {
  const issuesAndPullRequests = jest.fn();
  const octokit = { rest: { search: { issuesAndPullRequests } } } as unknown as Octokit;
  return { octokit, issuesAndPullRequests };
}

function createOctokitError(status: number, message = 'Error'): Error & { status: number } {
  const error = new Error(message) as Error & { status: number };
  error.status = status;
  return error;
}

function createSearchResponse(items: Array<Record<string, unknown>>) {
  return { data: { total_count: items.length, incomplete_results: false, items } };
}

function createSearchItem(overrides: Record<string, unknown> = {}) {
  return {
    state: 'open',
    created_at: '2024-03-05T09:07:02Z',
    html_url: 'https://github.com/test-org/test-manifests/pull/12',
    pull_request: { merged_at: null },
    ...overrides,
  };
}

// ==================== Tests ====================

describe('GitHubPullRequestFinder', () => {
  let mock: ReturnType<typeof createMockOctokit>;
  let finder: GitHubPullRequestFinder;

  beforeEach(() => {
    mock = createMockOctokit();
    finder = new GitHubPullRequestFinder(mock.octokit, { upstream });
  });

  it('should build a title search scoped to the upstream repository', () => {
    expect(buildExistingPullRequestQuery(upstream, 'Contoso.App', '1.2.3'))
      .toBe('repo:test-org/test-manifests is:pr in:title Contoso.App 1.2.3');
  });

  it('should request only the newest match', async () => {
    mock.issuesAndPullRequests.mockResolvedValue(createSearchResponse([]));

    await finder.findExisting('Contoso.App', '1.2.3');

    expect(mock.issuesAndPullRequests).toHaveBeenCalledWith({
      q: 'repo:test-org/test-manifests is:pr in:title Contoso.App 1.2.3',
      sort: 'created',
      order: 'desc',
      per_page: 1,
    });
  });

  it('should return null when nothing matches', async () => {
    mock.issuesAndPullRequests.mockResolvedValue(createSearchResponse([]));

    await expect(finder.findExisting('Contoso.App', '1.2.3')).resolves.toBeNull();
  });

  it('should map an open pull request', async () => {
    mock.issuesAndPullRequests.mockResolvedValue(createSearchResponse([createSearchItem()]));

    const result = await finder.findExisting('Contoso.App', '1.2.3');

    expect(result).toEqual({
      state: 'OPEN',
      createdAt: new Date('2024-03-05T09:07:02Z'),
      url: 'https://github.com/test-org/test-manifests/pull/12',
    });
  });

  it('should report a closed pull request with merged_at as merged', async () => {
    mock.issuesAndPullRequests.mockResolvedValue(createSearchResponse([
      createSearchItem({ state: 'closed', pull_request: { merged_at: '2024-03-06T10:00:00Z' } }),
    ]));

    const result = await finder.findExisting('Contoso.App', '1.2.3');

    expect(result?.state).toBe('MERGED');
  });

  it('should report a closed pull request without merged_at as closed', async () => {
    mock.issuesAndPullRequests.mockResolvedValue(createSearchResponse([
      createSearchItem({ state: 'closed' }),
    ]));

    const result = await finder.findExisting('Contoso.App', '1.2.3');

    expect(result?.state).toBe('CLOSED');
  });

  it('should reject an unparseable creation date', async () => {
    mock.issuesAndPullRequests.mockResolvedValue(createSearchResponse([
      createSearchItem({ created_at: 'yesterday' }),
    ]));

    await expect(finder.findExisting('Contoso.App', '1.2.3')).rejects.toMatchObject({
      name: 'GitHubApiError',
      code: 'INVALID_RESPONSE',
    });
  });

  it.each([
    [401, 'PERMISSION_DENIED'],
    [403, 'PERMISSION_DENIED'],
    [404, 'NOT_FOUND'],
    [422, 'CONFLICT'],
    [503, 'SERVER_ERROR'],
  ])('should map HTTP %i to %s', async (status, code) => {
    mock.issuesAndPullRequests.mockRejectedValue(createOctokitError(status));

    const error = await finder.findExisting('Contoso.App', '1.2.3').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GitHubApiError);
    expect(error).toMatchObject({ code, statusCode: status });
  });

  it('should map errors without a status to NETWORK_ERROR', async () => {
    mock.issuesAndPullRequests.mockRejectedValue(new Error('socket hang up'));

    await expect(finder.findExisting('Contoso.App', '1.2.3')).rejects.toMatchObject({
      code: 'NETWORK_ERROR',
      message: 'Network error: socket hang up',
    });
  });

  it('should build a finder from the environment', () => {
    const environment = loadEnvironment({ GITHUB_TOKEN: 'test-token' });

    expect(createPullRequestFinder(environment)).toBeInstanceOf(GitHubPullRequestFinder);
  });
});
