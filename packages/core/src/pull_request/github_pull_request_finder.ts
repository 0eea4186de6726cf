import { Octokit } from '@octokit/rest';
import type { RestEndpointMethodTypes } from '@octokit/rest';
import type { Environment, RepositoryCoordinates } from '../environment/environment.types';
import type { Logger } from '../logger/logger';
import { createLogger } from '../logger/logger';
import { GitHubApiError, mapOctokitError } from './github_api_error';
import type { PullRequestFinder, PullRequestRef, PullRequestState } from './pull_request.types';

type SearchItem = RestEndpointMethodTypes['search']['issuesAndPullRequests']['response']['data']['items'][number];

export type GitHubPullRequestFinderOptions = {
  /** Repository that receives the submissions */
  upstream: RepositoryCoordinates;
  logger?: Logger;
};

/**
 * Builds the issue-search query for pull requests whose title mentions
 * both the identifier and the version.
 */
export function buildExistingPullRequestQuery(
  upstream: RepositoryCoordinates,
  identifier: string,
  version: string,
): string {
  return `repo:${upstream.owner}/${upstream.repo} is:pr in:title ${identifier} ${version}`;
}

/**
 * Maps a search hit onto a PullRequestRef. Merged pull requests are reported
 * as closed by the search API, so `merged_at` decides first.
 */
export function toPullRequestRef(item: SearchItem): PullRequestRef {
  const createdAt = new Date(item.created_at);
  if (Number.isNaN(createdAt.getTime())) {
    throw new GitHubApiError(
      `Invalid created_at "${item.created_at}" for ${item.html_url}`,
      'INVALID_RESPONSE',
    );
  }

  let state: PullRequestState;
  if (item.pull_request?.merged_at) {
    state = 'MERGED';
  } else if (item.state === 'open') {
    state = 'OPEN';
  } else {
    state = item.state.toUpperCase();
  }

  return { state, createdAt, url: item.html_url };
}

/**
 * GitHubPullRequestFinder - PullRequestFinder over the GitHub search API
 *
 * @example
 * const finder = new GitHubPullRequestFinder(new Octokit({ auth: token }), {
 *   upstream: { owner: 'microsoft', repo: 'winget-pkgs' },
 * });
 * const existing = await finder.findExisting('Contoso.App', '1.2.3');
 */
export class GitHubPullRequestFinder implements PullRequestFinder {
  private readonly upstream: RepositoryCoordinates;
  private readonly logger: Logger;

  constructor(private readonly octokit: Octokit, options: GitHubPullRequestFinderOptions) {
    this.upstream = options.upstream;
    this.logger = options.logger ?? createLogger('[PullRequestFinder] ');
  }

  /**
   * Returns the most recently created matching pull request, or null.
   */
  async findExisting(identifier: string, version: string): Promise<PullRequestRef | null> {
    const q = buildExistingPullRequestQuery(this.upstream, identifier, version);
    this.logger.debug(`Searching pull requests: ${q}`);

    let items: SearchItem[];
    try {
      const response = await this.octokit.rest.search.issuesAndPullRequests({
        q,
        sort: 'created',
        order: 'desc',
        per_page: 1,
      });
      items = response.data.items;
    } catch (error) {
      throw mapOctokitError(error, `search pull requests for ${identifier} ${version}`);
    }

    const [latest] = items;
    if (!latest) {
      return null;
    }
    return toPullRequestRef(latest);
  }
}

/**
 * Builds a finder with its own Octokit client from the loaded environment.
 * The token is only forwarded when one is configured.
 */
export function createPullRequestFinder(environment: Environment, logger?: Logger): GitHubPullRequestFinder {
  const octokit = new Octokit({
    userAgent: 'manifest-pr',
    ...(environment.githubToken !== undefined && { auth: environment.githubToken }),
  });
  return new GitHubPullRequestFinder(octokit, {
    upstream: environment.upstream,
    ...(logger !== undefined && { logger }),
  });
}
