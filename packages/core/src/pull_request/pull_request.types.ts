/**
 * Lifecycle states reported for a pull request. The API may add states
 * beyond the known ones, so the union stays open.
 */
export type KnownPullRequestState = 'OPEN' | 'CLOSED' | 'MERGED';
export type PullRequestState = KnownPullRequestState | (string & {});

/**
 * An existing submission found upstream. Read-only: the core never builds
 * or mutates these itself beyond mapping API responses.
 */
export type PullRequestRef = {
  readonly state: PullRequestState;
  readonly createdAt: Date;
  readonly url: string;
};

/**
 * Looks up a previously opened pull request for a package version
 */
export interface PullRequestFinder {
  findExisting(identifier: string, version: string): Promise<PullRequestRef | null>;
}

/**
 * Error codes for GitHub API errors.
 * Semantic codes that abstract HTTP status codes.
 */
export type GitHubApiErrorCode =
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'INVALID_RESPONSE';
