import { ManifestPrError } from '../errors';
import type { GitHubApiErrorCode } from './pull_request.types';

/**
 * Typed error for GitHub API operations.
 */
export class GitHubApiError extends ManifestPrError {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: GitHubApiErrorCode,
    /** HTTP status code (if applicable) */
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'GitHubApiError';
    Object.setPrototypeOf(this, GitHubApiError.prototype);
  }
}

/**
 * Type guard: checks if an error is an Octokit RequestError (duck-typing).
 */
export function isOctokitRequestError(error: unknown): error is Error & { status: number } {
  return (
    error instanceof Error &&
    'status' in error &&
    typeof error.status === 'number'
  );
}

/**
 * Maps Octokit RequestError (and unknown errors) to GitHubApiError.
 */
export function mapOctokitError(error: unknown, context: string): GitHubApiError {
  if (isOctokitRequestError(error)) {
    const status = error.status;

    if (status === 401 || status === 403) {
      return new GitHubApiError(`Permission denied: ${context}`, 'PERMISSION_DENIED', status, error);
    }
    if (status === 404) {
      return new GitHubApiError(`Not found: ${context}`, 'NOT_FOUND', status, error);
    }
    if (status === 409 || status === 422) {
      return new GitHubApiError(`Validation failed: ${context}`, 'CONFLICT', status, error);
    }
    if (status >= 500) {
      return new GitHubApiError(`Server error (${status}): ${context}`, 'SERVER_ERROR', status, error);
    }

    return new GitHubApiError(`GitHub API error (${status}): ${context}`, 'SERVER_ERROR', status, error);
  }

  // Network / unknown errors
  const message = error instanceof Error ? error.message : String(error);
  return new GitHubApiError(`Network error: ${message}`, 'NETWORK_ERROR', undefined, error);
}
