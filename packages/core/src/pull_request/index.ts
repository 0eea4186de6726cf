export {
  GitHubPullRequestFinder,
  buildExistingPullRequestQuery,
  createPullRequestFinder,
  toPullRequestRef,
} from './github_pull_request_finder';
export type { GitHubPullRequestFinderOptions } from './github_pull_request_finder';
export { GitHubApiError, isOctokitRequestError, mapOctokitError } from './github_api_error';
export type {
  GitHubApiErrorCode,
  KnownPullRequestState,
  PullRequestFinder,
  PullRequestRef,
  PullRequestState,
} from './pull_request.types';
