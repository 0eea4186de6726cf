export { CheckCommand, summarizePullRequest } from './check-command';
export type { ExistingPullRequestSummary } from './check-command';
