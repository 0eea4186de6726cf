export {
  SubmissionGuard,
  PROCEED_QUESTION,
  describePullRequestState,
  formatCalendarDate,
  formatTimeOfDay,
  formatExistingPullRequestNotice,
  highlightUrl,
} from './submission_guard';
export type { GuardOutput, SubmissionGuardOptions } from './submission_guard';
