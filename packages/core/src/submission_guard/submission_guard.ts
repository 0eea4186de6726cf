import { PromptError } from '../errors';
import type { ConfirmPrompt } from '../prompt/confirm_prompt';
import type { PullRequestRef, PullRequestState } from '../pull_request/pull_request.types';

export const PROCEED_QUESTION = 'Would you like to proceed?';

const BLUE = '\x1b[34m';
const RESET = '\x1b[0m';

/**
 * Where the guard prints its status lines
 */
export interface GuardOutput {
  log(message: string): void;
}

export type SubmissionGuardOptions = {
  /** Skip the prompt and decline, e.g. when running in CI */
  isNonInteractive: boolean;
  prompt: ConfirmPrompt;
  output?: GuardOutput;
};

/**
 * Article and adjective for a pull request state. Anything that is not
 * merged or open reads as closed, including states added later by the API.
 */
export function describePullRequestState(state: PullRequestState): string {
  switch (state) {
    case 'MERGED':
      return 'a merged';
    case 'OPEN':
      return 'an open';
    default:
      return 'a closed';
  }
}

function pad(value: number): string {
  return value.toString().padStart(2, '0');
}

/** `YYYY-MM-DD` of the timestamp */
export function formatCalendarDate(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`;
}

/** `HH:MM:SS` of the timestamp */
export function formatTimeOfDay(date: Date): string {
  return `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
}

export function formatExistingPullRequestNotice(
  identifier: string,
  version: string,
  pullRequest: PullRequestRef,
): string {
  return `There is already ${describePullRequestState(pullRequest.state)} pull request for ${identifier} ${version}` +
    ` that was created on ${formatCalendarDate(pullRequest.createdAt)} at ${formatTimeOfDay(pullRequest.createdAt)}`;
}

export function highlightUrl(url: string): string {
  return `${BLUE}${url}${RESET}`;
}

/**
 * SubmissionGuard - asks before submitting a package version that already
 * has a pull request upstream.
 *
 * @example
 * const guard = new SubmissionGuard({ isNonInteractive: env.isCI, prompt: new ReadlineConfirmPrompt() });
 * if (!(await guard.shouldProceed('Contoso.App', '1.2.3', existing))) return;
 */
export class SubmissionGuard {
  private readonly isNonInteractive: boolean;
  private readonly prompt: ConfirmPrompt;
  private readonly output: GuardOutput;

  /** Tail of the pending calls; prompts never overlap */
  private queue: Promise<unknown> = Promise.resolve();

  constructor(options: SubmissionGuardOptions) {
    this.isNonInteractive = options.isNonInteractive;
    this.prompt = options.prompt;
    this.output = options.output ?? console;
  }

  /**
   * Prints the existing pull request and decides whether to go on.
   * Non-interactive runs always decline without prompting.
   * @throws PromptError when the confirmation cannot be read
   */
  shouldProceed(identifier: string, version: string, pullRequest: PullRequestRef): Promise<boolean> {
    const run = this.queue.then(() => this.decide(identifier, version, pullRequest));
    // The caller gets the rejection; the queue only needs to know it settled.
    this.queue = run.then(() => undefined, () => undefined);
    return run;
  }

  private async decide(identifier: string, version: string, pullRequest: PullRequestRef): Promise<boolean> {
    this.output.log(formatExistingPullRequestNotice(identifier, version, pullRequest));
    this.output.log(highlightUrl(pullRequest.url));

    if (this.isNonInteractive) {
      return false;
    }
    try {
      return await this.prompt.confirm(PROCEED_QUESTION);
    } catch (error) {
      if (error instanceof PromptError) {
        throw error;
      }
      throw new PromptError(`Failed to ask "${PROCEED_QUESTION}"`, error);
    }
  }
}
