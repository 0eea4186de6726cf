import { Command } from 'commander';
import type { PullRequests } from '@manifest-pr/core';
import { BaseCommand } from '../../base/base-command';
import type { CheckCommandOptions } from '../../types/command-options';

export type ExistingPullRequestSummary = {
  state: string;
  createdAt: string;
  url: string;
};

export function summarizePullRequest(pullRequest: PullRequests.PullRequestRef): ExistingPullRequestSummary {
  return {
    state: pullRequest.state,
    createdAt: pullRequest.createdAt.toISOString(),
    url: pullRequest.url,
  };
}

/**
 * Check Command - looks for an existing pull request for a package version
 * and asks whether to go on when one is found.
 *
 * Non-interactive (CI) runs decline automatically.
 */
export class CheckCommand extends BaseCommand<CheckCommandOptions> {
  protected description = 'Check for an existing pull request before submitting a package version';

  register(program: Command): void {
    program
      .command('check <identifier> <version>')
      .description(this.description)
      .option('--json', 'JSON output', false)
      .option('--verbose', 'Show technical details on failure', false)
      .option('-q, --quiet', 'Suppress non-essential output', false)
      .action(async (identifier: string, version: string, options: Omit<CheckCommandOptions, 'identifier' | 'version'>) => {
        await this.execute({ ...options, identifier, version });
      });
  }

  async execute(options: CheckCommandOptions): Promise<void> {
    const { identifier, version } = options;
    try {
      const finder = this.container.getPullRequestFinder();
      const existing = await finder.findExisting(identifier, version);

      if (!existing) {
        this.handleSuccess(
          { identifier, version, existing: null, proceed: true },
          options,
          `No existing pull request for ${identifier} ${version}`
        );
        return;
      }

      const guard = this.container.getSubmissionGuard(
        options.json ? { log: (message) => console.error(message) } : undefined
      );
      const proceed = await guard.shouldProceed(identifier, version, existing);

      this.handleSuccess(
        { identifier, version, existing: summarizePullRequest(existing), proceed },
        options,
        proceed
          ? `Proceeding with ${identifier} ${version}`
          : `Not proceeding with ${identifier} ${version}`
      );
    } catch (error) {
      this.handleFailure(`Failed to check ${identifier} ${version}`, options, error);
    }
  }
}
