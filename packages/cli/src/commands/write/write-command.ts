import { Command } from 'commander';
import * as path from 'path';
import { ChangeWriter } from '@manifest-pr/core';
import { BaseCommand } from '../../base/base-command';
import type { WriteCommandOptions } from '../../types/command-options';
import { summarizePullRequest } from '../check/check-command';
import type { ExistingPullRequestSummary } from '../check/check-command';
import { DEFAULT_MANIFEST_PATTERN, collectChanges } from './collect-changes';

type WriteCommandResult = {
  identifier: string;
  version: string;
  existing: ExistingPullRequestSummary | null;
  proceed: boolean;
  files: string[];
};

/**
 * Write Command - flattens generated manifests into an output directory.
 *
 * Unless `--no-check` is given, an existing pull request for the same
 * package version is looked up first and the guard decides whether to go on.
 */
export class WriteCommand extends BaseCommand<WriteCommandOptions> {
  protected description = 'Write generated manifests for a package version into an output directory';

  register(program: Command): void {
    program
      .command('write <identifier> <version>')
      .description(this.description)
      .requiredOption('-i, --input <dir>', 'Directory holding the generated manifests')
      .requiredOption('-o, --output <dir>', 'Directory to write the manifests into')
      .option('-p, --pattern <glob>', 'Glob for manifest files under the input directory', DEFAULT_MANIFEST_PATTERN)
      .option('--no-check', 'Skip the existing pull request check')
      .option('--json', 'JSON output', false)
      .option('--verbose', 'List written files and show technical details on failure', false)
      .option('-q, --quiet', 'Suppress non-essential output', false)
      .action(async (identifier: string, version: string, options: Omit<WriteCommandOptions, 'identifier' | 'version'>) => {
        await this.execute({ ...options, identifier, version });
      });
  }

  async execute(options: WriteCommandOptions): Promise<void> {
    const { identifier, version } = options;
    const pattern = options.pattern || DEFAULT_MANIFEST_PATTERN;

    try {
      const changes = await collectChanges(options.input, pattern);
      if (changes.length === 0) {
        this.handleError(`No files matching ${pattern} in ${options.input}`, options);
        return;
      }

      const result: WriteCommandResult = { identifier, version, existing: null, proceed: true, files: [] };

      if (options.check !== false) {
        const existing = await this.container.getPullRequestFinder().findExisting(identifier, version);
        if (existing) {
          const guard = this.container.getSubmissionGuard(
            options.json ? { log: (message) => console.error(message) } : undefined
          );
          result.existing = summarizePullRequest(existing);
          result.proceed = await guard.shouldProceed(identifier, version, existing);
        }
      }

      if (!result.proceed) {
        this.handleSuccess(result, options, `Skipped writing ${identifier} ${version}`);
        return;
      }

      result.files = await ChangeWriter.writeChanges(changes, options.output, {
        logger: this.container.getLogger(),
      });

      this.handleSuccess(
        result,
        options,
        `Wrote ${result.files.length} file(s) for ${identifier} ${version} to ${options.output}`
      );
      if (options.verbose && !options.json && !options.quiet) {
        for (const file of result.files) {
          console.log(`   • ${path.basename(file)}`);
        }
      }
    } catch (error) {
      this.handleFailure(`Failed to write ${identifier} ${version}`, options, error);
    }
  }
}
