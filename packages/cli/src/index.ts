#!/usr/bin/env node

/**
 * manifest-pr CLI
 *
 * Guards against duplicate pull requests for a package version and writes
 * generated manifests to disk. Prompts are skipped when CI=true.
 */

import { Command } from 'commander';
import packageJson from '../package.json';
import { CheckCommand } from './commands/check';
import { WriteCommand } from './commands/write';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('manifest-pr')
    .description('Submit package-manifest changes as pull requests without duplicating existing ones')
    .version(packageJson.version);

  new CheckCommand().register(program);
  new WriteCommand().register(program);

  return program;
}

if (require.main === module) {
  // Global error handling
  process.on('uncaughtException', (error) => {
    console.error('❌ Unexpected error:', error.message);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    console.error('❌ Unhandled promise rejection:', reason);
    process.exit(1);
  });

  createProgram().parseAsync().catch((error: unknown) => {
    console.error('❌ Fatal error:', error);
    process.exit(1);
  });
}
