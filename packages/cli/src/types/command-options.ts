/**
 * Option interfaces for the manifest-pr commands
 */

import type { BaseCommandOptions } from '../interfaces/command';

export interface PackageCommandOptions extends BaseCommandOptions {
  identifier: string;
  version: string;
}

export interface CheckCommandOptions extends PackageCommandOptions { }

export interface WriteCommandOptions extends PackageCommandOptions {
  /** Directory holding the generated manifests */
  input: string;
  /** Directory the manifests are flattened into */
  output: string;
  /** Glob matched against paths under `input` (default: '**\/*.yaml') */
  pattern?: string;
  /** Look for an existing pull request first (`--no-check` turns it off) */
  check?: boolean;
}
