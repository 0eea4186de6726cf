import { ConfigurationError } from '../errors';
import { isLogLevel } from '../logger/logger';
import type { LogLevel } from '../logger/logger';
import type { Environment, RepositoryCoordinates } from './environment.types';

export const CI_ENV = 'CI';
export const GITHUB_TOKEN_ENV = 'GITHUB_TOKEN';
export const UPSTREAM_ENV = 'MANIFEST_PR_UPSTREAM';
export const LOG_LEVEL_ENV = 'LOG_LEVEL';

export const DEFAULT_UPSTREAM: RepositoryCoordinates = {
  owner: 'microsoft',
  repo: 'winget-pkgs',
};

/**
 * Strict boolean literal parser: only `"true"` and `"false"` are recognized.
 * @returns undefined for absent or unrecognized values
 */
export function parseBooleanLiteral(value: string | undefined): boolean | undefined {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

/**
 * Parses `owner/repo`.
 * @throws ConfigurationError when the value is not exactly two non-empty segments
 */
export function parseRepositoryCoordinates(value: string, variable: string = UPSTREAM_ENV): RepositoryCoordinates {
  const segments = value.trim().split('/');
  const [owner, repo] = segments;
  if (segments.length !== 2 || !owner || !repo) {
    throw new ConfigurationError(variable, `expected "owner/repo", got "${value}"`);
  }
  return { owner, repo };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = nonEmpty(value);
  if (level === undefined) return 'info';
  if (!isLogLevel(level)) {
    throw new ConfigurationError(LOG_LEVEL_ENV, `unknown level "${level}"`);
  }
  return level;
}

/**
 * Reads the manifest-pr configuration from environment variables.
 *
 * An unset or unparseable `CI` counts as an interactive run.
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): Environment {
  const upstreamValue = nonEmpty(env[UPSTREAM_ENV]);
  const githubToken = nonEmpty(env[GITHUB_TOKEN_ENV]);

  return {
    isCI: parseBooleanLiteral(env[CI_ENV]) === true,
    ...(githubToken !== undefined && { githubToken }),
    upstream: upstreamValue ? parseRepositoryCoordinates(upstreamValue) : { ...DEFAULT_UPSTREAM },
    logLevel: parseLogLevel(env[LOG_LEVEL_ENV]),
  };
}
