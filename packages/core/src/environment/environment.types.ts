import type { LogLevel } from '../logger/logger';

/**
 * `owner/repo` coordinates of a GitHub repository
 */
export type RepositoryCoordinates = {
  owner: string;
  repo: string;
};

/**
 * Runtime configuration read from the process environment
 */
export type Environment = {
  /** `CI` parsed as a boolean literal; prompts are skipped when true */
  isCI: boolean;
  /** Token handed to the GitHub client, if any */
  githubToken?: string;
  /** Repository searched for existing pull requests */
  upstream: RepositoryCoordinates;
  logLevel: LogLevel;
};
