export {
  loadEnvironment,
  parseBooleanLiteral,
  parseRepositoryCoordinates,
  DEFAULT_UPSTREAM,
  CI_ENV,
  GITHUB_TOKEN_ENV,
  UPSTREAM_ENV,
  LOG_LEVEL_ENV,
} from './environment';
export type { Environment, RepositoryCoordinates } from './environment.types';
