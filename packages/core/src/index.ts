export * as Config from "./environment";
export * as Logger from "./logger";
export * as PullRequests from "./pull_request";
export * as Prompt from "./prompt";
export * as Guard from "./submission_guard";
export * as ChangeWriter from "./change_writer";
export * as Utils from "./utils";

// Error classes are shared by every module
export {
  ManifestPrError,
  ConfigurationError,
  PromptError,
  OutputDirectoryError,
  ChangeWriteError,
} from "./errors";
export { GitHubApiError } from "./pull_request";
