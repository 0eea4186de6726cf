/**
 * Error classes raised by the manifest-pr core.
 *
 * Every error extends ManifestPrError so the CLI can report them uniformly.
 * The underlying failure, when there is one, is kept in `cause`.
 */

export class ManifestPrError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ManifestPrError';
    Object.setPrototypeOf(this, ManifestPrError.prototype);
  }
}

/**
 * Invalid value in the process environment
 */
export class ConfigurationError extends ManifestPrError {
  public readonly variable: string;

  constructor(variable: string, message: string) {
    super(`Invalid ${variable}: ${message}`);
    this.name = 'ConfigurationError';
    this.variable = variable;
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * The interactive confirmation could not be shown or answered
 */
export class PromptError extends ManifestPrError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PromptError';
    Object.setPrototypeOf(this, PromptError.prototype);
  }
}

/**
 * The output directory could not be created. Raised before any file is written.
 */
export class OutputDirectoryError extends ManifestPrError {
  public readonly directory: string;

  constructor(directory: string, cause?: unknown) {
    super(`Failed to create output directory ${directory}: ${describeCause(cause)}`, { cause });
    this.name = 'OutputDirectoryError';
    this.directory = directory;
    Object.setPrototypeOf(this, OutputDirectoryError.prototype);
  }
}

/**
 * A single change-set entry could not be written
 */
export class ChangeWriteError extends ManifestPrError {
  public readonly filePath: string;
  public readonly sourcePath: string;

  constructor(filePath: string, sourcePath: string, cause?: unknown) {
    super(`Failed to write ${filePath}: ${describeCause(cause)}`, { cause });
    this.name = 'ChangeWriteError';
    this.filePath = filePath;
    this.sourcePath = sourcePath;
    Object.setPrototypeOf(this, ChangeWriteError.prototype);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
