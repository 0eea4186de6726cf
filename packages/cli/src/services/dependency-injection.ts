import { Config, Guard, Logger, Prompt, PullRequests } from '@manifest-pr/core';

/**
 * Dependency Injection Service for the manifest-pr CLI
 *
 * Builds the environment, logger, GitHub lookup and guard lazily, once per
 * process, so commands only pay for what they use.
 */
export class DependencyInjectionService {
  private static instance: DependencyInjectionService | null = null;
  private environment: Config.Environment | null = null;
  private logger: Logger.Logger | null = null;
  private pullRequestFinder: PullRequests.PullRequestFinder | null = null;
  private confirmPrompt: Prompt.ConfirmPrompt | null = null;

  private constructor(private readonly env: NodeJS.ProcessEnv = process.env) { }

  /**
   * Singleton pattern to ensure single instance across CLI
   */
  static getInstance(): DependencyInjectionService {
    if (!DependencyInjectionService.instance) {
      DependencyInjectionService.instance = new DependencyInjectionService();
    }
    return DependencyInjectionService.instance;
  }

  /**
   * Replaces the singleton with one reading `env`. Used by tests.
   */
  static resetInstance(env?: NodeJS.ProcessEnv): DependencyInjectionService {
    DependencyInjectionService.instance = new DependencyInjectionService(env);
    return DependencyInjectionService.instance;
  }

  /**
   * @throws ConfigurationError when an environment variable is malformed
   */
  getEnvironment(): Config.Environment {
    if (!this.environment) {
      this.environment = Config.loadEnvironment(this.env);
    }
    return this.environment;
  }

  getLogger(): Logger.Logger {
    if (!this.logger) {
      this.logger = Logger.createLogger('[manifest-pr] ', this.getEnvironment().logLevel);
    }
    return this.logger;
  }

  getPullRequestFinder(): PullRequests.PullRequestFinder {
    if (!this.pullRequestFinder) {
      this.pullRequestFinder = PullRequests.createPullRequestFinder(this.getEnvironment(), this.getLogger());
    }
    return this.pullRequestFinder;
  }

  getConfirmPrompt(): Prompt.ConfirmPrompt {
    if (!this.confirmPrompt) {
      this.confirmPrompt = new Prompt.ReadlineConfirmPrompt();
    }
    return this.confirmPrompt;
  }

  /**
   * Guard wired to the CI flag. `output` receives the status lines
   * (stdout by default; JSON runs send them to stderr).
   */
  getSubmissionGuard(output?: Guard.GuardOutput): Guard.SubmissionGuard {
    return new Guard.SubmissionGuard({
      isNonInteractive: this.getEnvironment().isCI,
      prompt: this.getConfirmPrompt(),
      ...(output !== undefined && { output }),
    });
  }
}
