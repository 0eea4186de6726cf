import { ConfigurationError, Guard, PullRequests } from '@manifest-pr/core';
import { DependencyInjectionService } from './dependency-injection';

describe('DependencyInjectionService', () => {
  afterEach(() => {
    DependencyInjectionService.resetInstance();
  });

  it('should return the same instance', () => {
    expect(DependencyInjectionService.getInstance()).toBe(DependencyInjectionService.getInstance());
  });

  it('should load the environment once', () => {
    const service = DependencyInjectionService.resetInstance({ CI: 'true', MANIFEST_PR_UPSTREAM: 'contoso/manifests' });

    const environment = service.getEnvironment();

    expect(environment.isCI).toBe(true);
    expect(environment.upstream).toEqual({ owner: 'contoso', repo: 'manifests' });
    expect(service.getEnvironment()).toBe(environment);
  });

  it('should surface configuration errors', () => {
    const service = DependencyInjectionService.resetInstance({ LOG_LEVEL: 'loud' });

    expect(() => service.getEnvironment()).toThrow(ConfigurationError);
  });

  it('should build and cache a GitHub pull request finder', () => {
    const service = DependencyInjectionService.resetInstance({ GITHUB_TOKEN: 'test-token' });

    const finder = service.getPullRequestFinder();

    expect(finder).toBeInstanceOf(PullRequests.GitHubPullRequestFinder);
    expect(service.getPullRequestFinder()).toBe(finder);
  });

  it('should build a guard that declines without prompting in CI', async () => {
    const service = DependencyInjectionService.resetInstance({ CI: 'true' });
    const lines: string[] = [];

    const guard = service.getSubmissionGuard({ log: (message) => { lines.push(message); } });
    const proceed = await guard.shouldProceed('Contoso.App', '1.2.3', {
      state: 'CLOSED',
      createdAt: new Date('2024-03-05T09:07:02Z'),
      url: 'https://github.com/test-org/test-manifests/pull/12',
    });

    expect(guard).toBeInstanceOf(Guard.SubmissionGuard);
    expect(proceed).toBe(false);
    expect(lines[0]).toBe(
      'There is already a closed pull request for Contoso.App 1.2.3 that was created on 2024-03-05 at 09:07:02'
    );
  });
});
