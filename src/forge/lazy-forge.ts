import type { Result } from '../errors.js';
import type { ForgeClient } from './types.js';

/**
 * Builds the underlying client on first use. Runs that never reach the forge
 * (unsupported events, branch pushes) never construct it.
 */
export class LazyForgeClient implements ForgeClient {
  private client: ForgeClient | null = null;

  constructor(private readonly build: () => ForgeClient) {}

  private resolve(): ForgeClient {
    if (!this.client) {
      this.client = this.build();
    }
    return this.client;
  }

  latestReleaseVersion(targetBranch: string): Promise<Result<string>> {
    return this.resolve().latestReleaseVersion(targetBranch);
  }

  openPullRequest(sourceBranch: string, targetBranch: string, version: string): Promise<Result<number>> {
    return this.resolve().openPullRequest(sourceBranch, targetBranch, version);
  }

  mergePullRequest(pullNumber: number): Promise<Result<void>> {
    return this.resolve().mergePullRequest(pullNumber);
  }

  publishRelease(version: string): Promise<Result<void>> {
    return this.resolve().publishRelease(version);
  }
}
