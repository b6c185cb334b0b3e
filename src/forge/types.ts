import type { Result } from '../errors.js';

export interface RepositoryRef {
  owner: string;
  repo: string;
}

/**
 * The forge queries and mutations a release run needs. Each is a single
 * round trip with no retry; failures come back as typed results.
 */
export interface ForgeClient {
  /** Tag of the latest published release, or `0.0.0` when there is none. */
  latestReleaseVersion(targetBranch: string): Promise<Result<string>>;
  /** Fails with `PR_EXISTS` when the branch pair already has an open PR. */
  openPullRequest(sourceBranch: string, targetBranch: string, version: string): Promise<Result<number>>;
  mergePullRequest(pullNumber: number): Promise<Result<void>>;
  publishRelease(version: string): Promise<Result<void>>;
}
