import { ok, type ReleaseError, type Result } from '../../errors.js';
import { INITIAL_BASELINE_VERSION } from '../../versioning/comparator.js';
import type { ForgeClient } from '../types.js';

export type FakeForgeCall =
  | { op: 'latestReleaseVersion'; targetBranch: string }
  | { op: 'openPullRequest'; sourceBranch: string; targetBranch: string; version: string }
  | { op: 'mergePullRequest'; pullNumber: number }
  | { op: 'publishRelease'; version: string };

export interface FakeForgeOptions {
  latestRelease?: string;
  nextPullNumber?: number;
  failures?: Partial<Record<FakeForgeCall['op'], ReleaseError>>;
}

/**
 * In-memory forge that records every call in order. Configured failures are
 * returned instead of the default success.
 */
export class FakeForge implements ForgeClient {
  readonly calls: FakeForgeCall[] = [];

  constructor(private readonly options: FakeForgeOptions = {}) {}

  ops(): Array<FakeForgeCall['op']> {
    return this.calls.map(c => c.op);
  }

  private failure(op: FakeForgeCall['op']): ReleaseError | undefined {
    return this.options.failures?.[op];
  }

  async latestReleaseVersion(targetBranch: string): Promise<Result<string>> {
    this.calls.push({ op: 'latestReleaseVersion', targetBranch });
    const error = this.failure('latestReleaseVersion');
    if (error) return { ok: false, error };
    return ok(this.options.latestRelease ?? INITIAL_BASELINE_VERSION);
  }

  async openPullRequest(sourceBranch: string, targetBranch: string, version: string): Promise<Result<number>> {
    this.calls.push({ op: 'openPullRequest', sourceBranch, targetBranch, version });
    const error = this.failure('openPullRequest');
    if (error) return { ok: false, error };
    return ok(this.options.nextPullNumber ?? 1);
  }

  async mergePullRequest(pullNumber: number): Promise<Result<void>> {
    this.calls.push({ op: 'mergePullRequest', pullNumber });
    const error = this.failure('mergePullRequest');
    if (error) return { ok: false, error };
    return ok(undefined);
  }

  async publishRelease(version: string): Promise<Result<void>> {
    this.calls.push({ op: 'publishRelease', version });
    const error = this.failure('publishRelease');
    if (error) return { ok: false, error };
    return ok(undefined);
  }
}
