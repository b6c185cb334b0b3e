import type { Octokit } from '@octokit/rest';
import { RequestError } from '@octokit/request-error';
import { ok, fail, type Result } from '../errors.js';
import { logger } from '../observability/logger.js';
import { INITIAL_BASELINE_VERSION, isPrerelease, toTagName } from '../versioning/comparator.js';
import type { ForgeClient, RepositoryRef } from './types.js';

export const DUPLICATE_PULL_REQUEST_MARKER = 'A pull request already exists';

interface HttpFailure {
  status?: number;
  body: string;
  message: string;
}

function describeFailure(error: unknown): HttpFailure {
  if (error instanceof RequestError) {
    const data = error.response?.data;
    return {
      status: error.status,
      body: data === undefined ? '' : typeof data === 'string' ? data : JSON.stringify(data),
      message: error.message,
    };
  }
  return {
    body: '',
    message: error instanceof Error ? error.message : 'Unknown error',
  };
}

export function releaseTitle(version: string): string {
  return `Release: ${version}`;
}

export function releaseBody(version: string): string {
  return `Automated release for version ${version}.`;
}

export class GitHubForgeClient implements ForgeClient {
  constructor(
    private readonly octokit: Octokit,
    private readonly repository: RepositoryRef
  ) {}

  async latestReleaseVersion(targetBranch: string): Promise<Result<string>> {
    try {
      const response = await this.octokit.rest.repos.getLatestRelease({
        owner: this.repository.owner,
        repo: this.repository.repo,
      });

      logger.info('forge_latest_release', 'Latest release resolved', {
        targetBranch,
        tagName: response.data.tag_name,
      });
      return ok(response.data.tag_name);
    } catch (error) {
      const failure = describeFailure(error);

      if (failure.status === 404) {
        logger.info('forge_latest_release', 'No releases found, assuming initial version', {
          targetBranch,
          version: INITIAL_BASELINE_VERSION,
        });
        return ok(INITIAL_BASELINE_VERSION);
      }

      logger.error('forge_latest_release', 'Failed to fetch latest release', { ...failure });
      return fail('FORGE_REQUEST_FAILED', `Failed to fetch latest release: ${failure.message}`, {
        status: failure.status,
        body: failure.body,
      });
    }
  }

  async openPullRequest(
    sourceBranch: string,
    targetBranch: string,
    version: string
  ): Promise<Result<number>> {
    try {
      const response = await this.octokit.rest.pulls.create({
        owner: this.repository.owner,
        repo: this.repository.repo,
        title: releaseTitle(version),
        head: sourceBranch,
        base: targetBranch,
        body: releaseBody(version),
      });

      logger.info('forge_open_pr', 'Pull request created', {
        pullNumber: response.data.number,
        head: sourceBranch,
        base: targetBranch,
      });
      return ok(response.data.number);
    } catch (error) {
      const failure = describeFailure(error);
      const duplicate =
        failure.body.includes(DUPLICATE_PULL_REQUEST_MARKER) ||
        failure.message.includes(DUPLICATE_PULL_REQUEST_MARKER);

      if (duplicate) {
        logger.warn('forge_open_pr', 'A pull request already exists for this branch pair', {
          head: sourceBranch,
          base: targetBranch,
          status: failure.status,
        });
        return fail('PR_EXISTS', `A pull request from '${sourceBranch}' to '${targetBranch}' already exists`, {
          status: failure.status,
          body: failure.body,
        });
      }

      logger.error('forge_open_pr', 'Failed to create pull request', { ...failure });
      return fail('FORGE_REQUEST_FAILED', `Error creating PR: ${failure.status ?? 'no status'} ${failure.message}`, {
        status: failure.status,
        body: failure.body,
      });
    }
  }

  async mergePullRequest(pullNumber: number): Promise<Result<void>> {
    try {
      const response = await this.octokit.rest.pulls.merge({
        owner: this.repository.owner,
        repo: this.repository.repo,
        pull_number: pullNumber,
        merge_method: 'squash',
      });

      if (response.status !== 200) {
        return fail('MERGE_FAILED', `Error merging PR #${pullNumber}: unexpected status ${response.status}`, {
          status: response.status,
          body: JSON.stringify(response.data),
        });
      }

      logger.info('forge_merge_pr', 'Pull request merged', {
        pullNumber,
        sha: response.data.sha,
      });
      return ok(undefined);
    } catch (error) {
      const failure = describeFailure(error);
      logger.error('forge_merge_pr', `Failed to merge PR #${pullNumber}`, { ...failure });
      return fail('MERGE_FAILED', `Error merging PR #${pullNumber}: ${failure.status ?? 'no status'} ${failure.message}`, {
        status: failure.status,
        body: failure.body,
      });
    }
  }

  async publishRelease(version: string): Promise<Result<void>> {
    const tag = toTagName(version);

    try {
      const response = await this.octokit.rest.repos.createRelease({
        owner: this.repository.owner,
        repo: this.repository.repo,
        tag_name: tag,
        name: `Release ${tag}`,
        body: releaseBody(tag),
        draft: false,
        prerelease: isPrerelease(version),
      });

      if (response.status !== 201) {
        return fail('PUBLISH_FAILED', `Error creating release ${tag}: unexpected status ${response.status}`, {
          status: response.status,
          body: JSON.stringify(response.data),
        });
      }

      logger.info('forge_publish_release', 'Release published', {
        tag,
        url: response.data.html_url,
        prerelease: response.data.prerelease,
      });
      return ok(undefined);
    } catch (error) {
      const failure = describeFailure(error);
      logger.error('forge_publish_release', `Failed to create release ${tag}`, { ...failure });
      return fail('PUBLISH_FAILED', `Error creating release ${tag}: ${failure.status ?? 'no status'} ${failure.message}`, {
        status: failure.status,
        body: failure.body,
      });
    }
  }
}
