import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { Octokit } from '@octokit/rest';
import { ReleaseError } from '../errors.js';
import { GitHubForgeClient } from '../forge/github-forge.js';
import { FakeLinter } from '../lint/__fakes__/fake-linter.js';
import { exitCodeFor, runAction } from './run.js';

type Routes = Record<string, { status: number; body: unknown }>;

function stubbedForge(routes: Routes) {
  const seen: string[] = [];
  const fetch = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const key = `${init?.method ?? 'GET'} ${new URL(String(input)).pathname}`;
    seen.push(key);
    const route = routes[key] ?? { status: 404, body: { message: 'Not Found' } };
    return new Response(JSON.stringify(route.body), {
      status: route.status,
      headers: { 'content-type': 'application/json' },
    });
  });
  const octokit = new Octokit({ auth: 'test-token', request: { fetch } });
  return { forge: new GitHubForgeClient(octokit, { owner: 'octo', repo: 'lib' }), seen };
}

describe('runAction', () => {
  let workDir: string;
  let env: Record<string, string>;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    workDir = mkdtempSync(path.join(os.tmpdir(), 'promote-release-action-'));
    writeFileSync(path.join(workDir, 'library.properties'), 'name=Example\n');
    env = {
      GITHUB_TOKEN: 'test-token',
      GITHUB_REPOSITORY: 'octo/lib',
      GITHUB_WORKSPACE: workDir,
      'INPUT_SOURCE-BRANCH': 'develop',
      'INPUT_TARGET-BRANCH': 'main',
      'INPUT_LINT-MODE': 'update',
    };
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('releases a pull request and exits 0', async () => {
    const { forge, seen } = stubbedForge({
      'PUT /repos/octo/lib/pulls/12/merge': { status: 200, body: { merged: true, sha: 'abc' } },
      'POST /repos/octo/lib/releases': { status: 201, body: { html_url: 'https://example.test/r', prerelease: false } },
    });
    const linter = new FakeLinter();

    const { exitCode, report } = await runAction(
      { ...env, GITHUB_EVENT_NAME: 'pull_request', pr_version: '2.0.0', main_version: '1.9.0', PR_NUMBER: '12' },
      { forge, linter }
    );

    expect(exitCode).toBe(0);
    expect(report?.finalState).toBe('DONE');
    expect(seen).toEqual(['PUT /repos/octo/lib/pulls/12/merge', 'POST /repos/octo/lib/releases']);
    expect(linter.runs).toEqual([{ workingDirectory: workDir, mode: 'update' }]);
  });

  it('releases the first tag of a repository', async () => {
    const { forge, seen } = stubbedForge({
      'POST /repos/octo/lib/pulls': { status: 201, body: { number: 1 } },
      'PUT /repos/octo/lib/pulls/1/merge': { status: 200, body: { merged: true, sha: 'abc' } },
      'POST /repos/octo/lib/releases': { status: 201, body: { prerelease: false } },
    });

    const { exitCode, report } = await runAction(
      { ...env, GITHUB_EVENT_NAME: 'push', GITHUB_REF: 'refs/tags/v0.1.0' },
      { forge, linter: new FakeLinter() }
    );

    expect(exitCode).toBe(0);
    expect(report?.outcome).toEqual({ status: 'released', version: 'v0.1.0', tag: 'v0.1.0', pullNumber: 1 });
    expect(seen).toEqual([
      'GET /repos/octo/lib/releases/latest',
      'POST /repos/octo/lib/pulls',
      'PUT /repos/octo/lib/pulls/1/merge',
      'POST /repos/octo/lib/releases',
    ]);
  });

  it('exits 0 without merging when the release pull request already exists', async () => {
    const { forge, seen } = stubbedForge({
      'GET /repos/octo/lib/releases/latest': { status: 200, body: { tag_name: 'v0.1.0' } },
      'POST /repos/octo/lib/pulls': {
        status: 422,
        body: {
          message: 'Validation Failed',
          errors: [{ resource: 'PullRequest', code: 'custom', message: 'A pull request already exists for octo:develop.' }],
        },
      },
    });

    const { exitCode, report } = await runAction(
      { ...env, GITHUB_EVENT_NAME: 'push', GITHUB_REF: 'refs/tags/v0.2.0' },
      { forge, linter: new FakeLinter() }
    );

    expect(exitCode).toBe(0);
    expect(report?.finalState).toBe('ABORTED');
    expect(seen).toEqual(['GET /repos/octo/lib/releases/latest', 'POST /repos/octo/lib/pulls']);
  });

  it('exits 0 without any forge call on a branch push', async () => {
    const { forge, seen } = stubbedForge({});
    const linter = new FakeLinter();

    const { exitCode } = await runAction(
      { ...env, GITHUB_EVENT_NAME: 'push', GITHUB_REF: 'refs/heads/main' },
      { forge, linter }
    );

    expect(exitCode).toBe(0);
    expect(seen).toEqual([]);
    expect(linter.runs).toEqual([]);
  });

  it('exits 1 when validation fails', async () => {
    const { forge } = stubbedForge({
      'GET /repos/octo/lib/releases/latest': { status: 200, body: { tag_name: 'v1.0.0' } },
    });

    const { exitCode } = await runAction(
      { ...env, GITHUB_EVENT_NAME: 'push', GITHUB_REF: 'refs/tags/v1.0.0' },
      { forge, linter: new FakeLinter() }
    );

    expect(exitCode).toBe(1);
  });

  it('exits 1 when a tag push has no token', async () => {
    const linter = new FakeLinter();

    const { exitCode, report } = await runAction(
      { GITHUB_REPOSITORY: 'octo/lib', GITHUB_EVENT_NAME: 'push', GITHUB_REF: 'refs/tags/v1.0.0' },
      { linter, cwd: workDir }
    );

    expect(exitCode).toBe(1);
    expect(report).toBeUndefined();
    expect(linter.runs).toEqual([]);
    const line = JSON.parse(String(vi.mocked(console.error).mock.calls[0][0]));
    expect(line).toMatchObject({ level: 'error', phase: 'configuration', message: 'GITHUB_TOKEN is not set' });
  });

  it('exits 1 when a pull request run has a malformed repository', async () => {
    const { exitCode } = await runAction(
      { GITHUB_TOKEN: 'test-token', GITHUB_REPOSITORY: 'lib', GITHUB_EVENT_NAME: 'pull_request' },
      { linter: new FakeLinter(), cwd: workDir }
    );

    expect(exitCode).toBe(1);
  });

  it('exits 0 on a branch push without credentials', async () => {
    const { exitCode, report } = await runAction(
      { GITHUB_EVENT_NAME: 'push', GITHUB_REF: 'refs/heads/main' },
      { linter: new FakeLinter(), cwd: workDir }
    );

    expect(exitCode).toBe(0);
    expect(report?.outcome).toEqual({ status: 'skipped', reason: 'not_a_tag_push' });
    expect(console.error).not.toHaveBeenCalled();
  });

  it('exits 0 on an unsupported event without credentials', async () => {
    const { forge, seen } = stubbedForge({});

    const { exitCode } = await runAction(
      { GITHUB_EVENT_NAME: 'workflow_dispatch', GITHUB_REPOSITORY: 'octo/lib' },
      { forge, linter: new FakeLinter() }
    );

    expect(exitCode).toBe(0);
    expect(seen).toEqual([]);
  });
});

describe('exitCodeFor', () => {
  it('maps outcomes to the process exit contract', () => {
    expect(exitCodeFor({ status: 'released', version: '1.0.0', tag: 'v1.0.0', pullNumber: 1 })).toBe(0);
    expect(exitCodeFor({ status: 'skipped', reason: 'unsupported_event' })).toBe(0);
    expect(exitCodeFor({ status: 'aborted', error: new ReleaseError('PR_EXISTS', 'exists') })).toBe(0);
    expect(exitCodeFor({ status: 'aborted', error: new ReleaseError('MERGE_FAILED', 'failed') })).toBe(1);
    expect(exitCodeFor({ status: 'aborted', error: new ReleaseError('INVALID_VERSION', 'bad') })).toBe(1);
  });
});
