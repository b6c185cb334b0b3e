import { describe, it, expect, vi } from 'vitest';
import { FakeForge } from './__fakes__/fake-forge.js';
import { LazyForgeClient } from './lazy-forge.js';

describe('LazyForgeClient', () => {
  it('does not build the client until a call is made', () => {
    const build = vi.fn(() => new FakeForge());

    new LazyForgeClient(build);

    expect(build).not.toHaveBeenCalled();
  });

  it('builds once and forwards every call', async () => {
    const forge = new FakeForge({ latestRelease: 'v1.2.0', nextPullNumber: 4 });
    const build = vi.fn(() => forge);
    const lazy = new LazyForgeClient(build);

    expect(await lazy.latestReleaseVersion('main')).toEqual({ ok: true, value: 'v1.2.0' });
    expect(await lazy.openPullRequest('develop', 'main', '1.3.0')).toEqual({ ok: true, value: 4 });
    await lazy.mergePullRequest(4);
    await lazy.publishRelease('1.3.0');

    expect(build).toHaveBeenCalledTimes(1);
    expect(forge.ops()).toEqual(['latestReleaseVersion', 'openPullRequest', 'mergePullRequest', 'publishRelease']);
  });
});
