import { Octokit } from '@octokit/rest';

export interface GitHubClientOptions {
  token: string;
  baseUrl?: string;
}

export function createTokenClient(options: GitHubClientOptions): Octokit {
  if (!options.token) {
    throw new Error('GitHub token not configured');
  }

  return new Octokit({
    auth: options.token,
    baseUrl: options.baseUrl,
    userAgent: 'promote-release',
  });
}
