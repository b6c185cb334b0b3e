import { ConfigurationError } from '../errors.js';
import type { RepositoryRef } from '../forge/types.js';
import type { BranchSettings, TriggerEvent } from '../types.js';

export const DEFAULTS = {
  API_URL: 'https://api.github.com',
  LINT_MODE: 'update',
  LINT_COMMAND: 'arduino-lint',
  METADATA_FILE: 'library.properties',
} as const;

export interface ActionConfig {
  token?: string;
  repository?: string;
  apiUrl: string;
  workingDirectory: string;
  branches: BranchSettings;
  lintMode: string;
  lintCommand: string;
  metadataFile: string;
  trigger: TriggerEvent;
}

type Env = Record<string, string | undefined>;

/**
 * Action inputs arrive as `INPUT_<NAME>` with the name upper-cased as
 * written, so `source-branch` keeps its hyphen. The underscore spelling is
 * accepted for shells that cannot export hyphenated names.
 */
function readInput(env: Env, name: string): string | undefined {
  const key = `INPUT_${name.toUpperCase()}`;
  const value = env[key] ?? env[key.replace(/-/g, '_')];
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function readVar(env: Env, name: string): string | undefined {
  const trimmed = env[name]?.trim();
  return trimmed ? trimmed : undefined;
}

function parseRepository(value: string | undefined): RepositoryRef {
  if (!value) {
    throw new ConfigurationError('GITHUB_REPOSITORY', 'GITHUB_REPOSITORY is not set');
  }
  const [owner, repo, ...rest] = value.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new ConfigurationError(
      'GITHUB_REPOSITORY',
      `GITHUB_REPOSITORY must be 'owner/repo', got '${value}'`
    );
  }
  return { owner, repo };
}

function parsePullRequestNumber(value: string | undefined): number | undefined {
  if (!value || !/^\d+$/.test(value)) return undefined;
  const parsed = Number(value);
  return parsed > 0 ? parsed : undefined;
}

export function parseTrigger(env: Env): TriggerEvent {
  const eventName = readVar(env, 'GITHUB_EVENT_NAME') ?? '';

  switch (eventName) {
    case 'pull_request':
      return {
        kind: 'pull_request',
        candidateVersion: readVar(env, 'pr_version'),
        baselineVersion: readVar(env, 'main_version'),
        pullRequestNumber: parsePullRequestNumber(readVar(env, 'PR_NUMBER')),
      };
    case 'push':
      return { kind: 'push', ref: readVar(env, 'GITHUB_REF') };
    default:
      return { kind: 'other', name: eventName };
  }
}

export interface ForgeAccess {
  token: string;
  repository: RepositoryRef;
}

/**
 * Credentials are only demanded once a run is going to talk to the forge,
 * so no-op triggers succeed without them.
 */
export function resolveForgeAccess(config: ActionConfig): ForgeAccess {
  if (!config.token) {
    throw new ConfigurationError('GITHUB_TOKEN', 'GITHUB_TOKEN is not set');
  }
  return { token: config.token, repository: parseRepository(config.repository) };
}

export function loadActionConfig(env: Env = process.env, cwd: string = process.cwd()): ActionConfig {
  const config: ActionConfig = {
    token: readVar(env, 'GITHUB_TOKEN'),
    repository: readVar(env, 'GITHUB_REPOSITORY'),
    apiUrl: readVar(env, 'GITHUB_API_URL') ?? DEFAULTS.API_URL,
    workingDirectory: readVar(env, 'GITHUB_WORKSPACE') ?? cwd,
    branches: Object.freeze({
      sourceBranch: readInput(env, 'source-branch'),
      targetBranch: readInput(env, 'target-branch'),
    }),
    lintMode: readInput(env, 'lint-mode') ?? DEFAULTS.LINT_MODE,
    lintCommand: readInput(env, 'lint-command') ?? DEFAULTS.LINT_COMMAND,
    metadataFile: readInput(env, 'metadata-file') ?? DEFAULTS.METADATA_FILE,
    trigger: Object.freeze(parseTrigger(env)),
  };

  return Object.freeze(config);
}
