import { loadActionConfig, resolveForgeAccess, type ActionConfig } from '../config/inputs.js';
import { ConfigurationError } from '../errors.js';
import { GitHubForgeClient } from '../forge/github-forge.js';
import { LazyForgeClient } from '../forge/lazy-forge.js';
import type { ForgeClient } from '../forge/types.js';
import { createTokenClient } from '../github/client.js';
import { CommandLinter, type Linter } from '../lint/linter.js';
import { logger, generateRunId } from '../observability/logger.js';
import { ReleaseOrchestrator, requiresForge } from '../pipeline/orchestrator.js';
import type { ReleaseOutcome, ReleaseRunReport } from '../types.js';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;

export interface ActionOverrides {
  forge?: ForgeClient;
  linter?: Linter;
  cwd?: string;
}

/**
 * Clean stops (nothing to release, or a release PR already open) exit 0;
 * every other abort exits 1.
 */
export function exitCodeFor(outcome: ReleaseOutcome): number {
  switch (outcome.status) {
    case 'released':
    case 'skipped':
      return EXIT_SUCCESS;
    case 'aborted':
      return outcome.error.code === 'PR_EXISTS' ? EXIT_SUCCESS : EXIT_FAILURE;
  }
}

export function createOrchestrator(
  config: ActionConfig,
  runId: string,
  overrides: ActionOverrides = {}
): ReleaseOrchestrator {
  const forge = overrides.forge ?? new LazyForgeClient(() => {
    const access = resolveForgeAccess(config);
    return new GitHubForgeClient(
      createTokenClient({ token: access.token, baseUrl: config.apiUrl }),
      access.repository
    );
  });

  return new ReleaseOrchestrator(
    {
      forge,
      branches: config.branches,
      validation: {
        workingDirectory: config.workingDirectory,
        metadataFile: config.metadataFile,
        lintMode: config.lintMode,
        linter: overrides.linter ?? new CommandLinter(config.lintCommand),
      },
    },
    runId
  );
}

export async function runAction(
  env: Record<string, string | undefined>,
  overrides: ActionOverrides = {}
): Promise<{ exitCode: number; report?: ReleaseRunReport }> {
  const runId = generateRunId();
  logger.setContext({ runId, event: env.GITHUB_EVENT_NAME, repository: env.GITHUB_REPOSITORY });

  try {
    let config: ActionConfig;
    try {
      config = loadActionConfig(env, overrides.cwd);
      if (!overrides.forge && requiresForge(config.trigger)) {
        resolveForgeAccess(config);
      }
    } catch (error) {
      if (error instanceof ConfigurationError) {
        logger.error('configuration', error.message, { variable: error.variable });
        return { exitCode: EXIT_FAILURE };
      }
      throw error;
    }

    const report = await createOrchestrator(config, runId, overrides).run(config.trigger);
    return { exitCode: exitCodeFor(report.outcome), report };
  } finally {
    logger.clearContext();
  }
}
