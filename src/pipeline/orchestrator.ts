import { ReleaseError } from '../errors.js';
import type { ForgeClient } from '../forge/types.js';
import { logger, generateRunId } from '../observability/logger.js';
import { checkPostconditions } from '../postconditions/checker.js';
import { runValidationPipeline } from '../validation/pipeline.js';
import type { ValidationSettings } from '../validation/types.js';
import { toTagName } from '../versioning/comparator.js';
import { ReleaseStateMachine } from './state/machine.js';
import type {
  BranchSettings,
  ForgeMutation,
  ReleaseOutcome,
  ReleaseRunReport,
  TriggerEvent,
} from '../types.js';

export const TAG_REF_PREFIX = 'refs/tags/';

/** Whether handling this trigger can reach the forge at all. */
export function requiresForge(trigger: TriggerEvent): boolean {
  switch (trigger.kind) {
    case 'pull_request':
      return true;
    case 'push':
      return isTagRef(trigger.ref);
    case 'other':
      return false;
  }
}

function isTagRef(ref: string | undefined): ref is string {
  return ref !== undefined && ref.startsWith(TAG_REF_PREFIX);
}

export interface OrchestratorDependencies {
  forge: ForgeClient;
  validation: ValidationSettings;
  branches: BranchSettings;
}

interface RunContext {
  machine: ReleaseStateMachine;
  mutations: ForgeMutation[];
  warnings: string[];
}

type PullRequestTrigger = Extract<TriggerEvent, { kind: 'pull_request' }>;
type PushTrigger = Extract<TriggerEvent, { kind: 'push' }>;

/**
 * Drives one release attempt: validation, then merge and publish. The two
 * trigger kinds differ only in how they obtain the versions and the pull
 * request; both end in the same merge-then-publish tail.
 *
 * Every failure is terminal. Nothing already done (a merge, an opened PR) is
 * rolled back.
 */
export class ReleaseOrchestrator {
  constructor(
    private readonly deps: OrchestratorDependencies,
    private readonly runId: string = generateRunId()
  ) {}

  async run(trigger: TriggerEvent): Promise<ReleaseRunReport> {
    const startTime = Date.now();
    const ctx: RunContext = {
      machine: new ReleaseStateMachine(this.runId),
      mutations: [],
      warnings: [],
    };

    logger.info('pipeline_start', 'Handling trigger event', { kind: trigger.kind });

    const outcome = await this.dispatch(ctx, trigger);

    const finalState = ctx.machine.getCurrentState();
    checkPostconditions({
      finalState,
      isTerminal: ctx.machine.isTerminal(),
      outcome,
      mutations: ctx.mutations,
    });

    const report: ReleaseRunReport = {
      runId: this.runId,
      outcome,
      finalState,
      transitions: ctx.machine.getTransitionHistory(),
      mutations: [...ctx.mutations],
      warnings: [...ctx.warnings],
      durationMs: Date.now() - startTime,
    };

    logger.info('pipeline_complete', 'Release run finished', {
      status: outcome.status,
      finalState,
      stateTransitions: ctx.machine.getStateHistorySummary(),
      mutations: ctx.mutations,
      durationMs: report.durationMs,
    });

    return report;
  }

  private async dispatch(ctx: RunContext, trigger: TriggerEvent): Promise<ReleaseOutcome> {
    switch (trigger.kind) {
      case 'pull_request':
        return this.handlePullRequest(ctx, trigger);
      case 'push':
        return this.handleTagPush(ctx, trigger);
      case 'other':
        logger.warn('pipeline_dispatch', `Unsupported event type '${trigger.name}', skipping`, {
          event: trigger.name,
        });
        ctx.machine.transition('DONE', 'unsupported event');
        return { status: 'skipped', reason: 'unsupported_event' };
    }
  }

  private async handlePullRequest(
    ctx: RunContext,
    trigger: PullRequestTrigger
  ): Promise<ReleaseOutcome> {
    logger.info('pull_request_path', 'Handling pull request');

    const { candidateVersion, baselineVersion, pullRequestNumber } = trigger;
    if (!candidateVersion || !baselineVersion || pullRequestNumber === undefined) {
      return this.abort(
        ctx,
        new ReleaseError(
          'MISSING_PARAMETERS',
          'Missing pr_version, main_version, or PR_NUMBER',
          {
            candidateVersion: candidateVersion ?? null,
            baselineVersion: baselineVersion ?? null,
            pullRequestNumber: pullRequestNumber ?? null,
          }
        )
      );
    }

    const validationError = await this.validate(ctx, candidateVersion, baselineVersion);
    if (validationError) return this.abort(ctx, validationError);

    return this.mergeAndPublish(ctx, pullRequestNumber, candidateVersion);
  }

  private async handleTagPush(ctx: RunContext, trigger: PushTrigger): Promise<ReleaseOutcome> {
    logger.info('tag_push_path', 'Handling tag push', { ref: trigger.ref });

    if (!isTagRef(trigger.ref)) {
      logger.info('tag_push_path', 'This push is not a tag push, skipping', { ref: trigger.ref });
      ctx.machine.transition('DONE', 'not a tag push');
      return { status: 'skipped', reason: 'not_a_tag_push' };
    }

    const candidateVersion = trigger.ref.slice(TAG_REF_PREFIX.length);
    const { sourceBranch, targetBranch } = this.deps.branches;
    if (!candidateVersion || !sourceBranch || !targetBranch) {
      return this.abort(
        ctx,
        new ReleaseError('MISSING_PARAMETERS', 'Missing tag name, source branch, or target branch', {
          tag: candidateVersion || null,
          sourceBranch: sourceBranch ?? null,
          targetBranch: targetBranch ?? null,
        })
      );
    }
    logger.info('tag_push_path', `Detected new tag: ${candidateVersion}`);

    ctx.machine.transition('RESOLVING_BASELINE');
    const latest = await this.deps.forge.latestReleaseVersion(targetBranch);
    if (!latest.ok) return this.abort(ctx, latest.error);

    const baselineVersion = latest.value;
    logger.info('tag_push_path', `Latest release version on '${targetBranch}' is '${baselineVersion}'`);

    const validationError = await this.validate(ctx, candidateVersion, baselineVersion);
    if (validationError) return this.abort(ctx, validationError);

    ctx.machine.transition('OPENING_PULL_REQUEST');
    ctx.mutations.push('open_pull_request');
    const opened = await this.deps.forge.openPullRequest(sourceBranch, targetBranch, candidateVersion);
    if (!opened.ok) {
      // An existing PR is not looked up or reused; the run stops here.
      const error = opened.error.code === 'PR_EXISTS'
        ? opened.error
        : opened.error.withCode('PR_CREATE_FAILED');
      return this.abort(ctx, error);
    }

    return this.mergeAndPublish(ctx, opened.value, candidateVersion);
  }

  private async validate(
    ctx: RunContext,
    candidateVersion: string,
    baselineVersion: string
  ): Promise<ReleaseError | null> {
    ctx.machine.transition('VALIDATING');

    const result = await runValidationPipeline(
      { candidateVersion, baselineVersion },
      this.deps.validation
    );
    if (!result.passed) return result.error;

    ctx.warnings.push(...result.warnings);
    logger.info('validation', `Version validation passed: ${baselineVersion} -> ${candidateVersion}`);
    return null;
  }

  private async mergeAndPublish(
    ctx: RunContext,
    pullNumber: number,
    version: string
  ): Promise<ReleaseOutcome> {
    ctx.machine.transition('MERGING');
    ctx.mutations.push('merge_pull_request');
    const merged = await this.deps.forge.mergePullRequest(pullNumber);
    if (!merged.ok) return this.abort(ctx, merged.error);

    ctx.machine.transition('PUBLISHING');
    ctx.mutations.push('publish_release');
    const published = await this.deps.forge.publishRelease(version);
    if (!published.ok) {
      logger.warn('publish_release', `PR #${pullNumber} is merged but no release was created`, {
        pullNumber,
        version,
      });
      return this.abort(ctx, published.error);
    }

    ctx.machine.transition('DONE', 'released');
    const tag = toTagName(version);
    logger.info('pipeline_success', `Released ${tag}`, { pullNumber, tag });
    return { status: 'released', version, tag, pullNumber };
  }

  private abort(ctx: RunContext, error: ReleaseError): ReleaseOutcome {
    ctx.machine.transition('ABORTED', error.code);

    if (error.code === 'PR_EXISTS') {
      logger.warn('pipeline_abort', `Stopping: ${error.message}`, { code: error.code });
    } else {
      logger.error('pipeline_abort', `Error: ${error.message}`, {
        code: error.code,
        details: error.details,
      });
    }

    return { status: 'aborted', error };
  }
}
