import type { ReleaseErrorCode } from '../errors.js';
import { PostconditionDefinition, PostconditionContext, PostconditionID } from './types.js';

// Failures raised before the first forge mutation can be requested
const PRE_MUTATION_FAILURES: ReleaseErrorCode[] = [
  'MISSING_PARAMETERS',
  'INVALID_VERSION',
  'VERSION_NOT_ADVANCED',
  'MISSING_METADATA',
  'STYLE_VIOLATION',
];

function count(ctx: PostconditionContext, mutation: PostconditionContext['mutations'][number]): number {
  return ctx.mutations.filter(m => m === mutation).length;
}

const POSTCONDITIONS: Record<PostconditionID, PostconditionDefinition> = {
  RELEASE_REQUIRES_MERGE_FIRST: {
    id: 'RELEASE_REQUIRES_MERGE_FIRST',
    description: 'A release is only published after the pull request merge was requested',
    severity: 'fatal',
    evaluate: (ctx) => {
      const publishAt = ctx.mutations.indexOf('publish_release');
      if (publishAt === -1) return true;
      const mergeAt = ctx.mutations.indexOf('merge_pull_request');
      return mergeAt !== -1 && mergeAt < publishAt;
    },
  },

  PUBLISH_AT_MOST_ONCE: {
    id: 'PUBLISH_AT_MOST_ONCE',
    description: 'A run requests at most one release',
    severity: 'fatal',
    evaluate: (ctx) => count(ctx, 'publish_release') <= 1,
  },

  RELEASED_REQUIRES_PUBLISH: {
    id: 'RELEASED_REQUIRES_PUBLISH',
    description: 'A released outcome published exactly once and ended in DONE',
    severity: 'fatal',
    evaluate: (ctx) => {
      if (ctx.outcome.status !== 'released') return true;
      return count(ctx, 'publish_release') === 1 && ctx.finalState === 'DONE';
    },
  },

  SKIP_HAS_NO_SIDE_EFFECTS: {
    id: 'SKIP_HAS_NO_SIDE_EFFECTS',
    description: 'A skipped run makes no forge mutation',
    severity: 'error',
    evaluate: (ctx) => ctx.outcome.status !== 'skipped' || ctx.mutations.length === 0,
  },

  ABORT_BEFORE_MUTATION_HAS_NO_SIDE_EFFECTS: {
    id: 'ABORT_BEFORE_MUTATION_HAS_NO_SIDE_EFFECTS',
    description: 'A run aborted by validation or missing parameters makes no forge mutation',
    severity: 'error',
    evaluate: (ctx) => {
      if (ctx.outcome.status !== 'aborted') return true;
      if (!PRE_MUTATION_FAILURES.includes(ctx.outcome.error.code)) return true;
      return ctx.mutations.length === 0;
    },
  },

  TERMINAL_STATE_REACHED: {
    id: 'TERMINAL_STATE_REACHED',
    description: 'The run ends in DONE or ABORTED',
    severity: 'error',
    evaluate: (ctx) => ctx.isTerminal,
  },
};

export function getAllPostconditions(): PostconditionDefinition[] {
  return Object.values(POSTCONDITIONS);
}

export function getPostconditionsByIds(ids: PostconditionID[]): PostconditionDefinition[] {
  return ids.map(id => POSTCONDITIONS[id]);
}
