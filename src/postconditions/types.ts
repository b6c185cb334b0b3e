import type { ReleaseState } from '../pipeline/state/states.js';
import type { ForgeMutation, ReleaseOutcome } from '../types.js';

export type PostconditionSeverity = 'warn' | 'error' | 'fatal';

export type PostconditionID =
  | 'RELEASE_REQUIRES_MERGE_FIRST'
  | 'PUBLISH_AT_MOST_ONCE'
  | 'RELEASED_REQUIRES_PUBLISH'
  | 'SKIP_HAS_NO_SIDE_EFFECTS'
  | 'ABORT_BEFORE_MUTATION_HAS_NO_SIDE_EFFECTS'
  | 'TERMINAL_STATE_REACHED';

export interface PostconditionContext {
  finalState: ReleaseState;
  isTerminal: boolean;
  outcome: ReleaseOutcome;
  // Forge mutations in the order they were requested, successful or not
  mutations: ForgeMutation[];
}

export interface PostconditionDefinition {
  id: PostconditionID;
  description: string;
  severity: PostconditionSeverity;
  evaluate: (context: PostconditionContext) => boolean;
}

export interface PostconditionViolation {
  postconditionId: PostconditionID;
  description: string;
  severity: PostconditionSeverity;
  finalState: ReleaseState;
  timestamp: string;
}

export interface PostconditionCheckResult {
  passed: boolean;
  violations: PostconditionViolation[];
  totalChecked: number;
}
