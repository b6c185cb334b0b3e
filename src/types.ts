import type { ReleaseError } from './errors.js';
import type { ReleaseState } from './pipeline/state/states.js';
import type { StateTransition } from './pipeline/state/transitions.js';

export type TriggerEvent =
  | {
      kind: 'pull_request';
      candidateVersion?: string;
      baselineVersion?: string;
      pullRequestNumber?: number;
    }
  | { kind: 'push'; ref?: string }
  | { kind: 'other'; name: string };

export interface BranchSettings {
  sourceBranch?: string;
  targetBranch?: string;
}

export type SkipReason = 'unsupported_event' | 'not_a_tag_push';

export type ReleaseOutcome =
  | { status: 'released'; version: string; tag: string; pullNumber: number }
  | { status: 'skipped'; reason: SkipReason }
  | { status: 'aborted'; error: ReleaseError };

export type ForgeMutation = 'open_pull_request' | 'merge_pull_request' | 'publish_release';

export interface ReleaseRunReport {
  runId: string;
  outcome: ReleaseOutcome;
  finalState: ReleaseState;
  transitions: StateTransition[];
  mutations: ForgeMutation[];
  warnings: string[];
  durationMs: number;
}
