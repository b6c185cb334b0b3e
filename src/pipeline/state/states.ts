export type ReleaseState =
  | 'START'
  | 'RESOLVING_BASELINE'
  | 'VALIDATING'
  | 'OPENING_PULL_REQUEST'
  | 'MERGING'
  | 'PUBLISHING'

  // Terminal states
  | 'DONE'
  | 'ABORTED';

export interface StateMetadata {
  state: ReleaseState;
  isTerminal: boolean;
  canTransitionTo: ReleaseState[];
  description: string;
}

const STATE_DEFINITIONS: Record<ReleaseState, Omit<StateMetadata, 'state'>> = {
  START: {
    isTerminal: false,
    canTransitionTo: ['RESOLVING_BASELINE', 'VALIDATING', 'DONE', 'ABORTED'],
    description: 'Trigger received, handler selected',
  },

  RESOLVING_BASELINE: {
    isTerminal: false,
    canTransitionTo: ['VALIDATING', 'ABORTED'],
    description: 'Fetching the latest published release',
  },

  VALIDATING: {
    isTerminal: false,
    canTransitionTo: ['OPENING_PULL_REQUEST', 'MERGING', 'ABORTED'],
    description: 'Running version, metadata and style checks',
  },

  OPENING_PULL_REQUEST: {
    isTerminal: false,
    canTransitionTo: ['MERGING', 'ABORTED'],
    description: 'Opening the release pull request',
  },

  MERGING: {
    isTerminal: false,
    canTransitionTo: ['PUBLISHING', 'ABORTED'],
    description: 'Squash-merging the release pull request',
  },

  PUBLISHING: {
    isTerminal: false,
    canTransitionTo: ['DONE', 'ABORTED'],
    description: 'Publishing the release',
  },

  DONE: {
    isTerminal: true,
    canTransitionTo: [],
    description: 'Run completed (released or nothing to do)',
  },

  ABORTED: {
    isTerminal: true,
    canTransitionTo: [],
    description: 'Run stopped on the first failure',
  },
};

export function isTerminalState(state: ReleaseState): boolean {
  return STATE_DEFINITIONS[state].isTerminal;
}

export function canTransition(from: ReleaseState, to: ReleaseState): boolean {
  return STATE_DEFINITIONS[from].canTransitionTo.includes(to);
}
