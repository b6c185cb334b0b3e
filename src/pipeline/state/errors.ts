import type { ReleaseState } from './states.js';

export class IllegalStateTransitionError extends Error {
  constructor(
    public readonly from: ReleaseState,
    public readonly to: ReleaseState,
    public readonly reason: string
  ) {
    super(`Illegal state transition: ${from} → ${to}: ${reason}`);
    this.name = 'IllegalStateTransitionError';
  }
}

export class TerminalStateViolationError extends Error {
  constructor(
    public readonly state: ReleaseState,
    public readonly attemptedTransition: ReleaseState
  ) {
    super(`Cannot transition from terminal state ${state} to ${attemptedTransition}`);
    this.name = 'TerminalStateViolationError';
  }
}
