import { ReleaseState, isTerminalState } from './states.js';
import { StateTransition, validateTransition, createTransition } from './transitions.js';
import { IllegalStateTransitionError, TerminalStateViolationError } from './errors.js';
import { logger } from '../../observability/logger.js';

export class ReleaseStateMachine {
  private currentState: ReleaseState;
  private transitions: StateTransition[] = [];
  private readonly runId: string;

  constructor(runId: string, initialState: ReleaseState = 'START') {
    this.runId = runId;
    this.currentState = initialState;

    logger.info('state_machine_initialized', 'Release state machine created', {
      runId,
      initialState,
    });
  }

  getCurrentState(): ReleaseState {
    return this.currentState;
  }

  getTransitionHistory(): StateTransition[] {
    return [...this.transitions];
  }

  transition(targetState: ReleaseState, reason?: string): void {
    const validationResult = validateTransition(this.currentState, targetState);

    if (!validationResult.allowed) {
      const error = isTerminalState(this.currentState)
        ? new TerminalStateViolationError(this.currentState, targetState)
        : new IllegalStateTransitionError(this.currentState, targetState, validationResult.reason);

      logger.error('illegal_state_transition', 'Illegal state transition attempted', {
        runId: this.runId,
        from: this.currentState,
        to: targetState,
        reason: validationResult.reason,
        transitionHistory: this.getStateHistorySummary(),
      });

      throw error;
    }

    const transition = createTransition(this.currentState, targetState, reason);
    this.transitions.push(transition);

    const previousState = this.currentState;
    this.currentState = targetState;

    logger.info('state_transition', 'Release state changed', {
      runId: this.runId,
      from: previousState,
      to: targetState,
      reason,
      isTerminal: isTerminalState(targetState),
    });
  }

  isTerminal(): boolean {
    return isTerminalState(this.currentState);
  }

  getStateHistorySummary(): string[] {
    return this.transitions.map(t => `${t.from}→${t.to}`);
  }
}
