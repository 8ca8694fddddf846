export type LoopState = 'started' | 'awaiting_decision' | 'invoking_operation' | 'completed' | 'aborted';

const ALLOWED_TRANSITIONS: Record<LoopState, readonly LoopState[]> = {
  started: ['awaiting_decision', 'aborted'],
  awaiting_decision: ['awaiting_decision', 'invoking_operation', 'completed', 'aborted'],
  invoking_operation: ['awaiting_decision', 'aborted'],
  completed: [],
  aborted: [],
};

export class IllegalTransitionError extends Error {
  constructor(from: LoopState, to: LoopState) {
    super(`illegal conversation transition ${from} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export class ConversationStateMachine {
  private state: LoopState = 'started';
  private readonly trail: LoopState[] = ['started'];

  get current(): LoopState {
    return this.state;
  }

  /** Every state visited, in order. */
  get history(): readonly LoopState[] {
    return this.trail;
  }

  get isTerminal(): boolean {
    return ALLOWED_TRANSITIONS[this.state].length === 0;
  }

  transition(next: LoopState): void {
    if (!ALLOWED_TRANSITIONS[this.state].includes(next)) {
      throw new IllegalTransitionError(this.state, next);
    }
    this.state = next;
    this.trail.push(next);
  }
}
