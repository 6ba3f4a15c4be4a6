import { HarvestError } from '../errors.js'

export type RunState = 'idle' | 'discovering' | 'processing' | 'finalized'

const TRANSITIONS: Record<RunState, readonly RunState[]> = {
  idle: ['discovering'],
  discovering: ['processing', 'finalized'],
  processing: ['finalized'],
  finalized: [],
}

export class IllegalTransitionError extends HarvestError {
  constructor(from: RunState, to: RunState) {
    super(`Illegal run state transition ${from} -> ${to}`, 'run')
    this.name = 'IllegalTransitionError'
  }
}

export class RunStateMachine {
  private current: RunState = 'idle'

  get state(): RunState {
    return this.current
  }

  canTransition(to: RunState): boolean {
    return TRANSITIONS[this.current].includes(to)
  }

  transition(to: RunState): void {
    if (!this.canTransition(to)) {
      throw new IllegalTransitionError(this.current, to)
    }
    this.current = to
  }
}
