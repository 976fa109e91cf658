import type { StepState } from '../../domain/types.js';
import { VALID_TRANSITIONS } from './types.js';

/** Tracks one step's position in the attempt loop and rejects moves the loop should never make. */
export class StepStateMachine {
  private current: StepState = 'PENDING';
  private readonly path: StepState[] = ['PENDING'];

  get state(): StepState {
    return this.current;
  }

  get visited(): readonly StepState[] {
    return this.path;
  }

  canTransition(to: StepState): boolean {
    return VALID_TRANSITIONS[this.current].has(to);
  }

  transition(to: StepState): void {
    if (!this.canTransition(to)) {
      throw new Error(`Invalid step transition from '${this.current}' to '${to}'`);
    }
    this.current = to;
    this.path.push(to);
  }
}
