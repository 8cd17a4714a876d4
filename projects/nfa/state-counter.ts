import type { State } from './label.js';

/**
 * Hands out state ids for a single construction run.
 *
 * A counter is an immutable value: allocating returns the new state
 * together with the counter to use for the next allocation, so two
 * runs never share an allocator.
 */
export class StateCounter {
  static readonly initial = new StateCounter(0);

  private readonly next: State;

  private constructor(next: State) {
    this.next = next;
  }

  /**
   * Number of states allocated so far in this run.
   */
  get allocated(): number {
    return this.next;
  }

  allocate(): [State, StateCounter] {
    return [this.next, new StateCounter(this.next + 1)];
  }

  /**
   * Allocate a fresh start state and a fresh accept state.
   */
  allocatePair(): [State, State, StateCounter] {
    const [start, afterStart] = this.allocate();
    const [accept, afterAccept] = afterStart.allocate();
    return [start, accept, afterAccept];
  }
}
