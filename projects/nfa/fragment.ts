import { type ConstMap, type ConstSet, HashMap } from '../utils/sets.js';
import { type Label, labelKey, type State } from './label.js';

/**
 * state -> label -> set of states reachable from that state via that label.
 */
export type TransitionTable = ReadonlyMap<
  State,
  ConstMap<Label, ConstSet<State>>
>;

export type MutTransitionRow = HashMap<Label, Set<State>>;

export function newTransitionRow(): MutTransitionRow {
  return new HashMap(labelKey);
}

/**
 * A partially built automaton with exactly one start state and
 * exactly one accept state. Every state of the fragment is a key of
 * its transition table, including states with no outgoing edges.
 *
 * Fragments are only mutated by the construction rule that creates
 * them. Once a fragment is handed to another rule it is read, never
 * written.
 */
export class Fragment {
  readonly start: State;
  readonly accept: State;
  private readonly table: Map<State, MutTransitionRow> = new Map();

  constructor(start: State, accept: State) {
    this.start = start;
    this.accept = accept;
    this.row(start);
    this.row(accept);
  }

  get transitions(): TransitionTable {
    return this.table;
  }

  private row(state: State): MutTransitionRow {
    let row = this.table.get(state);
    if (row === undefined) {
      row = newTransitionRow();
      this.table.set(state, row);
    }
    return row;
  }

  /**
   * Add a labeled edge between states in the fragment, creating the
   * table entries for either state if they don't exist yet.
   */
  addTransition(fromState: State, l: Label, toState: State): this {
    const row = this.row(fromState);
    this.row(toState);
    let destinations = row.get(l);
    if (destinations === undefined) {
      destinations = new Set();
      row.set(l, destinations);
    }
    destinations.add(toState);
    return this;
  }

  /**
   * Copy every state and edge of other into this fragment.
   *
   * Destination sets are copied rather than shared, so later changes
   * to either fragment are never visible through the other.
   */
  merge(other: Fragment): this {
    for (const [state, row] of other.table) {
      this.row(state);
      for (const [l, destinations] of row) {
        for (const destination of destinations) {
          this.addTransition(state, l, destination);
        }
      }
    }
    return this;
  }

  /**
   * Number of edges in the fragment, counting each destination separately.
   */
  get numTransitions(): number {
    let count = 0;
    for (const row of this.table.values()) {
      for (const destinations of row.values()) {
        count += destinations.size;
      }
    }
    return count;
  }
}
