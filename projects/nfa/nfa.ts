import { Table } from '../utils/data-structures/table.js';
import type { IHaveDebugStr } from '../utils/debug.js';
import type { ConstSet } from '../utils/sets.js';
import {
  type Fragment,
  type MutTransitionRow,
  newTransitionRow,
  type TransitionTable,
} from './fragment.js';
import {
  EPSILON,
  isEpsilon,
  type Label,
  label,
  labelToString,
  type State,
} from './label.js';

export type Edge = [fromState: State, label: Label, toState: State];

const NO_STATES: ConstSet<State> = new Set<State>();

/**
 * The automaton produced by Thompson's construction.
 *
 * An NFA owns a private copy of its transition table and never
 * changes after it has been constructed.
 */
export class NFA implements IHaveDebugStr {
  readonly startState: State;
  readonly acceptState: State;
  readonly transitions: TransitionTable;

  constructor(
    startState: State,
    acceptState: State,
    transitions: TransitionTable
  ) {
    if (!transitions.has(startState)) {
      throw new Error(
        `IndexError: start state ${startState} is not in the transition table`
      );
    }
    if (!transitions.has(acceptState)) {
      throw new Error(
        `IndexError: accept state ${acceptState} is not in the transition table`
      );
    }
    const table: Map<State, MutTransitionRow> = new Map();
    for (const [state, row] of transitions) {
      const copy = newTransitionRow();
      for (const [l, destinations] of row) {
        copy.set(l, new Set(destinations));
      }
      table.set(state, copy);
    }
    for (const destinations of table.values()) {
      for (const set of destinations.values()) {
        for (const state of set) {
          if (!table.has(state)) {
            throw new Error(
              `IndexError: state ${state} is a destination but not in the transition table`
            );
          }
        }
      }
    }
    this.startState = startState;
    this.acceptState = acceptState;
    this.transitions = table;
  }

  static fromFragment(fragment: Fragment): NFA {
    return new NFA(fragment.start, fragment.accept, fragment.transitions);
  }

  /**
   * All states of the automaton in ascending order.
   */
  get states(): State[] {
    return [...this.transitions.keys()].sort((a, b) => a - b);
  }

  get numStates(): number {
    return this.transitions.size;
  }

  /**
   * The literal characters that appear on at least one edge, sorted.
   */
  get alphabet(): string[] {
    const chars: Set<string> = new Set();
    for (const [, l] of this.edges()) {
      if (l.kind == 'char') {
        chars.add(l.char);
      }
    }
    return [...chars].sort();
  }

  /**
   * Get all the states you can get to from the given state by
   * following edges with the given label.
   */
  getNextStates(state: State, l: Label | string): ConstSet<State> {
    if (typeof l == 'string') {
      l = label(l);
    }
    return this.transitions.get(state)?.get(l) ?? NO_STATES;
  }

  isAcceptingState(state: State): boolean {
    return state == this.acceptState;
  }

  *edges(): IterableIterator<Edge> {
    for (const state of this.states) {
      const row = this.transitions.get(state);
      if (row === undefined) {
        continue;
      }
      for (const [l, destinations] of row) {
        for (const destination of [...destinations].sort((a, b) => a - b)) {
          yield [state, l, destination];
        }
      }
    }
  }

  toDebugStr(): string {
    const columns: Label[] = this.alphabet.map((char) => label(char));
    if ([...this.edges()].some(([, l]) => isEpsilon(l))) {
      columns.push(EPSILON);
    }
    const states = this.states;
    const table: Table<string> = Table.init(
      1 + states.length,
      1 + columns.length,
      () => ''
    );
    table.setCell(0, 0, 'δ');
    for (const [ci, l] of columns.entries()) {
      table.setCell(0, ci + 1, labelToString(l));
    }

    const stateLabel = (s: State) => {
      let out = 's' + s;
      if (this.isAcceptingState(s)) {
        out = '*' + out;
      }
      if (s == this.startState) {
        out = '>' + out;
      }
      return out;
    };

    for (const [si, state] of states.entries()) {
      table.setCell(si + 1, 0, stateLabel(state) + ':');
      for (const [ci, l] of columns.entries()) {
        const nextStates = [...this.getNextStates(state, l)];
        nextStates.sort((a, b) => a - b);
        table.setCell(
          si + 1,
          ci + 1,
          nextStates.length == 0 ? '_' : nextStates.map(stateLabel).join(',')
        );
      }
    }
    return table.toDebugStr();
  }
}
