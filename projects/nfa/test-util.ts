import { EPSILON, label, labelKey, type State } from './label.js';
import type { NFA } from './nfa.js';

/**
 * The set of states reachable from the given states by
 * only traversing epsilon edges.
 */
export function epsilonClosure(
  nfa: NFA,
  startStates: Iterable<State>
): Set<State> {
  let visited: Set<State> = new Set();
  let toVisit: State[] = [...startStates];
  while (toVisit.length > 0) {
    const current = toVisit.pop();
    if (current === undefined || visited.has(current)) {
      continue;
    }
    visited.add(current);
    for (const nextState of nfa.getNextStates(current, EPSILON)) {
      if (!visited.has(nextState)) {
        toVisit.push(nextState);
      }
    }
  }
  return visited;
}

/**
 * move(T,a)
 *
 * Set of NFA states to which there is a transition on
 * input symbol a from some state s in T.
 */
export function move(
  nfa: NFA,
  startStates: Iterable<State>,
  char: string
): Set<State> {
  let set: Set<State> = new Set();
  for (const state of startStates) {
    for (const nextState of nfa.getNextStates(state, label(char))) {
      set.add(nextState);
    }
  }
  return set;
}

/**
 * Simulate the nfa on the whole input.
 */
export function accepts(nfa: NFA, input: string): boolean {
  let current = epsilonClosure(nfa, [nfa.startState]);
  for (let i = 0; i < input.length; i++) {
    current = epsilonClosure(nfa, move(nfa, current, input[i]));
  }
  return current.has(nfa.acceptState);
}

/**
 * Render the nfa with its states renumbered in the order a breadth
 * first traversal from the start state reaches them. Two nfas with
 * the same shape render to the same string regardless of their ids.
 */
export function canonicalForm(nfa: NFA): string {
  const renamed: Map<State, number> = new Map();
  const queue: State[] = [nfa.startState];
  renamed.set(nfa.startState, 0);
  const lines: string[] = [];
  for (let i = 0; i < queue.length; i++) {
    const state = queue[i];
    const row = nfa.transitions.get(state);
    if (row === undefined) {
      continue;
    }
    const entries = [...row].sort(([a], [b]) =>
      labelKey(a) < labelKey(b) ? -1 : labelKey(a) > labelKey(b) ? 1 : 0
    );
    for (const [l, destinations] of entries) {
      for (const destination of [...destinations].sort((a, b) => a - b)) {
        if (!renamed.has(destination)) {
          renamed.set(destination, renamed.size);
          queue.push(destination);
        }
        lines.push(
          `${renamed.get(state)} -${labelKey(l)}-> ${renamed.get(destination)}`
        );
      }
    }
  }
  lines.sort();
  return [
    `start ${renamed.get(nfa.startState)}`,
    `accept ${renamed.get(nfa.acceptState)}`,
    `states ${nfa.numStates}`,
    ...lines,
  ].join('\n');
}
