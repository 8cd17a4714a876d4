import { EPSILON, label } from '../nfa/label.js';
import type { NFA } from '../nfa/nfa.js';
import { StateCounter } from '../nfa/state-counter.js';
import {
  InvalidPostfixError,
  RegexErrorKind,
  UnexpectedSymbolError,
} from './errors.js';
import {
  concatFragments,
  literalFragment,
  postfixToNFA,
  starFragment,
} from './thompson.js';

function edgeList(nfa: NFA) {
  return [...nfa.edges()].map(
    ([from, l, to]) => `${from} -${l.kind == 'char' ? l.char : 'ϵ'}-> ${to}`
  );
}

describe('construction rules', () => {
  test('literalFragment()', () => {
    const { fragment, counter } = literalFragment('a', StateCounter.initial);
    expect([fragment.start, fragment.accept]).toEqual([0, 1]);
    expect(counter.allocated).toBe(2);
    expect([...(fragment.transitions.get(0)?.get(label('a')) ?? [])]).toEqual(
      [1]
    );
  });

  test('starFragment() leaves its operand untouched', () => {
    const a = literalFragment('a', StateCounter.initial);
    const star = starFragment(a.fragment, a.counter);
    expect([star.fragment.start, star.fragment.accept]).toEqual([2, 3]);
    expect(star.fragment.numTransitions).toBe(5);
    expect(a.fragment.numTransitions).toBe(1);
    expect(a.fragment.transitions.get(1)?.get(EPSILON)).toBeUndefined();
  });

  test('concatFragments() allocates no states', () => {
    const a = literalFragment('a', StateCounter.initial);
    const b = literalFragment('b', a.counter);
    const ab = concatFragments(a.fragment, b.fragment);
    expect([ab.start, ab.accept]).toEqual([0, 3]);
    expect(b.counter.allocated).toBe(4);
    expect([...(ab.transitions.get(1)?.get(EPSILON) ?? [])]).toEqual([2]);
  });
});

describe('postfixToNFA', () => {
  test('literal', () => {
    const nfa = postfixToNFA('a')._unsafeUnwrap();
    expect([nfa.startState, nfa.acceptState]).toEqual([0, 1]);
    expect(edgeList(nfa)).toEqual(['0 -a-> 1']);
  });

  test('star', () => {
    const nfa = postfixToNFA('a*')._unsafeUnwrap();
    expect([nfa.startState, nfa.acceptState]).toEqual([2, 3]);
    expect(edgeList(nfa)).toEqual([
      '0 -a-> 1',
      '1 -ϵ-> 0',
      '1 -ϵ-> 3',
      '2 -ϵ-> 0',
      '2 -ϵ-> 3',
    ]);
  });

  test('plus', () => {
    const nfa = postfixToNFA('a+')._unsafeUnwrap();
    expect([nfa.startState, nfa.acceptState]).toEqual([2, 3]);
    expect(edgeList(nfa)).toEqual([
      '0 -a-> 1',
      '1 -ϵ-> 0',
      '1 -ϵ-> 3',
      '2 -ϵ-> 0',
    ]);
  });

  test('optional', () => {
    const nfa = postfixToNFA('a?')._unsafeUnwrap();
    expect([nfa.startState, nfa.acceptState]).toEqual([2, 3]);
    expect(edgeList(nfa)).toEqual([
      '0 -a-> 1',
      '1 -ϵ-> 3',
      '2 -ϵ-> 0',
      '2 -ϵ-> 3',
    ]);
  });

  test('concat', () => {
    const nfa = postfixToNFA('ab.')._unsafeUnwrap();
    expect([nfa.startState, nfa.acceptState]).toEqual([0, 3]);
    expect(edgeList(nfa)).toEqual(['0 -a-> 1', '1 -ϵ-> 2', '2 -b-> 3']);
  });

  test('union', () => {
    const nfa = postfixToNFA('ab|')._unsafeUnwrap();
    expect([nfa.startState, nfa.acceptState]).toEqual([4, 5]);
    expect(edgeList(nfa)).toEqual([
      '0 -a-> 1',
      '1 -ϵ-> 5',
      '2 -b-> 3',
      '3 -ϵ-> 5',
      '4 -ϵ-> 0',
      '4 -ϵ-> 2',
    ]);
  });

  test('accepts lexed tokens', () => {
    const nfa = postfixToNFA('ab|?a.')._unsafeUnwrap();
    expect([nfa.startState, nfa.acceptState]).toEqual([6, 9]);
    expect(nfa.numStates).toBe(10);
  });

  describe('errors', () => {
    test('an operator without enough operands', () => {
      const error = postfixToNFA('a|')._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(InvalidPostfixError);
      expect(error.kind).toBe(RegexErrorKind.INVALID_POSTFIX);
      expect(error.symbol).toBe('|');
      expect(error.pos).toBe(1);
      expect(error.message).toBe(
        "InvalidPostfixError at 1: '|' needs 2 operand(s) but only 1 available"
      );
    });

    test('a unary operator on an empty stack', () => {
      const error = postfixToNFA('*')._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(InvalidPostfixError);
      expect(error.message).toBe(
        "InvalidPostfixError at 0: '*' needs 1 operand(s) but only 0 available"
      );
    });

    test('operands left over', () => {
      const error = postfixToNFA('ab')._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(InvalidPostfixError);
      expect(error.pos).toBeUndefined();
      expect(error.message).toBe(
        'InvalidPostfixError at end of input: expected exactly one fragment once the input is consumed, found 2'
      );
    });

    test('an empty expression', () => {
      expect(postfixToNFA('')._unsafeUnwrapErr().message).toBe(
        'InvalidPostfixError at end of input: expected exactly one fragment once the input is consumed, found 0'
      );
    });

    test('parens', () => {
      const error = postfixToNFA('ab(')._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(UnexpectedSymbolError);
      expect(error.kind).toBe(RegexErrorKind.UNEXPECTED_SYMBOL);
      expect(error.symbol).toBe('(');
      expect(error.pos).toBe(2);
      expect(error.message).toBe(
        "UnexpectedSymbolError at 2: '(' can not appear in a postfix expression"
      );
      expect(postfixToNFA(')')._unsafeUnwrapErr()).toBeInstanceOf(
        UnexpectedSymbolError
      );
    });
  });
});
