/**
 * This file implements the McNaughton-Yamada-Thompson algorithm
 * for converting regular expressions to NFAs. You can find a
 * description in Section 3.7.4 of the dragon book (p. 159):
 * "Construction of an NFA from a Regular Expression".
 *
 * The expression is consumed in postfix order. Each literal pushes a
 * new fragment onto a stack, and each operator pops its operands off
 * the stack and pushes the fragment that combines them.
 */
import { err, ok, Result } from 'neverthrow';
import { Fragment } from '../nfa/fragment.js';
import { EPSILON, label } from '../nfa/label.js';
import { NFA } from '../nfa/nfa.js';
import { StateCounter } from '../nfa/state-counter.js';
import { log } from '../utils/debug.js';
import {
  InvalidPostfixError,
  type RegexError,
  UnexpectedSymbolError,
} from './errors.js';
import { lex, type Lexeme, Token } from './lexer.js';

/**
 * A fragment together with the counter to allocate the next state from.
 */
export type Built = { fragment: Fragment; counter: StateCounter };

/**
 * start --char--> accept
 */
export function literalFragment(char: string, counter: StateCounter): Built {
  const [start, accept, next] = counter.allocatePair();
  const fragment = new Fragment(start, accept).addTransition(
    start,
    label(char),
    accept
  );
  return { fragment, counter: next };
}

/**
 * Match inner zero or more times.
 */
export function starFragment(inner: Fragment, counter: StateCounter): Built {
  const [start, accept, next] = counter.allocatePair();
  const fragment = new Fragment(start, accept)
    .merge(inner)
    .addTransition(start, EPSILON, inner.start)
    .addTransition(inner.accept, EPSILON, inner.start)
    .addTransition(start, EPSILON, accept)
    .addTransition(inner.accept, EPSILON, accept);
  return { fragment, counter: next };
}

/**
 * Match inner one or more times.
 */
export function plusFragment(inner: Fragment, counter: StateCounter): Built {
  const [start, accept, next] = counter.allocatePair();
  const fragment = new Fragment(start, accept)
    .merge(inner)
    .addTransition(start, EPSILON, inner.start)
    .addTransition(inner.accept, EPSILON, inner.start)
    .addTransition(inner.accept, EPSILON, accept);
  return { fragment, counter: next };
}

/**
 * Match inner zero or one times.
 */
export function optionalFragment(
  inner: Fragment,
  counter: StateCounter
): Built {
  const [start, accept, next] = counter.allocatePair();
  const fragment = new Fragment(start, accept)
    .merge(inner)
    .addTransition(start, EPSILON, inner.start)
    .addTransition(inner.accept, EPSILON, accept)
    .addTransition(start, EPSILON, accept);
  return { fragment, counter: next };
}

/**
 * Match left followed by right. No new states are needed.
 */
export function concatFragments(left: Fragment, right: Fragment): Fragment {
  return new Fragment(left.start, right.accept)
    .merge(left)
    .merge(right)
    .addTransition(left.accept, EPSILON, right.start);
}

/**
 * Match either left or right.
 */
export function unionFragments(
  left: Fragment,
  right: Fragment,
  counter: StateCounter
): Built {
  const [start, accept, next] = counter.allocatePair();
  const fragment = new Fragment(start, accept)
    .merge(left)
    .merge(right)
    .addTransition(start, EPSILON, left.start)
    .addTransition(start, EPSILON, right.start)
    .addTransition(left.accept, EPSILON, accept)
    .addTransition(right.accept, EPSILON, accept);
  return { fragment, counter: next };
}

/**
 * Pop the operands of an operator off the stack, in the order they
 * were pushed (left operand first).
 */
function popOperands(
  stack: Fragment[],
  count: number,
  operator: Lexeme
): Result<Fragment[], InvalidPostfixError> {
  if (stack.length < count) {
    return err(
      new InvalidPostfixError(
        `'${operator.char}' needs ${count} operand(s) but only ${stack.length} available`,
        operator
      )
    );
  }
  return ok(stack.splice(stack.length - count, count));
}

/**
 * Build the fragment for a single postfix token, popping whatever
 * operands it needs off the stack.
 */
function evaluate(
  lexeme: Lexeme,
  stack: Fragment[],
  counter: StateCounter
): Result<Built, RegexError> {
  switch (lexeme.token) {
    case Token.CHAR:
      return ok(literalFragment(lexeme.char, counter));
    case Token.STAR:
      return popOperands(stack, 1, lexeme).map(([inner]) =>
        starFragment(inner, counter)
      );
    case Token.PLUS:
      return popOperands(stack, 1, lexeme).map(([inner]) =>
        plusFragment(inner, counter)
      );
    case Token.OPTIONAL:
      return popOperands(stack, 1, lexeme).map(([inner]) =>
        optionalFragment(inner, counter)
      );
    case Token.CONCAT:
      return popOperands(stack, 2, lexeme).map(([left, right]) => ({
        fragment: concatFragments(left, right),
        counter,
      }));
    case Token.OR:
      return popOperands(stack, 2, lexeme).map(([left, right]) =>
        unionFragments(left, right, counter)
      );
    case Token.OPEN_PAREN:
    case Token.CLOSE_PAREN:
      return err(
        new UnexpectedSymbolError(
          `'${lexeme.char}' can not appear in a postfix expression`,
          lexeme
        )
      );
    default: {
      const token: never = lexeme.token;
      return err(
        new UnexpectedSymbolError(`unknown token ${token}`, lexeme)
      );
    }
  }
}

/**
 * Build an NFA from an expression in postfix order, e.g. "ab|?a.".
 *
 * State ids start at 0 for every call.
 */
export function postfixToNFA(
  postfix: string | readonly Lexeme[]
): Result<NFA, RegexError> {
  const tokens = typeof postfix == 'string' ? lex(postfix) : postfix;
  const stack: Fragment[] = [];
  let counter = StateCounter.initial;

  for (const lexeme of tokens) {
    const result = evaluate(lexeme, stack, counter);
    if (result.isErr()) {
      return err(result.error);
    }
    const { fragment } = result.value;
    counter = result.value.counter;
    log(
      'thompson:',
      lexeme.char,
      `-> s${fragment.start}..s${fragment.accept}`,
      `(${fragment.numTransitions} transitions)`
    );
    stack.push(fragment);
  }

  if (stack.length != 1) {
    return err(
      new InvalidPostfixError(
        `expected exactly one fragment once the input is consumed, found ${stack.length}`
      )
    );
  }
  return ok(NFA.fromFragment(stack[0]));
}
