import type { Result } from 'neverthrow';
import type { NFA } from '../nfa/nfa.js';
import { log } from '../utils/debug.js';
import { insertConcatenationTokens } from './concat.js';
import type { RegexError } from './errors.js';
import { formatTokens, lex } from './lexer.js';
import { toPostfix } from './postfix.js';
import { postfixToNFA } from './thompson.js';

/**
 * Convert a regular expression to an NFA that recognizes the same
 * language.
 *
 * Supported syntax is single character literals, grouping with
 * parens, alternation with '|', concatenation (implicit, or written
 * as '.'), and the postfix operators '*', '+' and '?'.
 *
 * Errors from any stage are returned as is. Positions in the errors
 * refer to the expression that was passed in.
 */
export function regexToNFA(expression: string): Result<NFA, RegexError> {
  const explicit = insertConcatenationTokens(lex(expression));
  log('regex:', expression, '-> explicit:', formatTokens(explicit));
  return toPostfix(explicit).andThen((postfix) => {
    log('regex:', expression, '-> postfix:', formatTokens(postfix));
    return postfixToNFA(postfix);
  });
}

/**
 * Like regexToNFA(), but throws the error (with the expression
 * attached to its message) instead of returning it.
 */
export function regexToNFAOrThrow(expression: string): NFA {
  const result = regexToNFA(expression);
  if (result.isErr()) {
    result.error.attachSource(expression);
    throw result.error;
  }
  return result.value;
}
