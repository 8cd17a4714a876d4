import {
  CONCAT_CHAR,
  formatTokens,
  isPostfixOperator,
  lex,
  Lexeme,
  Token,
} from './lexer.js';

/**
 * Whether an explicit concatenation operator belongs between
 * two adjacent tokens.
 *
 * One is inserted unless the first token opens a group or an
 * alternation, or the second closes a group, starts an alternation
 * or applies a repetition operator.
 */
export function needsConcat(current: Token, next: Token): boolean {
  if (current == Token.OPEN_PAREN || current == Token.OR) {
    return false;
  }
  if (
    next == Token.CLOSE_PAREN ||
    next == Token.OR ||
    isPostfixOperator(next)
  ) {
    return false;
  }
  return true;
}

/**
 * Copy the tokens, inserting a CONCAT token wherever concatenation
 * is implied. The inserted tokens point at the token that follows them.
 *
 * Nothing is validated here; unbalanced parens and misplaced operators
 * are reported by later stages. A '.' already in the input is treated
 * like any other symbol, so "a.b" becomes "a...b" and fails to evaluate.
 */
export function insertConcatenationTokens(tokens: readonly Lexeme[]): Lexeme[] {
  const explicit: Lexeme[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const current = tokens[i];
    explicit.push(current);
    if (i + 1 < tokens.length) {
      const next = tokens[i + 1];
      if (needsConcat(current.token, next.token)) {
        explicit.push(new Lexeme(Token.CONCAT, next.pos, CONCAT_CHAR));
      }
    }
  }
  return explicit;
}

/**
 * Rewrite an expression so that every concatenation is written
 * out with the '.' operator, e.g. "(a|b)?a" becomes "(a|b)?.a".
 */
export function insertConcatenation(expression: string): string {
  return formatTokens(insertConcatenationTokens(lex(expression)));
}
