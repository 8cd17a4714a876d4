import { err, ok, Result } from 'neverthrow';
import { peek } from '../utils/iter.js';
import { MalformedExpressionError } from './errors.js';
import { formatTokens, lex, type Lexeme, Token } from './lexer.js';

/**
 * Operator precedence, lowest to highest. An open paren only ever
 * sits on the operator stack as a sentinel, so it binds the loosest.
 */
export function precedence(token: Token): number {
  switch (token) {
    case Token.OPEN_PAREN:
      return 0;
    case Token.OR:
      return 1;
    case Token.CONCAT:
      return 2;
    case Token.STAR:
    case Token.PLUS:
    case Token.OPTIONAL:
      return 3;
    default:
      throw new Error(`${token} is not an operator`);
  }
}

/**
 * Convert tokens in infix order, with every concatenation explicit,
 * to postfix order using the shunting-yard algorithm.
 *
 * Operators of equal precedence are left associative: the one already
 * on the stack is emitted before the new one is pushed.
 */
export function toPostfix(
  tokens: readonly Lexeme[]
): Result<Lexeme[], MalformedExpressionError> {
  const output: Lexeme[] = [];
  const stack: Lexeme[] = [];

  for (const lexeme of tokens) {
    switch (lexeme.token) {
      case Token.OPEN_PAREN:
        stack.push(lexeme);
        break;
      case Token.CLOSE_PAREN: {
        while (true) {
          const top = stack.pop();
          if (top === undefined) {
            return err(
              new MalformedExpressionError(
                `found ')' without a matching '('`,
                lexeme
              )
            );
          }
          if (top.token == Token.OPEN_PAREN) {
            break;
          }
          output.push(top);
        }
        break;
      }
      case Token.OR:
      case Token.CONCAT:
      case Token.STAR:
      case Token.PLUS:
      case Token.OPTIONAL: {
        let top = peek(stack);
        while (
          top !== undefined &&
          precedence(top.token) >= precedence(lexeme.token)
        ) {
          output.push(top);
          stack.pop();
          top = peek(stack);
        }
        stack.push(lexeme);
        break;
      }
      case Token.CHAR:
        output.push(lexeme);
        break;
    }
  }

  for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
    if (top.token == Token.OPEN_PAREN) {
      return err(
        new MalformedExpressionError(`found '(' without a matching ')'`, top)
      );
    }
    output.push(top);
  }
  return ok(output);
}

/**
 * String form of toPostfix(). The '.' in the input is read as the
 * concatenation operator, e.g. "(a|b)?.a" becomes "ab|?a.".
 */
export function infixToPostfix(
  explicit: string
): Result<string, MalformedExpressionError> {
  return toPostfix(lex(explicit)).map(formatTokens);
}
