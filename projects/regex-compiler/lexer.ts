import { colors } from '../utils/debug.js';
import { collect } from '../utils/iter.js';

export enum Token {
  CHAR = 'CHAR',
  STAR = 'STAR',
  PLUS = 'PLUS',
  OPTIONAL = 'OPTIONAL',
  OR = 'OR',
  CONCAT = 'CONCAT',
  OPEN_PAREN = 'OPEN_PAREN',
  CLOSE_PAREN = 'CLOSE_PAREN',
}

export const CONCAT_CHAR = '.';

const SYMBOLS: ReadonlyMap<string, Token> = new Map([
  ['*', Token.STAR],
  ['+', Token.PLUS],
  ['?', Token.OPTIONAL],
  ['|', Token.OR],
  [CONCAT_CHAR, Token.CONCAT],
  ['(', Token.OPEN_PAREN],
  [')', Token.CLOSE_PAREN],
]);

/**
 * Classify a single character. Anything that isn't one of the
 * operator symbols is a literal.
 */
export function tokenFor(char: string): Token {
  return SYMBOLS.get(char) ?? Token.CHAR;
}

export function isPostfixOperator(token: Token): boolean {
  return (
    token == Token.STAR || token == Token.PLUS || token == Token.OPTIONAL
  );
}

export class Lexeme {
  token: Token;
  /**
   * Index of the character in the expression it was read from.
   */
  pos: number;
  char: string;
  constructor(token: Token, pos: number, char: string) {
    this.token = token;
    this.pos = pos;
    this.char = char;
  }
  toString() {
    return (
      colors.green(`<${this.token}>`) +
      this.char +
      colors.green(`</${this.token}>`)
    );
  }
}

export class Lexer implements Iterator<Lexeme> {
  private input: string;
  private index: number = 0;

  constructor(input: string) {
    this.input = input;
  }

  next(): IteratorResult<Lexeme> {
    if (this.index >= this.input.length) {
      return { done: true, value: undefined };
    }
    const pos = this.index++;
    const char = this.input[pos];
    return { done: false, value: new Lexeme(tokenFor(char), pos, char) };
  }
}

export function lex(input: string): Lexeme[] {
  return collect(new Lexer(input));
}

export function formatTokens(tokens: Iterable<Lexeme>): string {
  let out = '';
  for (const lexeme of tokens) {
    out += lexeme.char;
  }
  return out;
}
