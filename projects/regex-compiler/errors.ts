import type { Lexeme } from './lexer.js';

export enum RegexErrorKind {
  MALFORMED_EXPRESSION = 'MalformedExpressionError',
  UNEXPECTED_SYMBOL = 'UnexpectedSymbolError',
  INVALID_POSTFIX = 'InvalidPostfixError',
}

export const atString = (pos: number | undefined) =>
  pos === undefined ? 'end of input' : `${pos}`;

const atSource = (source: string, pos: number): string[] => [
  source,
  '^'.padStart(pos + 1, '-'),
];

/**
 * Base class of every error raised while turning an expression
 * into an automaton.
 */
export abstract class RegexError extends Error {
  readonly kind: RegexErrorKind;
  /**
   * The offending character, when there is one.
   */
  readonly symbol?: string;
  /**
   * Index of the offending character in the expression.
   */
  readonly pos?: number;
  private _message: string;
  private source?: string;

  protected constructor(
    kind: RegexErrorKind,
    message: string,
    at?: Pick<Lexeme, 'char' | 'pos'>
  ) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this._message = message;
    this.symbol = at?.char;
    this.pos = at?.pos;
    this.message = this.getMessage();
  }

  getMessage() {
    const lines = [`${this.kind} at ${atString(this.pos)}: ${this._message}`];
    if (this.source !== undefined && this.pos !== undefined) {
      lines.push(
        ...atSource(this.source, this.pos).map((line) => `  ` + line)
      );
    }
    return lines.join('\n');
  }

  /**
   * Include the expression, with the offending position marked,
   * in the error message.
   */
  attachSource(source: string) {
    this.source = source;
    this.message = this.getMessage();
  }
}

/**
 * Grouping markers that don't pair up.
 */
export class MalformedExpressionError extends RegexError {
  constructor(message: string, at?: Pick<Lexeme, 'char' | 'pos'>) {
    super(RegexErrorKind.MALFORMED_EXPRESSION, message, at);
  }
}

/**
 * A token in a postfix stream that is neither a literal nor an operator.
 */
export class UnexpectedSymbolError extends RegexError {
  constructor(message: string, at?: Pick<Lexeme, 'char' | 'pos'>) {
    super(RegexErrorKind.UNEXPECTED_SYMBOL, message, at);
  }
}

/**
 * An operator without enough operands, or operands left over
 * once the postfix stream is exhausted.
 */
export class InvalidPostfixError extends RegexError {
  constructor(message: string, at?: Pick<Lexeme, 'char' | 'pos'>) {
    super(RegexErrorKind.INVALID_POSTFIX, message, at);
  }
}
