import {
  InvalidPostfixError,
  MalformedExpressionError,
  RegexErrorKind,
  UnexpectedSymbolError,
} from './errors.js';

describe('RegexError', () => {
  test('carries the offending symbol and position', () => {
    const error = new UnexpectedSymbolError('bad token', { char: '#', pos: 4 });
    expect(error.kind).toBe(RegexErrorKind.UNEXPECTED_SYMBOL);
    expect(error.name).toBe('UnexpectedSymbolError');
    expect(error.symbol).toBe('#');
    expect(error.pos).toBe(4);
    expect(error.message).toBe('UnexpectedSymbolError at 4: bad token');
  });

  test('attachSource() marks the position', () => {
    const error = new MalformedExpressionError('unbalanced', {
      char: '(',
      pos: 0,
    });
    error.attachSource('(ab');
    expect(error.message).toBe(
      ['MalformedExpressionError at 0: unbalanced', '  (ab', '  ^'].join('\n')
    );
  });

  test('attachSource() without a position leaves the message alone', () => {
    const error = new InvalidPostfixError('leftovers');
    error.attachSource('ab');
    expect(error.symbol).toBeUndefined();
    expect(error.message).toBe('InvalidPostfixError at end of input: leftovers');
  });
});
