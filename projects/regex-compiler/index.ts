export { regexToNFA, regexToNFAOrThrow } from './regex-nfa.js';
export { insertConcatenation, insertConcatenationTokens } from './concat.js';
export { infixToPostfix, toPostfix } from './postfix.js';
export { postfixToNFA } from './thompson.js';
export { formatTokens, lex, Lexeme, Lexer, Token } from './lexer.js';
export {
  InvalidPostfixError,
  MalformedExpressionError,
  RegexError,
  RegexErrorKind,
  UnexpectedSymbolError,
} from './errors.js';
export { NFA, type Edge } from '../nfa/nfa.js';
export { EPSILON, label, type Label, type State } from '../nfa/label.js';
export type { TransitionTable } from '../nfa/fragment.js';
export { logger, useColors } from '../utils/debug.js';
