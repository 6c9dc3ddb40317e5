/**
 * Lexer Module
 * Converts source text into tokens
 */

export { InvalidLexemeError } from './errors.js';
export { Lexer } from './lexer.js';
export { createLexerState, type LexerState } from './state.js';
export {
  nextToken,
  tokenize,
  tryTokenize,
  type LexErrorEvent,
  type LexerCallbacks,
  type TokenizeOptions,
  type TokenizeResult,
} from './tokenizer.js';
