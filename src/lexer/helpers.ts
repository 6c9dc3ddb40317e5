/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type {
  EofToken,
  LiteralToken,
  LiteralTokenType,
  SourceLocation,
  SymbolToken,
  SymbolTokenType,
} from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { advance, type LexerState } from './state.js';

const LETTER = /^\p{L}$/u;
const IDENTIFIER_CHAR = /^[\p{L}\p{Nd}_]$/u;

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isLetter(ch: string): boolean {
  return LETTER.test(ch);
}

/** Identifiers must start with a letter; underscore is only allowed after it */
export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch);
}

export function isIdentifierChar(ch: string): boolean {
  return IDENTIFIER_CHAR.test(ch);
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ';
}

export function makeToken(
  type: SymbolTokenType,
  lexeme: string,
  start: SourceLocation
): SymbolToken {
  return {
    type,
    lexeme,
    line: start.line,
    column: start.column,
    literal: null,
  };
}

export function makeLiteralToken(
  type: LiteralTokenType,
  lexeme: string,
  literal: number | bigint,
  start: SourceLocation
): LiteralToken {
  return { type, lexeme, line: start.line, column: start.column, literal };
}

export function makeEofToken(location: SourceLocation): EofToken {
  return {
    type: TOKEN_TYPES.EOF,
    lexeme: null,
    line: location.line,
    column: location.column,
    literal: null,
  };
}

/** Advance n times and return a token */
export function advanceAndMakeToken(
  state: LexerState,
  n: number,
  type: SymbolTokenType,
  lexeme: string,
  start: SourceLocation
): SymbolToken {
  for (let i = 0; i < n; i++) advance(state);
  return makeToken(type, lexeme, start);
}
