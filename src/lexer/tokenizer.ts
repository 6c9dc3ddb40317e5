/**
 * Tokenizer
 * Main tokenization logic
 */

import type { InvalidLexemeErrorData, Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { InvalidLexemeError } from './errors.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeEofToken,
} from './helpers.js';
import { SINGLE_CHAR_OPERATORS, TWO_CHAR_OPERATORS } from './operators.js';
import { readIdentifier, readNumber } from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
} from './state.js';

// ============================================================
// OPTIONS
// ============================================================

/** Event emitted when a scan fails */
export interface LexErrorEvent {
  readonly error: InvalidLexemeError;
  readonly source: string;
}

/** Observability hooks for tokenization; they observe and never alter tokens */
export interface LexerCallbacks {
  /**
   * Called for every token, including the end-of-stream token, in order.
   * Tokens are reported only after the whole scan succeeds.
   */
  onToken?: (token: Token) => void;
  /** Called once before an InvalidLexemeError propagates */
  onError?: (event: LexErrorEvent) => void;
}

export interface TokenizeOptions {
  callbacks?: LexerCallbacks | undefined;
}

export type TokenizeResult =
  | { readonly success: true; readonly tokens: Token[] }
  | { readonly success: false; readonly error: InvalidLexemeErrorData };

// ============================================================
// SCANNING
// ============================================================

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

export function nextToken(state: LexerState): Token {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    return makeEofToken(currentLocation(state));
  }

  const start = currentLocation(state);
  const ch = peek(state);

  // Identifier
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // Number (integer or float)
  if (isDigit(ch)) {
    return readNumber(state);
  }

  // Two-character operators
  const twoChar = peekString(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS.get(twoChar);
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  // Single-character delimiters
  const singleCharType = SINGLE_CHAR_OPERATORS.get(ch);
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  throw new InvalidLexemeError(ch, start);
}

/**
 * Tokenize source into a token list ending in a single EOF token.
 *
 * @throws InvalidLexemeError on the first character that cannot be lexed;
 * no partial token list is returned
 */
export function tokenize(source: string, options?: TokenizeOptions): Token[] {
  const state = createLexerState(source);
  const callbacks = options?.callbacks;
  const tokens: Token[] = [];
  let token: Token;

  try {
    do {
      token = nextToken(state);
      tokens.push(token);
    } while (token.type !== TOKEN_TYPES.EOF);
  } catch (err) {
    if (err instanceof InvalidLexemeError) {
      callbacks?.onError?.({ error: err, source });
    }
    throw err;
  }

  if (callbacks?.onToken) {
    for (const scanned of tokens) callbacks.onToken(scanned);
  }
  return tokens;
}

/** Tokenize without throwing; lex failures come back as error data */
export function tryTokenize(
  source: string,
  options?: TokenizeOptions
): TokenizeResult {
  try {
    return { success: true, tokens: tokenize(source, options) };
  } catch (err) {
    if (err instanceof InvalidLexemeError) {
      return { success: false, error: err.toData() };
    }
    throw err;
  }
}
