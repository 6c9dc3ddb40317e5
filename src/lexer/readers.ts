/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';
import { InvalidLexemeError } from './errors.js';
import {
  isDigit,
  isIdentifierChar,
  isLetter,
  makeLiteralToken,
  makeToken,
} from './helpers.js';
import {
  advance,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/**
 * Read a numeral: digits with at most one decimal point.
 * A second `.`, or a letter or `_` anywhere in the run, fails against the
 * first character of the run.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  const first = peek(state);
  let value = advance(state);
  let hasDecimalPoint = false;

  while (!isAtEnd(state)) {
    const ch = peek(state);
    if (ch === '.') {
      if (hasDecimalPoint) {
        throw new InvalidLexemeError(first, start);
      }
      hasDecimalPoint = true;
    } else if (isLetter(ch) || ch === '_') {
      throw new InvalidLexemeError(first, start);
    } else if (!isDigit(ch)) {
      break;
    }
    value += advance(state);
  }

  if (hasDecimalPoint) {
    return makeLiteralToken(
      TOKEN_TYPES.FLOAT_LITERAL,
      value,
      Number(value),
      start
    );
  }
  return makeLiteralToken(
    TOKEN_TYPES.INTEGER_LITERAL,
    value,
    parseInteger(value),
    start
  );
}

function parseInteger(digits: string): number | bigint {
  const parsed = Number.parseInt(digits, 10);
  return Number.isSafeInteger(parsed) ? parsed : BigInt(digits);
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = advance(state);

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.IDENTIFIER, value, start);
}
