/**
 * Operator Lookup Tables
 */

import type { SymbolTokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: ReadonlyMap<string, SymbolTokenType> =
  new Map([['==', TOKEN_TYPES.EQ]]);

/** Single-character operator lookup table (a lone `=` is not an operator) */
export const SINGLE_CHAR_OPERATORS: ReadonlyMap<string, SymbolTokenType> =
  new Map([
    ['(', TOKEN_TYPES.LPAREN],
    [')', TOKEN_TYPES.RPAREN],
    [',', TOKEN_TYPES.COMMA],
  ]);
