// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  INTEGER_LITERAL: 'INTEGER_LITERAL',
  FLOAT_LITERAL: 'FLOAT_LITERAL',

  // Identifiers
  IDENTIFIER: 'IDENTIFIER',

  // Comparison operators
  EQ: 'EQ', // ==

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  COMMA: 'COMMA', // ,

  // Special
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export type LiteralTokenType =
  | typeof TOKEN_TYPES.INTEGER_LITERAL
  | typeof TOKEN_TYPES.FLOAT_LITERAL;

export type SymbolTokenType = Exclude<
  TokenType,
  LiteralTokenType | typeof TOKEN_TYPES.EOF
>;

/** Identifier, delimiter and operator tokens */
export interface SymbolToken {
  readonly type: SymbolTokenType;
  readonly lexeme: string;
  readonly line: number;
  readonly column: number;
  readonly literal: null;
}

/**
 * Numeric literal; lexeme keeps the raw text, literal the parsed value.
 * Integers outside the safe integer range are kept exact as bigint.
 */
export interface LiteralToken {
  readonly type: LiteralTokenType;
  readonly lexeme: string;
  readonly line: number;
  readonly column: number;
  readonly literal: number | bigint;
}

export interface EofToken {
  readonly type: typeof TOKEN_TYPES.EOF;
  readonly lexeme: null;
  readonly line: number;
  readonly column: number;
  readonly literal: null;
}

export type Token = SymbolToken | LiteralToken | EofToken;
